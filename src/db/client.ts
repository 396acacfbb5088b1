import pg from 'pg';
import type { QueryResultRow } from 'pg';
import { env } from '../config/env';
import { logger } from '../config/logger';

// DATE columns come back as their 'YYYY-MM-DD' text instead of a local-midnight Date.
const PG_DATE_OID = 1082;
pg.types.setTypeParser(PG_DATE_OID, (value: string) => value);

/**
 * The slice of a pg Pool the data access layer depends on.
 * Tests provide an in-process implementation.
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<{ rows: R[]; rowCount: number | null }>;
}

// Single pool reused across the app. Connections open lazily on first query.
export const pool = new pg.Pool({ connectionString: env.DATABASE_URL });

pool.on('error', (err) => {
  logger.error({ err }, 'Idle PostgreSQL client error');
});

export const db: Queryable = {
  query: <R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]) =>
    pool.query<R>(text, values),
};
