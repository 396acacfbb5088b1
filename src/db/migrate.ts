import fs from 'node:fs';
import path from 'node:path';
import { logger } from '../config/logger';
import { db, pool, type Queryable } from './client';

const MIGRATIONS_DIR = path.join(__dirname, 'migrations');

/** Apply every .sql file in migrations/, in file-name order. Statements are idempotent. */
export async function runMigrations(client: Queryable, dir = MIGRATIONS_DIR): Promise<string[]> {
  const files = fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  for (const file of files) {
    const sql = fs.readFileSync(path.join(dir, file), 'utf8');
    await client.query(sql);
    logger.info({ file }, 'Migration applied');
  }
  return files;
}

if (require.main === module) {
  runMigrations(db)
    .then(() => pool.end())
    .catch(async (err: unknown) => {
      logger.error({ err }, 'Migration failed');
      await pool.end();
      process.exit(1);
    });
}
