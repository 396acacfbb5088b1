import type { Queryable } from '../db/client';
import { enforceFieldLimits } from '../normalization/transformer';
import {
  RESERVATION_COLUMNS,
  reservationRowSchema,
  type OnlineReservation,
} from '../types/reservation';

export type InsertOutcome = 'inserted' | 'duplicate';

/**
 * Persistence seam for canonical reservations. The sync service and the
 * query service depend on this interface, not on PostgreSQL.
 */
export interface ReservationStore {
  /** Resolves 'duplicate' on a booking_id collision; throws on any other failure. */
  insert(record: OnlineReservation): Promise<InsertOutcome>;
  /** Every reservation, latest check-in first. */
  listAll(): Promise<OnlineReservation[]>;
  listBookingIds(): Promise<Set<string>>;
}

const PG_UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === PG_UNIQUE_VIOLATION;
}

const INSERT_SQL = `INSERT INTO online_reservations (${RESERVATION_COLUMNS.join(', ')})
VALUES (${RESERVATION_COLUMNS.map((_, i) => `$${i + 1}`).join(', ')})`;

const SELECT_ALL_SQL = `SELECT ${RESERVATION_COLUMNS.join(', ')}
FROM online_reservations
ORDER BY check_in DESC NULLS LAST, booking_id ASC`;

const SELECT_IDS_SQL = 'SELECT booking_id FROM online_reservations';

/**
 * Data Access Layer for the online_reservations table.
 * Accepts any Queryable (pg pool or an in-process stand-in).
 */
export class ReservationDal implements ReservationStore {
  constructor(private readonly db: Queryable) {}

  async insert(record: OnlineReservation): Promise<InsertOutcome> {
    const bounded = enforceFieldLimits(record);
    try {
      await this.db.query(
        INSERT_SQL,
        RESERVATION_COLUMNS.map((column) => bounded[column]),
      );
      return 'inserted';
    } catch (err) {
      if (isUniqueViolation(err)) return 'duplicate';
      throw err;
    }
  }

  async listAll(): Promise<OnlineReservation[]> {
    const result = await this.db.query(SELECT_ALL_SQL);
    return result.rows.map((row) => reservationRowSchema.parse(row));
  }

  async listBookingIds(): Promise<Set<string>> {
    const result = await this.db.query<{ booking_id: string }>(SELECT_IDS_SQL);
    return new Set(result.rows.map((row) => row.booking_id));
  }
}
