import { describe, it, expect, vi } from 'vitest';
import type { Queryable } from '@/db/client';
import { isUniqueViolation, ReservationDal } from '@/dal/reservation.dal';
import { RESERVATION_COLUMNS } from '@/types/reservation';
import { reservation } from '../../helpers/fixtures';

function fakeDb(rows: unknown[] = []) {
  const query = vi.fn().mockResolvedValue({ rows, rowCount: rows.length });
  const db: Queryable = { query };
  return { db, query };
}

describe('ReservationDal.insert', () => {
  it('inserts every column in column order', async () => {
    const { db, query } = fakeDb();
    const record = reservation({ booking_id: 'BK-9', booking_amount: 1200 });

    await expect(new ReservationDal(db).insert(record)).resolves.toBe('inserted');

    const [text, values] = query.mock.calls[0] ?? [];
    expect(text).toContain('INSERT INTO online_reservations');
    expect(values).toEqual(RESERVATION_COLUMNS.map((column) => record[column]));
  });

  it('truncates overlength text before writing', async () => {
    const { db, query } = fakeDb();
    await new ReservationDal(db).insert(reservation({ guest_name: 'g'.repeat(70) }));

    const [, values] = query.mock.calls[0] ?? [];
    expect(values[RESERVATION_COLUMNS.indexOf('guest_name')]).toBe('g'.repeat(50));
  });

  it('reports a unique violation as a duplicate', async () => {
    const query = vi.fn().mockRejectedValue(
      Object.assign(new Error('duplicate key value'), { code: '23505' }),
    );
    await expect(new ReservationDal({ query }).insert(reservation())).resolves.toBe('duplicate');
  });

  it('rethrows any other failure', async () => {
    const query = vi.fn().mockRejectedValue(
      Object.assign(new Error('value too long'), { code: '22001' }),
    );
    await expect(new ReservationDal({ query }).insert(reservation())).rejects.toThrow(
      'value too long',
    );
  });
});

describe('ReservationDal reads', () => {
  it('parses stored rows, coercing NUMERIC strings and null text', async () => {
    const { db } = fakeDb([
      { ...reservation({ booking_id: 'BK-5' }), booking_amount: '1200.50', remarks: null },
    ]);

    const [row] = await new ReservationDal(db).listAll();

    expect(row?.booking_id).toBe('BK-5');
    expect(row?.booking_amount).toBe(1200.5);
    expect(row?.remarks).toBe('');
  });

  it('orders by check-in descending', async () => {
    const { db, query } = fakeDb();
    await new ReservationDal(db).listAll();
    expect(query.mock.calls[0]?.[0]).toContain('ORDER BY check_in DESC NULLS LAST');
  });

  it('returns the stored booking ids as a set', async () => {
    const { db } = fakeDb([{ booking_id: 'BK-1' }, { booking_id: 'BK-2' }]);
    const ids = await new ReservationDal(db).listBookingIds();
    expect([...ids]).toEqual(['BK-1', 'BK-2']);
  });
});

describe('isUniqueViolation', () => {
  it('matches only the unique violation code', () => {
    expect(isUniqueViolation({ code: '23505' })).toBe(true);
    expect(isUniqueViolation({ code: '23503' })).toBe(false);
    expect(isUniqueViolation(new Error('boom'))).toBe(false);
    expect(isUniqueViolation(null)).toBe(false);
  });
});
