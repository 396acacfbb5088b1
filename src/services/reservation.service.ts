import type { ReservationStore } from '../dal/reservation.dal';
import type { BookingStatus, IsoDate, OnlineReservation } from '../types/reservation';

export interface ReservationFilters {
  /** Inclusive lower bound on check-in. */
  checkInFrom?: IsoDate;
  /** Inclusive upper bound on check-in. */
  checkInTo?: IsoDate;
  bookingStatus?: BookingStatus;
  properties?: string[];
  sort?: 'asc' | 'desc';
}

/**
 * The dashboard's reservation list. Rows without a check-in date never match
 * a date-range filter and sort last in either direction.
 */
export async function listReservations(
  store: ReservationStore,
  filters: ReservationFilters = {},
): Promise<OnlineReservation[]> {
  const all = await store.listAll();
  const properties = filters.properties?.length ? new Set(filters.properties) : null;
  const hasRange = Boolean(filters.checkInFrom || filters.checkInTo);

  const matching = all.filter((r) => {
    if (filters.bookingStatus && r.booking_status !== filters.bookingStatus) return false;
    if (properties && !properties.has(r.property)) return false;
    if (hasRange) {
      if (!r.check_in) return false;
      if (filters.checkInFrom && r.check_in < filters.checkInFrom) return false;
      if (filters.checkInTo && r.check_in > filters.checkInTo) return false;
    }
    return true;
  });

  const direction = filters.sort === 'asc' ? 1 : -1;
  return matching.sort((a, b) => {
    if (a.check_in === b.check_in) return a.booking_id.localeCompare(b.booking_id);
    if (!a.check_in) return 1;
    if (!b.check_in) return -1;
    return a.check_in < b.check_in ? -direction : direction;
  });
}
