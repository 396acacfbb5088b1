import type { CreateEventInput, EventRecord, EventWriter } from '@/dal/events.dal';
import type { InsertOutcome, ReservationStore } from '@/dal/reservation.dal';
import type { OnlineReservation } from '@/types/reservation';

/**
 * In-process ReservationStore with the same duplicate semantics as the
 * online_reservations unique index.
 */
export class InMemoryReservationStore implements ReservationStore {
  readonly rows: OnlineReservation[] = [];
  insertCalls = 0;
  /** booking ids whose insert should throw, simulating a store failure */
  readonly failOn = new Set<string>();

  constructor(seed: OnlineReservation[] = []) {
    this.rows.push(...seed);
  }

  async insert(record: OnlineReservation): Promise<InsertOutcome> {
    this.insertCalls++;
    if (this.failOn.has(record.booking_id)) {
      throw new Error(`insert failed for ${record.booking_id}`);
    }
    if (this.rows.some((r) => r.booking_id === record.booking_id)) return 'duplicate';
    this.rows.push(record);
    return 'inserted';
  }

  async listAll(): Promise<OnlineReservation[]> {
    return [...this.rows].sort((a, b) => (b.check_in ?? '').localeCompare(a.check_in ?? ''));
  }

  async listBookingIds(): Promise<Set<string>> {
    return new Set(this.rows.map((r) => r.booking_id));
  }
}

export class InMemoryEventWriter implements EventWriter {
  readonly events: EventRecord[] = [];

  async create(data: CreateEventInput): Promise<EventRecord> {
    const record = { id: `evt-${this.events.length + 1}`, ...data };
    this.events.push(record);
    return record;
  }

  types(): string[] {
    return this.events.map((e) => e.type);
  }
}
