import type {
  FetchOutcome,
  IPmsClient,
  LoginOutcome,
  PmsCredentials,
  RoomBookingsRequest,
} from '../interfaces/pms';
import type { PmsSession } from '../pms/session';

/**
 * Stub PMS client. Runs in process: returns scripted outcomes per hotel id,
 * or one canned booking per property when nothing is scripted.
 * Used for local development (PMS_ADAPTER=stub) and in tests.
 */
export class StubPmsClient implements IPmsClient {
  readonly pmsName = 'StubPMS';
  readonly calls: RoomBookingsRequest[] = [];
  private readonly scripted = new Map<string, FetchOutcome[]>();

  /** Queue outcomes for a hotel; each fetch takes the next one, the last one repeats. */
  script(hotelId: string, ...outcomes: FetchOutcome[]): this {
    this.scripted.set(hotelId, outcomes);
    return this;
  }

  async login(credentials: PmsCredentials): Promise<LoginOutcome> {
    return { kind: 'authenticated', token: `stub-token-${credentials.email}` };
  }

  async fetchRoomBookings(
    _session: PmsSession,
    request: RoomBookingsRequest,
  ): Promise<FetchOutcome> {
    this.calls.push(request);

    const queue = this.scripted.get(request.hotelId);
    const next = queue && queue.length > 1 ? queue.shift() : queue?.[0];
    return next ?? cannedBooking(request);
  }
}

function cannedBooking(request: RoomBookingsRequest): FetchOutcome {
  return {
    kind: 'success',
    records: [
      {
        bookingId: `STUB-${request.hotelId}-${request.from}`,
        guestName: 'Stub Guest',
        checkIn: `${request.from}T14:00:00`,
        checkOut: `${request.to}T11:00:00`,
        adults: 2,
        roomTypeName: 'Deluxe',
        status: 'CONFIRMED',
        totalAmount: 4500,
        paymentMade: 4500,
      },
    ],
  };
}
