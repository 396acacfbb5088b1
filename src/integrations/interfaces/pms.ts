/**
 * Interface for Property Management System (PMS) integrations.
 * The PMS is the upstream source of online bookings, fetched one
 * property and one date range at a time.
 */
import type { RawBookingRecord } from '../../normalization/transformer';
import type { PmsSession } from '../pms/session';

export interface PmsCredentials {
  email: string;
  password: string;
}

export interface RoomBookingsRequest {
  hotelId: string;
  from: string; // ISO YYYY-MM-DD
  to: string; // ISO YYYY-MM-DD
}

/** How a booking fetch ended. Only `success` carries records. */
export type FetchOutcome =
  | { kind: 'success'; records: RawBookingRecord[] }
  | { kind: 'unauthorized'; message: string; status?: number }
  | { kind: 'transport_error'; message: string; status?: number }
  | { kind: 'no_credential'; message: string };

export type LoginOutcome =
  | { kind: 'authenticated'; token: string }
  | { kind: 'unauthorized'; message: string; status?: number }
  | { kind: 'transport_error'; message: string; status?: number };

export interface IPmsClient {
  /** Human-readable name of this PMS (e.g. "Stayflexi") */
  readonly pmsName: string;

  /** Exchange an email/password pair for a bearer token */
  login(credentials: PmsCredentials): Promise<LoginOutcome>;

  /**
   * Fetch the bookings of one property within a date range, authenticating
   * through the session. Never throws for HTTP or network failures.
   */
  fetchRoomBookings(session: PmsSession, request: RoomBookingsRequest): Promise<FetchOutcome>;
}
