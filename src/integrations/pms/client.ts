import axios, { isAxiosError, type AxiosInstance } from 'axios';
import { logger } from '../../config/logger';
import type {
  FetchOutcome,
  IPmsClient,
  LoginOutcome,
  PmsCredentials,
  RoomBookingsRequest,
} from '../interfaces/pms';
import { LOGIN_TOKEN_KEYS, roomBookingsRequestSchema, tokenCarrierSchema } from '../validation';
import { extractBookingRecords } from './response-shapes';
import type { PmsSession } from './session';

export const PMS_LOGIN_PATH = '/auth/login';
export const PMS_ROOM_BOOKINGS_PATH = '/core/api/v1/reservation/navigationGetRoomBookings';

export interface PmsApiClientOptions {
  baseUrl: string;
  /** Injected in tests; defaults to a fresh axios instance on baseUrl. */
  http?: AxiosInstance;
}

type PostResult =
  | { ok: true; data: unknown }
  | { ok: false; kind: 'unauthorized' | 'transport_error'; message: string; status?: number };

function isAuthStatus(status: number | undefined): boolean {
  return status === 401 || status === 403;
}

function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function extractLoginToken(body: unknown): string | null {
  const nested =
    typeof body === 'object' && body !== null && 'data' in body ? body.data : undefined;

  for (const candidate of [body, nested]) {
    const parsed = tokenCarrierSchema.safeParse(candidate);
    if (!parsed.success) continue;
    for (const key of LOGIN_TOKEN_KEYS) {
      const token = parsed.data[key];
      if (token) return token;
    }
  }
  return null;
}

/**
 * HTTP client for the PMS REST API.
 *
 * Every call resolves to an outcome value; HTTP and network failures are
 * classified, not thrown. A rejected token triggers one re-login (when the
 * session holds credentials) and one retry. Transport failures are never
 * retried.
 */
export class PmsApiClient implements IPmsClient {
  readonly pmsName = 'Stayflexi';
  private readonly http: AxiosInstance;

  constructor(options: PmsApiClientOptions) {
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl,
        headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      });
  }

  async login(credentials: PmsCredentials): Promise<LoginOutcome> {
    const result = await this.post(PMS_LOGIN_PATH, credentials);
    if (!result.ok) {
      logger.warn({ status: result.status, kind: result.kind }, 'PMS login failed');
      return { kind: result.kind, message: result.message, status: result.status };
    }

    const token = extractLoginToken(result.data);
    if (!token) {
      logger.warn('PMS login response carried no token');
      return { kind: 'unauthorized', message: 'Login response did not include a token' };
    }
    return { kind: 'authenticated', token };
  }

  async fetchRoomBookings(
    session: PmsSession,
    request: RoomBookingsRequest,
  ): Promise<FetchOutcome> {
    const body = roomBookingsRequestSchema.parse(request);

    const token = await this.acquireToken(session);
    if (typeof token !== 'string') return token;

    const first = await this.postBookings(token, body);
    if (first.kind !== 'unauthorized' || !session.credentials) return first;

    logger.info({ hotelId: body.hotelId }, 'PMS rejected token, re-authenticating once');
    session.invalidate();
    const refreshed = await this.authenticate(session, session.credentials);
    if (typeof refreshed !== 'string') return refreshed;

    return this.postBookings(refreshed, body);
  }

  /** The session's usable token, a fresh one from login, or the failure outcome. */
  private async acquireToken(session: PmsSession): Promise<string | FetchOutcome> {
    const held = session.usableToken();
    if (held) return held;

    if (!session.credentials) {
      return {
        kind: 'no_credential',
        message: 'No PMS token or credentials available',
      };
    }
    return this.authenticate(session, session.credentials);
  }

  private async authenticate(
    session: PmsSession,
    credentials: PmsCredentials,
  ): Promise<string | FetchOutcome> {
    const outcome = await this.login(credentials);
    if (outcome.kind !== 'authenticated') return outcome;

    session.setToken(outcome.token);
    return outcome.token;
  }

  private async postBookings(token: string, body: RoomBookingsRequest): Promise<FetchOutcome> {
    const result = await this.post(PMS_ROOM_BOOKINGS_PATH, body, {
      Authorization: `Bearer ${token}`,
    });
    if (!result.ok) {
      return { kind: result.kind, message: result.message, status: result.status };
    }

    const records = extractBookingRecords(result.data);
    if (records === null) {
      logger.warn({ hotelId: body.hotelId }, 'Unexpected PMS bookings response format');
      return { kind: 'transport_error', message: 'Unexpected bookings response format' };
    }
    return { kind: 'success', records };
  }

  private async post(
    path: string,
    body: object,
    headers: Record<string, string> = {},
  ): Promise<PostResult> {
    try {
      const response = await this.http.post<unknown>(path, body, { headers });
      return { ok: true, data: response.data };
    } catch (error) {
      if (isAxiosError(error) && error.response) {
        const status = error.response.status;
        return {
          ok: false,
          kind: isAuthStatus(status) ? 'unauthorized' : 'transport_error',
          message: `${path} failed: ${status} ${error.response.statusText}`.trim(),
          status,
        };
      }
      return { ok: false, kind: 'transport_error', message: `${path} failed: ${getErrorMessage(error)}` };
    }
  }
}
