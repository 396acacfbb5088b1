import { decodeJwt } from 'jose';
import type { PmsCredentials } from '../interfaces/pms';

export interface PmsSessionOptions {
  credentials?: PmsCredentials;
  /** A token supplied up front, e.g. from configuration. */
  token?: string;
  /** Tokens expiring within this many seconds count as expired. */
  expiryMarginSeconds?: number;
  now?: () => number;
}

const DEFAULT_EXPIRY_MARGIN_SECONDS = 3600;

/**
 * Credential context for one PMS account: the email/password pair (when
 * known) and the bearer token currently held. Passed explicitly to the
 * client and the sync service; there is no process-wide token.
 *
 * The token's `exp` claim is read without verifying the signature. The
 * PMS verifies the token; this side only needs to know when to replace it.
 */
export class PmsSession {
  readonly credentials: PmsCredentials | null;
  private token: string | null = null;
  private expiresAtMs: number | null = null;
  private readonly marginMs: number;
  private readonly now: () => number;

  constructor(options: PmsSessionOptions = {}) {
    this.credentials = options.credentials ?? null;
    this.marginMs = (options.expiryMarginSeconds ?? DEFAULT_EXPIRY_MARGIN_SECONDS) * 1000;
    this.now = options.now ?? Date.now;
    if (options.token) this.setToken(options.token);
  }

  get hasCredentials(): boolean {
    return this.credentials !== null;
  }

  /** Expiry of the held token, or null when unknown or no token is held. */
  get tokenExpiresAt(): Date | null {
    return this.expiresAtMs === null ? null : new Date(this.expiresAtMs);
  }

  /**
   * The held token if it can still be used. A token without a readable
   * `exp` is returned as-is; a rejection from the PMS is handled by the client.
   */
  usableToken(): string | null {
    if (!this.token) return null;
    if (this.expiresAtMs !== null && this.expiresAtMs - this.marginMs <= this.now()) {
      return null;
    }
    return this.token;
  }

  setToken(token: string): void {
    this.token = token;
    this.expiresAtMs = readExpiry(token);
  }

  invalidate(): void {
    this.token = null;
    this.expiresAtMs = null;
  }
}

function readExpiry(token: string): number | null {
  try {
    const { exp } = decodeJwt(token);
    return typeof exp === 'number' ? exp * 1000 : null;
  } catch {
    // Not a JWT: opaque API token with no readable expiry.
    return null;
  }
}
