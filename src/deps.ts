import { env } from './config/env';
import { loadPropertyDirectory, type PropertyDirectory } from './config/properties';
import { EventsDal } from './dal/events.dal';
import { ReservationDal, type ReservationStore } from './dal/reservation.dal';
import { db } from './db/client';
import { StubPmsClient } from './integrations/adapters/stub-pms';
import type { IPmsClient } from './integrations/interfaces/pms';
import { PmsApiClient } from './integrations/pms/client';
import { PmsSession } from './integrations/pms/session';
import { TelemetryService } from './services/telemetry.service';

/**
 * Collaborators the HTTP layer needs. buildApp() takes these so tests can
 * run the whole app against in-process stand-ins.
 */
export interface AppDeps {
  reservations: ReservationStore;
  telemetry: TelemetryService;
  pmsClient: IPmsClient;
  /** Session for the configured PMS account; holds its token across runs. */
  pmsSession: PmsSession;
  directory: PropertyDirectory;
  syncPauseMs: number;
  tokenExpiryMarginSeconds: number;
}

export function createDefaultDeps(): AppDeps {
  const credentials =
    env.PMS_EMAIL && env.PMS_PASSWORD
      ? { email: env.PMS_EMAIL, password: env.PMS_PASSWORD }
      : undefined;

  return {
    reservations: new ReservationDal(db),
    telemetry: new TelemetryService(new EventsDal(db)),
    pmsClient:
      env.PMS_ADAPTER === 'stub'
        ? new StubPmsClient()
        : new PmsApiClient({ baseUrl: env.PMS_API_URL }),
    pmsSession: new PmsSession({
      credentials,
      token: env.PMS_TOKEN,
      expiryMarginSeconds: env.PMS_TOKEN_EXPIRY_MARGIN_SECONDS,
    }),
    directory: loadPropertyDirectory(env.PROPERTY_DIRECTORY_PATH),
    syncPauseMs: env.SYNC_PAUSE_MS,
    tokenExpiryMarginSeconds: env.PMS_TOKEN_EXPIRY_MARGIN_SECONDS,
  };
}
