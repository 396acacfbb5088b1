import { setTimeout as sleepFor } from 'node:timers/promises';
import { logger } from '../config/logger';
import { syncConfig } from '../config/sync';
import type { PropertyDirectory } from '../config/properties';
import type { ReservationStore } from '../dal/reservation.dal';
import type { FetchOutcome, IPmsClient } from '../integrations/interfaces/pms';
import type { PmsSession } from '../integrations/pms/session';
import {
  transformRecord,
  type RawBookingRecord,
  type TransformContext,
} from '../normalization/transformer';
import { startTimer } from '../telemetry/timing';
import type { TelemetryService } from './telemetry.service';

export interface SyncCounters {
  inserted: number;
  skipped: number;
  errors: number;
}

/**
 * One atomic batch of a sync run: a spreadsheet upload, or one
 * (property, date range) pair fetched from the PMS.
 */
export interface SourceUnit {
  id: string;
  label: string;
  hotelId?: string;
  context: TransformContext;
  fetch(): Promise<FetchOutcome>;
}

export type UnitFetchStatus = 'ok' | 'transport_error';

export interface SourceUnitOutcome extends SyncCounters {
  unitId: string;
  label: string;
  hotelId?: string;
  fetchStatus: UnitFetchStatus;
  fetched: number;
  message?: string;
}

export type SyncAbortReason = 'unauthorized' | 'no_credential';

export type SyncRunResult =
  | { status: 'completed'; totals: SyncCounters; units: SourceUnitOutcome[] }
  | {
      status: 'aborted';
      reason: SyncAbortReason;
      message: string;
      failedUnitId: string;
      totals: SyncCounters;
      units: SourceUnitOutcome[];
    };

export interface SyncDeps {
  store: ReservationStore;
  telemetry?: TelemetryService;
  /** Pause between source units; upstream courtesy only. */
  pauseMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface SyncOptions {
  requestId?: string;
  trigger?: 'file' | 'api';
}

function emptyCounters(): SyncCounters {
  return { inserted: 0, skipped: 0, errors: 0 };
}

function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs source units strictly one after another against a snapshot of the
 * stored booking ids.
 *
 *   - Known booking ids (snapshot, or inserted earlier in the run) are
 *     skipped without touching the store.
 *   - A duplicate reported by the store is also a skip: another writer got there first.
 *   - Any other per-record failure is counted as an error; the run goes on.
 *   - A transport failure empties that unit; the run goes on.
 *   - An authentication failure stops the run. Inserts already made stay.
 */
export async function runSync(
  deps: SyncDeps,
  units: SourceUnit[],
  options: SyncOptions = {},
): Promise<SyncRunResult> {
  const timer = startTimer('service.runSync', { requestId: options.requestId });
  const sleep = deps.sleep ?? ((ms: number) => sleepFor(ms));
  const pauseMs = deps.pauseMs ?? 0;

  const knownIds = await deps.store.listBookingIds();
  const totals = emptyCounters();
  const outcomes: SourceUnitOutcome[] = [];

  await logSyncEvent(deps, 'sync.started', options, {
    trigger: options.trigger,
    units: units.length,
    existingBookings: knownIds.size,
  });

  for (const [index, unit] of units.entries()) {
    if (index > 0 && pauseMs > 0) await sleep(pauseMs);

    const fetched = await unit.fetch();

    if (fetched.kind === 'unauthorized' || fetched.kind === 'no_credential') {
      logger.warn(
        { unitId: unit.id, reason: fetched.kind, requestId: options.requestId },
        'Sync aborted: PMS authentication failed',
      );
      await logSyncEvent(deps, 'sync.aborted', options, {
        reason: fetched.kind,
        failedUnitId: unit.id,
        totals,
      });
      timer.stop({ status: 'aborted' });
      return {
        status: 'aborted',
        reason: fetched.kind,
        message: fetched.message,
        failedUnitId: unit.id,
        totals,
        units: outcomes,
      };
    }

    const outcome: SourceUnitOutcome = {
      unitId: unit.id,
      label: unit.label,
      ...(unit.hotelId ? { hotelId: unit.hotelId } : {}),
      fetchStatus: fetched.kind === 'success' ? 'ok' : 'transport_error',
      fetched: 0,
      ...emptyCounters(),
    };

    if (fetched.kind === 'transport_error') {
      outcome.message = fetched.message;
      logger.warn({ unitId: unit.id, message: fetched.message }, 'Source unit fetch failed');
    } else {
      outcome.fetched = fetched.records.length;
      await ingestRecords(deps.store, unit, fetched.records, knownIds, outcome);
    }

    totals.inserted += outcome.inserted;
    totals.skipped += outcome.skipped;
    totals.errors += outcome.errors;
    outcomes.push(outcome);

    await logSyncEvent(deps, 'sync.unit_completed', options, { ...outcome });
  }

  const durationMs = timer.stop({ status: 'completed', ...totals });
  await logSyncEvent(deps, 'sync.completed', options, { totals, units: outcomes.length }, durationMs);

  return { status: 'completed', totals, units: outcomes };
}

async function ingestRecords(
  store: ReservationStore,
  unit: SourceUnit,
  records: RawBookingRecord[],
  knownIds: Set<string>,
  counters: SyncCounters,
): Promise<void> {
  for (const raw of records) {
    try {
      const record = transformRecord(raw, unit.context);
      if (!record.booking_id) {
        logger.debug({ unitId: unit.id }, 'Ignoring record without booking id');
        continue;
      }

      if (knownIds.has(record.booking_id)) {
        counters.skipped++;
        continue;
      }

      const result = await store.insert(record);
      knownIds.add(record.booking_id);
      if (result === 'inserted') counters.inserted++;
      else counters.skipped++;
    } catch (err) {
      counters.errors++;
      logger.error({ err, unitId: unit.id }, `Failed to ingest record: ${getErrorMessage(err)}`);
    }
  }
}

async function logSyncEvent(
  deps: SyncDeps,
  type: string,
  options: SyncOptions,
  payload: Record<string, unknown>,
  durationMs?: number,
): Promise<void> {
  if (!deps.telemetry) return;
  await deps.telemetry.logEvent({
    type,
    payload,
    requestId: options.requestId,
    span: 'sync',
    durationMs,
  });
}

// ---------------------------------------------------------------------------
// Source unit builders
// ---------------------------------------------------------------------------

export interface SpreadsheetUnitInput {
  rows: RawBookingRecord[];
  fileName: string;
  directory: PropertyDirectory;
  submittedBy?: string;
}

export function spreadsheetSourceUnit(input: SpreadsheetUnitInput): SourceUnit {
  return {
    id: `file:${input.fileName}`,
    label: input.fileName,
    context: { directory: input.directory, submittedBy: input.submittedBy },
    fetch: async () => ({ kind: 'success', records: input.rows }),
  };
}

export interface PmsUnitsInput {
  client: IPmsClient;
  session: PmsSession;
  directory: PropertyDirectory;
  hotelIds: string[];
  from: string;
  to: string;
  submittedBy?: string;
}

/** One unit per hotel id, in the order given. */
export function pmsSourceUnits(input: PmsUnitsInput): SourceUnit[] {
  return input.hotelIds.map((hotelId) => ({
    id: `pms:${hotelId}:${input.from}:${input.to}`,
    label: input.directory.get(hotelId) ?? `Hotel ${hotelId}`,
    hotelId,
    context: {
      directory: input.directory,
      hotelId,
      submittedBy: input.submittedBy,
      defaults: {
        bookingSource: syncConfig.PMS_DEFAULT_BOOKING_SOURCE,
        status: syncConfig.PMS_DEFAULT_STATUS,
      },
    },
    fetch: () =>
      input.client.fetchRoomBookings(input.session, { hotelId, from: input.from, to: input.to }),
  }));
}
