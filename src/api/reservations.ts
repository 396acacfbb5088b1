import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { listHotelIds } from '../config/properties';
import type { AppDeps } from '../deps';
import { PmsSession } from '../integrations/pms/session';
import { readSpreadsheetRows, SpreadsheetReadError } from '../integrations/spreadsheet';
import type { RawBookingRecord } from '../normalization/transformer';
import { isoDateField, pmsCredentialsSchema } from '../integrations/validation';
import { listReservations } from '../services/reservation.service';
import {
  pmsSourceUnits,
  runSync,
  spreadsheetSourceUnit,
  type SyncDeps,
  type SyncRunResult,
} from '../services/sync.service';
import { validateDateRange, type ApiError } from '../types/common';
import { BOOKING_STATUSES } from '../types/reservation';

const SPREADSHEET_CONTENT_TYPES = [
  'application/octet-stream',
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  'application/vnd.ms-excel',
];

const MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

const listQuerySchema = z.object({
  from: isoDateField.optional(),
  to: isoDateField.optional(),
  bookingStatus: z.enum(BOOKING_STATUSES).optional(),
  // Comma-separated property names
  property: z
    .string()
    .optional()
    .transform((v) =>
      v
        ? v
            .split(',')
            .map((p) => p.trim())
            .filter(Boolean)
        : undefined,
    ),
  sort: z.enum(['asc', 'desc']).default('desc'),
});

const fileSyncQuerySchema = z.object({
  fileName: z.string().min(1).max(200).default('upload.xlsx'),
  submittedBy: z.string().max(50).optional(),
});

const apiSyncBodySchema = z.object({
  from: isoDateField,
  to: isoDateField,
  hotelIds: z.array(z.string().min(1)).min(1).optional(),
  credentials: pmsCredentialsSchema.optional(),
  token: z.string().min(1).optional(),
  submittedBy: z.string().max(50).optional(),
});

const AUTH_FAILURE_MESSAGES = {
  unauthorized:
    'The PMS rejected the login. Re-enter the PMS email and password, then run the sync again.',
  no_credential:
    'No PMS credentials are configured. Enter the PMS email and password, then run the sync again.',
} as const;

function syncResponse(result: SyncRunResult): {
  statusCode: number;
  body: Record<string, unknown>;
} {
  if (result.status === 'aborted') {
    const body: ApiError & Record<string, unknown> = {
      error: result.reason === 'unauthorized' ? 'pms_unauthorized' : 'pms_no_credential',
      message: AUTH_FAILURE_MESSAGES[result.reason],
      detail: result.message,
      failedUnitId: result.failedUnitId,
      totals: result.totals,
      units: result.units,
    };
    return { statusCode: 401, body };
  }
  return {
    statusCode: 200,
    body: { ok: true, status: result.status, totals: result.totals, units: result.units },
  };
}

/**
 * Reservation routes:
 *  - GET  /reservations              list, filtered and sorted by check-in
 *  - POST /reservations/sync/file    ingest an uploaded PMS spreadsheet export
 *  - POST /reservations/sync/api     ingest bookings from the PMS API for a date range
 */
export async function reservationRoutes(
  app: FastifyInstance,
  options: { deps: AppDeps },
): Promise<void> {
  const { deps } = options;
  const syncDeps: SyncDeps = {
    store: deps.reservations,
    telemetry: deps.telemetry,
    pauseMs: deps.syncPauseMs,
  };

  app.addContentTypeParser(
    SPREADSHEET_CONTENT_TYPES,
    { parseAs: 'buffer', bodyLimit: MAX_UPLOAD_BYTES },
    (_request, body, done) => {
      done(null, body);
    },
  );

  // ── List ──
  app.get('/reservations', async (request, reply) => {
    const query = listQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send({ error: 'invalid_query', message: query.error.message });
    }

    const reservations = await listReservations(deps.reservations, {
      checkInFrom: query.data.from,
      checkInTo: query.data.to,
      bookingStatus: query.data.bookingStatus,
      properties: query.data.property,
      sort: query.data.sort,
    });

    return reply.send({ reservations, count: reservations.length });
  });

  // ── Sync from spreadsheet ──
  app.post('/reservations/sync/file', async (request, reply) => {
    const query = fileSyncQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send({ error: 'invalid_query', message: query.error.message });
    }

    if (!Buffer.isBuffer(request.body)) {
      return reply.status(400).send({
        error: 'invalid_body',
        message: `Send the spreadsheet as the raw request body (${SPREADSHEET_CONTENT_TYPES[1]})`,
      });
    }

    let rows: RawBookingRecord[];
    try {
      rows = readSpreadsheetRows(request.body);
    } catch (err) {
      if (err instanceof SpreadsheetReadError) {
        return reply.status(400).send({ error: 'invalid_spreadsheet', message: err.message });
      }
      throw err;
    }

    const result = await runSync(
      syncDeps,
      [
        spreadsheetSourceUnit({
          rows,
          fileName: query.data.fileName,
          directory: deps.directory,
          submittedBy: query.data.submittedBy,
        }),
      ],
      { requestId: request.requestId, trigger: 'file' },
    );

    const response = syncResponse(result);
    return reply.status(response.statusCode).send(response.body);
  });

  // ── Sync from PMS API ──
  app.post('/reservations/sync/api', async (request, reply) => {
    const body = apiSyncBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: 'invalid_body', message: body.error.message });
    }

    const range = validateDateRange(body.data.from, body.data.to);
    if (!range.valid) {
      return reply.status(400).send({ error: 'invalid_date_range', message: range.error });
    }

    // Credentials or a token in the request get a session of their own.
    const session =
      body.data.credentials || body.data.token
        ? new PmsSession({
            credentials: body.data.credentials,
            token: body.data.token,
            expiryMarginSeconds: deps.tokenExpiryMarginSeconds,
          })
        : deps.pmsSession;

    const units = pmsSourceUnits({
      client: deps.pmsClient,
      session,
      directory: deps.directory,
      hotelIds: body.data.hotelIds ?? listHotelIds(deps.directory),
      from: body.data.from,
      to: body.data.to,
      submittedBy: body.data.submittedBy,
    });

    const result = await runSync(syncDeps, units, {
      requestId: request.requestId,
      trigger: 'api',
    });

    const response = syncResponse(result);
    return reply.status(response.statusCode).send(response.body);
  });
}
