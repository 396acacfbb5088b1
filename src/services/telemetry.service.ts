import { logger } from '../config/logger';
import type { EventWriter } from '../dal/events.dal';

export interface LogEventInput {
  type: string;
  payload?: Record<string, unknown>;
  requestId?: string;
  span?: string;
  durationMs?: number;
  entityType?: string;
  entityId?: string;
}

/**
 * Service layer for telemetry events.
 * Business logic lives here; DB access is delegated to the DAL.
 *
 * Never throws: if the write fails, logs the error and returns null.
 */
export class TelemetryService {
  constructor(private readonly events: EventWriter) {}

  async logEvent(input: LogEventInput): Promise<string | null> {
    try {
      const event = await this.events.create({
        type: input.type,
        payload: JSON.stringify(input.payload ?? {}),
        requestId: input.requestId,
        span: input.span,
        durationMs: input.durationMs,
        entityType: input.entityType,
        entityId: input.entityId,
      });

      logger.debug({ eventId: event.id, type: input.type }, 'Telemetry event recorded');
      return event.id;
    } catch (err) {
      logger.error({ err, eventType: input.type }, 'Failed to write telemetry event');
      return null;
    }
  }
}
