import { v4 as uuid } from 'uuid';
import type { Queryable } from '../db/client';

export interface CreateEventInput {
  type: string;
  payload: string;
  requestId?: string;
  span?: string;
  durationMs?: number;
  entityType?: string;
  entityId?: string;
}

export interface EventRecord extends CreateEventInput {
  id: string;
}

/** Anything that can persist a telemetry event. */
export interface EventWriter {
  create(data: CreateEventInput): Promise<EventRecord>;
}

/**
 * Data Access Layer for the events table.
 * Accepts a Queryable (pg pool or stand-in) so it can be tested without a database.
 */
export class EventsDal implements EventWriter {
  constructor(private readonly db: Queryable) {}

  async create(data: CreateEventInput): Promise<EventRecord> {
    const id = uuid();
    await this.db.query(
      `INSERT INTO events (id, type, payload, request_id, span, duration_ms, entity_type, entity_id)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
      [
        id,
        data.type,
        data.payload,
        data.requestId ?? null,
        data.span ?? null,
        data.durationMs ?? null,
        data.entityType ?? null,
        data.entityId ?? null,
      ],
    );
    return { id, ...data };
  }
}
