import { syncConfig } from '../../config/sync';
import type { RawBookingRecord } from '../../normalization/transformer';
import {
  bookingsEnvelopeSchema,
  dataListEnvelopeSchema,
  rawBookingListSchema,
  roomReservationsEnvelopeSchema,
  type RoomReservations,
} from '../validation';

/**
 * The booking-list response has changed shape across PMS API versions.
 * Each known shape is a variant, picked by which distinguishing key is present.
 */
export type BookingsResponse =
  | { shape: 'flat_list'; records: RawBookingRecord[] }
  | { shape: 'bookings_key'; records: RawBookingRecord[] }
  | { shape: 'data_list'; records: RawBookingRecord[] }
  | { shape: 'room_reservations'; rooms: RoomReservations[] }
  | { shape: 'unrecognized' };

export function detectResponseShape(body: unknown): BookingsResponse {
  const flat = rawBookingListSchema.safeParse(body);
  if (flat.success) return { shape: 'flat_list', records: flat.data };

  const bookings = bookingsEnvelopeSchema.safeParse(body);
  if (bookings.success) return { shape: 'bookings_key', records: bookings.data.bookings };

  const rooms = roomReservationsEnvelopeSchema.safeParse(body);
  if (rooms.success) {
    const envelope = 'data' in rooms.data ? rooms.data.data : rooms.data;
    return { shape: 'room_reservations', rooms: envelope.allRoomReservations };
  }

  const dataList = dataListEnvelopeSchema.safeParse(body);
  if (dataList.success) return { shape: 'data_list', records: dataList.data.data };

  return { shape: 'unrecognized' };
}

const BLOCK_STATUSES: ReadonlySet<string> = new Set(syncConfig.ROOM_BLOCK_STATUSES);

/** True for entries that hold a room administratively rather than for a guest. */
export function isRoomBlock(entry: RawBookingRecord): boolean {
  for (const key of ['status', 'reservationStatus', 'bookingStatus']) {
    const value = entry[key];
    if (typeof value === 'string' && value.trim() !== '') {
      return BLOCK_STATUSES.has(value.trim().toUpperCase());
    }
  }
  return false;
}

/**
 * Flatten rooms into reservation entries, copying each room's metadata onto
 * its entries (entry keys win) and dropping administrative blocks.
 */
export function flattenRoomReservations(rooms: RoomReservations[]): RawBookingRecord[] {
  const records: RawBookingRecord[] = [];

  for (const room of rooms) {
    const { resInfoList, reservations, ...roomMeta } = room;
    for (const entry of resInfoList ?? reservations ?? []) {
      if (isRoomBlock(entry)) continue;
      records.push({ ...roomMeta, ...entry });
    }
  }
  return records;
}

/** Booking records of a response body, or null when the shape is unknown. */
export function extractBookingRecords(body: unknown): RawBookingRecord[] | null {
  const response = detectResponseShape(body);
  switch (response.shape) {
    case 'flat_list':
    case 'bookings_key':
    case 'data_list':
      return response.records;
    case 'room_reservations':
      return flattenRoomReservations(response.rooms);
    case 'unrecognized':
      return null;
  }
}
