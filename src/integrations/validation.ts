/**
 * Zod schemas for validating PMS payloads.
 * Booking objects themselves stay loosely typed (the transformer resolves
 * their fields); these schemas pin down the envelopes around them.
 */
import { z } from 'zod';
import { isIsoDate } from '../normalization/fields';

// ---------------------------------------------------------------------------
// Shared
// ---------------------------------------------------------------------------

export const isoDateField = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be ISO YYYY-MM-DD')
  .refine(isIsoDate, 'Must be a real calendar date');

export const rawBookingSchema = z.record(z.unknown());
export const rawBookingListSchema = z.array(rawBookingSchema);

// ---------------------------------------------------------------------------
// Auth
// ---------------------------------------------------------------------------

export const pmsCredentialsSchema = z.object({
  email: z.string().email(),
  password: z.string().min(1),
});

/** Keys under which the login endpoint has been seen to return the token. */
export const LOGIN_TOKEN_KEYS = ['token', 'accessToken', 'access_token', 'jwt', 'authToken'] as const;

/** Object that may carry the bearer token (the login body, or its `data`). */
export const tokenCarrierSchema = z
  .object({
    token: z.string().min(1).optional(),
    accessToken: z.string().min(1).optional(),
    access_token: z.string().min(1).optional(),
    jwt: z.string().min(1).optional(),
    authToken: z.string().min(1).optional(),
  })
  .passthrough();

// ---------------------------------------------------------------------------
// Room bookings
// ---------------------------------------------------------------------------

export const roomBookingsRequestSchema = z.object({
  hotelId: z.string().min(1),
  from: isoDateField,
  to: isoDateField,
});

export const bookingsEnvelopeSchema = z.object({ bookings: rawBookingListSchema });
export const dataListEnvelopeSchema = z.object({ data: rawBookingListSchema });

/** One room and the reservations held against it. */
export const roomReservationsSchema = z
  .object({
    resInfoList: rawBookingListSchema.optional(),
    reservations: rawBookingListSchema.optional(),
  })
  .passthrough();

const allRoomReservationsSchema = z.object({
  allRoomReservations: z.array(roomReservationsSchema),
});

export const roomReservationsEnvelopeSchema = z.union([
  z.object({ data: allRoomReservationsSchema }),
  allRoomReservationsSchema,
]);

export type RoomReservations = z.infer<typeof roomReservationsSchema>;
