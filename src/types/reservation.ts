import { z } from 'zod';
import { syncConfig } from '../config/sync';

export const BOOKING_STATUSES = [
  'Pending',
  'Confirmed',
  'Follow-Up',
  'Cancelled',
  'Completed',
  'No Show',
] as const;
export type BookingStatus = (typeof BOOKING_STATUSES)[number];

export const PAYMENT_STATUSES = ['Not Paid', 'Partially Paid', 'Fully Paid'] as const;
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

/** Calendar date in YYYY-MM-DD form. */
export type IsoDate = string;

/**
 * Canonical reservation row. Keys are the column names of the
 * online_reservations table, so the record is inserted as-is.
 */
export interface OnlineReservation {
  property: string;
  booking_id: string;
  booking_made_on: IsoDate | null;
  guest_name: string;
  guest_phone: string;
  check_in: IsoDate | null;
  check_out: IsoDate | null;
  room_nights: number;
  no_of_adults: number;
  no_of_children: number;
  no_of_infant: number;
  total_pax: number;
  room_no: string;
  room_type: string;
  rate_plans: string;
  booking_source: string;
  segment: string;
  mode_of_booking: string;
  staflexi_status: string;
  booking_status: BookingStatus;
  payment_status: PaymentStatus;
  booking_confirmed_on: IsoDate | null;
  booking_amount: number;
  total_payment_made: number;
  balance_due: number;
  total_amount_with_services: number;
  ota_gross_amount: number;
  ota_commission: number;
  ota_tax: number;
  ota_net_amount: number;
  room_revenue: number;
  remarks: string;
  submitted_by: string;
  modified_by: string;
}

export type ReservationColumn = keyof OnlineReservation;

/** Column order used for inserts. */
export const RESERVATION_COLUMNS = [
  'property',
  'booking_id',
  'booking_made_on',
  'guest_name',
  'guest_phone',
  'check_in',
  'check_out',
  'room_nights',
  'no_of_adults',
  'no_of_children',
  'no_of_infant',
  'total_pax',
  'room_no',
  'room_type',
  'rate_plans',
  'booking_source',
  'segment',
  'mode_of_booking',
  'staflexi_status',
  'booking_status',
  'payment_status',
  'booking_confirmed_on',
  'booking_amount',
  'total_payment_made',
  'balance_due',
  'total_amount_with_services',
  'ota_gross_amount',
  'ota_commission',
  'ota_tax',
  'ota_net_amount',
  'room_revenue',
  'remarks',
  'submitted_by',
  'modified_by',
] as const satisfies readonly ReservationColumn[];

type StringColumn = {
  [K in ReservationColumn]: OnlineReservation[K] extends string ? K : never;
}[ReservationColumn];

/** Maximum stored length, in characters, of every bounded text column. */
export const FIELD_LIMITS = {
  property: syncConfig.DEFAULT_FIELD_LENGTH,
  booking_id: syncConfig.DEFAULT_FIELD_LENGTH,
  guest_name: syncConfig.DEFAULT_FIELD_LENGTH,
  guest_phone: syncConfig.DEFAULT_FIELD_LENGTH,
  room_no: syncConfig.DEFAULT_FIELD_LENGTH,
  room_type: syncConfig.DEFAULT_FIELD_LENGTH,
  rate_plans: syncConfig.DEFAULT_FIELD_LENGTH,
  booking_source: syncConfig.DEFAULT_FIELD_LENGTH,
  segment: syncConfig.DEFAULT_FIELD_LENGTH,
  mode_of_booking: syncConfig.DEFAULT_FIELD_LENGTH,
  staflexi_status: syncConfig.DEFAULT_FIELD_LENGTH,
  submitted_by: syncConfig.DEFAULT_FIELD_LENGTH,
  modified_by: syncConfig.DEFAULT_FIELD_LENGTH,
  remarks: syncConfig.REMARKS_FIELD_LENGTH,
} as const satisfies Partial<Record<StringColumn, number>>;

export type BoundedColumn = keyof typeof FIELD_LIMITS;

// ---------------------------------------------------------------------------
// Row schema: what comes back from the store
// ---------------------------------------------------------------------------

const isoDateOrNull = z
  .union([z.string(), z.date(), z.null()])
  .transform((v) => (v instanceof Date ? v.toISOString().slice(0, 10) : v));

const amount = z.coerce.number().nonnegative().default(0);
const count = z.coerce.number().int().nonnegative().default(0);
const text = (max: number) => z.string().max(max).nullable().transform((v) => v ?? '');

/**
 * Parses a stored row. PostgreSQL NUMERIC columns arrive as strings, so
 * numbers are coerced; nullable text columns come back as ''.
 */
export const reservationRowSchema = z.object({
  property: text(FIELD_LIMITS.property),
  booking_id: z.string().min(1).max(FIELD_LIMITS.booking_id),
  booking_made_on: isoDateOrNull,
  guest_name: text(FIELD_LIMITS.guest_name),
  guest_phone: text(FIELD_LIMITS.guest_phone),
  check_in: isoDateOrNull,
  check_out: isoDateOrNull,
  room_nights: count,
  no_of_adults: count,
  no_of_children: count,
  no_of_infant: count,
  total_pax: count,
  room_no: text(FIELD_LIMITS.room_no),
  room_type: text(FIELD_LIMITS.room_type),
  rate_plans: text(FIELD_LIMITS.rate_plans),
  booking_source: text(FIELD_LIMITS.booking_source),
  segment: text(FIELD_LIMITS.segment),
  mode_of_booking: text(FIELD_LIMITS.mode_of_booking),
  staflexi_status: text(FIELD_LIMITS.staflexi_status),
  booking_status: z.enum(BOOKING_STATUSES),
  payment_status: z.enum(PAYMENT_STATUSES),
  booking_confirmed_on: isoDateOrNull,
  booking_amount: amount,
  total_payment_made: amount,
  balance_due: amount,
  total_amount_with_services: amount,
  ota_gross_amount: amount,
  ota_commission: amount,
  ota_tax: amount,
  ota_net_amount: amount,
  room_revenue: amount,
  remarks: text(FIELD_LIMITS.remarks),
  submitted_by: text(FIELD_LIMITS.submitted_by),
  modified_by: text(FIELD_LIMITS.modified_by),
});
