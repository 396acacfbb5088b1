import { syncConfig } from '../config/sync';
import { getPropertyName, type PropertyDirectory } from '../config/properties';
import {
  FIELD_LIMITS,
  RESERVATION_COLUMNS,
  type BoundedColumn,
  type OnlineReservation,
  type ReservationColumn,
} from '../types/reservation';
import {
  derivePaymentStatus,
  parseAmount,
  parseCount,
  parseDate,
  parsePax,
  roomNights,
  truncate,
  type PaxCounts,
} from './fields';

/** One upstream booking: a spreadsheet row keyed by header, or a PMS API object. */
export type RawBookingRecord = Record<string, unknown>;

export interface TransformContext {
  directory: PropertyDirectory;
  /** Set when the source unit already knows the property (API sync). */
  hotelId?: string;
  submittedBy?: string;
  /** Fallbacks for fields a source commonly leaves out. */
  defaults?: {
    bookingSource?: string;
    status?: string;
  };
}

/**
 * Candidate upstream keys per canonical field, in priority order.
 * Spreadsheet headers and every observed API spelling live side by side.
 */
export const FIELD_CANDIDATES = {
  hotelId: ['hotel id', 'hotel_id', 'hotelId'],
  hotelName: ['hotel name', 'hotel_name', 'hotelName'],
  bookingId: ['booking id', 'booking_id', 'bookingId'],
  bookingMadeOn: ['booking_made_on', 'bookingMadeOn', 'bookingDate'],
  guestName: ['customer_name', 'guest_name', 'guestName', 'name'],
  guestPhone: ['customer_phone', 'guest_phone', 'guestPhone', 'phone'],
  guestEmail: ['customer_email', 'guest_email', 'guestEmail', 'email'],
  checkIn: ['checkin', 'check_in', 'checkIn', 'checkinDate'],
  checkOut: ['checkout', 'check_out', 'checkOut', 'checkoutDate'],
  pax: ['pax'],
  adults: ['adults', 'no_of_adults', 'adultCount'],
  children: ['children', 'no_of_children', 'childCount'],
  infants: ['infants', 'no_of_infant', 'infantCount'],
  roomNo: ['room ids', 'room_ids', 'roomId', 'room_no', 'roomNo'],
  roomType: ['room types', 'room_types', 'roomType', 'roomTypeName'],
  ratePlans: ['rate_plans', 'ratePlan', 'ratePlanName'],
  bookingSource: ['booking_source', 'bookingSource', 'channel', 'source'],
  segment: ['segment', 'marketSegment'],
  status: ['status', 'bookingStatus', 'reservationStatus'],
  bookingAmount: ['booking_amount', 'bookingAmount', 'total_amount', 'totalAmount'],
  paymentMade: ['Total Payment Made', 'total_payment_made', 'payment_made', 'paymentMade'],
  balanceDue: ['balance_due', 'balanceDue'],
  notes: ['special_requests', 'specialRequests', 'remarks', 'notes'],
  reservationRef: ['reservationId', 'reservation_id'],
  groupBooking: ['isGroupBooking', 'groupBooking', 'is_group_booking'],
  roomLocked: ['isRoomLocked', 'roomLocked', 'is_room_locked'],
  totalWithServices: ['total_amount_with_services', 'totalAmountWithServices'],
  otaGross: ['ota_gross_amount', 'otaGrossAmount'],
  otaCommission: ['ota_commission', 'otaCommission'],
  otaTax: ['ota_tax', 'otaTax'],
  otaNet: ['ota_net_amount', 'otaNetAmount'],
  roomRevenue: ['room_revenue', 'roomRevenue'],
} as const satisfies Record<string, readonly string[]>;

export type CanonicalField = keyof typeof FIELD_CANDIDATES;

function isPresent(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === 'string') return value.trim() !== '';
  if (typeof value === 'number') return !Number.isNaN(value);
  return true;
}

/** First present value among the field's candidate keys, or undefined. */
export function resolveField(raw: RawBookingRecord, field: CanonicalField): unknown {
  for (const key of FIELD_CANDIDATES[field]) {
    const value = raw[key];
    if (isPresent(value)) return value;
  }
  return undefined;
}

function resolveText(raw: RawBookingRecord, field: CanonicalField, fallback = ''): string {
  const value = resolveField(raw, field);
  if (value === undefined) return fallback;
  return typeof value === 'string' ? value.trim() : String(value);
}

function isTruthyFlag(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') return ['true', 'yes', 'y', '1'].includes(value.trim().toLowerCase());
  return false;
}

/**
 * Directory lookup by hotel id; when unmapped, the part of the free-text
 * hotel name before the first "-".
 */
export function resolvePropertyName(raw: RawBookingRecord, context: TransformContext): string {
  const hotelId = context.hotelId ?? String(parseCount(resolveField(raw, 'hotelId')));
  const mapped = getPropertyName(context.directory, hotelId);
  if (mapped) return mapped;

  const hotelName = resolveText(raw, 'hotelName');
  return hotelName ? (hotelName.split('-')[0] ?? '').trim() : '';
}

function resolvePax(raw: RawBookingRecord): PaxCounts {
  const pax = resolveField(raw, 'pax');
  if (pax !== undefined) return parsePax(String(pax));

  return {
    adults: parseCount(resolveField(raw, 'adults')),
    children: parseCount(resolveField(raw, 'children')),
    infants: parseCount(resolveField(raw, 'infants')),
  };
}

interface Settlement {
  bookingAmount: number;
  paymentMade: number;
  balanceDue: number;
}

/**
 * A balance larger than the booking amount is clamped to the amount and
 * read as nothing paid. A missing payment is inferred from the balance,
 * a missing balance from the payment.
 */
export function settleAmounts(raw: RawBookingRecord): Settlement {
  const bookingAmount = parseAmount(resolveField(raw, 'bookingAmount'));
  const rawPayment = resolveField(raw, 'paymentMade');
  const rawBalance = resolveField(raw, 'balanceDue');

  if (rawBalance === undefined) {
    const paymentMade = parseAmount(rawPayment);
    return { bookingAmount, paymentMade, balanceDue: Math.max(bookingAmount - paymentMade, 0) };
  }

  const balanceDue = parseAmount(rawBalance);
  if (balanceDue > bookingAmount) {
    return { bookingAmount, paymentMade: 0, balanceDue: bookingAmount };
  }

  const paymentMade =
    rawPayment === undefined ? bookingAmount - balanceDue : parseAmount(rawPayment);
  return { bookingAmount, paymentMade, balanceDue };
}

function buildRemarks(raw: RawBookingRecord): string {
  const parts: string[] = [];

  const notes = resolveText(raw, 'notes');
  if (notes) parts.push(notes);

  const email = resolveText(raw, 'guestEmail');
  if (email) parts.push(`Email: ${email}`);

  const reservationRef = resolveText(raw, 'reservationRef');
  if (reservationRef) parts.push(`Reservation ID: ${reservationRef}`);

  if (isTruthyFlag(resolveField(raw, 'groupBooking'))) parts.push('Group Booking');
  if (isTruthyFlag(resolveField(raw, 'roomLocked'))) parts.push('Room Locked');

  return parts.join(syncConfig.REMARKS_DELIMITER);
}

/**
 * Map one upstream booking onto the canonical reservation row.
 * Every key is filled: '' for text, 0 for numbers, null for dates.
 */
export function transformRecord(
  raw: RawBookingRecord,
  context: TransformContext,
): OnlineReservation {
  const checkIn = parseDate(resolveField(raw, 'checkIn'));
  const checkOut = parseDate(resolveField(raw, 'checkOut'));
  const pax = resolvePax(raw);
  const { bookingAmount, paymentMade, balanceDue } = settleAmounts(raw);

  const bookingSource = truncate(
    resolveText(raw, 'bookingSource', context.defaults?.bookingSource ?? ''),
    FIELD_LIMITS.booking_source,
  );

  return {
    property: truncate(resolvePropertyName(raw, context), FIELD_LIMITS.property),
    booking_id: truncate(resolveText(raw, 'bookingId'), FIELD_LIMITS.booking_id),
    booking_made_on: parseDate(resolveField(raw, 'bookingMadeOn')),
    guest_name: truncate(resolveText(raw, 'guestName'), FIELD_LIMITS.guest_name),
    guest_phone: truncate(resolveText(raw, 'guestPhone'), FIELD_LIMITS.guest_phone),
    check_in: checkIn,
    check_out: checkOut,
    room_nights: roomNights(checkIn, checkOut),
    no_of_adults: pax.adults,
    no_of_children: pax.children,
    no_of_infant: pax.infants,
    total_pax: pax.adults + pax.children + pax.infants,
    room_no: truncate(resolveText(raw, 'roomNo'), FIELD_LIMITS.room_no),
    room_type: truncate(resolveText(raw, 'roomType'), FIELD_LIMITS.room_type),
    rate_plans: truncate(resolveText(raw, 'ratePlans'), FIELD_LIMITS.rate_plans),
    booking_source: bookingSource,
    segment: truncate(resolveText(raw, 'segment'), FIELD_LIMITS.segment),
    mode_of_booking: truncate(bookingSource, FIELD_LIMITS.mode_of_booking),
    staflexi_status: truncate(
      resolveText(raw, 'status', context.defaults?.status ?? ''),
      FIELD_LIMITS.staflexi_status,
    ),
    // Workflow status owned by the reservations team; upstream status stays in staflexi_status.
    booking_status: 'Pending',
    payment_status: derivePaymentStatus(paymentMade, bookingAmount),
    booking_confirmed_on: null,
    booking_amount: bookingAmount,
    total_payment_made: paymentMade,
    balance_due: balanceDue,
    total_amount_with_services: parseAmount(resolveField(raw, 'totalWithServices')),
    ota_gross_amount: parseAmount(resolveField(raw, 'otaGross')),
    ota_commission: parseAmount(resolveField(raw, 'otaCommission')),
    ota_tax: parseAmount(resolveField(raw, 'otaTax')),
    ota_net_amount: parseAmount(resolveField(raw, 'otaNet')),
    room_revenue: parseAmount(resolveField(raw, 'roomRevenue')),
    remarks: truncate(buildRemarks(raw), FIELD_LIMITS.remarks),
    submitted_by: truncate(context.submittedBy ?? '', FIELD_LIMITS.submitted_by),
    modified_by: '',
  };
}

/** Re-applies every column bound; the store rejects overlength values. */
export function enforceFieldLimits(record: OnlineReservation): OnlineReservation {
  const bounded = { ...record };
  for (const column of RESERVATION_COLUMNS) {
    if (isBoundedColumn(column)) {
      bounded[column] = truncate(record[column], FIELD_LIMITS[column]);
    }
  }
  return bounded;
}

function isBoundedColumn(column: ReservationColumn): column is BoundedColumn {
  return column in FIELD_LIMITS;
}
