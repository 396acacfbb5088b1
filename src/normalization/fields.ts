import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat';
import { syncConfig } from '../config/sync';
import type { IsoDate, PaymentStatus } from '../types/reservation';

dayjs.extend(customParseFormat);

/**
 * Pure field conversions shared by every ingestion path.
 * Nothing here throws: unparseable input becomes null or 0.
 */

// Tried in order; the first strict match wins.
const DATE_FORMATS = [
  'DD/MM/YYYY HH:mm:ss',
  'DD/MM/YYYY',
  // PMS API format
  'DD-MM-YYYY HH:mm:ss',
  // ISO-8601, after any Z suffix and fractional seconds are stripped
  'YYYY-MM-DDTHH:mm:ss',
  'YYYY-MM-DDTHH:mm',
  'YYYY-MM-DD',
] as const;

const ISO_SUFFIX = /(\.\d+)?Z$/;

export function parseDate(value: unknown): IsoDate | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : dayjs(value).format('YYYY-MM-DD');
  }
  if (typeof value !== 'string') return null;

  const trimmed = value.trim();
  if (!trimmed) return null;

  for (const format of DATE_FORMATS) {
    const candidate = format.startsWith('YYYY') ? trimmed.replace(ISO_SUFFIX, '') : trimmed;
    const parsed = dayjs(candidate, format, true);
    if (parsed.isValid()) return parsed.format('YYYY-MM-DD');
  }
  return null;
}

/** True for a real calendar date written YYYY-MM-DD. */
export function isIsoDate(value: string): boolean {
  return dayjs(value, 'YYYY-MM-DD', true).isValid();
}

export interface PaxCounts {
  adults: number;
  children: number;
  infants: number;
}

const PAX_FIELD = /^(adults|children|infants?)\s*:\s*(.*)$/i;

/**
 * Parse "Adults: 2, Children: 1, Infant: 0". Fields are read independently;
 * a non-numeric count is ignored rather than failing the whole string.
 */
export function parsePax(value: unknown): PaxCounts {
  const counts: PaxCounts = { adults: 0, children: 0, infants: 0 };
  if (typeof value !== 'string' || !value.trim()) return counts;

  for (const part of value.split(',')) {
    const match = PAX_FIELD.exec(part.trim());
    if (!match) continue;

    const [, label = '', rawCount = ''] = match;
    const countText = rawCount.trim();
    if (!/^\d+$/.test(countText)) continue;

    const n = Number.parseInt(countText, 10);
    const key = label.toLowerCase();
    if (key === 'adults') counts.adults += n;
    else if (key === 'children') counts.children += n;
    else counts.infants += n;
  }
  return counts;
}

/**
 * Cap a string at maxLength characters (code points, as the store counts them).
 * Empty and absent values pass through untouched.
 */
export function truncate(value: string, maxLength?: number): string;
export function truncate(
  value: string | null | undefined,
  maxLength?: number,
): string | null | undefined;
export function truncate(
  value: string | null | undefined,
  maxLength: number = syncConfig.DEFAULT_FIELD_LENGTH,
): string | null | undefined {
  if (!value) return value;
  const chars = Array.from(value);
  return chars.length > maxLength ? chars.slice(0, maxLength).join('') : value;
}

/** Compares the two amounts directly; nothing paid is always Not Paid. */
export function derivePaymentStatus(paid: number, owed: number): PaymentStatus {
  if (paid <= 0) return 'Not Paid';
  if (paid >= owed) return 'Fully Paid';
  return 'Partially Paid';
}

const PLAIN_DECIMAL = /^\d+(\.\d+)?$/;

/** Non-negative decimal from a number or plain decimal string; 0 otherwise. */
export function parseAmount(value: unknown): number {
  let n: number;
  if (typeof value === 'number') {
    n = value;
  } else if (typeof value === 'string') {
    const cleaned = value.replace(/,/g, '').trim();
    n = PLAIN_DECIMAL.test(cleaned) ? Number(cleaned) : 0;
  } else {
    return 0;
  }
  return Number.isFinite(n) && n > 0 ? n : 0;
}

export function parseCount(value: unknown): number {
  return Math.trunc(parseAmount(value));
}

export function roomNights(checkIn: IsoDate | null, checkOut: IsoDate | null): number {
  if (!checkIn || !checkOut) return 0;
  const nights = dayjs(checkOut).diff(dayjs(checkIn), 'day');
  return Number.isFinite(nights) && nights > 0 ? nights : 0;
}
