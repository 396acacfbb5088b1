import dayjs from 'dayjs';
import { syncConfig } from '../config/sync';
import { isIsoDate } from '../normalization/fields';

/**
 * Standard API error response shape.
 */
export interface ApiError {
  error: string;
  message?: string;
}

/**
 * Validate a sync date range of YYYY-MM-DD calendar dates. Rejects ranges
 * longer than MAX_SYNC_RANGE_DAYS and ranges that end before they start.
 * A single day (dateFrom === dateTo) is allowed.
 */
export function validateDateRange(
  dateFrom: string,
  dateTo: string,
): { valid: true; from: Date; to: Date } | { valid: false; error: string } {
  if (!isIsoDate(dateFrom)) return { valid: false, error: 'from is not a valid date' };
  if (!isIsoDate(dateTo)) return { valid: false, error: 'to is not a valid date' };

  const from = dayjs(dateFrom, 'YYYY-MM-DD', true);
  const to = dayjs(dateTo, 'YYYY-MM-DD', true);
  if (from.isAfter(to)) return { valid: false, error: 'from must not be after to' };

  const diffDays = to.diff(from, 'day');
  if (diffDays > syncConfig.MAX_SYNC_RANGE_DAYS) {
    return {
      valid: false,
      error: `Date range exceeds maximum of ${syncConfig.MAX_SYNC_RANGE_DAYS} days (got ${diffDays})`,
    };
  }

  return { valid: true, from: from.toDate(), to: to.toDate() };
}
