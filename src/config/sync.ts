/**
 * Reservation sync configuration.
 * Field bounds mirror the column widths of the online_reservations table.
 */

export const syncConfig = {
  /** Default cap for short text columns (VARCHAR(50)). */
  DEFAULT_FIELD_LENGTH: 50,

  /** Cap for the remarks column (VARCHAR(500)). */
  REMARKS_FIELD_LENGTH: 500,

  /** Separator used when assembling remarks from several upstream signals. */
  REMARKS_DELIMITER: ' | ',

  /** Booking source recorded for API-ingested bookings that carry none. */
  PMS_DEFAULT_BOOKING_SOURCE: 'Stayflexi',

  /** Upstream status assumed for API bookings that carry none. */
  PMS_DEFAULT_STATUS: 'Confirmed',

  /** Upstream statuses that mark an administrative room block, not a guest booking. */
  ROOM_BLOCK_STATUSES: ['BLOCKED', 'BLOCK', 'ADMIN_BLOCKED', 'ROOM_BLOCKED'],

  /** Longest date range a single API sync may request. */
  MAX_SYNC_RANGE_DAYS: 366,
} as const;

export type SyncConfig = typeof syncConfig;
