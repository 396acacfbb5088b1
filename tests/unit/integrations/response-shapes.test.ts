import { describe, it, expect } from 'vitest';
import {
  detectResponseShape,
  extractBookingRecords,
  flattenRoomReservations,
  isRoomBlock,
} from '@/integrations/pms/response-shapes';

describe('detectResponseShape', () => {
  it('recognizes a bare list', () => {
    expect(detectResponseShape([{ bookingId: '1' }])).toEqual({
      shape: 'flat_list',
      records: [{ bookingId: '1' }],
    });
  });

  it('recognizes the bookings envelope', () => {
    expect(detectResponseShape({ bookings: [{ bookingId: '2' }] }).shape).toBe('bookings_key');
  });

  it('recognizes room reservations, nested under data or not', () => {
    expect(detectResponseShape({ data: { allRoomReservations: [] } }).shape).toBe(
      'room_reservations',
    );
    expect(detectResponseShape({ allRoomReservations: [] }).shape).toBe('room_reservations');
  });

  it('recognizes a list under data', () => {
    expect(detectResponseShape({ data: [{ bookingId: '3' }] }).shape).toBe('data_list');
  });

  it('reports anything else as unrecognized', () => {
    expect(detectResponseShape({ message: 'ok' }).shape).toBe('unrecognized');
    expect(detectResponseShape('oops').shape).toBe('unrecognized');
    expect(extractBookingRecords({ message: 'ok' })).toBeNull();
  });
});

describe('isRoomBlock', () => {
  it('matches block statuses case-insensitively', () => {
    expect(isRoomBlock({ status: 'blocked' })).toBe(true);
    expect(isRoomBlock({ status: ' Admin_Blocked ' })).toBe(true);
    expect(isRoomBlock({ status: 'CONFIRMED' })).toBe(false);
  });

  it('reads the first non-blank status key', () => {
    expect(isRoomBlock({ status: '', reservationStatus: 'ROOM_BLOCKED' })).toBe(true);
    expect(isRoomBlock({ status: 'CONFIRMED', reservationStatus: 'BLOCKED' })).toBe(false);
  });

  it('is false without any status', () => {
    expect(isRoomBlock({ bookingId: 'A' })).toBe(false);
  });
});

describe('flattenRoomReservations', () => {
  it('copies room metadata onto entries and drops blocks', () => {
    const records = flattenRoomReservations([
      {
        roomId: '101',
        roomTypeName: 'Deluxe',
        resInfoList: [
          { bookingId: 'A', status: 'CONFIRMED' },
          { bookingId: 'B', status: 'BLOCKED' },
          { bookingId: 'C', roomTypeName: 'Suite' },
        ],
      },
      { roomId: '102', reservations: [{ bookingId: 'D' }] },
      { roomId: '103' },
    ]);

    expect(records).toEqual([
      { roomId: '101', roomTypeName: 'Deluxe', bookingId: 'A', status: 'CONFIRMED' },
      { roomId: '101', roomTypeName: 'Suite', bookingId: 'C' },
      { roomId: '102', bookingId: 'D' },
    ]);
  });

  it('is used for room reservation responses', () => {
    expect(
      extractBookingRecords({
        data: {
          allRoomReservations: [
            { roomId: '7', resInfoList: [{ bookingId: 'X' }, { bookingId: 'Y', status: 'BLOCK' }] },
          ],
        },
      }),
    ).toEqual([{ roomId: '7', bookingId: 'X' }]);
  });

  it('does not filter blocks out of flat lists', () => {
    expect(extractBookingRecords([{ bookingId: 'B', status: 'BLOCKED' }])).toEqual([
      { bookingId: 'B', status: 'BLOCKED' },
    ]);
  });
});
