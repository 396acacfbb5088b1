import { describe, it, expect } from 'vitest';
import {
  enforceFieldLimits,
  resolvePropertyName,
  settleAmounts,
  transformRecord,
  type TransformContext,
} from '@/normalization/transformer';
import { reservation, testDirectory } from '../../helpers/fixtures';

const context: TransformContext = { directory: testDirectory };

describe('transformRecord: spreadsheet rows', () => {
  const row = {
    'booking id': 'BK-100',
    'hotel id': '501',
    customer_name: 'Asha Rao',
    checkin: '01/12/2025',
    checkout: '04/12/2025',
    pax: 'Adults: 2, Children: 1, Infant: 0',
    booking_amount: '9,000',
    'Total Payment Made': '3000',
    status: 'CONFIRMED',
    booking_source: 'Booking.com',
  };

  it('maps every canonical field', () => {
    const record = transformRecord(row, { ...context, submittedBy: 'ops' });

    expect(record).toMatchObject({
      property: 'Test Bay Hotel',
      booking_id: 'BK-100',
      guest_name: 'Asha Rao',
      check_in: '2025-12-01',
      check_out: '2025-12-04',
      room_nights: 3,
      no_of_adults: 2,
      no_of_children: 1,
      no_of_infant: 0,
      total_pax: 3,
      booking_amount: 9000,
      total_payment_made: 3000,
      balance_due: 6000,
      payment_status: 'Partially Paid',
      staflexi_status: 'CONFIRMED',
      booking_source: 'Booking.com',
      mode_of_booking: 'Booking.com',
      submitted_by: 'ops',
      remarks: '',
    });
  });

  it('always starts the workflow status at Pending', () => {
    const record = transformRecord({ ...row, status: 'CANCELLED' }, context);
    expect(record.booking_status).toBe('Pending');
    expect(record.staflexi_status).toBe('CANCELLED');
    expect(record.booking_confirmed_on).toBeNull();
    expect(record.modified_by).toBe('');
  });

  it('fills missing fields with empty values', () => {
    const record = transformRecord({}, context);
    expect(record.booking_id).toBe('');
    expect(record.guest_name).toBe('');
    expect(record.check_in).toBeNull();
    expect(record.room_nights).toBe(0);
    expect(record.total_pax).toBe(0);
    expect(record.payment_status).toBe('Not Paid');
  });
});

describe('transformRecord: PMS API objects', () => {
  it('reads camelCase keys and numeric pax fields', () => {
    const record = transformRecord(
      {
        bookingId: 'SF-1',
        guestName: 'Lee Chen',
        checkIn: '2025-12-01T14:00:00',
        checkOut: '2025-12-02T11:00:00',
        adults: 2,
        children: 0,
        roomTypeName: 'Suite',
        totalAmount: 4500,
        paymentMade: 4500,
      },
      { ...context, hotelId: '502' },
    );

    expect(record).toMatchObject({
      property: 'Test Hill Lodge',
      booking_id: 'SF-1',
      guest_name: 'Lee Chen',
      check_in: '2025-12-01',
      check_out: '2025-12-02',
      room_nights: 1,
      total_pax: 2,
      room_type: 'Suite',
      payment_status: 'Fully Paid',
      balance_due: 0,
    });
  });

  it('applies the source defaults when the record has none', () => {
    const record = transformRecord(
      { bookingId: 'SF-2' },
      { ...context, defaults: { bookingSource: 'Stayflexi', status: 'Confirmed' } },
    );
    expect(record.booking_source).toBe('Stayflexi');
    expect(record.mode_of_booking).toBe('Stayflexi');
    expect(record.staflexi_status).toBe('Confirmed');
  });
});

describe('guest name resolution', () => {
  it('falls back through the candidate keys', () => {
    expect(transformRecord({ guestName: 'X' }, context).guest_name).toBe('X');
    expect(transformRecord({ name: 'Y' }, context).guest_name).toBe('Y');
  });

  it('treats blank values as absent', () => {
    expect(transformRecord({ customer_name: '   ', guest_name: 'Z' }, context).guest_name).toBe('Z');
  });
});

describe('resolvePropertyName', () => {
  it('prefers the context hotel id', () => {
    expect(resolvePropertyName({ 'hotel id': '501' }, { ...context, hotelId: '503' })).toBe(
      'Test River Inn',
    );
  });

  it('uses the part of the hotel name before the first dash when unmapped', () => {
    expect(resolvePropertyName({ 'hotel name': 'Seaside Inn - Goa - North' }, context)).toBe(
      'Seaside Inn',
    );
    expect(resolvePropertyName({ 'hotel id': '999', hotelName: 'Plain Name' }, context)).toBe(
      'Plain Name',
    );
  });

  it('is empty with neither an id nor a name', () => {
    expect(resolvePropertyName({}, context)).toBe('');
  });
});

describe('settleAmounts', () => {
  it('derives the balance when none is given', () => {
    expect(settleAmounts({ booking_amount: 1000, payment_made: 250 })).toEqual({
      bookingAmount: 1000,
      paymentMade: 250,
      balanceDue: 750,
    });
  });

  it('never derives a negative balance', () => {
    expect(settleAmounts({ booking_amount: 1000, payment_made: 1200 })).toEqual({
      bookingAmount: 1000,
      paymentMade: 1200,
      balanceDue: 0,
    });
  });

  it('clamps a balance above the amount and reads it as nothing paid', () => {
    expect(settleAmounts({ booking_amount: 1000, balance_due: 1500, payment_made: 200 })).toEqual({
      bookingAmount: 1000,
      paymentMade: 0,
      balanceDue: 1000,
    });
  });

  it('infers a missing payment from the balance', () => {
    expect(settleAmounts({ booking_amount: 1000, balance_due: 400 })).toEqual({
      bookingAmount: 1000,
      paymentMade: 600,
      balanceDue: 400,
    });
  });

  it('is all zero for an empty record', () => {
    expect(settleAmounts({})).toEqual({ bookingAmount: 0, paymentMade: 0, balanceDue: 0 });
  });
});

describe('remarks', () => {
  it('joins notes, contact and flags in order', () => {
    const record = transformRecord(
      {
        special_requests: 'Late arrival',
        customer_email: 'guest@example.com',
        reservationId: 'R-9',
        isGroupBooking: true,
        isRoomLocked: 'false',
      },
      context,
    );
    expect(record.remarks).toBe(
      'Late arrival | Email: guest@example.com | Reservation ID: R-9 | Group Booking',
    );
  });

  it('includes the room lock flag', () => {
    expect(transformRecord({ isRoomLocked: 'yes' }, context).remarks).toBe('Room Locked');
  });
});

describe('field limits', () => {
  it('truncates long text on transform', () => {
    const record = transformRecord(
      { guest_name: 'n'.repeat(80), remarks: 'r'.repeat(600) },
      context,
    );
    expect(record.guest_name).toBe('n'.repeat(50));
    expect(record.remarks).toHaveLength(500);
  });

  it('enforceFieldLimits re-applies the bounds to any record', () => {
    const bounded = enforceFieldLimits(
      reservation({ guest_name: 'g'.repeat(70), room_type: 't'.repeat(51) }),
    );
    expect(bounded.guest_name).toHaveLength(50);
    expect(bounded.room_type).toHaveLength(50);
    expect(bounded.booking_id).toBe('BK-1');
  });
});
