import { buildPropertyDirectory } from '@/config/properties';
import type { AppDeps } from '@/deps';
import { StubPmsClient } from '@/integrations/adapters/stub-pms';
import { PmsSession } from '@/integrations/pms/session';
import { TelemetryService } from '@/services/telemetry.service';
import type { OnlineReservation } from '@/types/reservation';
import { InMemoryEventWriter, InMemoryReservationStore } from './in-memory';

export const testDirectory = buildPropertyDirectory({
  properties: [
    { hotelId: '501', name: 'Test Bay Hotel' },
    { hotelId: '502', name: 'Test Hill Lodge' },
    { hotelId: '503', name: 'Test River Inn' },
  ],
});

export interface TestDeps extends AppDeps {
  reservations: InMemoryReservationStore;
  pmsClient: StubPmsClient;
  events: InMemoryEventWriter;
}

export function buildTestDeps(overrides: Partial<TestDeps> = {}): TestDeps {
  const events = overrides.events ?? new InMemoryEventWriter();
  return {
    reservations: new InMemoryReservationStore(),
    pmsClient: new StubPmsClient(),
    pmsSession: new PmsSession({ credentials: { email: 'ops@example.com', password: 'test-secret' } }),
    directory: testDirectory,
    syncPauseMs: 0,
    tokenExpiryMarginSeconds: 3600,
    ...overrides,
    events,
    telemetry: overrides.telemetry ?? new TelemetryService(events),
  };
}

export function reservation(overrides: Partial<OnlineReservation> = {}): OnlineReservation {
  return {
    property: 'Test Bay Hotel',
    booking_id: 'BK-1',
    booking_made_on: null,
    guest_name: 'Guest',
    guest_phone: '',
    check_in: '2025-12-01',
    check_out: '2025-12-03',
    room_nights: 2,
    no_of_adults: 2,
    no_of_children: 0,
    no_of_infant: 0,
    total_pax: 2,
    room_no: '101',
    room_type: 'Deluxe',
    rate_plans: '',
    booking_source: 'Walk-in',
    segment: '',
    mode_of_booking: 'Walk-in',
    staflexi_status: 'CONFIRMED',
    booking_status: 'Pending',
    payment_status: 'Not Paid',
    booking_confirmed_on: null,
    booking_amount: 0,
    total_payment_made: 0,
    balance_due: 0,
    total_amount_with_services: 0,
    ota_gross_amount: 0,
    ota_commission: 0,
    ota_tax: 0,
    ota_net_amount: 0,
    room_revenue: 0,
    remarks: '',
    submitted_by: '',
    modified_by: '',
    ...overrides,
  };
}
