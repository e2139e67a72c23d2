import { validateBookingPayload } from './booking-validation';

describe('validateBookingPayload', () => {
  const valid = {
    eventTypeId: 5,
    start: '2025-03-10T14:00:00Z',
    attendeeEmail: 'ada@example.com',
    attendeeName: 'Ada Lovelace',
    timeZone: 'America/New_York',
  };

  it('accepts a complete payload', () => {
    expect(validateBookingPayload(valid)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it('accepts a numeric string event type id', () => {
    expect(validateBookingPayload({ ...valid, eventTypeId: '5' }).valid).toBe(true);
  });

  it('flags an email without an @', () => {
    expect(validateBookingPayload({ ...valid, attendeeEmail: 'ada.example.com' })).toEqual({
      valid: false,
      errors: ['attendee email must be valid'],
      warnings: [],
    });
  });

  it('lists every missing field', () => {
    const report = validateBookingPayload({ eventTypeId: undefined, start: '', attendeeEmail: null, attendeeName: ' ' });

    expect(report.errors).toEqual([
      'event type id is required',
      'start time is required',
      'attendee email is required',
      'attendee name is required',
    ]);
  });

  it('rejects a non-integer event type and a local time without offset', () => {
    const report = validateBookingPayload({ ...valid, eventTypeId: 'intro', start: '2025-03-10T14:00:00' });

    expect(report.errors).toEqual([
      'event type id must be a positive integer',
      'start time must be a valid ISO-8601 instant',
    ]);
  });

  it('only warns about an unknown timezone', () => {
    expect(validateBookingPayload({ ...valid, timeZone: 'Mars/Olympus_Mons' })).toEqual({
      valid: true,
      errors: [],
      warnings: ['timezone Mars/Olympus_Mons may not be supported; the backend default will apply'],
    });
  });
});
