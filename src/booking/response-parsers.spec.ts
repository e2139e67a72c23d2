import {
  CATEGORY_RECORD_PARSERS,
  parseBookingRecord,
  parseBookingRecords,
  parseCategories,
  parseSlots,
  SLOT_PARSERS,
  walkForSlots,
} from './response-parsers';

describe('response parsers', () => {
  describe('parseCategories', () => {
    const intro = { id: 1, title: 'Intro Call', slug: 'intro', lengthInMinutes: 15 };

    it('reads a top-level array', () => {
      expect(parseCategories([intro])).toEqual({
        items: [{ id: 1, title: 'Intro Call', slug: 'intro', lengthInMinutes: 15, description: undefined }],
        matchedBy: 'top-level-array',
      });
    });

    it('reads a data array', () => {
      expect(parseCategories({ status: 'success', data: [intro] }).matchedBy).toBe('data-array');
    });

    it('flattens grouped event types nested under data', () => {
      const body = {
        data: {
          eventTypeGroups: [
            { eventTypes: [intro] },
            { eventTypes: [{ id: '2', title: 'Interview', slug: 'interview', length: 45, description: 'Hiring' }] },
          ],
        },
      };

      const parsed = parseCategories(body);

      expect(parsed.matchedBy).toBe('data-nested');
      expect(parsed.items.map((category) => category.id)).toEqual([1, 2]);
      expect(parsed.items[1]).toEqual({
        id: 2,
        title: 'Interview',
        slug: 'interview',
        lengthInMinutes: 45,
        description: 'Hiring',
      });
    });

    it('reads the legacy event_types key', () => {
      expect(parseCategories({ event_types: [intro] }).matchedBy).toBe('event-types-key');
    });

    it('falls back to the first list of objects that look like categories', () => {
      const parsed = parseCategories({ result: { page: { entries: [{ id: 9, slug: 'demo' }] } } });

      expect(parsed.matchedBy).toBe('first-object-list');
      expect(parsed.items).toEqual([{ id: 9, title: 'demo', slug: 'demo', lengthInMinutes: undefined, description: undefined }]);
    });

    it('returns an empty list for a successful empty response', () => {
      expect(parseCategories({ data: [] })).toEqual({ items: [], matchedBy: 'data-array' });
    });

    it('reports no match for an unknown shape', () => {
      expect(parseCategories({ status: 'ok' })).toEqual({ items: [], matchedBy: null });
    });

    it('keeps the parsers in a fixed order', () => {
      expect(CATEGORY_RECORD_PARSERS.map((parser) => parser.name)).toEqual([
        'top-level-array',
        'data-array',
        'data-nested',
        'event-types-key',
        'first-object-list',
      ]);
    });
  });

  describe('parseSlots', () => {
    it('normalizes both generations to the same flat list', () => {
      const current = {
        status: 'success',
        data: {
          '2025-03-10': [
            { start: '2025-03-10T14:00:00.000Z' },
            { start: '2025-03-10T14:30:00.000Z' },
            { start: '2025-03-10T14:00:00.000Z' },
          ],
          '2025-03-11': [{ start: '2025-03-11T09:00:00.000-04:00' }],
        },
      };
      const legacy = {
        slots: {
          '2025-03-10': [{ time: '2025-03-10T14:00:00Z' }, { time: '2025-03-10T14:30:00Z' }],
          '2025-03-11': [{ time: '2025-03-11T13:00:00Z' }],
        },
      };
      const expected = ['2025-03-10T14:00:00.000Z', '2025-03-10T14:30:00.000Z', '2025-03-11T13:00:00.000Z'];

      expect(parseSlots(current)).toEqual({ items: expected, matchedBy: 'data-date-map' });
      expect(parseSlots(legacy)).toEqual({ items: expected, matchedBy: 'slots-date-map' });
    });

    it('reads slots nested under data.slots', () => {
      const body = { data: { slots: { '2025-03-10': [{ time: '2025-03-10T15:00:00Z' }] } } };

      expect(parseSlots(body)).toEqual({ items: ['2025-03-10T15:00:00.000Z'], matchedBy: 'data-slots-date-map' });
    });

    it('reads a flat list of strings', () => {
      expect(parseSlots({ data: ['2025-03-10T15:00:00Z'] }).items).toEqual(['2025-03-10T15:00:00.000Z']);
    });

    it('treats an empty date map as zero slots', () => {
      expect(parseSlots({ status: 'success', data: {} })).toEqual({ items: [], matchedBy: 'data-date-map' });
    });

    it('walks unknown trees for instants under known keys', () => {
      const body = {
        result: {
          days: [{ entries: [{ startTime: '2025-03-10T16:00:00Z', label: '2025-03-10T17:00:00Z' }] }],
        },
      };

      expect(walkForSlots(body)).toEqual(['2025-03-10T16:00:00Z']);
      expect(parseSlots(body).matchedBy).toBe('tree-walk');
    });

    it('ignores values that are not instants', () => {
      expect(parseSlots({ data: { '2025-03-10': [{ start: 'soon' }, { start: '2025-03-10' }] } }).items).toEqual([]);
    });

    it('tries the tree walk last', () => {
      expect(SLOT_PARSERS[SLOT_PARSERS.length - 1].name).toBe('tree-walk');
    });
  });

  describe('bookings', () => {
    const booking = { id: 7, uid: 'uid-7', startTime: '2025-03-12T15:00:00Z' };

    it('reads list shapes from either generation', () => {
      expect(parseBookingRecords({ data: [booking] }).matchedBy).toBe('data-array');
      expect(parseBookingRecords({ bookings: [booking] }).matchedBy).toBe('bookings-key');
      expect(parseBookingRecords({ data: { bookings: [booking] } }).matchedBy).toBe('data-nested');
    });

    it('drops list entries without an identifier or start', () => {
      expect(parseBookingRecords({ data: [booking, { note: 'x' }] }).items).toEqual([booking]);
    });

    it('reads a single booking from data, booking or the top level', () => {
      expect(parseBookingRecord({ status: 'success', data: booking })).toBe(booking);
      expect(parseBookingRecord({ booking })).toBe(booking);
      expect(parseBookingRecord(booking)).toBe(booking);
      expect(parseBookingRecord({ data: [booking] })).toBe(booking);
      expect(parseBookingRecord({ message: 'nope' })).toBeNull();
    });
  });
});
