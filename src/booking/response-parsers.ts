import { EventCategory, isRecord } from '../common/types';

type JsonRecord = Record<string, unknown>;

/** A named, independently testable guess at one response layout. */
export interface ShapeParser<T> {
  name: string;
  parse(body: unknown): T[] | null; // null = "this shape does not apply"
}

export interface ParsedList<T> {
  items: T[];
  matchedBy: string | null;
}

function parseWith<T>(parsers: ShapeParser<T>[], body: unknown): ParsedList<T> {
  for (const parser of parsers) {
    const items = parser.parse(body);
    if (items) {
      return { items, matchedBy: parser.name };
    }
  }
  return { items: [], matchedBy: null };
}

function recordsOf(value: unknown): JsonRecord[] | null {
  return Array.isArray(value) ? value.filter(isRecord) : null;
}

function field(record: unknown, key: string): unknown {
  return isRecord(record) ? record[key] : undefined;
}

/** Depth-first search for the first array of objects that satisfies `accept`. */
function findFirstRecordList(
  body: unknown,
  accept: (record: JsonRecord) => boolean,
  depth = 0,
): JsonRecord[] | null {
  if (depth > 6) return null;
  if (Array.isArray(body)) {
    const records = body.filter(isRecord);
    if (records.length > 0 && records.some(accept)) {
      return records;
    }
    for (const item of body) {
      const nested = findFirstRecordList(item, accept, depth + 1);
      if (nested) return nested;
    }
    return null;
  }
  if (isRecord(body)) {
    for (const value of Object.values(body)) {
      const nested = findFirstRecordList(value, accept, depth + 1);
      if (nested) return nested;
    }
  }
  return null;
}

// ---------------------------------------------------------------------------
// Event categories

const NESTED_CATEGORY_KEYS = ['eventTypes', 'event_types', 'items', 'results'];

export const CATEGORY_RECORD_PARSERS: ShapeParser<JsonRecord>[] = [
  { name: 'top-level-array', parse: (body) => recordsOf(body) },
  { name: 'data-array', parse: (body) => recordsOf(field(body, 'data')) },
  {
    name: 'data-nested',
    parse: (body) => {
      const data = field(body, 'data');
      if (!isRecord(data)) return null;
      const groups = recordsOf(data.eventTypeGroups);
      if (groups) {
        return groups.flatMap((group) => recordsOf(group.eventTypes) ?? []);
      }
      for (const key of NESTED_CATEGORY_KEYS) {
        const records = recordsOf(data[key]);
        if (records) return records;
      }
      return null;
    },
  },
  {
    name: 'event-types-key',
    parse: (body) => recordsOf(field(body, 'event_types')) ?? recordsOf(field(body, 'eventTypes')),
  },
  {
    name: 'first-object-list',
    parse: (body) => findFirstRecordList(body, (record) => 'id' in record && ('title' in record || 'slug' in record)),
  },
];

function toEventCategory(record: JsonRecord): EventCategory | null {
  const id = toPositiveInt(record.id);
  if (id === undefined) return null;
  const slug = asString(record.slug) ?? '';
  const title = asString(record.title) ?? asString(record.name) ?? slug;
  return {
    id,
    title: title || `Event type ${id}`,
    slug,
    lengthInMinutes: toPositiveInt(record.lengthInMinutes) ?? toPositiveInt(record.length) ?? toPositiveInt(record.duration),
    description: asString(record.description) || undefined,
  };
}

export function parseCategories(body: unknown): ParsedList<EventCategory> {
  const parsed = parseWith(CATEGORY_RECORD_PARSERS, body);
  const items = parsed.items.map(toEventCategory).filter((category): category is EventCategory => category !== null);
  return { items, matchedBy: parsed.matchedBy };
}

// ---------------------------------------------------------------------------
// Slots

const SLOT_KEYS = ['start', 'time', 'startTime', 'start_time', 'slot'];
const ISO_INSTANT = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})$/;

export function isIsoInstant(value: unknown): value is string {
  return typeof value === 'string' && ISO_INSTANT.test(value) && !Number.isNaN(Date.parse(value));
}

function slotValue(item: unknown): string[] {
  if (isIsoInstant(item)) return [item];
  if (!isRecord(item)) return [];
  for (const key of SLOT_KEYS) {
    const value = item[key];
    if (isIsoInstant(value)) return [value];
  }
  return [];
}

function dateMapSlots(value: unknown): string[] | null {
  if (!isRecord(value)) return null;
  const lists = Object.values(value);
  if (!lists.every(Array.isArray)) return null;
  return lists.flatMap((list) => (Array.isArray(list) ? list.flatMap(slotValue) : []));
}

function flatSlots(value: unknown): string[] | null {
  return Array.isArray(value) ? value.flatMap(slotValue) : null;
}

/** Last resort: collect every ISO instant under a known slot key, or sitting bare in an array. */
export function walkForSlots(body: unknown, depth = 0): string[] {
  if (depth > 8) return [];
  if (Array.isArray(body)) {
    return body.flatMap((item) => (isIsoInstant(item) ? [item] : walkForSlots(item, depth + 1)));
  }
  if (!isRecord(body)) return [];
  const found: string[] = [];
  for (const [key, value] of Object.entries(body)) {
    if (SLOT_KEYS.includes(key) && isIsoInstant(value)) {
      found.push(value);
    } else if (typeof value === 'object' && value !== null) {
      found.push(...walkForSlots(value, depth + 1));
    }
  }
  return found;
}

export const SLOT_PARSERS: ShapeParser<string>[] = [
  { name: 'data-date-map', parse: (body) => dateMapSlots(field(body, 'data')) },
  { name: 'slots-date-map', parse: (body) => dateMapSlots(field(body, 'slots')) },
  { name: 'data-slots-date-map', parse: (body) => dateMapSlots(field(field(body, 'data'), 'slots')) },
  { name: 'flat-list', parse: (body) => flatSlots(body) ?? flatSlots(field(body, 'data')) ?? flatSlots(field(body, 'slots')) },
  {
    name: 'tree-walk',
    parse: (body) => {
      const slots = walkForSlots(body);
      return slots.length > 0 ? slots : null;
    },
  },
];

/** Flat, de-duplicated, order-preserving list of UTC ISO instants. */
export function parseSlots(body: unknown): ParsedList<string> {
  const parsed = parseWith(SLOT_PARSERS, body);
  const seen = new Set<string>();
  const items: string[] = [];
  for (const raw of parsed.items) {
    const normalized = new Date(raw).toISOString();
    if (!seen.has(normalized)) {
      seen.add(normalized);
      items.push(normalized);
    }
  }
  return { items, matchedBy: parsed.matchedBy };
}

// ---------------------------------------------------------------------------
// Bookings

function looksLikeBooking(record: JsonRecord): boolean {
  return ('uid' in record || 'id' in record) && ('startTime' in record || 'start' in record);
}

const BOOKING_LIST_PARSERS: ShapeParser<JsonRecord>[] = [
  { name: 'top-level-array', parse: (body) => recordsOf(body) },
  { name: 'data-array', parse: (body) => recordsOf(field(body, 'data')) },
  { name: 'bookings-key', parse: (body) => recordsOf(field(body, 'bookings')) },
  {
    name: 'data-nested',
    parse: (body) => recordsOf(field(field(body, 'data'), 'bookings')) ?? recordsOf(field(field(body, 'data'), 'items')),
  },
  { name: 'first-object-list', parse: (body) => findFirstRecordList(body, looksLikeBooking) },
];

export function parseBookingRecords(body: unknown): ParsedList<JsonRecord> {
  const parsed = parseWith(BOOKING_LIST_PARSERS, body);
  return { items: parsed.items.filter(looksLikeBooking), matchedBy: parsed.matchedBy };
}

/** A single booking as returned by a by-id/by-uid lookup or a create/reschedule call. */
export function parseBookingRecord(body: unknown): JsonRecord | null {
  const candidates = [field(body, 'data'), field(body, 'booking'), field(field(body, 'data'), 'booking'), body];
  for (const candidate of candidates) {
    if (isRecord(candidate) && ('uid' in candidate || 'id' in candidate)) {
      return candidate;
    }
    // v2 returns an array for recurring bookings; the first occurrence stands for the series
    if (Array.isArray(candidate) && isRecord(candidate[0]) && ('uid' in candidate[0] || 'id' in candidate[0])) {
      return candidate[0];
    }
  }
  return null;
}

export function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function toPositiveInt(value: unknown): number | undefined {
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  return typeof parsed === 'number' && Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}
