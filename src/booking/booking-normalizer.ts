import { Booking, BookingDisplayStatus, isRecord } from '../common/types';
import { TimeContextService } from '../time/time-context.service';
import { asString, toPositiveInt } from './response-parsers';

type JsonRecord = Record<string, unknown>;

const WEEK_MS = 7 * 24 * 60 * 60 * 1000;
const JOIN_URL_KEYS = ['meetingUrl', 'videoCallUrl', 'joinUrl', 'hangoutLink', 'location'];
// Wrong reschedule/cancel links would be actionable, so only these exact keys count.
const RESCHEDULE_URL_KEYS = ['rescheduleUrl', 'rescheduleLink'];
const CANCEL_URL_KEYS = ['cancelUrl', 'cancelLink'];

export interface Attendee {
  email?: string;
  name?: string;
  timeZone?: string;
}

function isHttpUrl(value: unknown): value is string {
  return typeof value === 'string' && /^https?:\/\//i.test(value);
}

function attendeesOf(record: JsonRecord): Attendee[] {
  const raw = Array.isArray(record.attendees) ? record.attendees : [];
  const attendees = raw.filter(isRecord).map((attendee) => ({
    email: asString(attendee.email),
    name: asString(attendee.name),
    timeZone: asString(attendee.timeZone),
  }));
  const responses = record.responses;
  if (attendees.length === 0 && isRecord(responses)) {
    attendees.push({ email: asString(responses.email), name: asString(responses.name), timeZone: undefined });
  }
  return attendees;
}

/** The attendee matching the filter email, else the first one listed. */
function primaryAttendee(record: JsonRecord, preferEmail?: string): Attendee | undefined {
  const attendees = attendeesOf(record);
  if (preferEmail) {
    const wanted = preferEmail.toLowerCase();
    const match = attendees.find((attendee) => attendee.email?.toLowerCase() === wanted);
    if (match) return match;
  }
  return attendees[0];
}

function firstUrl(sources: unknown[], keys: string[]): string | undefined {
  for (const source of sources) {
    if (!isRecord(source)) continue;
    for (const key of keys) {
      if (isHttpUrl(source[key])) return String(source[key]);
    }
  }
  return undefined;
}

function joinUrl(record: JsonRecord): string | undefined {
  const known = firstUrl([record, record.metadata, record.responses], JOIN_URL_KEYS);
  if (known) return known;
  const references = Array.isArray(record.references) ? record.references.filter(isRecord) : [];
  for (const reference of references) {
    const url = reference.meetingUrl ?? reference.url;
    if (isHttpUrl(url)) return url;
  }
  // generic fallback: any URL-valued key that names a meeting, video or join link
  for (const [key, value] of Object.entries(record)) {
    if (/meeting|video|join/i.test(key) && isHttpUrl(value)) return value;
  }
  return undefined;
}

function displayStatusOf(
  status: string | undefined,
  start: Date,
  now: Date,
  time: TimeContextService,
): BookingDisplayStatus {
  const normalized = status?.toLowerCase();
  if (normalized === 'cancelled' || normalized === 'canceled' || normalized === 'rejected') return 'cancelled';
  if (normalized === 'pending') return 'pending';
  if (start.getTime() < now.getTime()) return 'past';
  if (time.localDate(start) === time.localDate(now)) return 'today';
  if (start.getTime() - now.getTime() < WEEK_MS) return 'this_week';
  return 'upcoming';
}

/** Maps a raw booking record from either generation onto {@link Booking}; null when it has no start. */
export function toBooking(
  record: JsonRecord,
  time: TimeContextService,
  now: Date,
  preferEmail?: string,
): Booking | null {
  const startRaw = asString(record.startTime) ?? asString(record.start);
  if (!startRaw || Number.isNaN(Date.parse(startRaw))) return null;
  const start = new Date(startRaw);
  const endRaw = asString(record.endTime) ?? asString(record.end);

  const id = toPositiveInt(record.id);
  const backendUid = asString(record.uid);
  const uid = backendUid ?? (id !== undefined ? String(id) : '');
  if (!uid) return null;

  const eventType = record.eventType;
  const attendee = primaryAttendee(record, preferEmail);
  const status = asString(record.status);

  return {
    id,
    uid,
    hasBackendUid: backendUid !== undefined,
    title: asString(record.title) ?? (isRecord(eventType) ? asString(eventType.title) : undefined) ?? 'Meeting',
    start: start.toISOString(),
    end: endRaw && !Number.isNaN(Date.parse(endRaw)) ? new Date(endRaw).toISOString() : undefined,
    status,
    eventTypeId: toPositiveInt(record.eventTypeId) ?? (isRecord(eventType) ? toPositiveInt(eventType.id) : undefined),
    attendeeEmail: attendee?.email,
    attendeeName: attendee?.name,
    attendeeTimeZone: attendee?.timeZone,
    localTime: time.formatLocal(start),
    displayStatus: displayStatusOf(status, start, now, time),
    joinUrl: joinUrl(record),
    rescheduleUrl: firstUrl([record, record.metadata], RESCHEDULE_URL_KEYS),
    cancelUrl: firstUrl([record, record.metadata], CANCEL_URL_KEYS),
  };
}
