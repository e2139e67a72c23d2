import { Logger } from '@nestjs/common';
import { Booking, EventCategory, isRecord } from '../common/types';
import { TimeContextService } from '../time/time-context.service';
import { BookingHttpClient } from './booking-http.client';
import {
  attemptWithFallback,
  CalComGenerations,
  FallbackResult,
  GenerationName,
  V2_API_VERSIONS,
} from './api-generations';
import { toBooking } from './booking-normalizer';
import { validateBookingPayload } from './booking-validation';
import {
  asString,
  isIsoInstant,
  ParsedList,
  parseBookingRecord,
  parseBookingRecords,
  parseCategories,
  parseSlots,
  toPositiveInt,
} from './response-parsers';

const MAX_BACKEND_MESSAGE = 200;
const MAX_ERROR_LOG = 20;
const NUMERIC_ID = /^\d+$/;

export type FailureCode =
  | 'validation'
  | 'duplicate_in_progress'
  | 'client_error'
  | 'transient'
  | 'not_found'
  | 'partial_failure';

export interface AdapterFailure {
  success: false;
  code: FailureCode;
  error: string;
  suggestion?: string;
  retryable?: boolean;
  status?: number;
  errors?: string[];
  warnings?: string[];
  partialFailure?: boolean;
  cancelledUid?: string;
}

export type AdapterResult<T extends object> = ({ success: true } & T) | AdapterFailure;

export interface CreateBookingInput {
  eventTypeId: number | string;
  start: string;
  attendeeEmail: string;
  attendeeName: string;
  timeZone?: string;
  language?: string;
  reason?: string;
}

export interface BookingRef {
  uid?: string;
  id?: number;
}

export interface BookingFilter {
  attendeeEmail?: string;
  attendeeName?: string;
}

export interface CreatedBooking {
  id?: number;
  uid?: string;
  start: string;
  eventTypeId: number;
}

export interface AdapterErrorEntry {
  at: string;
  operation: string;
  message: string;
  status?: number;
}

export interface BookingAdapterOptions {
  defaultTimeZone: string;
  defaultLanguage: string;
}

export interface RescheduledBooking {
  uid?: string;
  id?: number;
  start: string;
}

export type CategoryList = { categories: EventCategory[]; generation: GenerationName };
export type SlotList = { slots: string[]; count: number };
export type BookingCreated = { booking: CreatedBooking; generation: GenerationName; warnings: string[] };
export type BookingList = { bookings: Booking[]; count: number };
export type BookingDetail = { booking: Booking };
export type BookingCancelled = { cancelled: { uid: string; id?: number }; generation: GenerationName };
export type BookingRescheduled = {
  method: 'reschedule' | 'cancel_and_recreate';
  booking: CreatedBooking | RescheduledBooking;
  previousUid: string;
};

interface ResolvedTarget {
  success: true;
  uid: string;
  id?: number;
}

/**
 * One stable interface over the two Cal.com API generations. Every public
 * operation resolves to a result object; nothing here throws to the caller.
 *
 * Holds per-session state only: the in-flight creation guard and a short log
 * of recent failures for the debug view. Create one instance per chat session.
 */
export class BookingBackendAdapter {
  private readonly logger = new Logger(BookingBackendAdapter.name);
  private readonly inFlight = new Set<string>();
  private readonly errorLog: AdapterErrorEntry[] = [];

  constructor(
    private readonly client: BookingHttpClient,
    private readonly api: CalComGenerations,
    private readonly time: TimeContextService,
    private readonly options: BookingAdapterOptions,
  ) {}

  async listCategories(): Promise<AdapterResult<CategoryList>> {
    return this.guard<CategoryList>('listCategories', async () => {
      const result = await attemptWithFallback(this.client, [
        {
          generation: 'v2',
          build: () => this.api.v2('GET', '/event-types', V2_API_VERSIONS.eventTypes),
          parse: (body) => this.itemsOrEmpty('listCategories', parseCategories(body)),
        },
        {
          generation: 'v1',
          build: () => this.api.v1('GET', '/event-types'),
          parse: (body) => this.itemsOrEmpty('listCategories', parseCategories(body)),
        },
      ]);
      if (result.kind !== 'success') {
        return this.failure('listCategories', result);
      }
      return { success: true, categories: result.value, generation: result.generation };
    });
  }

  async listAvailableSlots(
    eventTypeId: number,
    windowStart: string,
    windowEnd: string,
  ): Promise<AdapterResult<SlotList>> {
    return this.guard<SlotList>('listAvailableSlots', async () => {
      const errors: string[] = [];
      if (toPositiveInt(eventTypeId) === undefined) errors.push('event type id must be a positive integer');
      if (!isIsoInstant(windowStart) || !isIsoInstant(windowEnd)) errors.push('slot window must be ISO-8601 instants');
      if (errors.length > 0) {
        return { success: false, code: 'validation', error: errors.join('; '), errors };
      }

      const result = await attemptWithFallback(this.client, [
        {
          generation: 'v2',
          build: () =>
            this.api.v2('GET', '/slots', V2_API_VERSIONS.slots, {
              params: { eventTypeId, start: windowStart, end: windowEnd, timeZone: 'UTC' },
            }),
          parse: (body) => this.itemsOrEmpty('listAvailableSlots', parseSlots(body)),
        },
        {
          generation: 'v1',
          build: () =>
            this.api.v1('GET', '/slots', {
              params: { eventTypeId, startTime: windowStart, endTime: windowEnd, timeZone: 'UTC' },
            }),
          parse: (body) => this.itemsOrEmpty('listAvailableSlots', parseSlots(body)),
        },
      ]);
      if (result.kind !== 'success') {
        return this.failure('listAvailableSlots', result);
      }
      const slots = result.value.filter((slot) => slot >= normalize(windowStart) && slot < normalize(windowEnd));
      return { success: true, slots, count: slots.length };
    });
  }

  async createBooking(input: CreateBookingInput): Promise<AdapterResult<BookingCreated>> {
    const report = validateBookingPayload({
      eventTypeId: input.eventTypeId,
      start: input.start,
      attendeeEmail: input.attendeeEmail,
      attendeeName: input.attendeeName,
      timeZone: input.timeZone,
    });
    if (!report.valid) {
      return {
        success: false,
        code: 'validation',
        error: `Invalid booking details: ${report.errors.join('; ')}`,
        errors: report.errors,
        warnings: report.warnings,
        suggestion: 'Ask the user for the missing or invalid details, then try again.',
      };
    }

    const eventTypeId = Number(input.eventTypeId);
    const start = normalize(input.start);
    const key = `${eventTypeId}|${start}|${input.attendeeEmail.trim().toLowerCase()}`;
    if (this.inFlight.has(key)) {
      return {
        success: false,
        code: 'duplicate_in_progress',
        error: 'An identical booking request is already being processed.',
        suggestion: 'Wait for the first request to finish before trying again.',
      };
    }

    // Added before the first await so a concurrent duplicate sees it.
    this.inFlight.add(key);
    try {
      return await this.guard<BookingCreated>('createBooking', async () => {
        const timeZone = report.warnings.length === 0 && input.timeZone ? input.timeZone : this.options.defaultTimeZone;
        const language = input.language || this.options.defaultLanguage;
        const reason = input.reason?.trim() || undefined;
        const parse = (body: unknown): CreatedBooking => {
          const record = parseBookingRecord(body);
          return {
            id: toPositiveInt(record?.id),
            uid: asString(record?.uid),
            start: normalizeOr(asString(record?.startTime) ?? asString(record?.start), start),
            eventTypeId,
          };
        };

        const result = await attemptWithFallback(this.client, [
          {
            generation: 'v2',
            build: () =>
              this.api.v2('POST', '/bookings', V2_API_VERSIONS.bookings, {
                body: {
                  start,
                  eventTypeId,
                  attendee: { name: input.attendeeName, email: input.attendeeEmail, timeZone, language },
                  ...(reason ? { bookingFieldsResponses: { notes: reason }, metadata: { reason } } : {}),
                },
              }),
            parse,
          },
          {
            generation: 'v1',
            build: () =>
              this.api.v1('POST', '/bookings', {
                body: {
                  eventTypeId,
                  start,
                  responses: { name: input.attendeeName, email: input.attendeeEmail, ...(reason ? { notes: reason } : {}) },
                  timeZone,
                  language,
                  metadata: reason ? { reason } : {},
                },
              }),
            parse,
          },
        ]);
        if (result.kind !== 'success') {
          return this.failure('createBooking', result);
        }
        this.logger.log(`Booked event type ${eventTypeId} at ${start} via ${result.generation}`);
        return { success: true, booking: result.value, generation: result.generation, warnings: report.warnings };
      });
    } finally {
      this.inFlight.delete(key);
    }
  }

  async listBookings(filter: BookingFilter = {}): Promise<AdapterResult<BookingList>> {
    return this.guard<BookingList>('listBookings', async () => {
      const email = filter.attendeeEmail?.trim() || undefined;
      const name = filter.attendeeName?.trim() || undefined;

      const result = await attemptWithFallback(this.client, [
        {
          generation: 'v2',
          build: () =>
            this.api.v2('GET', '/bookings', V2_API_VERSIONS.bookings, { params: { attendeeEmail: email } }),
          parse: (body) => this.itemsOrEmpty('listBookings', parseBookingRecords(body)),
        },
        {
          generation: 'v1',
          build: () => this.api.v1('GET', '/bookings'),
          parse: (body) => this.itemsOrEmpty('listBookings', parseBookingRecords(body)),
        },
      ]);
      if (result.kind !== 'success') {
        return this.failure('listBookings', result);
      }

      const now = this.time.nowInReferenceZone();
      // Server-side filtering differs between generations, so filter here as well.
      const bookings = result.value
        .map((record) => toBooking(record, this.time, now, email))
        .filter((booking): booking is Booking => booking !== null)
        .filter((booking) => !email || booking.attendeeEmail?.toLowerCase() === email.toLowerCase())
        .filter((booking) => !name || (booking.attendeeName ?? '').toLowerCase().includes(name.toLowerCase()))
        .sort((a, b) => a.start.localeCompare(b.start));
      return { success: true, bookings, count: bookings.length };
    });
  }

  async getBooking(uid: string): Promise<AdapterResult<BookingDetail>> {
    return this.guard<BookingDetail>('getBooking', async () => {
      const parse = (body: unknown): Booking | null => {
        const record = parseBookingRecord(body);
        return record ? toBooking(record, this.time, this.time.nowInReferenceZone()) : null;
      };
      const result = await attemptWithFallback(this.client, [
        { generation: 'v2', build: () => this.api.v2('GET', `/bookings/${encodeURIComponent(uid)}`, V2_API_VERSIONS.bookings), parse },
        { generation: 'v1', build: () => this.api.v1('GET', `/bookings/${encodeURIComponent(uid)}`), parse },
      ]);
      if (result.kind === 'success' && result.value) {
        return { success: true, booking: result.value };
      }
      if (result.kind === 'success' || result.status === 404) {
        return { success: false, code: 'not_found', error: `No booking found for ${uid}.`, status: 404 };
      }
      return this.failure('getBooking', result);
    });
  }

  /**
   * Looks up the uid of a numeric booking id: direct fetch on v2, then v1,
   * then a scan of the booking list. Null when nothing matches.
   */
  async resolveBookingUid(id: number): Promise<string | null> {
    const lookups = [
      this.api.v2('GET', `/bookings/${id}`, V2_API_VERSIONS.bookings),
      this.api.v1('GET', `/bookings/${id}`),
    ];
    for (const request of lookups) {
      const outcome = await this.client.request(request);
      if (!outcome.ok) continue;
      const record = parseBookingRecord(outcome.data);
      const uid = asString(record?.uid);
      const recordId = toPositiveInt(record?.id);
      if (uid && (recordId === undefined || recordId === id)) {
        return uid;
      }
    }

    const listed = await this.listBookings();
    if (listed.success) {
      const match = listed.bookings.find((booking) => booking.id === id && booking.hasBackendUid);
      if (match) return match.uid;
    }
    return null;
  }

  async cancelBooking(
    ref: BookingRef,
    reason = 'Cancelled by user',
  ): Promise<AdapterResult<BookingCancelled>> {
    return this.guard<BookingCancelled>('cancelBooking', async () => {
      const target = await this.resolveTarget(ref);
      if (!target.success) return target;

      const result = await attemptWithFallback(this.client, [
        {
          generation: 'v2',
          build: () =>
            this.api.v2('POST', `/bookings/${encodeURIComponent(target.uid)}/cancel`, V2_API_VERSIONS.bookings, {
              body: { cancellationReason: reason },
            }),
          parse: () => undefined,
        },
        {
          generation: 'v1',
          // v1 addresses bookings by numeric id
          build: () =>
            this.api.v1('DELETE', `/bookings/${target.id ?? encodeURIComponent(target.uid)}/cancel`, {
              params: { cancellationReason: reason },
            }),
          parse: () => undefined,
        },
      ]);
      if (result.kind !== 'success') {
        if (result.status === 404) {
          return { success: false, code: 'not_found', error: `No booking found for ${target.uid}.`, status: 404 };
        }
        return this.failure('cancelBooking', result);
      }
      this.logger.log(`Cancelled booking ${target.uid} via ${result.generation}`);
      return { success: true, cancelled: { uid: target.uid, id: target.id }, generation: result.generation };
    });
  }

  async rescheduleBooking(
    ref: BookingRef,
    newStart: string,
    reason?: string,
  ): Promise<AdapterResult<BookingRescheduled>> {
    return this.guard<BookingRescheduled>('rescheduleBooking', async () => {
      if (!isIsoInstant(newStart)) {
        const errors = ['new start time must be a valid ISO-8601 instant'];
        return { success: false, code: 'validation', error: errors[0], errors };
      }
      const start = normalize(newStart);
      const target = await this.resolveTarget(ref);
      if (!target.success) return target;

      const direct = await this.client.request(
        this.api.v2('POST', `/bookings/${encodeURIComponent(target.uid)}/reschedule`, V2_API_VERSIONS.bookings, {
          body: { start, ...(reason ? { reschedulingReason: reason } : {}) },
        }),
      );
      if (direct.ok) {
        const record = parseBookingRecord(direct.data);
        this.logger.log(`Rescheduled booking ${target.uid} to ${start}`);
        return {
          success: true,
          method: 'reschedule',
          booking: {
            uid: asString(record?.uid),
            id: toPositiveInt(record?.id),
            start: normalizeOr(asString(record?.startTime) ?? asString(record?.start), start),
          },
          previousUid: target.uid,
        };
      }
      if (direct.status === 409 || direct.status === 422 || direct.status === 429) {
        return this.failure('rescheduleBooking', {
          kind: 'client_error',
          generation: 'v2',
          status: direct.status,
          data: direct.data,
        });
      }

      this.logger.warn(
        `Direct reschedule of ${target.uid} unavailable (${direct.transportError ?? `HTTP ${direct.status}`}), falling back to cancel and recreate`,
      );
      return this.cancelAndRecreate(target, start, reason);
    });
  }

  recentErrors(): AdapterErrorEntry[] {
    return [...this.errorLog];
  }

  /**
   * Compensating reschedule. Not atomic: a crash between the cancel and the
   * create loses the original slot. The intent line logged before the cancel
   * is what an operator reconciles from.
   */
  private async cancelAndRecreate(
    target: ResolvedTarget,
    start: string,
    reason?: string,
  ): Promise<AdapterResult<BookingRescheduled>> {
    const original = await this.getBooking(target.uid);
    if (!original.success) {
      return { ...original, error: `Could not load the original booking, so nothing was changed. ${original.error}` };
    }
    const { eventTypeId, attendeeEmail, attendeeName, attendeeTimeZone } = original.booking;
    if (eventTypeId === undefined || !attendeeEmail || !attendeeName) {
      return {
        success: false,
        code: 'client_error',
        error: 'The original booking is missing its event type or attendee details, so nothing was changed.',
        suggestion: 'Cancel the booking and book the new time instead.',
      };
    }

    this.logger.warn(
      `Reschedule intent: ${JSON.stringify({ uid: target.uid, eventTypeId, attendeeEmail, from: original.booking.start, to: start })}`,
    );
    const cancelled = await this.cancelBooking(
      { uid: target.uid, id: original.booking.id ?? target.id },
      reason ? `Rescheduled: ${reason}` : 'Rescheduled',
    );
    if (!cancelled.success) {
      return { ...cancelled, error: `Could not cancel the original booking, so nothing was changed. ${cancelled.error}` };
    }

    const created = await this.createBooking({
      eventTypeId,
      start,
      attendeeEmail,
      attendeeName,
      timeZone: attendeeTimeZone,
      reason,
    });
    if (created.success) {
      return { success: true, method: 'cancel_and_recreate', booking: created.booking, previousUid: target.uid };
    }

    this.record('rescheduleBooking', `partial failure: ${target.uid} cancelled, new booking at ${start} failed`);
    return {
      success: false,
      code: 'partial_failure',
      partialFailure: true,
      cancelledUid: target.uid,
      error: `The original booking was cancelled, but the new booking could not be created: ${created.error}`,
      suggestion: 'The original slot has been released. Check availability and book the new time again.',
      retryable: created.retryable,
      status: created.status,
    };
  }

  private async resolveTarget(ref: BookingRef): Promise<ResolvedTarget | AdapterFailure> {
    const uid = ref.uid?.trim();
    if (uid && !NUMERIC_ID.test(uid)) {
      return { success: true, uid, id: ref.id };
    }
    // an all-digit "uid" is a numeric id and goes through resolution
    const id = ref.id ?? (uid ? Number(uid) : undefined);
    if (id === undefined) {
      return {
        success: false,
        code: 'validation',
        error: 'A booking uid or id is required.',
        errors: ['booking uid or id is required'],
      };
    }
    const resolved = await this.resolveBookingUid(id);
    if (!resolved) {
      return {
        success: false,
        code: 'not_found',
        error: `No booking with id ${id} was found.`,
        suggestion: 'List the bookings to find the right one, then use its uid.',
        status: 404,
      };
    }
    return { success: true, uid: resolved, id };
  }

  private itemsOrEmpty<T>(operation: string, parsed: ParsedList<T>): T[] {
    if (parsed.matchedBy === null) {
      this.logger.warn(`${operation}: unrecognised response shape, treating as empty`);
      this.record(operation, 'unrecognised response shape');
    }
    return parsed.items;
  }

  private failure(operation: string, result: Exclude<FallbackResult<unknown>, { kind: 'success' }>): AdapterFailure {
    const failure = describeFailure(result);
    this.record(operation, failure.error, result.status || undefined);
    this.logger.error(`${operation} failed on ${result.generation}: ${failure.error}`);
    return failure;
  }

  private record(operation: string, message: string, status?: number): void {
    this.errorLog.push({ at: new Date().toISOString(), operation, message, status });
    if (this.errorLog.length > MAX_ERROR_LOG) {
      this.errorLog.splice(0, this.errorLog.length - MAX_ERROR_LOG);
    }
  }

  private async guard<T extends object>(
    operation: string,
    run: () => Promise<AdapterResult<T>>,
  ): Promise<AdapterResult<T>> {
    try {
      return await run();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`${operation} crashed: ${message}`);
      this.record(operation, message);
      return {
        success: false,
        code: 'transient',
        error: `Unexpected error while talking to the booking service: ${message}`,
        retryable: true,
        suggestion: 'Please try again in a moment.',
      };
    }
  }
}

function backendMessage(data: unknown): string {
  let message: string;
  if (typeof data === 'string') {
    message = data;
  } else if (isRecord(data)) {
    const error = data.error;
    message =
      (isRecord(error) ? asString(error.message) : asString(error)) ??
      asString(data.message) ??
      JSON.stringify(data);
  } else if (data === undefined || data === null) {
    message = 'no details';
  } else {
    message = JSON.stringify(data);
  }
  return message.length > MAX_BACKEND_MESSAGE ? `${message.slice(0, MAX_BACKEND_MESSAGE)}…` : message;
}

function describeFailure(result: Exclude<FallbackResult<unknown>, { kind: 'success' }>): AdapterFailure {
  if (result.kind === 'transient') {
    const cause = result.transportError ?? `HTTP ${result.status}`;
    return {
      success: false,
      code: 'transient',
      error: `The booking service is temporarily unavailable (${cause}); retry suggested.`,
      suggestion: 'Please try again in a moment.',
      retryable: true,
      status: result.status || undefined,
    };
  }
  switch (result.status) {
    case 409:
      return {
        success: false,
        code: 'client_error',
        error: 'That time slot is no longer available.',
        suggestion: 'Check availability again and pick another time.',
        status: 409,
      };
    case 422:
      return {
        success: false,
        code: 'client_error',
        error: `Invalid booking data: ${backendMessage(result.data)}`,
        suggestion: 'Check the booking details and try again.',
        status: 422,
      };
    case 429:
      return {
        success: false,
        code: 'client_error',
        error: 'Too many requests to the booking service, retry later.',
        suggestion: 'Wait a minute before trying again.',
        retryable: true,
        status: 429,
      };
    default:
      return {
        success: false,
        code: 'client_error',
        error: `The booking service rejected the request (HTTP ${result.status}): ${backendMessage(result.data)}`,
        status: result.status,
      };
  }
}

function normalize(instant: string): string {
  return new Date(instant).toISOString();
}

function normalizeOr(candidate: string | undefined, fallback: string): string {
  return candidate && !Number.isNaN(Date.parse(candidate)) ? normalize(candidate) : fallback;
}
