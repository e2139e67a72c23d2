import { Logger } from '@nestjs/common';
import { z } from 'zod';
import { AdapterFailure, BookingBackendAdapter } from '../booking/booking-backend.adapter';
import { FunctionCall, FunctionResult } from '../common/function-schemas';
import { Booking, errorMessage, EventCategory } from '../common/types';
import { TimeContextService } from '../time/time-context.service';
import { matchCategory } from './category-matcher';
import { describeIssues, ToolArgumentSchemas } from './tool-arguments';

const MAX_LISTED_SLOTS = 10;

export interface ToolDispatcherOptions {
  /** Pinned event type used whenever the model gives no explicit id. */
  pinnedEventTypeId?: number;
}

type EventTypeChoice = { ok: true; eventTypeId: number; title?: string } | { ok: false; result: FunctionResult };

/**
 * Routes a model-issued tool call to the booking adapter and packages the
 * outcome as JSON the model can read. Never throws.
 */
export class ToolDispatcher {
  private readonly logger = new Logger(ToolDispatcher.name);
  private userEmail?: string;

  constructor(
    private readonly adapter: BookingBackendAdapter,
    private readonly time: TimeContextService,
    private readonly options: ToolDispatcherOptions = {},
  ) {}

  /** Default attendee email for tools that take one. */
  setUserEmail(email: string | undefined): void {
    this.userEmail = email?.trim() || undefined;
  }

  async dispatch(name: string, args: Record<string, unknown>): Promise<string> {
    return JSON.stringify(await this.executeFunction({ name, arguments: args }));
  }

  async executeFunction(functionCall: FunctionCall): Promise<FunctionResult> {
    try {
      this.logger.log(`Executing function: ${functionCall.name}`);

      switch (functionCall.name) {
        case 'list_event_types':
          return await this.handleListEventTypes();

        case 'get_available_slots':
          return await this.handleGetAvailableSlots(functionCall.arguments);

        case 'create_booking':
          return await this.handleCreateBooking(functionCall.arguments);

        case 'get_bookings':
          return await this.handleGetBookings(functionCall.arguments);

        case 'cancel_booking':
          return await this.handleCancelBooking(functionCall.arguments);

        case 'reschedule_booking':
          return await this.handleRescheduleBooking(functionCall.arguments);

        default:
          return {
            success: false,
            error: `Unknown function: ${functionCall.name}`,
          };
      }
    } catch (error) {
      this.logger.error(`Error executing function ${functionCall.name}: ${errorMessage(error)}`);
      return {
        success: false,
        error: errorMessage(error),
      };
    }
  }

  private async handleListEventTypes(): Promise<FunctionResult> {
    const result = await this.adapter.listCategories();
    if (!result.success) return failed(result);
    return {
      success: true,
      eventTypes: result.categories.map(summarizeCategory),
      count: result.categories.length,
    };
  }

  private async handleGetAvailableSlots(raw: Record<string, unknown>): Promise<FunctionResult> {
    const parsed = ToolArgumentSchemas.get_available_slots.safeParse(raw);
    if (!parsed.success) return invalidArguments('get_available_slots', parsed.error);
    const args = parsed.data;

    const window = this.time.localDayWindow(args.date);
    const choice = await this.chooseEventType(args.event_type_id, args.reason);
    if (!choice.ok) return choice.result;

    const result = await this.adapter.listAvailableSlots(choice.eventTypeId, window.start, window.end);
    if (!result.success) return failed(result);

    const slots = result.slots.slice(0, MAX_LISTED_SLOTS);
    return {
      success: true,
      date: args.date,
      timeZone: this.time.referenceZone,
      eventTypeId: choice.eventTypeId,
      eventType: choice.title,
      count: result.count,
      slots,
      localSlots: slots.map((slot) => this.time.formatLocal(new Date(slot))),
      ...(result.count === 0 ? { suggestion: `Nothing is free on ${args.date}; offer to check another day.` } : {}),
    };
  }

  private async handleCreateBooking(raw: Record<string, unknown>): Promise<FunctionResult> {
    const parsed = ToolArgumentSchemas.create_booking.safeParse(raw);
    if (!parsed.success) return invalidArguments('create_booking', parsed.error);
    const args = parsed.data;

    const choice = await this.chooseEventType(args.event_type_id, args.meeting_reason);
    if (!choice.ok) return choice.result;

    const result = await this.adapter.createBooking({
      eventTypeId: choice.eventTypeId,
      start: args.start_time,
      attendeeEmail: args.attendee_email ?? this.userEmail ?? '',
      attendeeName: args.attendee_name,
      timeZone: args.attendee_timezone,
      language: args.language,
      reason: args.meeting_reason,
    });
    if (!result.success) return failed(result);

    return {
      success: true,
      booking: {
        ...result.booking,
        eventType: choice.title,
        localTime: this.time.formatLocal(new Date(result.booking.start)),
      },
      warnings: result.warnings,
    };
  }

  private async handleGetBookings(raw: Record<string, unknown>): Promise<FunctionResult> {
    const parsed = ToolArgumentSchemas.get_bookings.safeParse(raw);
    if (!parsed.success) return invalidArguments('get_bookings', parsed.error);
    const args = parsed.data;

    const result = await this.adapter.listBookings({
      attendeeEmail: args.attendee_email ?? this.userEmail,
      attendeeName: args.attendee_name,
    });
    if (!result.success) return failed(result);
    return {
      success: true,
      count: result.count,
      bookings: result.bookings.map(summarizeBooking),
    };
  }

  private async handleCancelBooking(raw: Record<string, unknown>): Promise<FunctionResult> {
    const parsed = ToolArgumentSchemas.cancel_booking.safeParse(raw);
    if (!parsed.success) return invalidArguments('cancel_booking', parsed.error);
    const args = parsed.data;

    const result = await this.adapter.cancelBooking({ uid: args.booking_uid, id: args.booking_id }, args.reason);
    if (!result.success) return failed(result);
    return { success: true, cancelled: result.cancelled };
  }

  private async handleRescheduleBooking(raw: Record<string, unknown>): Promise<FunctionResult> {
    const parsed = ToolArgumentSchemas.reschedule_booking.safeParse(raw);
    if (!parsed.success) return invalidArguments('reschedule_booking', parsed.error);
    const args = parsed.data;

    const result = await this.adapter.rescheduleBooking(
      { uid: args.booking_uid, id: args.booking_id },
      args.new_start_time,
      args.reason,
    );
    if (!result.success) return failed(result);
    return {
      success: true,
      method: result.method,
      previousUid: result.previousUid,
      booking: { ...result.booking, localTime: this.time.formatLocal(new Date(result.booking.start)) },
    };
  }

  /** explicit id, then the pinned override, then the reason, then the first category. */
  private async chooseEventType(explicitId: number | undefined, reason: string | undefined): Promise<EventTypeChoice> {
    if (explicitId !== undefined) return { ok: true, eventTypeId: explicitId };
    if (this.options.pinnedEventTypeId !== undefined) return { ok: true, eventTypeId: this.options.pinnedEventTypeId };

    const listed = await this.adapter.listCategories();
    if (!listed.success) return { ok: false, result: failed(listed) };

    const match = matchCategory(listed.categories, reason);
    switch (match.kind) {
      case 'matched':
        return { ok: true, eventTypeId: match.category.id, title: match.category.title };
      case 'needs_selection':
        return {
          ok: false,
          result: {
            success: false,
            needsSelection: true,
            error: `No event type matches "${reason ?? ''}".`,
            options: match.options.map(summarizeCategory),
            suggestion: 'Ask the user which of these event types they want, then call again with its event_type_id.',
          },
        };
      case 'empty':
        return {
          ok: false,
          result: { success: false, error: 'No event types are available for booking.' },
        };
    }
  }
}

function failed(failure: AdapterFailure): FunctionResult {
  return { ...failure };
}

function invalidArguments(name: string, error: z.ZodError): FunctionResult {
  const issues = describeIssues(error);
  return {
    success: false,
    error: `Invalid arguments for ${name}: ${issues.join('; ')}`,
    invalidFields: issues,
  };
}

function summarizeCategory(category: EventCategory) {
  return {
    id: category.id,
    title: category.title,
    slug: category.slug,
    lengthInMinutes: category.lengthInMinutes,
    description: category.description,
  };
}

function summarizeBooking(booking: Booking) {
  return {
    // a uid synthesised from the numeric id is not one the backend can mutate by
    uid: booking.hasBackendUid ? booking.uid : undefined,
    id: booking.id,
    title: booking.title,
    start: booking.start,
    localTime: booking.localTime,
    status: booking.displayStatus,
    attendeeName: booking.attendeeName,
    attendeeEmail: booking.attendeeEmail,
    joinUrl: booking.joinUrl,
  };
}
