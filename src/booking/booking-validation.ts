import { isIsoInstant } from './response-parsers';

export interface BookingPayload {
  eventTypeId: unknown;
  start: unknown;
  attendeeEmail: unknown;
  attendeeName: unknown;
  timeZone?: unknown;
}

export interface ValidationReport {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

function isSupportedTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

export function validateBookingPayload(payload: BookingPayload): ValidationReport {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (isBlank(payload.eventTypeId)) {
    errors.push('event type id is required');
  } else {
    const id = typeof payload.eventTypeId === 'string' ? Number(payload.eventTypeId) : payload.eventTypeId;
    if (typeof id !== 'number' || !Number.isInteger(id) || id <= 0) {
      errors.push('event type id must be a positive integer');
    }
  }

  if (isBlank(payload.start)) {
    errors.push('start time is required');
  } else if (!isIsoInstant(payload.start)) {
    errors.push('start time must be a valid ISO-8601 instant');
  }

  if (isBlank(payload.attendeeEmail)) {
    errors.push('attendee email is required');
  } else if (typeof payload.attendeeEmail !== 'string' || !payload.attendeeEmail.includes('@')) {
    errors.push('attendee email must be valid');
  }

  if (isBlank(payload.attendeeName)) {
    errors.push('attendee name is required');
  }

  if (!isBlank(payload.timeZone)) {
    if (typeof payload.timeZone !== 'string' || !isSupportedTimeZone(payload.timeZone)) {
      warnings.push(`timezone ${String(payload.timeZone)} may not be supported; the backend default will apply`);
    }
  }

  return { valid: errors.length === 0, errors, warnings };
}
