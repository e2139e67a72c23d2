import { z } from 'zod';

// Models sometimes send ids as strings, or null for "not given".
const optionalId = z.preprocess(
  (value) => (value === null || value === '' ? undefined : typeof value === 'string' ? Number(value) : value),
  z.number().int().positive().optional(),
);

const optionalText = z.preprocess(
  (value) => (value === null ? undefined : typeof value === 'string' ? value.trim() || undefined : value),
  z.string().optional(),
);

const requiredText = z.string().trim().min(1);

export const ToolArgumentSchemas = {
  get_available_slots: z.object({
    date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD'),
    event_type_id: optionalId,
    reason: optionalText,
  }),
  create_booking: z.object({
    start_time: requiredText,
    attendee_name: requiredText,
    attendee_email: optionalText,
    event_type_id: optionalId,
    meeting_reason: optionalText,
    attendee_timezone: optionalText,
    language: optionalText,
  }),
  get_bookings: z.object({
    attendee_email: optionalText,
    attendee_name: optionalText,
  }),
  cancel_booking: z.object({
    booking_uid: optionalText,
    booking_id: optionalId,
    reason: optionalText,
  }),
  reschedule_booking: z.object({
    booking_uid: optionalText,
    booking_id: optionalId,
    new_start_time: requiredText,
    reason: optionalText,
  }),
} as const;

/** "field: message" lines for a failed parse. */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`);
}
