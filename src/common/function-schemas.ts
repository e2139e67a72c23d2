export interface JsonSchemaProperty {
  type: 'string' | 'integer' | 'number' | 'boolean';
  description: string;
  format?: string;
  enum?: string[];
}

export interface FunctionSchema {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required: string[];
  };
}

export const SCHEDULING_FUNCTIONS: FunctionSchema[] = [
  {
    name: 'list_event_types',
    description:
      'List the bookable meeting types (title, duration, description). Call this when the user has not said what kind of meeting they want, or to show them the options.',
    parameters: {
      type: 'object',
      properties: {},
      required: [],
    },
  },
  {
    name: 'get_available_slots',
    description:
      'Get available start times for a meeting on one calendar day. Always call this before create_booking and only offer times it returns.',
    parameters: {
      type: 'object',
      properties: {
        date: {
          type: 'string',
          format: 'date',
          description: 'The local calendar day to search (YYYY-MM-DD)',
        },
        event_type_id: {
          type: 'integer',
          description: 'Event type id, if the user already picked one',
        },
        reason: {
          type: 'string',
          description: 'What the meeting is about, used to pick the event type when no id is known',
        },
      },
      required: ['date'],
    },
  },
  {
    name: 'create_booking',
    description:
      "Book a meeting. Only call this after get_available_slots confirmed the time and the user gave their name and email. Use one of the returned ISO start times verbatim.",
    parameters: {
      type: 'object',
      properties: {
        start_time: {
          type: 'string',
          format: 'date-time',
          description: 'Start time as a UTC ISO-8601 instant (YYYY-MM-DDTHH:MM:SSZ)',
        },
        attendee_email: {
          type: 'string',
          description: "Attendee's email address",
        },
        attendee_name: {
          type: 'string',
          description: "Attendee's full name",
        },
        event_type_id: {
          type: 'integer',
          description: 'Event type id (optional, inferred from meeting_reason otherwise)',
        },
        meeting_reason: {
          type: 'string',
          description: 'Reason or purpose for the meeting',
        },
        attendee_timezone: {
          type: 'string',
          description: "Attendee's IANA timezone, e.g. America/New_York (optional)",
        },
        language: {
          type: 'string',
          description: 'Two-letter language code for notifications (default: en)',
        },
      },
      required: ['start_time', 'attendee_name'],
    },
  },
  {
    name: 'get_bookings',
    description:
      "List the user's scheduled bookings. Call this before cancelling or rescheduling so you know the booking uid.",
    parameters: {
      type: 'object',
      properties: {
        attendee_email: {
          type: 'string',
          description: 'Email of the attendee to filter bookings (defaults to the user email)',
        },
        attendee_name: {
          type: 'string',
          description: 'Attendee name to filter bookings (optional)',
        },
      },
      required: [],
    },
  },
  {
    name: 'cancel_booking',
    description:
      'Cancel a booking. Prefer booking_uid from get_bookings; booking_id is accepted and resolved. Confirm with the user before calling.',
    parameters: {
      type: 'object',
      properties: {
        booking_uid: {
          type: 'string',
          description: 'The uid of the booking to cancel',
        },
        booking_id: {
          type: 'integer',
          description: 'The numeric id of the booking, when no uid is known',
        },
        reason: {
          type: 'string',
          description: 'Reason for cancellation',
        },
      },
      required: [],
    },
  },
  {
    name: 'reschedule_booking',
    description:
      'Move an existing booking to a new time. Check get_available_slots for the new day first. Prefer booking_uid from get_bookings.',
    parameters: {
      type: 'object',
      properties: {
        booking_uid: {
          type: 'string',
          description: 'The uid of the booking to reschedule',
        },
        booking_id: {
          type: 'integer',
          description: 'The numeric id of the booking, when no uid is known',
        },
        new_start_time: {
          type: 'string',
          format: 'date-time',
          description: 'The new start time as a UTC ISO-8601 instant',
        },
        reason: {
          type: 'string',
          description: 'Reason for rescheduling',
        },
      },
      required: ['new_start_time'],
    },
  },
];

export interface FunctionCall {
  name: string;
  arguments: Record<string, unknown>;
}

export interface FunctionResult {
  success: boolean;
  error?: string;
  suggestion?: string;
  [field: string]: unknown;
}
