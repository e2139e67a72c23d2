export type ChatRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ToolCallRequest {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface ChatMessage {
  role: ChatRole;
  content: string | null;
  toolCalls?: ToolCallRequest[];
  toolCallId?: string; // set on `tool` messages
}

export interface EventCategory {
  id: number;
  title: string;
  slug: string;
  lengthInMinutes?: number;
  description?: string;
}

export type BookingDisplayStatus =
  | 'cancelled'
  | 'pending'
  | 'past'
  | 'today'
  | 'this_week'
  | 'upcoming';

export interface Booking {
  id?: number;
  uid: string; // display uid; falls back to the numeric id when the backend sent no uid
  hasBackendUid: boolean;
  title: string;
  start: string; // UTC ISO-8601
  end?: string;
  status?: string;
  eventTypeId?: number;
  attendeeEmail?: string;
  attendeeName?: string;
  attendeeTimeZone?: string;
  localTime: string;
  displayStatus: BookingDisplayStatus;
  joinUrl?: string;
  rescheduleUrl?: string;
  cancelUrl?: string;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
