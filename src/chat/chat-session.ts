import {
  AdapterErrorEntry,
  AdapterResult,
  BookingBackendAdapter,
  BookingList,
  CategoryList,
  SlotList,
} from '../booking/booking-backend.adapter';
import { ChatMessage, errorMessage } from '../common/types';
import { ToolDispatcher } from '../scheduling/tool-dispatcher';
import { TimeContextService, UtcWindow } from '../time/time-context.service';
import { ConversationOrchestrator } from './conversation.orchestrator';

/**
 * Everything one user owns: transcript, booking adapter (with its in-flight
 * guard and cache) and dispatcher. This is the surface presentation shells use.
 */
export class ChatSession {
  private email?: string;

  constructor(
    readonly id: string,
    private readonly adapter: BookingBackendAdapter,
    private readonly dispatcher: ToolDispatcher,
    private readonly orchestrator: ConversationOrchestrator,
    private readonly time: TimeContextService,
  ) {}

  get userEmail(): string | undefined {
    return this.email;
  }

  setUserEmail(email: string | undefined): void {
    this.email = email?.trim() || undefined;
    this.dispatcher.setUserEmail(this.email);
    this.orchestrator.setUserEmail(this.email);
  }

  sendUserMessage(text: string): Promise<string> {
    return this.orchestrator.handleUserMessage(text);
  }

  listBookingsForDisplay(email?: string, name?: string): Promise<AdapterResult<BookingList>> {
    return this.adapter.listBookings({ attendeeEmail: email ?? this.email, attendeeName: name });
  }

  listCategories(): Promise<AdapterResult<CategoryList>> {
    return this.adapter.listCategories();
  }

  /** Slots for one reference-zone calendar day (YYYY-MM-DD). */
  async listAvailableSlots(categoryId: number, date: string): Promise<AdapterResult<SlotList>> {
    let window: UtcWindow;
    try {
      window = this.time.localDayWindow(date);
    } catch (error) {
      const message = errorMessage(error);
      return { success: false, code: 'validation', error: message, errors: [message] };
    }
    return this.adapter.listAvailableSlots(categoryId, window.start, window.end);
  }

  history(): ChatMessage[] {
    return this.orchestrator.history();
  }

  recentErrors(): AdapterErrorEntry[] {
    return this.adapter.recentErrors();
  }

  reset(): void {
    this.orchestrator.reset();
  }
}
