import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BookingBackendFactory } from '../booking/booking-backend.factory';
import { LlmService } from '../llm/llm.service';
import { ToolDispatcherFactory } from '../scheduling/tool-dispatcher.factory';
import { TimeContextService } from '../time/time-context.service';
import { ChatSession } from './chat-session';
import { ConversationOrchestrator } from './conversation.orchestrator';

const DEFAULT_IDLE_TTL_MS = 24 * 60 * 60 * 1000;

interface SessionEntry {
  session: ChatSession;
  lastUsed: number;
}

/**
 * In-memory sessions keyed by shell-provided id; nothing survives a restart.
 * A session unused for SESSION_IDLE_TTL_MS is dropped the next time any
 * session is looked up.
 */
@Injectable()
export class ChatSessionService {
  private readonly logger = new Logger(ChatSessionService.name);
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly idleTtlMs: number;

  constructor(
    private configService: ConfigService,
    private bookingFactory: BookingBackendFactory,
    private dispatcherFactory: ToolDispatcherFactory,
    private llmService: LlmService,
    private timeContext: TimeContextService,
  ) {
    this.idleTtlMs = Number(this.configService.get<string | number>('SESSION_IDLE_TTL_MS') ?? DEFAULT_IDLE_TTL_MS);
  }

  get(sessionId: string): ChatSession {
    const now = Date.now();
    this.evictIdle(now);

    const existing = this.sessions.get(sessionId);
    if (existing) {
      existing.lastUsed = now;
      return existing.session;
    }

    const adapter = this.bookingFactory.create();
    const dispatcher = this.dispatcherFactory.create(adapter);
    const orchestrator = new ConversationOrchestrator(this.llmService, dispatcher, this.timeContext);
    const session = new ChatSession(sessionId, adapter, dispatcher, orchestrator, this.timeContext);
    this.sessions.set(sessionId, { session, lastUsed: now });
    this.logger.log(`Started session ${sessionId}`);
    return session;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  end(sessionId: string): boolean {
    const removed = this.sessions.delete(sessionId);
    if (removed) this.logger.log(`Ended session ${sessionId}`);
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }

  private evictIdle(now: number): void {
    for (const [sessionId, entry] of this.sessions) {
      if (now - entry.lastUsed > this.idleTtlMs) {
        this.sessions.delete(sessionId);
        this.logger.log(`Evicted idle session ${sessionId}`);
      }
    }
  }
}
