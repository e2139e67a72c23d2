import { Logger } from '@nestjs/common';
import { FunctionSchema, SCHEDULING_FUNCTIONS } from '../common/function-schemas';
import { ChatMessage, errorMessage } from '../common/types';
import { CompletionResult, LanguageModel } from '../llm/llm.service';
import { ToolDispatcher } from '../scheduling/tool-dispatcher';
import { TimeContextService } from '../time/time-context.service';

export const EMPTY_REPLY = 'Sorry, I could not come up with a reply. Could you rephrase that?';

function errorReply(error: unknown): string {
  return `Sorry, something went wrong while talking to the assistant: ${errorMessage(error)}`;
}

/**
 * Runs one user turn as at most two model calls: the first may request a
 * tool, the second (offered no tools) turns the tool result into a reply.
 * Only the first requested tool call is executed; chained tool use across
 * several calls in one turn is not supported.
 */
export class ConversationOrchestrator {
  private readonly logger = new Logger(ConversationOrchestrator.name);
  private transcript: ChatMessage[] = [];
  private userEmail?: string;
  private pending: Promise<void> = Promise.resolve();

  constructor(
    private readonly llm: LanguageModel,
    private readonly dispatcher: Pick<ToolDispatcher, 'dispatch'>,
    private readonly time: TimeContextService,
    private readonly tools: FunctionSchema[] = SCHEDULING_FUNCTIONS,
  ) {}

  setUserEmail(email: string | undefined): void {
    this.userEmail = email?.trim() || undefined;
  }

  history(): ChatMessage[] {
    return [...this.transcript];
  }

  reset(): void {
    this.transcript = [];
  }

  /**
   * Turns run one at a time: a message that arrives while another turn is in
   * flight waits for it, so a tool result always directly follows its call.
   */
  handleUserMessage(text: string): Promise<string> {
    const turn = this.pending.then(() => this.runTurn(text));
    this.pending = turn.then(
      () => undefined,
      () => undefined,
    );
    return turn;
  }

  // Works on the transcript it started with; after a reset() that array is
  // detached and the turn's writes no longer reach the session.
  private async runTurn(text: string): Promise<string> {
    const transcript = this.transcript;
    this.refreshSystemMessage(transcript);
    transcript.push({ role: 'user', content: text });

    let first: CompletionResult;
    try {
      first = await this.llm.complete(transcript, this.tools);
    } catch (error) {
      return this.replyWithError(transcript, 'first', error);
    }

    const [call, ...ignored] = first.toolCalls;
    if (!call) {
      return reply(transcript, first.content || EMPTY_REPLY);
    }
    if (ignored.length > 0) {
      this.logger.warn(`Ignoring ${ignored.length} extra tool call(s): ${ignored.map((extra) => extra.name).join(', ')}`);
    }

    transcript.push({ role: 'assistant', content: first.content, toolCalls: [call] });
    const result = await this.dispatcher.dispatch(call.name, call.arguments);
    transcript.push({ role: 'tool', toolCallId: call.id, content: result });

    this.refreshSystemMessage(transcript);
    try {
      const second = await this.llm.complete(transcript);
      return reply(transcript, second.content || EMPTY_REPLY);
    } catch (error) {
      return this.replyWithError(transcript, 'second', error);
    }
  }

  private replyWithError(transcript: ChatMessage[], pass: 'first' | 'second', error: unknown): string {
    this.logger.error(`Model call (${pass} pass) failed: ${errorMessage(error)}`);
    return reply(transcript, errorReply(error));
  }

  private refreshSystemMessage(transcript: ChatMessage[]): void {
    const system: ChatMessage = { role: 'system', content: this.systemPrompt() };
    if (transcript[0]?.role === 'system') {
      transcript[0] = system;
    } else {
      transcript.unshift(system);
    }
  }

  private systemPrompt(): string {
    const zone = this.time.referenceZone;
    const identity = this.userEmail
      ? `The user's email is ${this.userEmail}. Use it as the attendee email unless they give another one.`
      : "Ask for the user's name and email before booking.";

    return `You are a friendly scheduling assistant. You book, list, cancel and reschedule meetings using the available functions.

${this.time.renderContext()}

Guidelines:
- Check get_available_slots before create_booking and only offer times it returned
- Tool arguments take UTC ISO-8601 instants; show times to the user in ${zone}
- Call get_bookings before cancelling or rescheduling, and confirm with the user first
- When a result has needsSelection, list the options and let the user choose
- When a result has partialFailure, say plainly that the original booking was cancelled and the new one was not created
- When a result has an error, explain it briefly and follow its suggestion

${identity}`;
  }
}

function reply(transcript: ChatMessage[], content: string): string {
  transcript.push({ role: 'assistant', content });
  return content;
}
