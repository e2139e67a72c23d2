import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import {
  ChatCompletionMessageParam,
  ChatCompletionMessageToolCall,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';
import { FunctionSchema } from '../common/function-schemas';
import { ChatMessage, isRecord, ToolCallRequest } from '../common/types';

const REQUEST_TIMEOUT_MS = 30000;

export interface CompletionResult {
  content: string | null;
  toolCalls: ToolCallRequest[];
}

export interface LanguageModel {
  complete(messages: ChatMessage[], tools?: FunctionSchema[]): Promise<CompletionResult>;
}

/**
 * The language-model boundary: complete a transcript, optionally offering
 * tools, and hand back either text or the requested tool calls.
 */
@Injectable()
export class LlmService implements LanguageModel {
  private readonly logger = new Logger(LlmService.name);
  private readonly openai: OpenAI;
  private readonly model: string;

  constructor(private configService: ConfigService) {
    const apiKey = this.configService.get<string>('OPENAI_API_KEY');
    if (!apiKey) {
      throw new Error('OPENAI_API_KEY is required');
    }
    this.openai = new OpenAI({ apiKey });
    this.model = this.configService.get<string>('OPENAI_MODEL') || 'gpt-4-turbo-preview';
  }

  async complete(messages: ChatMessage[], tools?: FunctionSchema[]): Promise<CompletionResult> {
    const startTime = Date.now();
    const offered = tools && tools.length > 0 ? tools.map(toOpenAiTool) : undefined;

    const completion = await this.openai.chat.completions.create(
      {
        model: this.model,
        messages: messages.map(toOpenAiMessage),
        ...(offered ? { tools: offered, tool_choice: 'auto' as const, parallel_tool_calls: false } : {}),
        temperature: 0.3,
      },
      { timeout: REQUEST_TIMEOUT_MS },
    );

    const message = completion.choices[0]?.message;
    if (!message) {
      throw new Error('No response from OpenAI');
    }
    this.logger.log(
      `Completion in ${Date.now() - startTime}ms, ${message.tool_calls?.length ?? 0} tool call(s)`,
    );
    return {
      content: message.content,
      toolCalls: (message.tool_calls ?? []).map((toolCall) => fromOpenAiToolCall(toolCall, this.logger)),
    };
  }
}

export function toOpenAiTool(schema: FunctionSchema): ChatCompletionTool {
  return {
    type: 'function',
    function: {
      name: schema.name,
      description: schema.description,
      parameters: { ...schema.parameters },
    },
  };
}

export function toOpenAiMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content ?? '' };
    case 'user':
      return { role: 'user', content: message.content ?? '' };
    case 'tool':
      return { role: 'tool', tool_call_id: message.toolCallId ?? '', content: message.content ?? '' };
    case 'assistant':
      return {
        role: 'assistant',
        content: message.content,
        ...(message.toolCalls && message.toolCalls.length > 0
          ? {
              tool_calls: message.toolCalls.map((call) => ({
                id: call.id,
                type: 'function' as const,
                function: { name: call.name, arguments: JSON.stringify(call.arguments) },
              })),
            }
          : {}),
      };
  }
}

export function fromOpenAiToolCall(toolCall: ChatCompletionMessageToolCall, logger?: Logger): ToolCallRequest {
  let args: Record<string, unknown> = {};
  try {
    const parsed: unknown = JSON.parse(toolCall.function.arguments || '{}');
    if (isRecord(parsed)) {
      args = parsed;
    }
  } catch (error) {
    logger?.warn(`Unparseable arguments for ${toolCall.function.name}: ${toolCall.function.arguments}`);
  }
  return { id: toolCall.id, name: toolCall.function.name, arguments: args };
}
