import { BadRequestException, Body, Controller, Delete, Get, Param, Post, Query } from '@nestjs/common';
import { z } from 'zod';
import { ChatSessionService } from './chat-session.service';

const MessageBodySchema = z.object({
  message: z.string().trim().min(1, 'message must not be empty'),
  email: z.string().trim().email().optional(),
});

const BookingsQuerySchema = z.object({
  email: z.string().trim().min(1).optional(),
  name: z.string().trim().min(1).optional(),
});

const SlotsQuerySchema = z.object({
  eventTypeId: z.coerce.number().int().positive(),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD'),
});

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new BadRequestException(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`),
    );
  }
  return result.data;
}

@Controller('chat')
export class ChatController {
  constructor(private chatSessions: ChatSessionService) {}

  @Get('health')
  health() {
    return { status: 'ok', sessions: this.chatSessions.size, timestamp: new Date().toISOString() };
  }

  @Post(':sessionId/messages')
  async sendMessage(@Param('sessionId') sessionId: string, @Body() body: unknown) {
    const { message, email } = parseOrThrow(MessageBodySchema, body);
    const session = this.chatSessions.get(sessionId);
    if (email) {
      session.setUserEmail(email);
    }
    const reply = await session.sendUserMessage(message);
    return { sessionId, reply };
  }

  @Get(':sessionId/bookings')
  async bookings(@Param('sessionId') sessionId: string, @Query() query: unknown) {
    const { email, name } = parseOrThrow(BookingsQuerySchema, query);
    return this.chatSessions.get(sessionId).listBookingsForDisplay(email, name);
  }

  @Get(':sessionId/event-types')
  async eventTypes(@Param('sessionId') sessionId: string) {
    return this.chatSessions.get(sessionId).listCategories();
  }

  @Get(':sessionId/slots')
  async slots(@Param('sessionId') sessionId: string, @Query() query: unknown) {
    const { eventTypeId, date } = parseOrThrow(SlotsQuerySchema, query);
    return this.chatSessions.get(sessionId).listAvailableSlots(eventTypeId, date);
  }

  // Debug view of recent backend failures for this session.
  @Get(':sessionId/errors')
  errors(@Param('sessionId') sessionId: string) {
    return { errors: this.chatSessions.get(sessionId).recentErrors() };
  }

  @Delete(':sessionId')
  end(@Param('sessionId') sessionId: string) {
    return { sessionId, ended: this.chatSessions.end(sessionId) };
  }
}
