import { BadRequestException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { BookingBackendFactory } from '../booking/booking-backend.factory';
import { LlmService } from '../llm/llm.service';
import { ToolDispatcherFactory } from '../scheduling/tool-dispatcher.factory';
import { testConfig } from '../testing/config';
import { createTestAdapter, FakeBackend, V2 } from '../testing/fake-backend';
import { FakeLlm, textReply } from '../testing/fake-llm';
import { TimeContextService } from '../time/time-context.service';
import { ChatSessionService } from './chat-session.service';
import { ChatController } from './chat.controller';

describe('ChatController', () => {
  let backend: FakeBackend;
  let llm: FakeLlm;
  let controller: ChatController;
  let sessions: ChatSessionService;

  beforeEach(async () => {
    backend = new FakeBackend();
    llm = new FakeLlm();
    const moduleRef = await Test.createTestingModule({
      controllers: [ChatController],
      providers: [
        ChatSessionService,
        ToolDispatcherFactory,
        TimeContextService,
        { provide: ConfigService, useValue: testConfig() },
        { provide: BookingBackendFactory, useValue: { create: () => createTestAdapter(backend) } },
        { provide: LlmService, useValue: llm },
      ],
    }).compile();
    controller = moduleRef.get(ChatController);
    sessions = moduleRef.get(ChatSessionService);
  });

  it('relays a message and remembers the email', async () => {
    llm.reply(textReply('Hi Ada!'));

    await expect(controller.sendMessage('s1', { message: ' hello ', email: 'ada@example.com' })).resolves.toEqual({
      sessionId: 's1',
      reply: 'Hi Ada!',
    });
    expect(sessions.get('s1').userEmail).toBe('ada@example.com');
    expect(llm.requests[0].messages[1]).toEqual({ role: 'user', content: 'hello' });
  });

  it('rejects an empty message', async () => {
    await expect(controller.sendMessage('s1', { message: '   ' })).rejects.toBeInstanceOf(BadRequestException);
    expect(sessions.has('s1')).toBe(false);
  });

  it('validates the slot query', async () => {
    await expect(controller.slots('s1', { eventTypeId: 'abc', date: '2025-03-10' })).rejects.toBeInstanceOf(
      BadRequestException,
    );
  });

  it('lists slots for a local day', async () => {
    backend.on('GET', `${V2}/slots`, { status: 200, data: { data: { '2025-03-10': [{ start: '2025-03-10T15:00:00Z' }] } } });

    await expect(controller.slots('s1', { eventTypeId: '5', date: '2025-03-10' })).resolves.toEqual({
      success: true,
      slots: ['2025-03-10T15:00:00.000Z'],
      count: 1,
    });
  });

  it('exposes recent backend errors', async () => {
    backend.on('GET', `${V2}/event-types`, { status: 403, data: { message: 'Forbidden' } });
    await controller.eventTypes('s1');

    expect(controller.errors('s1')).toEqual({
      errors: [
        expect.objectContaining({
          operation: 'listCategories',
          message: 'The booking service rejected the request (HTTP 403): Forbidden',
          status: 403,
        }),
      ],
    });
  });

  it('ends a session', () => {
    sessions.get('s1');

    expect(controller.end('s1')).toEqual({ sessionId: 's1', ended: true });
    expect(controller.health()).toMatchObject({ status: 'ok', sessions: 0 });
  });
});
