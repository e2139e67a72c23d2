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

describe('ChatSessionService', () => {
  let backend: FakeBackend;
  let llm: FakeLlm;
  let sessions: ChatSessionService;

  beforeEach(async () => {
    backend = new FakeBackend();
    llm = new FakeLlm();
    const moduleRef = await Test.createTestingModule({
      providers: [
        ChatSessionService,
        ToolDispatcherFactory,
        TimeContextService,
        { provide: ConfigService, useValue: testConfig({ CALCOM_EVENT_TYPE_ID: '5', SESSION_IDLE_TTL_MS: '60000' }) },
        { provide: BookingBackendFactory, useValue: { create: () => createTestAdapter(backend) } },
        { provide: LlmService, useValue: llm },
      ],
    }).compile();
    sessions = moduleRef.get(ChatSessionService);
  });

  it('creates one session per id and reuses it', () => {
    const first = sessions.get('alice');

    expect(sessions.get('alice')).toBe(first);
    expect(sessions.get('bob')).not.toBe(first);
    expect(sessions.size).toBe(2);
  });

  it('ends a session', () => {
    sessions.get('alice');

    expect(sessions.end('alice')).toBe(true);
    expect(sessions.end('alice')).toBe(false);
    expect(sessions.has('alice')).toBe(false);
  });

  it('evicts a session left idle longer than the configured ttl', () => {
    const now = jest.spyOn(Date, 'now').mockReturnValue(1_000_000);
    try {
      const alice = sessions.get('alice');
      now.mockReturnValue(1_030_000);
      sessions.get('bob');
      now.mockReturnValue(1_070_000);

      expect(sessions.get('bob')).toBeDefined();
      expect(sessions.has('alice')).toBe(false);
      expect(sessions.get('alice')).not.toBe(alice);
      expect(sessions.size).toBe(2);
    } finally {
      now.mockRestore();
    }
  });

  it('runs a full turn through the dispatcher with the pinned event type', async () => {
    backend.on('GET', `${V2}/slots`, {
      status: 200,
      data: { data: { '2025-03-10': [{ start: '2025-03-10T14:00:00.000Z' }] } },
    });
    llm.reply(
      { content: null, toolCalls: [{ id: 'call_1', name: 'get_available_slots', arguments: { date: '2025-03-10' } }] },
      textReply('There is one opening at 10:00.'),
    );
    const alice = sessions.get('alice');

    await expect(alice.sendUserMessage('anything free today?')).resolves.toBe('There is one opening at 10:00.');

    expect(backend.calls('GET', `${V2}/slots`)[0].params.eventTypeId).toBe(5);
    const toolMessage = llm.requests[1].messages.find((message) => message.role === 'tool');
    expect(toolMessage?.content).toContain('"slots":["2025-03-10T14:00:00.000Z"]');
    expect(sessions.get('bob').history()).toEqual([]);
  });

  it('keeps user emails apart between sessions', async () => {
    backend.on('GET', `${V2}/bookings`, { status: 200, data: { data: [] } });
    sessions.get('alice').setUserEmail('alice@example.com');

    await sessions.get('alice').listBookingsForDisplay();
    await sessions.get('bob').listBookingsForDisplay();

    expect(backend.calls('GET', `${V2}/bookings`).map((request) => request.params.attendeeEmail)).toEqual([
      'alice@example.com',
      undefined,
    ]);
  });

  it('rejects a malformed slot date', async () => {
    await expect(sessions.get('alice').listAvailableSlots(5, '2025-13-01')).resolves.toEqual({
      success: false,
      code: 'validation',
      error: 'Invalid date "2025-13-01", expected YYYY-MM-DD',
      errors: ['Invalid date "2025-13-01", expected YYYY-MM-DD'],
    });
  });
});
