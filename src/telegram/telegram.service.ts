import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Telegraf } from 'telegraf';
import { ChatSessionService } from '../chat/chat-session.service';
import { errorMessage } from '../common/types';
import { formatBookingList, formatCategories } from './booking-formatter';

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

const WELCOME =
  '🤖 Welcome to the scheduling assistant!\n\n' +
  'Tell me what you need in plain words:\n' +
  '• "What can I book?"\n' +
  '• "Is there anything free tomorrow afternoon for an interview?"\n' +
  '• "Cancel my meeting on Friday"\n\n' +
  'Set your email with /email you@example.com so I can find your bookings.\n' +
  'Type /help for all commands.';

const HELP =
  '📝 Available commands:\n\n' +
  '/start - Get started\n' +
  '/help - Show this help message\n' +
  '/email <address> - Set the email used for your bookings\n' +
  '/bookings - List your bookings\n' +
  '/types - List the meeting types\n' +
  '/clear - Forget this conversation\n\n' +
  '💬 Anything else you type goes to the assistant.';

/**
 * Telegram front end. Each chat id is its own session. Disabled when no bot
 * token is configured; the HTTP API keeps working either way.
 */
@Injectable()
export class TelegramService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(TelegramService.name);
  private readonly bot?: Telegraf;

  constructor(
    private configService: ConfigService,
    private chatSessions: ChatSessionService,
  ) {
    const token = this.configService.get<string>('TELEGRAM_BOT_TOKEN');
    if (!token) {
      this.logger.log('TELEGRAM_BOT_TOKEN is not set, Telegram bot disabled');
      return;
    }
    this.bot = new Telegraf(token);
    this.setupHandlers(this.bot);
  }

  get enabled(): boolean {
    return this.bot !== undefined;
  }

  onModuleInit() {
    if (!this.bot) return;
    // launch() only settles when polling stops, so it is not awaited here
    this.bot.launch().catch((error: unknown) => {
      this.logger.warn(`Failed to launch Telegram bot: ${errorMessage(error)}`);
    });
    this.logger.log('Telegram bot launching');
  }

  onModuleDestroy() {
    this.bot?.stop('module destroy');
  }

  async handleText(chatId: string, text: string): Promise<string> {
    const trimmed = text.trim();
    if (!trimmed) {
      return 'Please send a message.';
    }
    return this.chatSessions.get(chatId).sendUserMessage(trimmed);
  }

  handleEmail(chatId: string, payload: string): string {
    const email = payload.trim();
    const session = this.chatSessions.get(chatId);
    if (!email) {
      return session.userEmail
        ? `📧 Your email is ${session.userEmail}.`
        : '📧 Usage: /email you@example.com';
    }
    if (!EMAIL_PATTERN.test(email)) {
      return `❌ "${email}" does not look like an email address.`;
    }
    session.setUserEmail(email);
    return `✅ Got it, I'll use ${email} for your bookings.`;
  }

  async handleBookings(chatId: string): Promise<string> {
    const session = this.chatSessions.get(chatId);
    if (!session.userEmail) {
      return '📧 Set your email first with /email you@example.com';
    }
    const result = await session.listBookingsForDisplay();
    if (!result.success) {
      return `❌ ${result.error}`;
    }
    return formatBookingList(result.bookings);
  }

  async handleTypes(chatId: string): Promise<string> {
    const result = await this.chatSessions.get(chatId).listCategories();
    if (!result.success) {
      return `❌ ${result.error}`;
    }
    return formatCategories(result.categories);
  }

  handleClear(chatId: string): string {
    this.chatSessions.get(chatId).reset();
    return '🧹 Conversation cleared.';
  }

  private setupHandlers(bot: Telegraf) {
    bot.start((ctx) => ctx.reply(WELCOME));
    bot.help((ctx) => ctx.reply(HELP));

    bot.command('email', (ctx) => ctx.reply(this.handleEmail(String(ctx.message.chat.id), ctx.payload)));
    bot.command('bookings', async (ctx) => ctx.reply(await this.handleBookings(String(ctx.message.chat.id))));
    bot.command('types', async (ctx) => ctx.reply(await this.handleTypes(String(ctx.message.chat.id))));
    bot.command('clear', (ctx) => ctx.reply(this.handleClear(String(ctx.message.chat.id))));

    bot.on('text', async (ctx) => {
      const text = ctx.message.text;
      if (text.startsWith('/')) {
        await ctx.reply('Unknown command. Type /help for the list.');
        return;
      }
      const chatId = String(ctx.message.chat.id);
      this.logger.log(`Message from chat ${chatId} (${text.length} chars)`);
      await ctx.sendChatAction('typing');
      await ctx.reply(await this.handleText(chatId, text));
    });

    bot.catch((error, ctx) => {
      this.logger.error(`Error handling update ${ctx.update.update_id}: ${errorMessage(error)}`);
      ctx.reply('❌ Something went wrong. Please try again.').catch((replyError: unknown) => {
        this.logger.error(`Could not send error reply: ${errorMessage(replyError)}`);
      });
    });
  }
}
