import axios from 'axios';
import { Telegraf, type Context, type Telegram } from 'telegraf';
import { message } from 'telegraf/filters';
import { formatStats, type AdminService, type Broadcaster } from '../admin/admin-service';
import { describeError } from '../core/errors';
import type { InboundEvent } from '../core/events';
import type { Orchestrator } from '../core/orchestrator';
import { replies } from '../core/replies';
import { logger, errorMessage } from '../observability/logger';
import type { TurnStore } from '../storage/turn-store';
import { chunkReply } from './reply-chunker';

/** Outbound Bot API calls the adapter makes. */
export interface TelegramGateway {
  sendMessage(chatId: number | string, text: string): Promise<void>;
  sendTyping(chatId: number): Promise<void>;
  download(fileId: string): Promise<Buffer>;
}

export class BotApiGateway implements TelegramGateway {
  constructor(
    private telegram: Telegram,
    private downloadTimeoutMs = 30000
  ) {}

  async sendMessage(chatId: number | string, text: string) {
    await this.telegram.sendMessage(chatId, text);
  }

  async sendTyping(chatId: number) {
    await this.telegram.sendChatAction(chatId, 'typing');
  }

  async download(fileId: string): Promise<Buffer> {
    const link = await this.telegram.getFileLink(fileId);
    const res = await axios.get<ArrayBuffer>(link.href, {
      responseType: 'arraybuffer',
      timeout: this.downloadTimeoutMs
    });
    return Buffer.from(res.data);
  }
}

type TelegramBotDeps = {
  token: string;
  orchestrator: Pick<Orchestrator, 'handle'>;
  admin: AdminService;
  store: TurnStore;
  gateway?: TelegramGateway;
  downloadTimeoutMs?: number;
};

/** Text after "/command" (and an optional "@botname"). */
export function commandArgs(text: string): string {
  return text.replace(/^\/\w+(@\w+)?\s*/, '').trim();
}

function senderId(ctx: Context): string | undefined {
  return ctx.from ? String(ctx.from.id) : undefined;
}

function describeUpdate(ctx: Context): string {
  const msg = ctx.message;
  if (!msg) return ctx.updateType;
  if ('text' in msg) return `text: ${msg.text.slice(0, 50)}`;
  if ('voice' in msg) return `voice: ${msg.voice.duration}s`;
  return 'other message';
}

export class TelegramBot implements Broadcaster {
  readonly bot: Telegraf;
  private orchestrator: Pick<Orchestrator, 'handle'>;
  private admin: AdminService;
  private store: TurnStore;
  private gateway: TelegramGateway;
  private inflight = new Set<Promise<void>>();
  private polling = false;

  constructor(deps: TelegramBotDeps) {
    this.bot = new Telegraf(deps.token);
    this.orchestrator = deps.orchestrator;
    this.admin = deps.admin;
    this.store = deps.store;
    this.gateway = deps.gateway ?? new BotApiGateway(this.bot.telegram, deps.downloadTimeoutMs);
    this.registerMiddleware();
    this.registerCommands();
    this.registerMessages();
  }

  async launch() {
    // launch() settles only when polling stops
    this.polling = true;
    this.bot
      .launch(() => logger.info('telegram polling started'))
      .catch((err: unknown) => logger.error('telegram polling stopped with error', { error: errorMessage(err) }))
      .finally(() => {
        this.polling = false;
      });
  }

  /** Stops polling and waits for turns and admin jobs already running. */
  async stop(reason = 'shutdown') {
    if (this.polling) {
      this.polling = false;
      this.bot.stop(reason);
    }
    await this.drain();
  }

  /** Resolves once every detached task has settled, including ones started meanwhile. */
  async drain() {
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight]);
    }
  }

  async send(userId: string, text: string): Promise<void> {
    for (const chunk of chunkReply(text)) {
      await this.gateway.sendMessage(userId, chunk);
    }
  }

  private registerMiddleware() {
    this.bot.use(async (ctx, next) => {
      const startedAt = Date.now();
      const who = ctx.from ? `${ctx.from.id} (${ctx.from.username ?? '-'})` : 'unknown';
      logger.info('telegram update', { from: who, update: describeUpdate(ctx) });
      await next();
      logger.debug('telegram update handled', { from: who, elapsed_ms: Date.now() - startedAt });
    });

    this.bot.catch(async (err, ctx) => {
      logger.error('telegram handler error', { update: ctx.updateType, error: err });
      try {
        await this.say(ctx, replies.unexpected);
      } catch (replyErr) {
        logger.error('could not send error reply', { error: errorMessage(replyErr) });
      }
    });
  }

  private registerCommands() {
    this.bot.start(async (ctx) => {
      const userId = senderId(ctx);
      if (userId) await this.store.touchUser(userId, ctx.from?.username);
      await this.say(ctx, replies.welcome(ctx.from?.first_name));
    });

    this.bot.command('stats', async (ctx) => {
      if (!this.admin.isAdmin(senderId(ctx))) return this.say(ctx, replies.notAdmin);
      await this.say(ctx, formatStats(await this.admin.stats()));
    });

    // Reload and broadcast can take minutes; the report arrives when the job settles.
    this.bot.command('reload', async (ctx) => {
      if (!this.admin.isAdmin(senderId(ctx))) return this.say(ctx, replies.notAdmin);
      this.runJob('reload', ctx, async () => {
        try {
          const report = await this.admin.reloadKnowledge();
          return `✅ База знаний обновлена: версия ${report.version}, ${report.chars} символов.`;
        } catch (err) {
          return `❌ Не удалось обновить базу знаний: ${describeError(err)}`;
        }
      });
    });

    this.bot.command('broadcast', async (ctx) => {
      if (!this.admin.isAdmin(senderId(ctx))) return this.say(ctx, replies.notAdmin);
      const text = commandArgs(ctx.message.text);
      if (!text) return this.say(ctx, 'Использование: /broadcast <текст>');
      this.runJob('broadcast', ctx, async () => {
        try {
          const report = await this.admin.broadcast(text);
          return `📣 Рассылка завершена: отправлено ${report.sent} из ${report.total}, ошибок ${report.failed}.`;
        } catch (err) {
          return `❌ Рассылка не выполнена: ${describeError(err)}`;
        }
      });
    });

    this.bot.command('reset', async (ctx) => {
      if (!this.admin.isAdmin(senderId(ctx))) return this.say(ctx, replies.notAdmin);
      const target = commandArgs(ctx.message.text) || senderId(ctx);
      if (!target) return;
      await this.admin.resetHistory(target);
      await this.say(ctx, `🧹 История пользователя ${target} очищена.`);
    });
  }

  private registerMessages() {
    this.bot.on(message('text'), (ctx) => {
      const userId = senderId(ctx);
      if (!userId) return;
      this.dispatch(ctx, { kind: 'text', userId, username: ctx.from?.username, text: ctx.message.text });
    });

    this.bot.on(message('voice'), (ctx) => {
      const userId = senderId(ctx);
      if (!userId) return;
      const { file_id: fileId } = ctx.message.voice;
      this.dispatch(ctx, {
        kind: 'voice',
        userId,
        username: ctx.from?.username,
        format: 'ogg',
        audio: () => this.gateway.download(fileId)
      });
    });

    this.bot.on(message(), async (ctx) => {
      await this.say(ctx, replies.unsupported);
    });
  }

  // Telegraf waits for a whole update batch; turns run detached so one slow
  // completion does not hold back other users.
  private dispatch(ctx: Context, event: InboundEvent) {
    const chatId = ctx.chat?.id;
    if (chatId === undefined) return;
    this.gateway.sendTyping(chatId).catch((err: unknown) => {
      logger.debug('typing indicator failed', { error: errorMessage(err) });
    });
    this.track(
      this.orchestrator
        .handle(event)
        .then(async (reply) => {
          if (!reply) return;
          for (const chunk of chunkReply(reply.text)) {
            await this.gateway.sendMessage(chatId, chunk);
          }
        })
        .catch((err: unknown) => {
          logger.error('reply delivery failed, dropping', { userId: event.userId, error: errorMessage(err) });
        })
    );
  }

  private async say(ctx: Context, text: string) {
    if (ctx.chat) await this.gateway.sendMessage(ctx.chat.id, text);
  }

  private runJob(name: string, ctx: Context, job: () => Promise<string>) {
    const chatId = ctx.chat?.id;
    if (chatId === undefined) return;
    logger.info('admin job started', { job: name, chatId });
    this.track(
      job()
        .then((report) => this.gateway.sendMessage(chatId, report))
        .catch((err: unknown) => {
          logger.error('admin job report failed', { job: name, chatId, error: errorMessage(err) });
        })
    );
  }

  private track(task: Promise<void>) {
    const tracked = task.finally(() => {
      this.inflight.delete(tracked);
    });
    this.inflight.add(tracked);
  }
}
