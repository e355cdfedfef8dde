import 'dotenv/config';
import type { FastifyInstance } from 'fastify';
import { AdminService } from './admin/admin-service';
import { TelegramBot } from './adapters/telegram-bot';
import { Transcriber } from './asr/transcriber';
import { config, requireSecrets } from './config';
import { Orchestrator } from './core/orchestrator';
import { DriveKnowledgeSource } from './knowledge/drive-source';
import { FileKnowledgeSource } from './knowledge/file-source';
import { KnowledgeProvider } from './knowledge/knowledge-provider';
import type { KnowledgeSource } from './knowledge/types';
import { CompletionClient } from './llm/completion-client';
import { logger, errorMessage } from './observability/logger';
import { buildServer } from './server';
import { HistoryJournal } from './services/history-journal';
import { MemoryTurnStore } from './storage/memory-turn-store';
import { SqliteTurnStore } from './storage/sqlite-turn-store';
import type { TurnStore } from './storage/turn-store';

function createStore(): TurnStore {
  if (config.dbPath === 'memory') {
    return new MemoryTurnStore({ retainPerUser: config.historyRetain });
  }
  return new SqliteTurnStore({ dbPath: config.dbPath, retainPerUser: config.historyRetain });
}

function createKnowledgeSource(): KnowledgeSource {
  if (config.knowledgeFile) {
    return new FileKnowledgeSource(config.knowledgeFile);
  }
  if (config.googleDriveFileId && config.googleServiceAccountJson) {
    return new DriveKnowledgeSource({
      fileId: config.googleDriveFileId,
      serviceAccountJson: config.googleServiceAccountJson
    });
  }
  throw new Error('no knowledge source configured');
}

async function start() {
  logger.info('=== bento assistant start ===');
  requireSecrets(config);

  const store = createStore();
  const knowledge = new KnowledgeProvider({
    source: createKnowledgeSource(),
    cachePath: config.knowledgeCachePath
  });
  const initial = await knowledge.init();
  logger.info('knowledge ready', { version: initial?.version ?? null, chars: initial?.content.length ?? 0 });
  if (config.knowledgeRefreshCron) {
    knowledge.startSchedule(config.knowledgeRefreshCron);
  }

  const orchestrator = new Orchestrator({
    store,
    knowledge,
    transcriber: new Transcriber(),
    completer: new CompletionClient(),
    journal: config.historyDir ? new HistoryJournal(config.historyDir) : undefined
  });
  const admin = new AdminService({
    store,
    knowledge,
    adminIds: config.adminUserIds,
    delayMs: config.broadcastDelayMs
  });

  let telegram: TelegramBot | null = null;
  if (config.enableTelegram && config.telegramBotToken) {
    telegram = new TelegramBot({ token: config.telegramBotToken, orchestrator, admin, store });
    admin.setBroadcaster(telegram);
    await telegram.launch();
  }

  let server: FastifyInstance | null = null;
  if (config.enableHttp && config.httpApiToken) {
    server = await buildServer({
      orchestrator,
      admin,
      apiToken: config.httpApiToken,
      health: () => {
        try {
          const snap = knowledge.currentSnapshot();
          return { knowledgeVersion: snap.version, knowledgeOrigin: snap.origin };
        } catch {
          return { knowledgeVersion: null };
        }
      }
    });
    await server.listen({ port: config.port, host: config.httpHost });
    logger.info('server listening', { port: config.port, host: config.httpHost });
  }

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info('shutting down', { signal });
    knowledge.stopSchedule();
    await telegram?.stop(signal);
    await server?.close();
    await store.close();
    logger.info('stopped');
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error('shutdown failed', { error: errorMessage(err) });
        process.exitCode = 1;
      });
    });
  }
}

start().catch((err) => {
  logger.error('failed to start', { error: errorMessage(err) });
  process.exit(1);
});
