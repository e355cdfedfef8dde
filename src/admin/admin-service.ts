import type { KnowledgeSnapshot } from '../knowledge/types';
import { sleep as defaultSleep, type Sleep } from '../llm/util';
import { logger, errorMessage } from '../observability/logger';
import type { TurnStats, TurnStore } from '../storage/turn-store';

/** Outbound channel used for broadcasts; the Telegram adapter provides one. */
export interface Broadcaster {
  send(userId: string, text: string): Promise<void>;
}

export interface KnowledgeReloader {
  reload(): Promise<KnowledgeSnapshot>;
}

export type BroadcastReport = { total: number; sent: number; failed: number };

export type ReloadReport = { version: number; chars: number; loadedAt: string };

type AdminServiceDeps = {
  store: TurnStore;
  knowledge: KnowledgeReloader;
  adminIds: string[];
  broadcaster?: Broadcaster;
  delayMs?: number;
  sleep?: Sleep;
};

/**
 * Operator commands. Unlike the customer pipeline, errors propagate to the
 * caller unchanged so the operator sees exactly what failed.
 */
export class AdminService {
  private store: TurnStore;
  private knowledge: KnowledgeReloader;
  private adminIds: Set<string>;
  private broadcaster?: Broadcaster;
  private delayMs: number;
  private sleep: Sleep;

  constructor(deps: AdminServiceDeps) {
    this.store = deps.store;
    this.knowledge = deps.knowledge;
    this.adminIds = new Set(deps.adminIds);
    this.broadcaster = deps.broadcaster;
    this.delayMs = deps.delayMs ?? 50;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  isAdmin(userId: string | undefined): boolean {
    return userId !== undefined && this.adminIds.has(userId);
  }

  setBroadcaster(broadcaster: Broadcaster) {
    this.broadcaster = broadcaster;
  }

  stats(now?: Date): Promise<TurnStats> {
    return this.store.stats(now);
  }

  async reloadKnowledge(): Promise<ReloadReport> {
    const snapshot = await this.knowledge.reload();
    return { version: snapshot.version, chars: snapshot.content.length, loadedAt: snapshot.loadedAt.toISOString() };
  }

  async resetHistory(userId: string): Promise<void> {
    await this.store.resetHistory(userId);
    logger.info('history reset', { userId });
  }

  /** One message per known user; a failed delivery is counted, not retried. */
  async broadcast(text: string): Promise<BroadcastReport> {
    const broadcaster = this.broadcaster;
    if (!broadcaster) {
      throw new Error('no outbound channel configured for broadcast');
    }
    if (!text.trim()) {
      throw new Error('broadcast text is empty');
    }
    const userIds = await this.store.listUserIds();
    const report: BroadcastReport = { total: userIds.length, sent: 0, failed: 0 };
    for (const [i, userId] of userIds.entries()) {
      if (i > 0 && this.delayMs > 0) await this.sleep(this.delayMs);
      try {
        await broadcaster.send(userId, text);
        report.sent += 1;
      } catch (err) {
        report.failed += 1;
        logger.warn('broadcast delivery failed', { userId, error: errorMessage(err) });
      }
    }
    logger.info('broadcast finished', { ...report });
    return report;
  }
}

export function formatStats(stats: TurnStats): string {
  return [
    '📊 Статистика',
    `Пользователей: ${stats.totalUsers}`,
    `Сообщений всего: ${stats.totalMessages}`,
    `Сообщений от пользователей: ${stats.userMessages}`,
    `Активных сегодня: ${stats.activeToday}`
  ].join('\n');
}
