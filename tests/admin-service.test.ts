import test from 'node:test';
import assert from 'node:assert/strict';
import { AdminService, formatStats, type Broadcaster, type KnowledgeReloader } from '../src/admin/admin-service';
import { ReloadFailed } from '../src/core/errors';
import type { KnowledgeSnapshot } from '../src/knowledge/types';
import { MemoryTurnStore } from '../src/storage/memory-turn-store';

class FixedReloader implements KnowledgeReloader {
  constructor(private result: KnowledgeSnapshot | Error) {}

  async reload(): Promise<KnowledgeSnapshot> {
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

class RecordingBroadcaster implements Broadcaster {
  attempts: string[] = [];

  constructor(private failFor: Set<string> = new Set()) {}

  async send(userId: string): Promise<void> {
    this.attempts.push(userId);
    if (this.failFor.has(userId)) throw new Error('403: bot was blocked by the user');
  }
}

const snapshot: KnowledgeSnapshot = {
  content: 'abc',
  version: 3,
  loadedAt: new Date(Date.UTC(2026, 0, 2, 3, 4, 5)),
  origin: 'source'
};

test('isAdmin accepts only configured ids', () => {
  const admin = new AdminService({ store: new MemoryTurnStore(), knowledge: new FixedReloader(snapshot), adminIds: ['100'] });
  assert.equal(admin.isAdmin('100'), true);
  assert.equal(admin.isAdmin('200'), false);
  assert.equal(admin.isAdmin(undefined), false);
});

test('reloadKnowledge reports the new snapshot', async () => {
  const admin = new AdminService({ store: new MemoryTurnStore(), knowledge: new FixedReloader(snapshot), adminIds: [] });
  assert.deepEqual(await admin.reloadKnowledge(), { version: 3, chars: 3, loadedAt: '2026-01-02T03:04:05.000Z' });
});

test('reloadKnowledge passes the failure through', async () => {
  const admin = new AdminService({
    store: new MemoryTurnStore(),
    knowledge: new FixedReloader(new ReloadFailed('could not fetch knowledge from drive')),
    adminIds: []
  });
  await assert.rejects(admin.reloadKnowledge(), ReloadFailed);
});

test('broadcast reaches every known user, counts failures and writes no turns', async () => {
  const store = new MemoryTurnStore();
  await store.touchUser('u1');
  await store.touchUser('u2');
  await store.touchUser('u3');
  const broadcaster = new RecordingBroadcaster(new Set(['u2']));
  const sleeps: number[] = [];
  const admin = new AdminService({
    store,
    knowledge: new FixedReloader(snapshot),
    adminIds: [],
    broadcaster,
    delayMs: 50,
    sleep: async (ms) => void sleeps.push(ms)
  });

  assert.deepEqual(await admin.broadcast('Скидка 10% на все торты!'), { total: 3, sent: 2, failed: 1 });
  assert.deepEqual(broadcaster.attempts, ['u1', 'u2', 'u3']);
  assert.deepEqual(sleeps, [50, 50]);
  assert.equal((await store.stats()).totalMessages, 0);
});

test('broadcast needs a channel and a text', async () => {
  const admin = new AdminService({ store: new MemoryTurnStore(), knowledge: new FixedReloader(snapshot), adminIds: [] });
  await assert.rejects(admin.broadcast('hello'), /no outbound channel configured for broadcast/);
  admin.setBroadcaster(new RecordingBroadcaster());
  await assert.rejects(admin.broadcast('   '), /broadcast text is empty/);
});

test('resetHistory clears the user history', async () => {
  const store = new MemoryTurnStore();
  await store.append('u1', 'user', 'q1');
  const admin = new AdminService({ store, knowledge: new FixedReloader(snapshot), adminIds: [] });
  await admin.resetHistory('u1');
  assert.deepEqual(await store.recentTurns('u1', 10), []);
});

test('formatStats renders one line per figure', () => {
  assert.equal(
    formatStats({ totalUsers: 3, totalMessages: 10, userMessages: 5, activeToday: 2 }),
    [
      '📊 Статистика',
      'Пользователей: 3',
      'Сообщений всего: 10',
      'Сообщений от пользователей: 5',
      'Активных сегодня: 2'
    ].join('\n')
  );
});
