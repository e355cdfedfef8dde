import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { StorageUnavailable } from '../src/core/errors';
import { SqliteTurnStore } from '../src/storage/sqlite-turn-store';

test('sqlite store returns the most recent turns oldest first', async () => {
  const store = new SqliteTurnStore({ dbPath: ':memory:' });
  await store.append('u1', 'user', 'q1');
  await store.append('u1', 'assistant', 'a1');
  await store.append('u1', 'user', 'q2');
  await store.append('u2', 'user', 'other');

  assert.deepEqual(
    (await store.recentTurns('u1', 2)).map((t) => [t.role, t.content]),
    [
      ['assistant', 'a1'],
      ['user', 'q2']
    ]
  );
  assert.equal((await store.recentTurns('u1', 10)).length, 3);
  assert.deepEqual(await store.recentTurns('u1', 0), []);
  assert.deepEqual(await store.recentTurns('nobody', 5), []);
  await store.close();
});

test('sqlite store clamps timestamps and applies retention', async () => {
  let now = 2000;
  const store = new SqliteTurnStore({ dbPath: ':memory:', retainPerUser: 2, clock: () => now });
  await store.append('u1', 'user', 'q1');
  now = 1500;
  const second = await store.append('u1', 'assistant', 'a1');
  await store.append('u1', 'user', 'q2');
  assert.equal(second.timestamp, 2000);
  const turns = await store.recentTurns('u1', 10);
  assert.deepEqual(
    turns.map((t) => [t.content, t.timestamp]),
    [
      ['a1', 2000],
      ['q2', 2000]
    ]
  );
  await store.close();
});

test('sqlite store reset is idempotent and keeps the user listed', async () => {
  let now = 1000;
  const store = new SqliteTurnStore({ dbPath: ':memory:', clock: () => now });
  await store.append('u2', 'user', 'first');
  now = 2000;
  await store.touchUser('u1', 'anna');
  await store.resetHistory('u2');
  await store.resetHistory('u2');
  await store.resetHistory('nobody');
  assert.deepEqual(await store.recentTurns('u2', 10), []);
  assert.deepEqual(await store.listUserIds(), ['u2', 'u1']);
  await store.close();
});

test('sqlite store stats count users, messages and today activity', async () => {
  const yesterday = new Date(2026, 0, 14, 10, 0, 0).getTime();
  const today = new Date(2026, 0, 15, 9, 0, 0).getTime();
  let now = yesterday;
  const store = new SqliteTurnStore({ dbPath: ':memory:', clock: () => now });
  await store.append('u1', 'user', 'q1');
  await store.append('u1', 'assistant', 'a1');
  now = today;
  await store.append('u2', 'user', 'q2');
  await store.touchUser('u3', 'anna');

  assert.deepEqual(await store.stats(new Date(2026, 0, 15, 12, 0, 0)), {
    totalUsers: 3,
    totalMessages: 3,
    userMessages: 2,
    activeToday: 1
  });
  await store.close();
});

test('sqlite store keeps turns across reopen', async () => {
  const dir = await mkdtemp(path.join(tmpdir(), 'bento-store-'));
  const dbPath = path.join(dir, 'nested', 'assistant.db');
  try {
    const first = new SqliteTurnStore({ dbPath });
    await first.append('u1', 'user', 'Есть ли доставка?');
    await first.append('u1', 'assistant', 'Да, по городу.');
    await first.close();

    const second = new SqliteTurnStore({ dbPath });
    assert.deepEqual(
      (await second.recentTurns('u1', 10)).map((t) => t.content),
      ['Есть ли доставка?', 'Да, по городу.']
    );
    await second.close();
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test('sqlite store reports StorageUnavailable once the database is closed', async () => {
  const store = new SqliteTurnStore({ dbPath: ':memory:' });
  await store.close();
  await assert.rejects(store.append('u1', 'user', 'q1'), StorageUnavailable);
  await assert.rejects(store.recentTurns('u1', 5), StorageUnavailable);
});
