import test from 'node:test';
import assert from 'node:assert/strict';
import { MemoryTurnStore } from '../src/storage/memory-turn-store';

test('memory store returns the most recent turns oldest first', async () => {
  const store = new MemoryTurnStore();
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
});

test('memory store never lets a timestamp go backwards', async () => {
  let now = 2000;
  const store = new MemoryTurnStore({ clock: () => now });
  const first = await store.append('u1', 'user', 'q1');
  now = 1500;
  const second = await store.append('u1', 'assistant', 'a1');
  assert.equal(first.timestamp, 2000);
  assert.equal(second.timestamp, 2000);
  assert.ok(Object.isFrozen(second));
});

test('memory store keeps only the newest turns when retention is set', async () => {
  const store = new MemoryTurnStore({ retainPerUser: 2 });
  await store.append('u1', 'user', 'q1');
  await store.append('u1', 'assistant', 'a1');
  await store.append('u1', 'user', 'q2');
  assert.deepEqual(
    (await store.recentTurns('u1', 10)).map((t) => t.content),
    ['a1', 'q2']
  );
});

test('memory store reset clears history but keeps the user', async () => {
  const store = new MemoryTurnStore();
  await store.append('u1', 'user', 'q1');
  await store.resetHistory('u1');
  await store.resetHistory('u1');
  await store.resetHistory('nobody');
  assert.deepEqual(await store.recentTurns('u1', 10), []);
  assert.deepEqual(await store.listUserIds(), ['u1']);
});

test('memory store stats count users, messages and today activity', async () => {
  const yesterday = new Date(2026, 0, 14, 10, 0, 0).getTime();
  const today = new Date(2026, 0, 15, 9, 0, 0).getTime();
  let now = yesterday;
  const store = new MemoryTurnStore({ clock: () => now });
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
});
