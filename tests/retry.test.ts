import test from 'node:test';
import assert from 'node:assert/strict';
import { backoffDelay, withRetry, type RetryPolicy } from '../src/llm/retry';

const policy: RetryPolicy = { maxRetries: 2, baseDelayMs: 500, factor: 2, maxDelayMs: 3000 };

test('backoff doubles per retry and stops at the cap', () => {
  const wide = { ...policy, maxRetries: 5 };
  assert.deepEqual(
    [1, 2, 3, 4].map((n) => backoffDelay(wide, n)),
    [500, 1000, 2000, 3000]
  );
});

test('withRetry succeeds after transient failures', async () => {
  const sleeps: number[] = [];
  const attempts: number[] = [];
  const out = await withRetry(
    async (attempt) => {
      attempts.push(attempt);
      if (attempt < 3) throw new Error(`fail ${attempt}`);
      return 'ok';
    },
    { policy, shouldRetry: () => true, sleep: async (ms) => void sleeps.push(ms) }
  );
  assert.equal(out, 'ok');
  assert.deepEqual(attempts, [1, 2, 3]);
  assert.deepEqual(sleeps, [500, 1000]);
});

test('withRetry rethrows the last error once retries run out', async () => {
  const sleeps: number[] = [];
  let calls = 0;
  await assert.rejects(
    withRetry(
      async (attempt) => {
        calls += 1;
        throw new Error(`fail ${attempt}`);
      },
      { policy, shouldRetry: () => true, sleep: async (ms) => void sleeps.push(ms) }
    ),
    /fail 3/
  );
  assert.equal(calls, 3);
  assert.deepEqual(sleeps, [500, 1000]);
});

test('withRetry does not retry what shouldRetry rejects', async () => {
  const sleeps: number[] = [];
  const retries: number[] = [];
  let calls = 0;
  await assert.rejects(
    withRetry(
      async () => {
        calls += 1;
        throw new Error('fatal');
      },
      {
        policy,
        shouldRetry: () => false,
        sleep: async (ms) => void sleeps.push(ms),
        onRetry: (_err, retry) => retries.push(retry)
      }
    ),
    /fatal/
  );
  assert.equal(calls, 1);
  assert.deepEqual(sleeps, []);
  assert.deepEqual(retries, []);
});
