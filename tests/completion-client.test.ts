import test from 'node:test';
import assert from 'node:assert/strict';
import { APIConnectionTimeoutError, APIError } from 'openai';
import { CompletionRefused, CompletionTimeout, CompletionUnavailable } from '../src/core/errors';
import { mapProviderError, type ChatMessage, type ChatModel } from '../src/llm/chat-model';
import { CompletionClient, isRetryable, type CompletionRequest } from '../src/llm/completion-client';
import { KNOWLEDGE_HEADING, KNOWLEDGE_PLACEHOLDER } from '../src/llm/prompts';
import type { RetryPolicy } from '../src/llm/retry';

class ScriptedModel implements ChatModel {
  readonly name = 'scripted';
  calls: ChatMessage[][] = [];

  constructor(private script: Array<string | Error>) {}

  async generate(messages: ChatMessage[]): Promise<string> {
    this.calls.push(messages);
    const next = this.script.shift();
    if (next === undefined) throw new Error('script exhausted');
    if (next instanceof Error) throw next;
    return next;
  }
}

const policy: RetryPolicy = { maxRetries: 2, baseDelayMs: 500, factor: 2, maxDelayMs: 8000 };

const request: CompletionRequest = {
  systemInstructions: 'Отвечай кратко.',
  contextTurns: [
    { role: 'user', content: 'Привет' },
    { role: 'assistant', content: 'Здравствуйте!' }
  ],
  knowledgeExcerpt: 'Бенто-торт: 1500 ₽',
  userMessage: 'Сколько стоит торт?'
};

function recorder() {
  const sleeps: number[] = [];
  return { sleeps, sleep: async (ms: number) => void sleeps.push(ms) };
}

test('buildMessages puts knowledge in the system message, then history, then the question', () => {
  const client = new CompletionClient({ model: new ScriptedModel([]) });
  assert.deepEqual(client.buildMessages(request), [
    { role: 'system', content: `Отвечай кратко.\n\n${KNOWLEDGE_HEADING}\nБенто-торт: 1500 ₽` },
    { role: 'user', content: 'Привет' },
    { role: 'assistant', content: 'Здравствуйте!' },
    { role: 'user', content: 'Сколько стоит торт?' }
  ]);
});

test('buildMessages uses the placeholder when there is no knowledge', () => {
  const client = new CompletionClient({ model: new ScriptedModel([]) });
  const [system] = client.buildMessages({ ...request, knowledgeExcerpt: '   ', contextTurns: [] });
  assert.equal(system.content, `Отвечай кратко.\n\n${KNOWLEDGE_HEADING}\n${KNOWLEDGE_PLACEHOLDER}`);
});

test('complete retries unavailability with backoff and returns the answer', async () => {
  const model = new ScriptedModel([
    new CompletionUnavailable('provider error 503'),
    new CompletionUnavailable('provider error 502'),
    'Торт стоит 1500 ₽'
  ]);
  const { sleeps, sleep } = recorder();
  const client = new CompletionClient({ model, policy, timeoutMs: 1000, sleep });
  assert.equal(await client.complete(request), 'Торт стоит 1500 ₽');
  assert.equal(model.calls.length, 3);
  assert.deepEqual(sleeps, [500, 1000]);
});

test('complete gives up after the configured retries', async () => {
  const model = new ScriptedModel([
    new CompletionUnavailable('down'),
    new CompletionUnavailable('down'),
    new CompletionUnavailable('still down')
  ]);
  const { sleeps, sleep } = recorder();
  const client = new CompletionClient({ model, policy, timeoutMs: 1000, sleep });
  await assert.rejects(client.complete(request), (err: unknown) => {
    assert.ok(err instanceof CompletionUnavailable);
    assert.equal(err.message, 'still down');
    return true;
  });
  assert.equal(model.calls.length, 3);
  assert.deepEqual(sleeps, [500, 1000]);
});

test('complete never retries a refusal', async () => {
  const model = new ScriptedModel([new CompletionRefused('filtered'), 'unused']);
  const { sleeps, sleep } = recorder();
  const client = new CompletionClient({ model, policy, timeoutMs: 1000, sleep });
  await assert.rejects(client.complete(request), CompletionRefused);
  assert.equal(model.calls.length, 1);
  assert.deepEqual(sleeps, []);
});

test('complete does not retry a non-retryable provider error', async () => {
  const model = new ScriptedModel([new CompletionUnavailable('provider error 401', { retryable: false }), 'unused']);
  const { sleeps, sleep } = recorder();
  const client = new CompletionClient({ model, policy, timeoutMs: 1000, sleep });
  await assert.rejects(client.complete(request), CompletionUnavailable);
  assert.equal(model.calls.length, 1);
  assert.deepEqual(sleeps, []);
});

test('complete times out a hanging model and retries the timeout', async () => {
  let calls = 0;
  const hanging: ChatModel = {
    name: 'hanging',
    generate: (_messages, signal) =>
      new Promise<string>((_resolve, reject) => {
        calls += 1;
        signal.addEventListener('abort', () => reject(new Error('aborted')));
      })
  };
  const { sleeps, sleep } = recorder();
  const client = new CompletionClient({ model: hanging, policy: { ...policy, maxRetries: 1 }, timeoutMs: 20, sleep });
  await assert.rejects(client.complete(request), CompletionTimeout);
  assert.equal(calls, 2);
  assert.deepEqual(sleeps, [500]);
});

test('isRetryable covers timeouts and transient unavailability only', () => {
  assert.equal(isRetryable(new CompletionTimeout('slow')), true);
  assert.equal(isRetryable(new CompletionUnavailable('503')), true);
  assert.equal(isRetryable(new CompletionUnavailable('401', { retryable: false })), false);
  assert.equal(isRetryable(new CompletionRefused('no')), false);
  assert.equal(isRetryable(new Error('other')), false);
});

test('mapProviderError maps provider failures onto completion errors', () => {
  assert.ok(mapProviderError(new APIConnectionTimeoutError()) instanceof CompletionTimeout);

  const overloaded = mapProviderError(new APIError(503, undefined, 'overloaded', undefined));
  assert.ok(overloaded instanceof CompletionUnavailable);
  assert.equal(overloaded.retryable, true);

  const limited = mapProviderError(new APIError(429, undefined, 'slow down', undefined));
  assert.ok(limited instanceof CompletionUnavailable);
  assert.equal(limited.retryable, true);

  const unauthorized = mapProviderError(new APIError(401, undefined, 'bad key', undefined));
  assert.ok(unauthorized instanceof CompletionUnavailable);
  assert.equal(unauthorized.retryable, false);

  const policyBlock = mapProviderError(new APIError(400, { code: 'content_policy_violation' }, 'blocked', undefined));
  assert.ok(policyBlock instanceof CompletionRefused);

  const socket = mapProviderError(new Error('socket hang up'));
  assert.ok(socket instanceof CompletionUnavailable);
  assert.equal(socket.message, 'socket hang up');
});
