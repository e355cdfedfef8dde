import test from 'node:test';
import assert from 'node:assert/strict';
import { TranscriptionFailed } from '../src/core/errors';
import { Transcriber, type TranscriptionEngine } from '../src/asr/transcriber';

class StubEngine implements TranscriptionEngine {
  readonly name = 'stub-asr';
  calls: Array<{ bytes: number; format: string }> = [];

  constructor(private result: string | Error) {}

  async transcribe(audio: Buffer, format: string): Promise<string> {
    this.calls.push({ bytes: audio.length, format });
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

test('transcriber returns the trimmed transcript', async () => {
  const engine = new StubEngine('  Хочу заказать торт  ');
  const text = await new Transcriber(engine).transcribe(Buffer.from('ogg-bytes'), 'ogg');
  assert.equal(text, 'Хочу заказать торт');
  assert.deepEqual(engine.calls, [{ bytes: 9, format: 'ogg' }]);
});

test('transcriber rejects empty audio without calling the engine', async () => {
  const engine = new StubEngine('unused');
  await assert.rejects(new Transcriber(engine).transcribe(Buffer.alloc(0), 'ogg'), TranscriptionFailed);
  assert.equal(engine.calls.length, 0);
});

test('transcriber wraps engine errors', async () => {
  const cause = new Error('engine offline');
  const engine = new StubEngine(cause);
  await assert.rejects(new Transcriber(engine).transcribe(Buffer.from('x'), 'ogg'), (err: unknown) => {
    assert.ok(err instanceof TranscriptionFailed);
    assert.equal(err.cause, cause);
    return true;
  });
});

test('transcriber treats a blank transcript as a failure', async () => {
  const engine = new StubEngine('   ');
  await assert.rejects(new Transcriber(engine).transcribe(Buffer.from('x'), 'ogg'), /transcript is empty/);
});
