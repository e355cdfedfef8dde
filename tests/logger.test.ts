import test from 'node:test';
import assert from 'node:assert/strict';
import { formatLine } from '../src/observability/logger';

test('formatLine renders fields as key=value pairs', () => {
  assert.equal(
    formatLine('turn finished', { userId: '42', state: 'REPLIED', error: undefined, elapsed_ms: 12 }),
    'turn finished userId=42 state=REPLIED elapsed_ms=12'
  );
});

test('formatLine quotes text with spaces and flattens errors and objects', () => {
  assert.equal(
    formatLine('x', { text: 'two words', err: new Error('boom'), nested: { a: 1 } }),
    'x text="two words" err="Error: boom" nested={"a":1}'
  );
  assert.equal(formatLine('x'), 'x');
  assert.equal(formatLine('x', {}), 'x');
});
