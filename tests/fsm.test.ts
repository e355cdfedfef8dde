import test from 'node:test';
import assert from 'node:assert/strict';
import { TurnFSM, TurnState } from '../src/core/fsm';

test('turn fsm walks the happy path', () => {
  const fsm = new TurnFSM();
  fsm.advance(TurnState.RESOLVED);
  fsm.advance(TurnState.CONTEXT_ASSEMBLED);
  fsm.advance(TurnState.COMPLETED);
  fsm.advance(TurnState.PERSISTED);
  fsm.advance(TurnState.REPLIED);
  assert.equal(fsm.state, TurnState.REPLIED);
  assert.equal(fsm.isTerminal(), true);
  assert.equal(fsm.path.length, 6);
});

test('turn fsm rejects skipped states', () => {
  const fsm = new TurnFSM();
  assert.throws(() => fsm.advance(TurnState.COMPLETED), /illegal turn transition RECEIVED -> COMPLETED/);
});

test('turn fsm can fail from any open state, once', () => {
  const fsm = new TurnFSM();
  fsm.advance(TurnState.RESOLVED);
  fsm.fail('CompletionTimeout');
  assert.equal(fsm.state, TurnState.ERRORED);
  assert.equal(fsm.errorKind, 'CompletionTimeout');
  assert.deepEqual(fsm.path, [TurnState.RECEIVED, TurnState.RESOLVED, TurnState.ERRORED]);
  assert.throws(() => fsm.fail('Unexpected'), /turn already finished in ERRORED/);
  assert.throws(() => fsm.advance(TurnState.REPLIED), /illegal turn transition ERRORED -> REPLIED/);
});
