import type { ErrorKind } from './errors';

export enum TurnState {
  RECEIVED = 'RECEIVED',
  RESOLVED = 'RESOLVED',
  CONTEXT_ASSEMBLED = 'CONTEXT_ASSEMBLED',
  COMPLETED = 'COMPLETED',
  PERSISTED = 'PERSISTED',
  REPLIED = 'REPLIED',
  ERRORED = 'ERRORED'
}

const NEXT: Record<TurnState, TurnState | null> = {
  [TurnState.RECEIVED]: TurnState.RESOLVED,
  [TurnState.RESOLVED]: TurnState.CONTEXT_ASSEMBLED,
  [TurnState.CONTEXT_ASSEMBLED]: TurnState.COMPLETED,
  [TurnState.COMPLETED]: TurnState.PERSISTED,
  [TurnState.PERSISTED]: TurnState.REPLIED,
  [TurnState.REPLIED]: null,
  [TurnState.ERRORED]: null
};

/** Tracks one turn through the pipeline; ERRORED is reachable from any non-terminal state. */
export class TurnFSM {
  state: TurnState = TurnState.RECEIVED;
  errorKind: ErrorKind | null = null;
  readonly path: TurnState[] = [TurnState.RECEIVED];

  advance(to: TurnState) {
    if (NEXT[this.state] !== to) {
      throw new Error(`illegal turn transition ${this.state} -> ${to}`);
    }
    this.enter(to);
  }

  fail(kind: ErrorKind) {
    if (this.isTerminal()) {
      throw new Error(`turn already finished in ${this.state}`);
    }
    this.errorKind = kind;
    this.enter(TurnState.ERRORED);
  }

  isTerminal(): boolean {
    return NEXT[this.state] === null;
  }

  private enter(to: TurnState) {
    this.state = to;
    this.path.push(to);
  }
}
