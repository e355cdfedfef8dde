import { config } from '../config';
import type { Completer } from '../llm/completion-client';
import { fitContext, type ContextBudget, type SizeMeter } from '../llm/context-window';
import { SYSTEM_INSTRUCTIONS } from '../llm/prompts';
import type { KnowledgeSnapshot } from '../knowledge/types';
import type { Turn, TurnStore } from '../storage/turn-store';
import type { HistoryJournal } from '../services/history-journal';
import { logger, errorMessage } from '../observability/logger';
import { CompletionRefused, KnowledgeUnavailable, TranscriptionFailed, errorKindOf, type ErrorKind } from './errors';
import type { AudioPayload, InboundEvent, OutboundReply, TextEvent, VoiceEvent } from './events';
import { TurnFSM, TurnState } from './fsm';
import { KeyedMutex } from './keyed-mutex';
import { replies } from './replies';

export interface KnowledgeReader {
  currentSnapshot(): KnowledgeSnapshot;
}

export interface VoiceTranscriber {
  transcribe(audio: Buffer, format: string): Promise<string>;
}

export type OrchestratorDeps = {
  store: TurnStore;
  knowledge: KnowledgeReader;
  transcriber: VoiceTranscriber;
  completer: Completer;
  journal?: HistoryJournal;
  systemInstructions?: string;
  historyLimit?: number;
  budget?: ContextBudget;
  measure?: SizeMeter;
  locks?: KeyedMutex;
};

type TurnResult = {
  text: string;
  status: OutboundReply['status'];
  errorKind?: ErrorKind;
};

/**
 * Turns one inbound event into one reply. Work for a single user is
 * serialized from transcription through persistence; different users run
 * concurrently. Every failure ends in a fixed customer-facing reply.
 */
export class Orchestrator {
  private store: TurnStore;
  private knowledge: KnowledgeReader;
  private transcriber: VoiceTranscriber;
  private completer: Completer;
  private journal?: HistoryJournal;
  private systemInstructions: string;
  private historyLimit: number;
  private budget: ContextBudget;
  private measure?: SizeMeter;
  private locks: KeyedMutex;

  constructor(deps: OrchestratorDeps) {
    this.store = deps.store;
    this.knowledge = deps.knowledge;
    this.transcriber = deps.transcriber;
    this.completer = deps.completer;
    this.journal = deps.journal;
    this.systemInstructions = deps.systemInstructions ?? SYSTEM_INSTRUCTIONS;
    this.historyLimit = deps.historyLimit ?? config.historyLimit;
    this.budget = deps.budget ?? {
      maxInputTokens: config.maxInputTokens,
      maxKnowledgeTokens: config.maxKnowledgeTokens
    };
    this.measure = deps.measure;
    this.locks = deps.locks ?? new KeyedMutex();
  }

  async handle(event: InboundEvent): Promise<OutboundReply | null> {
    if (event.kind === 'system') {
      logger.debug('ignoring system event', { userId: event.userId, reason: event.reason });
      return null;
    }

    const fsm = new TurnFSM();
    const startedAt = Date.now();
    let result: TurnResult;
    try {
      // enqueue synchronously so same-user events keep their arrival order
      result = await this.locks.run(event.userId, () => this.runTurn(event, fsm));
    } catch (err) {
      logger.error('turn crashed', { userId: event.userId, state: fsm.state, error: err });
      if (!fsm.isTerminal()) fsm.fail('Unexpected');
      result = { text: replies.unexpected, status: 'degraded', errorKind: 'Unexpected' };
    }

    if (result.status === 'ok') fsm.advance(TurnState.REPLIED);
    logger.info('turn finished', {
      userId: event.userId,
      kind: event.kind,
      state: fsm.state,
      error: result.errorKind,
      elapsed_ms: Date.now() - startedAt
    });

    return { userId: event.userId, ...result, states: [...fsm.path] };
  }

  private async runTurn(event: TextEvent | VoiceEvent, fsm: TurnFSM): Promise<TurnResult> {
    const { userId } = event;

    let text: string;
    if (event.kind === 'voice') {
      try {
        const audio = await loadAudio(event.audio);
        text = await this.transcriber.transcribe(audio, event.format);
      } catch (err) {
        return this.degrade(fsm, userId, err, replies.transcriptionFailed);
      }
    } else {
      text = event.text.trim();
    }
    if (!text) {
      fsm.fail('EmptyMessage');
      return { text: replies.emptyMessage, status: 'degraded', errorKind: 'EmptyMessage' };
    }
    fsm.advance(TurnState.RESOLVED);
    await this.journal?.record(userId, text, event.username);

    let history: Turn[];
    let knowledge: string;
    try {
      [history, knowledge] = await Promise.all([
        this.store.recentTurns(userId, this.historyLimit),
        Promise.resolve().then(() => this.readKnowledge())
      ]);
    } catch (err) {
      return this.degrade(fsm, userId, err, replies.apology);
    }
    const fitted = fitContext(
      { systemInstructions: this.systemInstructions, knowledge, turns: history, userMessage: text },
      this.budget,
      this.measure
    );
    if (fitted.droppedTurns > 0 || fitted.knowledgeTruncated) {
      logger.info('context trimmed to budget', {
        userId,
        dropped_turns: fitted.droppedTurns,
        knowledge_truncated: fitted.knowledgeTruncated,
        size: fitted.size
      });
    }
    fsm.advance(TurnState.CONTEXT_ASSEMBLED);

    let reply: string;
    try {
      reply = await this.completer.complete({
        systemInstructions: this.systemInstructions,
        contextTurns: fitted.turns,
        knowledgeExcerpt: fitted.knowledge,
        userMessage: text
      });
    } catch (err) {
      if (err instanceof CompletionRefused) {
        return this.degrade(fsm, userId, err, replies.refused);
      }
      // keep the question in context so a retry by the user has it
      await this.appendUserTurnBestEffort(userId, text);
      return this.degrade(fsm, userId, err, replies.apology);
    }
    fsm.advance(TurnState.COMPLETED);

    try {
      await this.store.append(userId, 'user', text);
      await this.store.append(userId, 'assistant', reply);
    } catch (err) {
      return this.degrade(fsm, userId, err, replies.apology);
    }
    fsm.advance(TurnState.PERSISTED);

    return { text: reply, status: 'ok' };
  }

  private readKnowledge(): string {
    try {
      return this.knowledge.currentSnapshot().content;
    } catch (err) {
      if (err instanceof KnowledgeUnavailable) {
        logger.warn('knowledge unavailable, answering without it');
        return '';
      }
      throw err;
    }
  }

  private async appendUserTurnBestEffort(userId: string, text: string) {
    try {
      await this.store.append(userId, 'user', text);
    } catch (err) {
      logger.error('could not keep user turn after failed completion', { userId, error: errorMessage(err) });
    }
  }

  private degrade(fsm: TurnFSM, userId: string, err: unknown, text: string): TurnResult {
    const errorKind = errorKindOf(err);
    logger.warn('turn degraded', { userId, state: fsm.state, kind: errorKind, error: errorMessage(err) });
    fsm.fail(errorKind);
    return { text, status: 'degraded', errorKind };
  }
}

async function loadAudio(payload: AudioPayload): Promise<Buffer> {
  if (Buffer.isBuffer(payload)) return payload;
  try {
    return await payload();
  } catch (err) {
    throw new TranscriptionFailed('could not download voice message', { cause: err });
  }
}
