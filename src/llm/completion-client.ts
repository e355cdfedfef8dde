import { config } from '../config';
import { CompletionTimeout, CompletionUnavailable } from '../core/errors';
import { logger, errorMessage } from '../observability/logger';
import { OpenAIChatModel, type ChatMessage, type ChatModel } from './chat-model';
import type { ContextTurn } from './context-window';
import { renderSystemMessage } from './prompts';
import { withRetry, type RetryPolicy } from './retry';
import { withDeadline, type Sleep } from './util';

export type CompletionRequest = {
  systemInstructions: string;
  contextTurns: ContextTurn[];
  knowledgeExcerpt: string;
  userMessage: string;
};

/** What the orchestrator depends on; CompletionClient is the production implementation. */
export interface Completer {
  complete(req: CompletionRequest): Promise<string>;
}

type CompletionClientOpts = {
  model?: ChatModel;
  policy?: RetryPolicy;
  timeoutMs?: number;
  sleep?: Sleep;
};

export function isRetryable(err: unknown): boolean {
  if (err instanceof CompletionTimeout) return true;
  if (err instanceof CompletionUnavailable) return err.retryable;
  return false;
}

export class CompletionClient implements Completer {
  private model: ChatModel;
  private policy: RetryPolicy;
  private timeoutMs: number;
  private sleep?: Sleep;

  constructor(opts: CompletionClientOpts = {}) {
    this.model = opts.model ?? new OpenAIChatModel();
    this.policy = opts.policy ?? {
      maxRetries: config.completionMaxRetries,
      baseDelayMs: config.completionBackoffMs,
      factor: 2,
      maxDelayMs: 8000
    };
    this.timeoutMs = opts.timeoutMs ?? config.completionTimeoutMs;
    this.sleep = opts.sleep;
  }

  buildMessages(req: CompletionRequest): ChatMessage[] {
    return [
      { role: 'system', content: renderSystemMessage(req.systemInstructions, req.knowledgeExcerpt) },
      ...req.contextTurns.map((t) => ({ role: t.role, content: t.content })),
      { role: 'user', content: req.userMessage }
    ];
  }

  async complete(req: CompletionRequest): Promise<string> {
    const messages = this.buildMessages(req);
    return withRetry(
      async (attempt) => {
        const startedAt = Date.now();
        const text = await withDeadline(
          (signal) => this.model.generate(messages, signal),
          this.timeoutMs,
          () => new CompletionTimeout(`completion exceeded ${this.timeoutMs}ms`)
        );
        logger.info('completion done', {
          model: this.model.name,
          attempt,
          chars: text.length,
          elapsed_ms: Date.now() - startedAt
        });
        return text;
      },
      {
        policy: this.policy,
        shouldRetry: isRetryable,
        sleep: this.sleep,
        onRetry: (err, retry, delayMs) => {
          logger.warn('completion failed, retrying', {
            model: this.model.name,
            retry,
            delay_ms: delayMs,
            error: errorMessage(err)
          });
        }
      }
    );
  }
}
