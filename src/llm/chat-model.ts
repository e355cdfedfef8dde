import OpenAI, { APIConnectionError, APIConnectionTimeoutError, APIError, APIUserAbortError } from 'openai';
import type { ChatCompletion, ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { config } from '../config';
import { CompletionRefused, CompletionTimeout, CompletionUnavailable } from '../core/errors';

export type ChatMessage = { role: 'system' | 'user' | 'assistant'; content: string };

/** One non-streaming completion. Implementations throw the Completion* errors. */
export interface ChatModel {
  readonly name: string;
  generate(messages: ChatMessage[], signal: AbortSignal): Promise<string>;
}

type OpenAIChatModelOpts = {
  client?: OpenAI;
  model?: string;
  temperature?: number;
  maxTokens?: number;
};

// Statuses worth another attempt; everything else in 4xx is our fault.
const TRANSIENT_STATUS = new Set([408, 409, 429]);

export class OpenAIChatModel implements ChatModel {
  readonly name: string;
  private client: OpenAI;
  private model: string;
  private temperature: number;
  private maxTokens: number;

  constructor(opts: OpenAIChatModelOpts = {}) {
    this.client =
      opts.client ??
      new OpenAI({
        apiKey: config.openaiApiKey,
        baseURL: config.openaiBaseUrl
      });
    this.model = opts.model ?? config.openaiModel;
    this.temperature = opts.temperature ?? config.openaiTemperature;
    this.maxTokens = opts.maxTokens ?? config.openaiMaxTokens;
    this.name = `openai:${this.model}`;
  }

  async generate(messages: ChatMessage[], signal: AbortSignal): Promise<string> {
    let response: ChatCompletion;
    try {
      response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: messages.map(toParam),
          temperature: this.temperature,
          max_tokens: this.maxTokens
        },
        // retries are owned by CompletionClient
        { signal, maxRetries: 0 }
      );
    } catch (err) {
      throw mapProviderError(err);
    }

    const choice = response.choices[0];
    if (!choice) {
      throw new CompletionUnavailable('provider returned no choices');
    }
    if (choice.finish_reason === 'content_filter' || choice.message.refusal) {
      throw new CompletionRefused(choice.message.refusal ?? 'provider filtered the answer');
    }
    const content = choice.message.content?.trim();
    if (!content) {
      throw new CompletionUnavailable('provider returned an empty answer');
    }
    return content;
  }
}

function toParam(m: ChatMessage): ChatCompletionMessageParam {
  switch (m.role) {
    case 'system':
      return { role: 'system', content: m.content };
    case 'user':
      return { role: 'user', content: m.content };
    case 'assistant':
      return { role: 'assistant', content: m.content };
  }
}

export function mapProviderError(err: unknown): Error {
  if (err instanceof APIConnectionTimeoutError) {
    return new CompletionTimeout('provider request timed out', { cause: err });
  }
  if (err instanceof APIUserAbortError) {
    return new CompletionTimeout('provider request aborted at deadline', { cause: err });
  }
  if (err instanceof APIConnectionError) {
    return new CompletionUnavailable('provider unreachable', { cause: err });
  }
  if (err instanceof APIError) {
    if (err.code === 'content_policy_violation' || err.code === 'content_filter') {
      return new CompletionRefused('provider rejected the request by content policy', { cause: err });
    }
    const status = err.status ?? 0;
    const retryable = status === 0 || status >= 500 || TRANSIENT_STATUS.has(status);
    return new CompletionUnavailable(`provider error ${status || 'unknown'}`, { cause: err, retryable });
  }
  return new CompletionUnavailable(err instanceof Error ? err.message : String(err), { cause: err });
}
