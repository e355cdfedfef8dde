export type ErrorKind =
  | 'TranscriptionFailed'
  | 'KnowledgeUnavailable'
  | 'ReloadFailed'
  | 'CompletionUnavailable'
  | 'CompletionTimeout'
  | 'CompletionRefused'
  | 'StorageUnavailable'
  | 'EmptyMessage'
  | 'Unexpected';

export abstract class AssistantError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TranscriptionFailed extends AssistantError {
  readonly kind = 'TranscriptionFailed';
}

export class KnowledgeUnavailable extends AssistantError {
  readonly kind = 'KnowledgeUnavailable';
}

export class ReloadFailed extends AssistantError {
  readonly kind = 'ReloadFailed';
}

export class CompletionUnavailable extends AssistantError {
  readonly kind = 'CompletionUnavailable';
  // auth and malformed-request failures will not get better on a second try
  readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown; retryable?: boolean }) {
    super(message, options);
    this.retryable = options?.retryable ?? true;
  }
}

export class CompletionTimeout extends AssistantError {
  readonly kind = 'CompletionTimeout';
}

export class CompletionRefused extends AssistantError {
  readonly kind = 'CompletionRefused';
}

export class StorageUnavailable extends AssistantError {
  readonly kind = 'StorageUnavailable';
}

export function errorKindOf(err: unknown): ErrorKind {
  return err instanceof AssistantError ? err.kind : 'Unexpected';
}

/** Operator-facing rendering: precise, unlike the fixed customer replies. */
export function describeError(err: unknown): string {
  if (err instanceof AssistantError) {
    const cause = err.cause instanceof Error ? ` (${err.cause.message})` : '';
    return `${err.kind}: ${err.message}${cause}`;
  }
  return err instanceof Error ? err.message : String(err);
}
