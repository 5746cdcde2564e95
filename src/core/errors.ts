export type VocabularyBotErrorCode =
  | 'CONFIG_INVALID'
  | 'SOURCE_UNAVAILABLE'
  | 'DELIVERY_FAILED'
  | 'STORAGE_UNAVAILABLE'
  | 'NO_WORDS_AVAILABLE'
  | 'WORKFLOW_BUSY';

export abstract class VocabularyBotError extends Error {
  abstract readonly code: VocabularyBotErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigInvalidError extends VocabularyBotError {
  readonly code = 'CONFIG_INVALID';

  constructor(public readonly errors: string[]) {
    super(`Configuration is invalid: ${errors.join('; ')}`);
  }
}

// Recovered inside the word source; callers never see it.
export class SourceUnavailableError extends VocabularyBotError {
  readonly code = 'SOURCE_UNAVAILABLE';

  constructor(public readonly term: string, reason: string, options?: { cause?: unknown }) {
    super(`Dictionary lookup failed for '${term}': ${reason}`, options);
  }
}

export class DeliveryFailedError extends VocabularyBotError {
  readonly code = 'DELIVERY_FAILED';

  constructor(public readonly transport: string, reason: string, options?: { cause?: unknown }) {
    super(`Email delivery via ${transport} failed: ${reason}`, options);
  }
}

export class StorageUnavailableError extends VocabularyBotError {
  readonly code = 'STORAGE_UNAVAILABLE';

  constructor(public readonly operation: string, options?: { cause?: unknown }) {
    super(`Word store unavailable during ${operation}${describeCause(options?.cause)}`, options);
  }
}

export class NoWordsAvailableError extends VocabularyBotError {
  readonly code = 'NO_WORDS_AVAILABLE';

  constructor() {
    super('No new words available; every candidate has already been sent');
  }
}

export class WorkflowBusyError extends VocabularyBotError {
  readonly code = 'WORKFLOW_BUSY';

  constructor() {
    super('A send is already in progress');
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function describeCause(cause: unknown): string {
  return cause === undefined ? '' : `: ${errorMessage(cause)}`;
}
