import { JobErrorKind } from '../types/jobs';

/** Failures that end a job; `kind` selects the message prefix and `errorKind` field. */
export abstract class JobError extends Error {
  abstract readonly kind: JobErrorKind;

  constructor(message: string, readonly cause?: unknown) {
    super(message);
  }
}

/** Missing or unusable credentials or identifiers. Not retryable. */
export class ConfigurationError extends JobError {
  readonly kind = 'CONFIGURATION';

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'ConfigurationError';
  }
}

export class ProviderError extends JobError {
  readonly kind = 'PROVIDER';

  constructor(
    message: string,
    readonly statusCode?: number,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = 'ProviderError';
  }
}

export class JobTimeoutError extends JobError {
  readonly kind = 'TIMEOUT';

  constructor(
    readonly operation: string,
    readonly timeoutMs: number,
    cause?: unknown,
  ) {
    super(`${operation} exceeded ${timeoutMs}ms`, cause);
    this.name = 'JobTimeoutError';
  }
}

export class StoreAccessError extends Error {
  constructor(message: string, readonly cause?: unknown) {
    super(message);
    this.name = 'StoreAccessError';
  }
}

/** The store refused a write that would move a job backwards or re-terminate it. */
export class TransitionRejectedError extends Error {
  constructor(readonly jobId: string, readonly attemptedStatus: string) {
    super(`Status write ${attemptedStatus} rejected for job ${jobId}`);
    this.name = 'TransitionRejectedError';
  }
}

const KIND_PREFIX: Record<JobErrorKind, string> = {
  CONFIGURATION: 'Configuration error',
  PROVIDER: 'Provider error',
  TIMEOUT: 'Timeout error',
  UNEXPECTED: 'Unexpected error',
};

export function formatFailureMessage(kind: JobErrorKind, detail: string): string {
  return `${KIND_PREFIX[kind]}: ${detail}`;
}
