import { formatFailureMessage, JobError } from '../errors/job-errors';
import { describeError } from '../errors/http-error';
import { JobErrorKind, JobRecord, ScrapeResultPayload } from '../types/jobs';

export interface JobFailure {
  kind: JobErrorKind;
  message: string;
}

export type StepResult<T> = { ok: true; value: T } | { ok: false; failure: JobFailure };

export type JobOutcome =
  | { outcome: 'SUCCESS'; data: ScrapeResultPayload }
  | { outcome: 'FAILED'; failure: JobFailure };

export function classifyFailure(error: unknown): JobFailure {
  if (error instanceof JobError) {
    return { kind: error.kind, message: error.message };
  }
  return { kind: 'UNEXPECTED', message: describeError(error) };
}

/** Runs one executor step and captures its result instead of throwing. */
export async function attempt<T>(step: () => Promise<T>): Promise<StepResult<T>> {
  try {
    return { ok: true, value: await step() };
  } catch (error) {
    return { ok: false, failure: classifyFailure(error) };
  }
}

export function succeeded(data: ScrapeResultPayload): JobOutcome {
  return { outcome: 'SUCCESS', data };
}

export function failed(failure: JobFailure): JobOutcome {
  return { outcome: 'FAILED', failure };
}

/**
 * Builds the terminal record from the last written record and the captured
 * outcome. Identity fields are carried over; result and error never coexist.
 */
export function resolveTerminal(current: JobRecord, outcome: JobOutcome, updatedAt: string): JobRecord {
  const base: JobRecord = {
    jobId: current.jobId,
    status: current.status,
    requestedUrl: current.requestedUrl,
    receivedAt: current.receivedAt,
    lastUpdatedAt: updatedAt,
  };
  if (current.sessionId) base.sessionId = current.sessionId;

  if (outcome.outcome === 'SUCCESS') {
    return { ...base, status: 'SUCCESS', resultPayload: { ...outcome.data } };
  }

  return {
    ...base,
    status: 'FAILED',
    errorKind: outcome.failure.kind,
    errorMessage: formatFailureMessage(outcome.failure.kind, outcome.failure.message),
  };
}
