import { describeError } from '../errors/http-error';
import type { JobStatusService } from '../services/jobStatus.service';
import { mapJobRecordToDto } from '../repositories/mappers/jobRecord.mapper';
import { isTerminalStatus, JobRecordDto, JobStatus, statusPhase } from '../types/jobs';
import { logger as rootLogger, Logger } from '../utils/logger';
import { sleep } from '../utils/timeout';

export type StatusObservation =
  | { kind: 'found'; record: JobRecordDto }
  | { kind: 'not_found' }
  /** the lookup did not answer in time; worth asking again */
  | { kind: 'transient'; reason: string }
  | { kind: 'error_checking'; error: string };

export type StatusQuery = (jobId: string, signal?: AbortSignal) => Promise<StatusObservation>;

export type PollResult =
  | { outcome: 'terminal'; record: JobRecordDto; attempts: number }
  | { outcome: 'error_checking'; error: string; attempts: number }
  | { outcome: 'budget_exhausted'; attempts: number; lastStatus?: JobStatus }
  | { outcome: 'aborted'; attempts: number };

export interface PollOptions {
  intervalMs?: number;
  maxAttempts?: number;
  signal?: AbortSignal;
  onAttempt?: (attempt: number, observation: StatusObservation) => void;
}

export type Wait = (ms: number, signal?: AbortSignal) => Promise<void>;

export const DEFAULT_POLL_INTERVAL_MS = 2_000;
export const DEFAULT_MAX_POLL_ATTEMPTS = 50;

/**
 * Polls a job until it reaches SUCCESS or FAILED, the status check itself
 * fails, or the attempt budget runs out. Not-found and transient misses
 * keep polling. Exhausting the budget says nothing about the job itself:
 * it may still finish, so callers can poll again with the same jobId.
 */
export class JobPoller {
  constructor(
    private readonly query: StatusQuery,
    private readonly wait: Wait = sleep,
    private readonly log: Logger = rootLogger.child('JobPoller'),
  ) {}

  async poll(jobId: string, options: PollOptions = {}): Promise<PollResult> {
    const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_POLL_ATTEMPTS;
    const { signal, onAttempt } = options;

    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }
    if (!Number.isFinite(intervalMs) || intervalMs < 0) {
      throw new RangeError(`intervalMs must be a non-negative number, got ${intervalMs}`);
    }

    let lastStatus: JobStatus | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const completed = attempt - 1;

      if (attempt > 1) {
        try {
          await this.wait(intervalMs, signal);
        } catch (error) {
          if (signal?.aborted) return { outcome: 'aborted', attempts: completed };
          throw error;
        }
      }
      if (signal?.aborted) return { outcome: 'aborted', attempts: completed };

      let observation: StatusObservation;
      try {
        observation = await this.query(jobId, signal);
      } catch (error) {
        if (signal?.aborted) return { outcome: 'aborted', attempts: completed };
        observation = { kind: 'error_checking', error: describeError(error) };
      }

      onAttempt?.(attempt, observation);

      switch (observation.kind) {
        case 'found': {
          const { status } = observation.record;
          if (lastStatus && statusPhase(status) < statusPhase(lastStatus)) {
            this.log.warn('Ignoring stale status read', { jobId, status, lastStatus });
            break;
          }
          lastStatus = status;
          this.log.debug(`Polling attempt ${attempt}/${maxAttempts}: status ${status}`, { jobId });
          if (isTerminalStatus(status)) {
            return { outcome: 'terminal', record: observation.record, attempts: attempt };
          }
          break;
        }
        case 'not_found':
        case 'transient':
          this.log.debug(`Polling attempt ${attempt}/${maxAttempts}: no status yet`, { jobId, kind: observation.kind });
          break;
        case 'error_checking':
          return { outcome: 'error_checking', error: observation.error, attempts: attempt };
      }
    }

    return { outcome: 'budget_exhausted', attempts: maxAttempts, lastStatus };
  }
}

/** Status query backed directly by the status service, for in-process callers. */
export function statusServiceQuery(service: Pick<JobStatusService, 'get'>): StatusQuery {
  return async (jobId) => {
    const result = await service.get(jobId);
    switch (result.kind) {
      case 'found':
        return { kind: 'found', record: mapJobRecordToDto(result.record) };
      case 'not_found':
        return { kind: 'not_found' };
      case 'error':
        return { kind: 'error_checking', error: result.error.message };
    }
  };
}
