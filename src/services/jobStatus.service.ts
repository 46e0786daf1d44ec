import { StoreAccessError } from '../errors/job-errors';
import { describeError } from '../errors/http-error';
import { JobStatusRepository } from '../repositories/jobStatus.repository';
import { CheckingStatus, JobRecord } from '../types/jobs';

export type JobStatusResult =
  | { kind: 'found'; record: JobRecord }
  | { kind: 'not_found' }
  | { kind: 'error'; error: StoreAccessError };

export class JobStatusService {
  constructor(private readonly repository: JobStatusRepository) {}

  /** Not-found is an expected result while a job has not been written yet. */
  async get(jobId: string): Promise<JobStatusResult> {
    try {
      const record = await this.repository.get(jobId);
      return record ? { kind: 'found', record } : { kind: 'not_found' };
    } catch (error) {
      return {
        kind: 'error',
        error: error instanceof StoreAccessError ? error : new StoreAccessError(describeError(error), error),
      };
    }
  }
}

/** Collapses a lookup result into one status value; undefined while not found. */
export function toCheckingStatus(result: JobStatusResult): CheckingStatus | undefined {
  switch (result.kind) {
    case 'found':
      return result.record.status;
    case 'not_found':
      return undefined;
    case 'error':
      return 'ERROR_CHECKING';
  }
}
