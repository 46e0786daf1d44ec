import { z } from 'zod';
import { ConflictError, ValidationError } from '../errors/http-error';
import { JobStatusRepository } from '../repositories/jobStatus.repository';
import { ScrapeJobRequest, SubmitAcknowledgement } from '../types/jobs';
import { logger as rootLogger, Logger } from '../utils/logger';
import { JobQueue } from './jobQueue.service';

export const JOB_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

function isHttpUrl(value: string): boolean {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    return false;
  }
  return (parsed.protocol === 'http:' || parsed.protocol === 'https:') && parsed.hostname.length > 0;
}

export const submitSchema = z.object({
  jobId: z
    .string()
    .regex(JOB_ID_PATTERN, 'jobId must be 1-128 characters of letters, digits, ".", "_", ":" or "-"'),
  url: z.string().refine(isHttpUrl, 'url must be an absolute http or https URL'),
});

export interface JobRunner {
  execute(job: ScrapeJobRequest): Promise<unknown>;
}

/** Accepts scrape jobs and hands them to the queue without waiting for them. */
export class ScrapeJobService {
  constructor(
    private readonly queue: JobQueue,
    private readonly runner: JobRunner,
    private readonly repository: JobStatusRepository,
    private readonly log: Logger = rootLogger.child('ScrapeJobService'),
  ) {}

  async submit(input: unknown): Promise<SubmitAcknowledgement> {
    const parsed = submitSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError('Invalid request payload', parsed.error.flatten());
    }

    const job: ScrapeJobRequest = parsed.data;

    if (this.queue.isClaimed(job.jobId) || (await this.repository.get(job.jobId))) {
      throw new ConflictError(`Job ${job.jobId} already exists`);
    }

    if (!this.queue.enqueue({ jobId: job.jobId, run: () => this.runner.execute(job) })) {
      throw new ConflictError(`Job ${job.jobId} already exists`);
    }

    this.log.info('Scrape job accepted', { jobId: job.jobId, url: job.url });

    return {
      jobId: job.jobId,
      status: 'ACCEPTED',
      message: 'Job accepted; poll the status endpoint for progress.',
    };
  }
}
