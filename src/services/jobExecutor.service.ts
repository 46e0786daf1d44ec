import { describeError } from '../errors/http-error';
import { JobStatusRepository } from '../repositories/jobStatus.repository';
import { JobRecord, ScrapeJobRequest } from '../types/jobs';
import { logger as rootLogger, Logger } from '../utils/logger';
import { AutomationDriver } from '../utils/playwright';
import { withTimeout } from '../utils/timeout';
import {
  attempt,
  classifyFailure,
  failed,
  JobOutcome,
  resolveTerminal,
  succeeded,
} from './jobOutcome';
import { SessionLifecycle, SessionScope } from './sessionScope';

export interface JobExecutorOptions {
  repository: JobStatusRepository;
  sessions: SessionLifecycle;
  driver: AutomationDriver;
  timeouts: {
    /** Bounds the connection and page discovery. */
    connectMs: number;
    /** Bounds navigation and content extraction. */
    navigationMs: number;
  };
  clock?: () => Date;
  logger?: Logger;
}

/**
 * Runs one scrape job to a terminal state:
 *
 *   PENDING write -> acquire session -> RUNNING write -> connect -> page
 *   -> navigate -> extract -> terminal write -> cleanup
 *
 * Every step yields a StepResult; the terminal record is derived from the
 * captured outcome. The terminal write always precedes cleanup, and
 * `execute` never rejects.
 */
export class JobExecutor {
  private readonly log: Logger;
  private readonly clock: () => Date;

  constructor(private readonly options: JobExecutorOptions) {
    this.log = options.logger ?? rootLogger.child('JobExecutor');
    this.clock = options.clock ?? (() => new Date());
  }

  async execute(job: ScrapeJobRequest): Promise<JobRecord> {
    const receivedAt = this.timestamp();
    let record: JobRecord = {
      jobId: job.jobId,
      status: 'PENDING',
      requestedUrl: job.url,
      receivedAt,
      lastUpdatedAt: receivedAt,
    };
    await this.commit(record);

    const scope = new SessionScope(this.options.sessions, this.log);
    try {
      let outcome: JobOutcome;
      try {
        outcome = await this.drive(scope, job.url, async (sessionId) => {
          record = { ...record, status: 'RUNNING', sessionId, lastUpdatedAt: this.timestamp(record.lastUpdatedAt) };
          await this.commit(record);
        });
      } catch (error) {
        outcome = failed(classifyFailure(error));
      }

      record = resolveTerminal(record, outcome, this.timestamp(record.lastUpdatedAt));
      await this.commit(record);

      this.log.info('Scrape job finished', {
        jobId: record.jobId,
        status: record.status,
        sessionId: record.sessionId,
        errorKind: record.errorKind,
      });
      return record;
    } finally {
      await scope.dispose();
    }
  }

  private async drive(
    scope: SessionScope,
    url: string,
    onAcquired: (sessionId: string) => Promise<void>,
  ): Promise<JobOutcome> {
    const { driver, timeouts } = this.options;

    const session = await attempt(() => scope.acquire());
    if (!session.ok) return failed(session.failure);
    await onAcquired(session.value.sessionId);

    const connection = await attempt(() => scope.connect(driver, timeouts.connectMs));
    if (!connection.ok) return failed(connection.failure);
    const browser = connection.value;

    const page = await attempt(() => withTimeout('Page discovery', timeouts.connectMs, () => browser.openPage()));
    if (!page.ok) return failed(page.failure);

    this.log.info('Navigating', { sessionId: session.value.sessionId, url });
    const navigated = await attempt(() =>
      withTimeout(`Navigation to ${url}`, timeouts.navigationMs, () => browser.navigate(url, timeouts.navigationMs)),
    );
    if (!navigated.ok) return failed(navigated.failure);

    const extracted = await attempt(() =>
      withTimeout('Content extraction', timeouts.navigationMs, async () => ({
        pageTitle: await browser.title(),
        contentLength: await browser.contentLength(),
      })),
    );
    if (!extracted.ok) return failed(extracted.failure);

    this.log.debug('Page extracted', { url, ...extracted.value });
    return succeeded(extracted.value);
  }

  /** Store failures are logged; the executor keeps going so a terminal write is still attempted. */
  private async commit(record: JobRecord): Promise<void> {
    try {
      await this.options.repository.put(record);
      this.log.info('Job status updated', { jobId: record.jobId, status: record.status });
    } catch (error) {
      this.log.error('Failed to write job status', {
        jobId: record.jobId,
        status: record.status,
        error: describeError(error),
      });
    }
  }

  private timestamp(previous?: string): string {
    const now = this.clock().toISOString();
    return previous && now < previous ? previous : now;
  }
}
