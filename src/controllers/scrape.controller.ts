import { Request, Response } from 'express';
import { ConflictError, describeError, ValidationError } from '../errors/http-error';
import { StoreAccessError } from '../errors/job-errors';
import { mapJobRecordToDto } from '../repositories/mappers/jobRecord.mapper';
import { JobStatusService } from '../services/jobStatus.service';
import { ScrapeJobService } from '../services/scrapeJob.service';
import { logger } from '../utils/logger';

export class ScrapeController {
  constructor(
    private readonly scrapeJobService: ScrapeJobService,
    private readonly jobStatusService: JobStatusService,
  ) {}

  async submitJob(req: Request, res: Response): Promise<void> {
    try {
      const ack = await this.scrapeJobService.submit(req.body);
      res.status(202).json(ack);
    } catch (error) {
      if (error instanceof ValidationError) {
        res.status(400).json({ success: false, error: error.message, details: error.data });
        return;
      }

      if (error instanceof ConflictError) {
        res.status(409).json({ success: false, error: error.message });
        return;
      }

      logger.error('Failed to accept scrape job', { error: describeError(error) });
      const message = error instanceof StoreAccessError ? 'Failed to check existing job status' : 'Failed to accept job';
      res.status(500).json({ success: false, error: message });
    }
  }

  async getJobStatus(req: Request<{ jobId: string }>, res: Response): Promise<void> {
    const { jobId } = req.params;
    const result = await this.jobStatusService.get(jobId);

    switch (result.kind) {
      case 'found':
        logger.debug('Found job record', { jobId, status: result.record.status });
        res.status(200).json(mapJobRecordToDto(result.record));
        return;
      case 'not_found':
        logger.warn('No job record found', { jobId });
        res.status(404).json({ error: 'Job not found' });
        return;
      case 'error':
        logger.error('Failed to retrieve job status', { jobId, error: result.error.message });
        res.status(500).json({ error: 'Failed to retrieve job status due to database error' });
        return;
    }
  }
}
