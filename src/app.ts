import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { ScrapeController } from './controllers/scrape.controller';
import { createScrapeRouter } from './routes/scrape.route';
import { JobStatusService } from './services/jobStatus.service';
import { ScrapeJobService } from './services/scrapeJob.service';
import { describeError, getErrorStatus } from './errors/http-error';
import { logger } from './utils/logger';

export interface ServerDependencies {
  scrapeJobService: ScrapeJobService;
  jobStatusService: JobStatusService;
}

export function createServer({ scrapeJobService, jobStatusService }: ServerDependencies) {
  const app = express();

  app.use(cors({
    origin: true,
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'x-api-key'],
  }));

  app.use(express.json({ limit: '1mb' }));

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', uptime: process.uptime() });
  });

  app.use('/api/scrape', createScrapeRouter(new ScrapeController(scrapeJobService, jobStatusService)));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    // body-parser errors carry their own 4xx status
    const status = getErrorStatus(err);
    if (status !== undefined && status >= 400 && status < 500) {
      res.status(status).json({ success: false, error: status === 400 ? 'Invalid JSON body' : describeError(err) });
      return;
    }
    logger.error('Unhandled error', err);
    res.status(500).json({ success: false, error: 'Internal server error' });
  });

  return app;
}
