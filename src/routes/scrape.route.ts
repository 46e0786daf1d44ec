import { Router } from 'express';
import { ScrapeController } from '../controllers/scrape.controller';

export function createScrapeRouter(controller: ScrapeController): Router {
  const router = Router();

  router.post('/', controller.submitJob.bind(controller));
  router.get('/:jobId', controller.getJobStatus.bind(controller));

  return router;
}
