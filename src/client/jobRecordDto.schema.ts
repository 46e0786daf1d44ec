import { z } from 'zod';
import { JOB_ERROR_KINDS, JOB_STATUSES } from '../types/jobs';

/** Shape of a status response body as served by `GET /api/scrape/:jobId`. */
export const jobRecordDtoSchema = z.object({
  jobId: z.string().min(1),
  status: z.enum(JOB_STATUSES),
  requestedUrl: z.string(),
  receivedAt: z.string(),
  lastUpdatedAt: z.string(),
  sessionId: z.string().optional(),
  pageTitle: z.string().optional(),
  contentLength: z.number().int().nonnegative().optional(),
  errorMessage: z.string().optional(),
  errorKind: z.enum(JOB_ERROR_KINDS).optional(),
});
