export const JOB_STATUSES = ['PENDING', 'RUNNING', 'SUCCESS', 'FAILED'] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export type TerminalJobStatus = Extract<JobStatus, 'SUCCESS' | 'FAILED'>;

/** Client-side pseudo-status for "the status lookup itself failed". */
export type CheckingStatus = JobStatus | 'ERROR_CHECKING';

export const JOB_ERROR_KINDS = ['CONFIGURATION', 'PROVIDER', 'TIMEOUT', 'UNEXPECTED'] as const;

export type JobErrorKind = (typeof JOB_ERROR_KINDS)[number];

export const TERMINAL_STATUSES: readonly TerminalJobStatus[] = ['SUCCESS', 'FAILED'];

export function isTerminalStatus(status: string): status is TerminalJobStatus {
  return status === 'SUCCESS' || status === 'FAILED';
}

/** Ordinal used to keep stored status transitions forward-only. */
export function statusPhase(status: JobStatus): number {
  switch (status) {
    case 'PENDING':
      return 0;
    case 'RUNNING':
      return 1;
    case 'SUCCESS':
    case 'FAILED':
      return 2;
  }
}

export interface ScrapeResultPayload {
  pageTitle: string;
  contentLength: number;
}

export interface JobRecord {
  jobId: string;
  status: JobStatus;
  requestedUrl: string;
  receivedAt: string;
  lastUpdatedAt: string;
  sessionId?: string;
  resultPayload?: ScrapeResultPayload;
  errorMessage?: string;
  errorKind?: JobErrorKind;
}

export interface ScrapeJobRequest {
  jobId: string;
  url: string;
}

/** JSON shape of a Job Record on the wire; result fields are flattened. */
export interface JobRecordDto {
  jobId: string;
  status: JobStatus;
  requestedUrl: string;
  receivedAt: string;
  lastUpdatedAt: string;
  sessionId?: string;
  pageTitle?: string;
  contentLength?: number;
  errorMessage?: string;
  errorKind?: JobErrorKind;
}

export interface SubmitAcknowledgement {
  jobId: string;
  status: 'ACCEPTED';
  message: string;
}
