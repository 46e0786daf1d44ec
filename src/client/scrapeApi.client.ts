import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { HttpError, describeError } from '../errors/http-error';
import { SubmitAcknowledgement } from '../types/jobs';
import { jobRecordDtoSchema } from './jobRecordDto.schema';
import { StatusObservation, StatusQuery } from './jobPoller';

export interface ScrapeApiClientOptions {
  /** Submission endpoint, e.g. https://host/api/scrape; status lives at `<endpoint>/<jobId>`. */
  endpointUrl: string;
  apiKey?: string;
  requestTimeoutMs?: number;
}

const DEFAULT_STATUS_TIMEOUT_MS = 20_000;

function isTimeout(error: unknown): boolean {
  return axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT');
}

export class ScrapeApiClient {
  private readonly http: AxiosInstance;
  private readonly endpointUrl: string;
  private readonly requestTimeoutMs: number;
  private readonly apiKey?: string;

  constructor(options: ScrapeApiClientOptions) {
    this.endpointUrl = options.endpointUrl.replace(/\/+$/, '');
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_STATUS_TIMEOUT_MS;
    this.apiKey = options.apiKey;
    this.http = axios.create({
      headers: options.apiKey ? { 'x-api-key': options.apiKey } : {},
      validateStatus: () => true,
    });
  }

  statusUrl(jobId: string): string {
    return `${this.endpointUrl}/${encodeURIComponent(jobId)}`;
  }

  /** Shell command for checking a job's status by hand. */
  statusCommand(jobId: string): string {
    const header = this.apiKey ? ` -H "x-api-key: ${this.apiKey}"` : '';
    return `curl${header} "${this.statusUrl(jobId)}"`;
  }

  /** Submits a job; anything but 202 is an {@link HttpError}. */
  async submit(jobId: string, url: string): Promise<SubmitAcknowledgement> {
    const response = await this.http.post<SubmitAcknowledgement>(
      this.endpointUrl,
      { jobId, url },
      { timeout: this.requestTimeoutMs },
    );

    if (response.status !== 202) {
      throw new HttpError(`Job submission returned status ${response.status}`, response.status, response.data);
    }
    return response.data;
  }

  async getStatus(jobId: string, signal?: AbortSignal): Promise<StatusObservation> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(this.statusUrl(jobId), {
        timeout: this.requestTimeoutMs,
        signal,
      });
    } catch (error) {
      if (axios.isCancel(error)) throw error;
      if (isTimeout(error)) {
        return { kind: 'transient', reason: `Status request timed out after ${this.requestTimeoutMs}ms` };
      }
      return { kind: 'error_checking', error: `Network error: ${describeError(error)}` };
    }

    if (response.status === 404) {
      return { kind: 'not_found' };
    }
    if (response.status !== 200) {
      return { kind: 'error_checking', error: `Status request returned HTTP ${response.status}` };
    }

    const parsed = jobRecordDtoSchema.safeParse(response.data);
    if (!parsed.success) {
      return { kind: 'error_checking', error: 'Invalid JSON response' };
    }
    return { kind: 'found', record: parsed.data };
  }

  /** Adapter for {@link JobPoller}. */
  asStatusQuery(): StatusQuery {
    return (jobId, signal) => this.getStatus(jobId, signal);
  }
}
