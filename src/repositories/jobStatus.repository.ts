import {
  DynamoDBClient,
  GetItemCommand,
  PutItemCommand,
} from '@aws-sdk/client-dynamodb';
import { StoreAccessError, TransitionRejectedError } from '../errors/job-errors';
import { describeError } from '../errors/http-error';
import { JobRecord, statusPhase } from '../types/jobs';
import { logger as rootLogger, Logger } from '../utils/logger';
import {
  JobItem,
  mapItemToJobRecord,
  mapJobRecordToItem,
} from './mappers/jobRecord.mapper';

/**
 * Durable job status record keyed by jobId. `put` is an upsert that only
 * moves a job forward (PENDING < RUNNING < terminal); anything else is
 * rejected with {@link TransitionRejectedError}.
 */
export interface JobStatusRepository {
  get(jobId: string): Promise<JobRecord | undefined>;
  put(record: JobRecord): Promise<void>;
}

export class DynamoJobStatusRepository implements JobStatusRepository {
  constructor(
    private readonly client: Pick<DynamoDBClient, 'send'>,
    private readonly tableName: string,
    private readonly log: Logger = rootLogger.child('JobStatusRepository'),
  ) {}

  async get(jobId: string): Promise<JobRecord | undefined> {
    let item: JobItem | undefined;
    try {
      const response = await this.client.send(
        new GetItemCommand({
          TableName: this.tableName,
          Key: { jobId: { S: jobId } },
          ConsistentRead: true,
        }),
      );
      item = response.Item;
    } catch (error) {
      this.log.error('Failed to read job status', { jobId, error: describeError(error) });
      throw new StoreAccessError(`Failed to read job ${jobId}: ${describeError(error)}`, error);
    }

    if (!item) {
      return undefined;
    }

    try {
      return mapItemToJobRecord(item);
    } catch (error) {
      this.log.error('Stored job record is malformed', { jobId, error: describeError(error) });
      throw new StoreAccessError(`Stored record for job ${jobId} is malformed: ${describeError(error)}`, error);
    }
  }

  async put(record: JobRecord): Promise<void> {
    const item = mapJobRecordToItem(record);

    try {
      await this.client.send(
        new PutItemCommand({
          TableName: this.tableName,
          Item: item,
          ConditionExpression: 'attribute_not_exists(jobId) OR #phase < :phase',
          ExpressionAttributeNames: { '#phase': 'phase' },
          ExpressionAttributeValues: { ':phase': { N: String(statusPhase(record.status)) } },
        }),
      );
      this.log.debug('Job status written', { jobId: record.jobId, status: record.status });
    } catch (error) {
      if (error instanceof Error && error.name === 'ConditionalCheckFailedException') {
        throw new TransitionRejectedError(record.jobId, record.status);
      }
      throw new StoreAccessError(`Failed to write job ${record.jobId}: ${describeError(error)}`, error);
    }
  }
}

/** Same contract as the DynamoDB table, held in process memory. */
export class InMemoryJobStatusRepository implements JobStatusRepository {
  private readonly records = new Map<string, JobRecord>();

  async get(jobId: string): Promise<JobRecord | undefined> {
    const record = this.records.get(jobId);
    return record ? structuredClone(record) : undefined;
  }

  async put(record: JobRecord): Promise<void> {
    const existing = this.records.get(record.jobId);
    if (existing && statusPhase(existing.status) >= statusPhase(record.status)) {
      throw new TransitionRejectedError(record.jobId, record.status);
    }
    this.records.set(record.jobId, structuredClone(record));
  }

  size(): number {
    return this.records.size;
  }
}
