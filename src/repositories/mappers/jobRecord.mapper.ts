import type { AttributeValue } from '@aws-sdk/client-dynamodb';
import { z } from 'zod';
import { JOB_ERROR_KINDS, JOB_STATUSES, JobRecord, JobRecordDto, statusPhase } from '../../types/jobs';

export type JobItem = Record<string, AttributeValue>;

export class RecordDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RecordDecodeError';
  }
}

/**
 * Numbers are stored as base-10 integer text and read back only if they
 * are safe integers. Fractions, exponents and overflow are rejected.
 */
export function encodeInteger(value: number): AttributeValue {
  if (!Number.isSafeInteger(value)) {
    throw new RecordDecodeError(`Refusing to store non-integer numeric value ${value}`);
  }
  return { N: value.toString(10) };
}

export function decodeInteger(field: string, raw: string): number {
  if (!/^-?\d+$/.test(raw)) {
    throw new RecordDecodeError(`Field ${field} is not an integer: ${raw}`);
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value)) {
    throw new RecordDecodeError(`Field ${field} exceeds the safe integer range: ${raw}`);
  }
  return value;
}

export function mapJobRecordToItem(record: JobRecord): JobItem {
  const item: JobItem = {
    jobId: { S: record.jobId },
    status: { S: record.status },
    phase: encodeInteger(statusPhase(record.status)),
    requestedUrl: { S: record.requestedUrl },
    receivedAt: { S: record.receivedAt },
    lastUpdatedAt: { S: record.lastUpdatedAt },
  };

  if (record.sessionId) item.sessionId = { S: record.sessionId };
  if (record.resultPayload) {
    item.pageTitle = { S: record.resultPayload.pageTitle };
    item.contentLength = encodeInteger(record.resultPayload.contentLength);
  }
  if (record.errorMessage) item.errorMessage = { S: record.errorMessage };
  if (record.errorKind) item.errorKind = { S: record.errorKind };

  return item;
}

function readString(item: JobItem, field: string): string | undefined {
  const value = item[field];
  if (value === undefined) return undefined;
  if (value.S === undefined) {
    throw new RecordDecodeError(`Field ${field} is not a string attribute`);
  }
  return value.S;
}

function requireString(item: JobItem, field: string): string {
  const value = readString(item, field);
  if (value === undefined) {
    throw new RecordDecodeError(`Field ${field} is missing`);
  }
  return value;
}

function readInteger(item: JobItem, field: string): number | undefined {
  const value = item[field];
  if (value === undefined) return undefined;
  if (value.N === undefined) {
    throw new RecordDecodeError(`Field ${field} is not a number attribute`);
  }
  return decodeInteger(field, value.N);
}

export function mapItemToJobRecord(item: JobItem): JobRecord {
  const status = requireString(item, 'status');
  const statusCheck = z.enum(JOB_STATUSES).safeParse(status);
  if (!statusCheck.success) {
    throw new RecordDecodeError(`Unknown job status ${status}`);
  }

  const record: JobRecord = {
    jobId: requireString(item, 'jobId'),
    status: statusCheck.data,
    requestedUrl: requireString(item, 'requestedUrl'),
    receivedAt: requireString(item, 'receivedAt'),
    lastUpdatedAt: requireString(item, 'lastUpdatedAt'),
  };

  const sessionId = readString(item, 'sessionId');
  if (sessionId) record.sessionId = sessionId;

  const pageTitle = readString(item, 'pageTitle');
  const contentLength = readInteger(item, 'contentLength');
  if (pageTitle !== undefined && contentLength !== undefined) {
    record.resultPayload = { pageTitle, contentLength };
  }

  const errorMessage = readString(item, 'errorMessage');
  if (errorMessage) record.errorMessage = errorMessage;

  const errorKind = readString(item, 'errorKind');
  if (errorKind) {
    const kindCheck = z.enum(JOB_ERROR_KINDS).safeParse(errorKind);
    if (kindCheck.success) record.errorKind = kindCheck.data;
  }

  return record;
}

export function mapJobRecordToDto(record: JobRecord): JobRecordDto {
  const dto: JobRecordDto = {
    jobId: record.jobId,
    status: record.status,
    requestedUrl: record.requestedUrl,
    receivedAt: record.receivedAt,
    lastUpdatedAt: record.lastUpdatedAt,
  };

  if (record.sessionId) dto.sessionId = record.sessionId;
  if (record.resultPayload) {
    dto.pageTitle = record.resultPayload.pageTitle;
    dto.contentLength = record.resultPayload.contentLength;
  }
  if (record.errorMessage) dto.errorMessage = record.errorMessage;
  if (record.errorKind) dto.errorKind = record.errorKind;

  return dto;
}
