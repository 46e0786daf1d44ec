import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../errors/job-errors';
import { logger, LogLevel } from './logger';

const ENV_LOADED = Symbol.for('SCRAPE_SERVICE_ENV_LOADED');

export function loadEnv() {
  if ((global as Record<symbol, boolean>)[ENV_LOADED]) {
    return;
  }

  const envFile = path.resolve(process.cwd(), '.env');
  if (fs.existsSync(envFile)) {
    const content = fs.readFileSync(envFile, 'utf-8');
    for (const line of content.split('\n')) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith('#')) continue;
      const [key, ...rest] = trimmed.split('=');
      const value = rest.join('=').trim();
      if (key && !(key in process.env)) {
        process.env[key] = value;
      }
    }
    logger.info('Environment variables loaded from .env');
  }

  (global as Record<symbol, boolean>)[ENV_LOADED] = true;
}

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const serverSchema = z
  .object({
    PORT: positiveInt(4000),
    LOG_LEVEL: z.preprocess(
      (value) => (typeof value === 'string' ? value.toLowerCase() : value),
      z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    ),
    AWS_REGION: optionalString,
    STORE_DRIVER: z.enum(['dynamodb', 'memory']).default('dynamodb'),
    JOB_STATUS_TABLE_NAME: optionalString,
    SECRETS_SOURCE: z.enum(['aws', 'env']).default('aws'),
    BROWSERBASE_API_KEY_SECRET_ARN: optionalString,
    BROWSERBASE_PROJECT_ID_ARN: optionalString,
    SESSION_TIMEOUT_MS: positiveInt(60_000),
    CONNECT_TIMEOUT_MS: positiveInt(60_000),
    NAVIGATION_TIMEOUT_MS: positiveInt(60_000),
    JOB_CONCURRENCY: positiveInt(4),
  })
  .superRefine((env, ctx) => {
    if (env.STORE_DRIVER === 'dynamodb' && !env.JOB_STATUS_TABLE_NAME) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['JOB_STATUS_TABLE_NAME'],
        message: 'JOB_STATUS_TABLE_NAME is required when STORE_DRIVER=dynamodb',
      });
    }
  });

const clientSchema = z.object({
  API_ENDPOINT_URL: z.string().url(),
  API_KEY: optionalString,
  POLL_INTERVAL_MS: positiveInt(2_000),
  MAX_POLL_ATTEMPTS: positiveInt(50),
  STATUS_CHECK_TIMEOUT_MS: positiveInt(20_000),
});

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  awsRegion?: string;
  store: { driver: 'memory' } | { driver: 'dynamodb'; tableName: string };
  secrets: {
    source: 'aws' | 'env';
    apiKeySecretId?: string;
    projectIdSecretId?: string;
  };
  timeouts: {
    sessionMs: number;
    connectMs: number;
    navigationMs: number;
  };
  jobConcurrency: number;
}

export interface ClientConfig {
  endpointUrl: string;
  apiKey?: string;
  pollIntervalMs: number;
  maxPollAttempts: number;
  requestTimeoutMs: number;
}

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: NodeJS.ProcessEnv): z.infer<T> {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration - ${issues}`, parsed.error);
  }
  return parsed.data;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = parseEnv(serverSchema, env);

  return {
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    awsRegion: parsed.AWS_REGION,
    store:
      parsed.STORE_DRIVER === 'dynamodb' && parsed.JOB_STATUS_TABLE_NAME
        ? { driver: 'dynamodb', tableName: parsed.JOB_STATUS_TABLE_NAME }
        : { driver: 'memory' },
    secrets: {
      source: parsed.SECRETS_SOURCE,
      apiKeySecretId: parsed.BROWSERBASE_API_KEY_SECRET_ARN,
      projectIdSecretId: parsed.BROWSERBASE_PROJECT_ID_ARN,
    },
    timeouts: {
      sessionMs: parsed.SESSION_TIMEOUT_MS,
      connectMs: parsed.CONNECT_TIMEOUT_MS,
      navigationMs: parsed.NAVIGATION_TIMEOUT_MS,
    },
    jobConcurrency: parsed.JOB_CONCURRENCY,
  };
}

export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const parsed = parseEnv(clientSchema, env);

  return {
    endpointUrl: parsed.API_ENDPOINT_URL.replace(/\/+$/, ''),
    apiKey: parsed.API_KEY,
    pollIntervalMs: parsed.POLL_INTERVAL_MS,
    maxPollAttempts: parsed.MAX_POLL_ATTEMPTS,
    requestTimeoutMs: parsed.STATUS_CHECK_TIMEOUT_MS,
  };
}
