import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import {
  DynamoJobStatusRepository,
  InMemoryJobStatusRepository,
  JobStatusRepository,
} from './repositories/jobStatus.repository';
import { createBrowserbaseProvider, RemoteSessionProviderFactory } from './services/browserbase.provider';
import { JobExecutor } from './services/jobExecutor.service';
import { JobQueue } from './services/jobQueue.service';
import { JobStatusService } from './services/jobStatus.service';
import { ScrapeJobService } from './services/scrapeJob.service';
import { EnvSecretResolver, SecretResolver, SecretsManagerResolver } from './services/secrets.service';
import { RemoteSessionManager } from './services/session.service';
import { AppConfig } from './utils/env';
import { AutomationDriver, PlaywrightDriver } from './utils/playwright';

export interface Container {
  repository: JobStatusRepository;
  queue: JobQueue;
  executor: JobExecutor;
  scrapeJobService: ScrapeJobService;
  jobStatusService: JobStatusService;
}

/** Collaborators that tests or alternative deployments swap out. */
export interface ContainerOverrides {
  repository?: JobStatusRepository;
  secrets?: SecretResolver;
  createProvider?: RemoteSessionProviderFactory;
  driver?: AutomationDriver;
}

function createRepository(config: AppConfig): JobStatusRepository {
  if (config.store.driver === 'memory') {
    return new InMemoryJobStatusRepository();
  }
  return new DynamoJobStatusRepository(
    new DynamoDBClient({ region: config.awsRegion }),
    config.store.tableName,
  );
}

function createSecrets(config: AppConfig): SecretResolver {
  return config.secrets.source === 'env'
    ? new EnvSecretResolver()
    : new SecretsManagerResolver(new SecretsManagerClient({ region: config.awsRegion }));
}

export function createContainer(config: AppConfig, overrides: ContainerOverrides = {}): Container {
  const repository = overrides.repository ?? createRepository(config);

  const sessions = new RemoteSessionManager({
    secrets: overrides.secrets ?? createSecrets(config),
    credentials: {
      apiKey: { secretId: config.secrets.apiKeySecretId, key: 'BROWSERBASE_API_KEY' },
      projectId: { secretId: config.secrets.projectIdSecretId, key: 'BROWSERBASE_PROJECT_ID' },
    },
    createProvider: overrides.createProvider ?? createBrowserbaseProvider,
    acquireTimeoutMs: config.timeouts.sessionMs,
  });

  const executor = new JobExecutor({
    repository,
    sessions,
    driver: overrides.driver ?? new PlaywrightDriver(),
    timeouts: {
      connectMs: config.timeouts.connectMs,
      navigationMs: config.timeouts.navigationMs,
    },
  });

  const queue = new JobQueue(config.jobConcurrency);

  return {
    repository,
    queue,
    executor,
    scrapeJobService: new ScrapeJobService(queue, executor, repository),
    jobStatusService: new JobStatusService(repository),
  };
}
