import {
  GetSecretValueCommand,
  SecretsManagerClient,
} from '@aws-sdk/client-secrets-manager';
import { z } from 'zod';
import { ConfigurationError } from '../errors/job-errors';
import { describeError } from '../errors/http-error';
import { logger as rootLogger, Logger } from '../utils/logger';

export interface SecretReference {
  /** Secret name or ARN; ignored by the environment resolver. */
  secretId?: string;
  /** Key inside the JSON secret string, or the environment variable name. */
  key: string;
}

const secretFieldsSchema = z.record(z.string(), z.unknown());

export interface SecretResolver {
  /** Resolves a non-empty value or throws {@link ConfigurationError}. */
  resolve(reference: SecretReference): Promise<string>;
}

/**
 * Reads JSON secret strings from AWS Secrets Manager, e.g.
 * `{"BROWSERBASE_API_KEY": "..."}`, and returns the requested key.
 */
export class SecretsManagerResolver implements SecretResolver {
  constructor(
    private readonly client: Pick<SecretsManagerClient, 'send'>,
    private readonly log: Logger = rootLogger.child('SecretsManagerResolver'),
  ) {}

  async resolve({ secretId, key }: SecretReference): Promise<string> {
    if (!secretId) {
      throw new ConfigurationError(`Secret reference for key '${key}' is not configured`);
    }

    this.log.info('Retrieving secret', { secretId, key });

    let secretString: string | undefined;
    try {
      const response = await this.client.send(new GetSecretValueCommand({ SecretId: secretId }));
      secretString = response.SecretString;
    } catch (error) {
      throw new ConfigurationError(`Unable to read secret ${secretId}: ${describeError(error)}`, error);
    }

    if (!secretString) {
      throw new ConfigurationError(`Secret ${secretId} has no SecretString`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(secretString);
    } catch (error) {
      throw new ConfigurationError(`Secret ${secretId} is not valid JSON`, error);
    }

    const fields = secretFieldsSchema.safeParse(parsed);
    const value = fields.success ? fields.data[key] : undefined;
    if (typeof value !== 'string' || value.trim().length === 0) {
      throw new ConfigurationError(`Key '${key}' not found in secret ${secretId}`);
    }

    return value;
  }
}

/** Local development resolver: the key names an environment variable. */
export class EnvSecretResolver implements SecretResolver {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async resolve({ key }: SecretReference): Promise<string> {
    const value = this.env[key]?.trim();
    if (!value) {
      throw new ConfigurationError(`Environment variable ${key} is not set`);
    }
    return value;
  }
}
