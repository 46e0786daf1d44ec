import { GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import { ConfigurationError } from '../../errors/job-errors';
import { EnvSecretResolver, SecretsManagerResolver } from '../secrets.service';
import { silentLogger } from '../../__tests__/helpers/fakes';

describe('SecretsManagerResolver', () => {
  const secretId = 'arn:aws:secretsmanager:us-east-1:000000000000:secret:scrape/browserbase-api-key';

  it('should read the expected key from the JSON secret string', async () => {
    const send = jest.fn().mockResolvedValue({ SecretString: JSON.stringify({ BROWSERBASE_API_KEY: 'test-secret' }) });
    const resolver = new SecretsManagerResolver({ send }, silentLogger);

    await expect(resolver.resolve({ secretId, key: 'BROWSERBASE_API_KEY' })).resolves.toBe('test-secret');

    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(GetSecretValueCommand);
    expect(command.input).toEqual({ SecretId: secretId });
  });

  it('should reject when no secret reference is configured', async () => {
    const send = jest.fn();
    const resolver = new SecretsManagerResolver({ send }, silentLogger);

    await expect(resolver.resolve({ key: 'BROWSERBASE_API_KEY' })).rejects.toThrow(
      "Secret reference for key 'BROWSERBASE_API_KEY' is not configured",
    );
    expect(send).not.toHaveBeenCalled();
  });

  it('should reject when the key is absent from the secret', async () => {
    const send = jest.fn().mockResolvedValue({ SecretString: JSON.stringify({ OTHER: 'x' }) });
    const resolver = new SecretsManagerResolver({ send }, silentLogger);

    await expect(resolver.resolve({ secretId, key: 'BROWSERBASE_API_KEY' })).rejects.toThrow(
      `Key 'BROWSERBASE_API_KEY' not found in secret ${secretId}`,
    );
  });

  it('should reject secrets that are not JSON', async () => {
    const send = jest.fn().mockResolvedValue({ SecretString: 'plain-text' });
    const resolver = new SecretsManagerResolver({ send }, silentLogger);

    await expect(resolver.resolve({ secretId, key: 'BROWSERBASE_API_KEY' })).rejects.toThrow(
      `Secret ${secretId} is not valid JSON`,
    );
  });

  it('should turn client failures into configuration errors', async () => {
    const send = jest.fn().mockRejectedValue(new Error('ResourceNotFoundException'));
    const resolver = new SecretsManagerResolver({ send }, silentLogger);

    const error = await resolver.resolve({ secretId, key: 'BROWSERBASE_API_KEY' }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ message: `Unable to read secret ${secretId}: ResourceNotFoundException` });
  });
});

describe('EnvSecretResolver', () => {
  it('should read the key as an environment variable', async () => {
    const resolver = new EnvSecretResolver({ BROWSERBASE_PROJECT_ID: ' test-project ' });

    await expect(resolver.resolve({ key: 'BROWSERBASE_PROJECT_ID' })).resolves.toBe('test-project');
  });

  it('should reject blank values', async () => {
    const resolver = new EnvSecretResolver({ BROWSERBASE_PROJECT_ID: '   ' });

    await expect(resolver.resolve({ key: 'BROWSERBASE_PROJECT_ID' })).rejects.toThrow(
      'Environment variable BROWSERBASE_PROJECT_ID is not set',
    );
  });
});
