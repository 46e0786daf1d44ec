import { ConfigurationError, JobError, ProviderError } from '../errors/job-errors';
import { describeError } from '../errors/http-error';
import { logger as rootLogger, Logger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';
import { SecretReference, SecretResolver } from './secrets.service';
import { RemoteSessionProvider, RemoteSessionProviderFactory } from './browserbase.provider';

export interface SessionHandle {
  sessionId: string;
  connectUrl: string;
}

export interface SessionCredentialRefs {
  apiKey: SecretReference;
  projectId: SecretReference;
}

export interface RemoteSessionManagerOptions {
  secrets: SecretResolver;
  credentials: SessionCredentialRefs;
  createProvider: RemoteSessionProviderFactory;
  acquireTimeoutMs: number;
  logger?: Logger;
}

interface ActiveSession {
  provider: RemoteSessionProvider;
  projectId: string;
}

/**
 * Acquires and tears down remote browser sessions. Failures are translated
 * into {@link ConfigurationError}, {@link ProviderError} or a timeout.
 */
export class RemoteSessionManager {
  private readonly log: Logger;
  private readonly active = new Map<string, ActiveSession>();

  constructor(private readonly options: RemoteSessionManagerOptions) {
    this.log = options.logger ?? rootLogger.child('RemoteSessionManager');
  }

  async acquire(): Promise<SessionHandle> {
    const { secrets, credentials, createProvider, acquireTimeoutMs } = this.options;

    let apiKey: string;
    let projectId: string;
    try {
      [apiKey, projectId] = await Promise.all([
        secrets.resolve(credentials.apiKey),
        secrets.resolve(credentials.projectId),
      ]);
    } catch (error) {
      if (error instanceof ConfigurationError) throw error;
      throw new ConfigurationError(`Failed to resolve session credentials: ${describeError(error)}`, error);
    }

    let provider: RemoteSessionProvider;
    try {
      provider = createProvider(apiKey);
    } catch (error) {
      throw new ConfigurationError(`Unable to initialise session provider: ${describeError(error)}`, error);
    }

    this.log.info('Creating remote browser session', { projectId });

    try {
      const session = await withTimeout(
        'Remote session creation',
        acquireTimeoutMs,
        () => provider.create(projectId),
        (late) => this.releaseOrphan(provider, projectId, late.id),
      );
      if (!session.id || !session.connectUrl) {
        throw new ProviderError('Provider returned a session without id or connect URL');
      }

      this.active.set(session.id, { provider, projectId });
      this.log.info('Remote session created', { sessionId: session.id });
      return { sessionId: session.id, connectUrl: session.connectUrl };
    } catch (error) {
      if (error instanceof JobError) {
        throw error;
      }
      throw new ProviderError(`Remote session creation failed: ${describeError(error)}`, undefined, error);
    }
  }

  /** Never rejects; a handle that is unknown or already released is a no-op. */
  async release(handle: SessionHandle | undefined): Promise<void> {
    if (!handle) {
      return;
    }

    const session = this.active.get(handle.sessionId);
    if (!session) {
      this.log.debug('Release skipped for unknown session', { sessionId: handle.sessionId });
      return;
    }
    this.active.delete(handle.sessionId);

    try {
      await session.provider.release(handle.sessionId, session.projectId);
      this.log.info('Remote session released', { sessionId: handle.sessionId });
    } catch (error) {
      this.log.warn('Failed to release remote session', {
        sessionId: handle.sessionId,
        error: describeError(error),
      });
    }
  }

  private async releaseOrphan(provider: RemoteSessionProvider, projectId: string, sessionId: string): Promise<void> {
    this.log.warn('Releasing session created after acquire timed out', { sessionId });
    try {
      await provider.release(sessionId, projectId);
    } catch (error) {
      this.log.warn('Failed to release orphaned session', { sessionId, error: describeError(error) });
    }
  }

  activeSessionCount(): number {
    return this.active.size;
  }
}
