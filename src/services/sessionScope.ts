import { describeError } from '../errors/http-error';
import { AutomationConnection, AutomationDriver } from '../utils/playwright';
import { Logger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';
import type { SessionHandle } from './session.service';

export interface SessionLifecycle {
  acquire(): Promise<SessionHandle>;
  release(handle: SessionHandle | undefined): Promise<void>;
}

/**
 * Holds the remote session and automation connection of one job run.
 * `dispose` closes the connection and releases the session exactly once.
 */
export class SessionScope {
  private handle?: SessionHandle;
  private connection?: AutomationConnection;
  private disposed = false;

  constructor(
    private readonly sessions: SessionLifecycle,
    private readonly log: Logger,
  ) {}

  get sessionId(): string | undefined {
    return this.handle?.sessionId;
  }

  async acquire(): Promise<SessionHandle> {
    if (this.disposed) {
      throw new Error('Session scope already disposed');
    }
    this.handle = await this.sessions.acquire();
    return this.handle;
  }

  async connect(driver: AutomationDriver, timeoutMs: number): Promise<AutomationConnection> {
    if (!this.handle) {
      throw new Error('Cannot connect before a session is acquired');
    }
    const endpoint = this.handle.connectUrl;
    this.connection = await withTimeout(
      'Browser connection',
      timeoutMs,
      () => driver.connect(endpoint, timeoutMs),
      (late) => this.closeConnection(late),
    );
    return this.connection;
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;

    if (this.connection) {
      await this.closeConnection(this.connection);
      this.connection = undefined;
    }

    if (this.handle) {
      try {
        await this.sessions.release(this.handle);
      } catch (error) {
        this.log.error('Session release failed', { sessionId: this.handle.sessionId, error: describeError(error) });
      }
    }
  }

  private async closeConnection(connection: AutomationConnection): Promise<void> {
    try {
      await connection.close();
    } catch (error) {
      this.log.warn('Failed to close automation connection', {
        sessionId: this.sessionId,
        error: describeError(error),
      });
    }
  }
}
