import Browserbase from '@browserbasehq/sdk';
import { ProviderError } from '../errors/job-errors';
import { describeError } from '../errors/http-error';

export interface RemoteSession {
  id: string;
  connectUrl: string;
}

export interface RemoteSessionProvider {
  create(projectId: string): Promise<RemoteSession>;
  release(sessionId: string, projectId: string): Promise<void>;
}

export type RemoteSessionProviderFactory = (apiKey: string) => RemoteSessionProvider;

function toProviderError(action: string, error: unknown): ProviderError {
  if (error instanceof Browserbase.APIError) {
    return new ProviderError(`Browserbase ${action} failed: ${error.message}`, error.status, error);
  }
  return new ProviderError(`Browserbase ${action} failed: ${describeError(error)}`, undefined, error);
}

export class BrowserbaseSessionProvider implements RemoteSessionProvider {
  private readonly client: Browserbase;

  constructor(apiKey: string) {
    this.client = new Browserbase({ apiKey });
  }

  async create(projectId: string): Promise<RemoteSession> {
    try {
      const session = await this.client.sessions.create({ projectId });
      return { id: session.id, connectUrl: session.connectUrl };
    } catch (error) {
      throw toProviderError('session create', error);
    }
  }

  async release(sessionId: string, projectId: string): Promise<void> {
    try {
      await this.client.sessions.update(sessionId, { projectId, status: 'REQUEST_RELEASE' });
    } catch (error) {
      throw toProviderError('session release', error);
    }
  }
}

export const createBrowserbaseProvider: RemoteSessionProviderFactory = (apiKey) =>
  new BrowserbaseSessionProvider(apiKey);
