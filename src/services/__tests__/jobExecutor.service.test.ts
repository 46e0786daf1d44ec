import { JobTimeoutError, ProviderError, StoreAccessError } from '../../errors/job-errors';
import { JobExecutor } from '../jobExecutor.service';
import { RemoteSessionManager } from '../session.service';
import { SessionLifecycle } from '../sessionScope';
import {
  FakeDriver,
  FakePageBehaviour,
  FakeProvider,
  never,
  RecordingRepository,
  silentLogger,
  StaticSecrets,
  steppingClock,
  TEST_SECRETS,
} from '../../__tests__/helpers/fakes';

const HTML = '<html><body>hello</body></html>';

function setup(
  behaviour: FakePageBehaviour = {},
  options: { secrets?: Record<string, string>; connectMs?: number; navigationMs?: number } = {},
) {
  const events: string[] = [];
  const repository = new RecordingRepository(events);
  const provider = new FakeProvider(events);
  const sessions = new RemoteSessionManager({
    secrets: new StaticSecrets(options.secrets ?? TEST_SECRETS),
    credentials: {
      apiKey: { key: 'BROWSERBASE_API_KEY' },
      projectId: { key: 'BROWSERBASE_PROJECT_ID' },
    },
    createProvider: () => provider,
    acquireTimeoutMs: 1000,
    logger: silentLogger,
  });
  const driver = new FakeDriver(behaviour, events);
  const executor = new JobExecutor({
    repository,
    sessions,
    driver,
    timeouts: {
      connectMs: options.connectMs ?? 1000,
      navigationMs: options.navigationMs ?? 1000,
    },
    clock: steppingClock(),
    logger: silentLogger,
  });

  return { events, repository, provider, sessions, driver, executor };
}

describe('JobExecutor', () => {
  describe('successful run', () => {
    it('should write PENDING, RUNNING and SUCCESS with the extracted page data', async () => {
      const { executor, repository, driver } = setup({ html: HTML });

      const record = await executor.execute({ jobId: 'abc', url: 'https://example.com/' });

      expect(repository.statuses()).toEqual(['PENDING', 'RUNNING', 'SUCCESS']);
      expect(record).toEqual({
        jobId: 'abc',
        status: 'SUCCESS',
        requestedUrl: 'https://example.com/',
        receivedAt: '2024-05-01T10:00:00.000Z',
        lastUpdatedAt: '2024-05-01T10:00:02.000Z',
        sessionId: 'session-1',
        resultPayload: { pageTitle: 'Example Domain', contentLength: 31 },
      });
      expect(await repository.get('abc')).toEqual(record);
      expect(driver.connectedTo).toEqual(['wss://remote.test/session-1']);
      expect(driver.navigations).toEqual([{ url: 'https://example.com/', timeoutMs: 1000 }]);
    });

    it('should record the session id on the RUNNING write', async () => {
      const { executor, repository } = setup();

      await executor.execute({ jobId: 'abc', url: 'https://example.com/' });

      expect(repository.writes[0].sessionId).toBeUndefined();
      expect(repository.writes[1]).toEqual({
        jobId: 'abc',
        status: 'RUNNING',
        requestedUrl: 'https://example.com/',
        receivedAt: '2024-05-01T10:00:00.000Z',
        lastUpdatedAt: '2024-05-01T10:00:01.000Z',
        sessionId: 'session-1',
      });
    });

    it('should commit the terminal record before closing the connection and releasing the session', async () => {
      const { executor, events } = setup();

      await executor.execute({ jobId: 'abc', url: 'https://example.com/' });

      expect(events).toEqual([
        'write:PENDING',
        'create:session-1',
        'write:RUNNING',
        'connect',
        'navigate:https://example.com/',
        'write:SUCCESS',
        'close',
        'release:session-1',
      ]);
    });
  });

  describe('session acquisition failures', () => {
    it('should fail with a configuration error and no session id when credentials are missing', async () => {
      const { executor, repository, provider } = setup({}, { secrets: {} });

      const record = await executor.execute({ jobId: 'cfg', url: 'https://example.com/' });

      expect(repository.statuses()).toEqual(['PENDING', 'FAILED']);
      expect(record.status).toBe('FAILED');
      expect(record.errorKind).toBe('CONFIGURATION');
      expect(record.errorMessage).toBe('Configuration error: Environment variable BROWSERBASE_API_KEY is not set');
      expect(record.sessionId).toBeUndefined();
      expect(record.resultPayload).toBeUndefined();
      expect(provider.created).toEqual([]);
      expect(provider.released).toEqual([]);
    });

    it('should keep the provider error detail when session creation is rejected', async () => {
      const { executor, provider } = setup();
      provider.createImpl = async () => {
        throw new ProviderError('Browserbase session create failed: 429 Too Many Requests', 429);
      };

      const record = await executor.execute({ jobId: 'prov', url: 'https://example.com/' });

      expect(record.status).toBe('FAILED');
      expect(record.errorKind).toBe('PROVIDER');
      expect(record.errorMessage).toBe('Provider error: Browserbase session create failed: 429 Too Many Requests');
      expect(record.sessionId).toBeUndefined();
      expect(provider.released).toEqual([]);
    });
  });

  describe('automation failures after acquisition', () => {
    it('should fail with a timeout error and keep the session id when navigation times out', async () => {
      const { executor, provider, driver } = setup({
        navigate: (url, timeoutMs) => Promise.reject(new JobTimeoutError(`Navigation to ${url}`, timeoutMs)),
      });

      const record = await executor.execute({ jobId: 'slow', url: 'https://unreachable.test/' });

      expect(record.status).toBe('FAILED');
      expect(record.errorKind).toBe('TIMEOUT');
      expect(record.errorMessage).toBe('Timeout error: Navigation to https://unreachable.test/ exceeded 1000ms');
      expect(record.sessionId).toBe('session-1');
      expect(provider.released).toEqual(['session-1']);
      expect(driver.closed).toBe(1);
    });

    it('should enforce the navigation bound even when the driver never answers', async () => {
      const { executor, provider } = setup({ navigate: () => never() }, { navigationMs: 20 });

      const record = await executor.execute({ jobId: 'hung', url: 'https://unreachable.test/' });

      expect(record.errorMessage).toBe('Timeout error: Navigation to https://unreachable.test/ exceeded 20ms');
      expect(provider.released).toEqual(['session-1']);
    });

    it('should enforce the connect bound independently', async () => {
      const { executor, provider, driver } = setup({ connect: () => never() }, { connectMs: 20 });

      const record = await executor.execute({ jobId: 'noconn', url: 'https://example.com/' });

      expect(record.errorMessage).toBe('Timeout error: Browser connection exceeded 20ms');
      expect(record.sessionId).toBe('session-1');
      expect(driver.closed).toBe(0);
      expect(provider.released).toEqual(['session-1']);
    });

    it('should time out page discovery when the browser never hands back a page', async () => {
      const { executor, provider, driver } = setup({ openPage: () => never() }, { connectMs: 20 });

      const record = await executor.execute({ jobId: 'nopage', url: 'https://example.com/' });

      expect(record.errorKind).toBe('TIMEOUT');
      expect(record.errorMessage).toBe('Timeout error: Page discovery exceeded 20ms');
      expect(driver.navigations).toEqual([]);
      expect(driver.closed).toBe(1);
      expect(provider.released).toEqual(['session-1']);
    });

    it('should time out extraction when the page title never resolves', async () => {
      const { executor, provider, repository } = setup({ title: () => never() }, { navigationMs: 20 });

      const record = await executor.execute({ jobId: 'stuck', url: 'https://example.com/' });

      expect(repository.statuses()).toEqual(['PENDING', 'RUNNING', 'FAILED']);
      expect(record.errorKind).toBe('TIMEOUT');
      expect(record.errorMessage).toBe('Timeout error: Content extraction exceeded 20ms');
      expect(record.resultPayload).toBeUndefined();
      expect(provider.released).toEqual(['session-1']);
    });

    it('should report an unexpected error when the page context cannot be found', async () => {
      const { executor, driver } = setup({
        openPage: () => Promise.reject(new Error('No browser contexts found in the connected session')),
      });

      const record = await executor.execute({ jobId: 'ctx', url: 'https://example.com/' });

      expect(record.errorKind).toBe('UNEXPECTED');
      expect(record.errorMessage).toBe('Unexpected error: No browser contexts found in the connected session');
      expect(driver.navigations).toEqual([]);
      expect(driver.closed).toBe(1);
    });

    it('should release the session exactly once when the browser crashes mid-navigation', async () => {
      const { executor, provider, repository } = setup({
        navigate: () => Promise.reject(new Error('Target page, context or browser has been closed')),
      });

      const record = await executor.execute({ jobId: 'crash', url: 'https://example.com/' });

      expect(record.errorMessage).toBe('Unexpected error: Target page, context or browser has been closed');
      expect(repository.statuses()).toEqual(['PENDING', 'RUNNING', 'FAILED']);
      expect(provider.released).toEqual(['session-1']);
    });

    it('should not carry a result payload when extraction fails after navigation', async () => {
      const { executor } = setup({ title: () => Promise.reject(new Error('Execution context was destroyed')) });

      const record = await executor.execute({ jobId: 'extract', url: 'https://example.com/' });

      expect(record.status).toBe('FAILED');
      expect(record.resultPayload).toBeUndefined();
      expect(record.errorMessage).toBe('Unexpected error: Execution context was destroyed');
    });
  });

  describe('cleanup and store faults', () => {
    it('should keep the terminal status when closing and releasing both fail', async () => {
      const { executor, provider, repository } = setup({
        close: () => Promise.reject(new Error('socket hang up')),
      });
      provider.releaseImpl = () => Promise.reject(new Error('release rejected'));

      const record = await executor.execute({ jobId: 'dirty', url: 'https://example.com/' });

      expect(record.status).toBe('SUCCESS');
      expect((await repository.get('dirty'))?.status).toBe('SUCCESS');
      expect(provider.released).toEqual(['session-1']);
    });

    it('should still resolve when a session lifecycle rejects on release', async () => {
      const repository = new RecordingRepository();
      const sessions: SessionLifecycle = {
        acquire: async () => ({ sessionId: 'external-1', connectUrl: 'wss://remote.test/external-1' }),
        release: () => Promise.reject(new Error('provider unreachable')),
      };
      const executor = new JobExecutor({
        repository,
        sessions,
        driver: new FakeDriver(),
        timeouts: { connectMs: 1000, navigationMs: 1000 },
        clock: steppingClock(),
        logger: silentLogger,
      });

      const record = await executor.execute({ jobId: 'rel', url: 'https://example.com/' });

      expect(record.status).toBe('SUCCESS');
      expect(record.sessionId).toBe('external-1');
    });

    it('should carry on to the terminal write when an intermediate write fails', async () => {
      const { executor, repository } = setup();
      repository.failWrites = (record) =>
        record.status === 'RUNNING' ? new StoreAccessError('Failed to write job abc: throttled') : undefined;

      const record = await executor.execute({ jobId: 'abc', url: 'https://example.com/' });

      expect(record.status).toBe('SUCCESS');
      expect(repository.statuses()).toEqual(['PENDING', 'SUCCESS']);
    });

    it('should never move lastUpdatedAt backwards when the clock does', async () => {
      const times = ['2024-05-01T10:00:05.000Z', '2024-05-01T10:00:03.000Z', '2024-05-01T10:00:01.000Z'];
      const repository = new RecordingRepository();
      const provider = new FakeProvider();
      const executor = new JobExecutor({
        repository,
        sessions: new RemoteSessionManager({
          secrets: new StaticSecrets(TEST_SECRETS),
          credentials: { apiKey: { key: 'BROWSERBASE_API_KEY' }, projectId: { key: 'BROWSERBASE_PROJECT_ID' } },
          createProvider: () => provider,
          acquireTimeoutMs: 1000,
          logger: silentLogger,
        }),
        driver: new FakeDriver(),
        timeouts: { connectMs: 1000, navigationMs: 1000 },
        clock: () => new Date(times.shift() ?? '2024-05-01T10:00:00.000Z'),
        logger: silentLogger,
      });

      await executor.execute({ jobId: 'clock', url: 'https://example.com/' });

      expect(repository.writes.map((record) => record.lastUpdatedAt)).toEqual([
        '2024-05-01T10:00:05.000Z',
        '2024-05-01T10:00:05.000Z',
        '2024-05-01T10:00:05.000Z',
      ]);
    });
  });
});
