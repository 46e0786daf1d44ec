import { JobQueue } from '../jobQueue.service';
import { silentLogger } from '../../__tests__/helpers/fakes';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

const flush = () => new Promise((resolve) => setImmediate(resolve));

describe('JobQueue', () => {
  it('should return before the task finishes', async () => {
    const queue = new JobQueue(1, silentLogger);
    const gate = deferred();
    let finished = false;

    const accepted = queue.enqueue({
      jobId: 'a',
      run: async () => {
        await gate.promise;
        finished = true;
      },
    });

    expect(accepted).toBe(true);
    expect(finished).toBe(false);
    expect(queue.size()).toEqual({ pending: 0, running: 1 });

    gate.resolve();
    await queue.onIdle();
    expect(finished).toBe(true);
  });

  it('should claim each jobId once', () => {
    const queue = new JobQueue(1, silentLogger);

    expect(queue.enqueue({ jobId: 'dup', run: async () => undefined })).toBe(true);
    expect(queue.enqueue({ jobId: 'dup', run: async () => undefined })).toBe(false);
    expect(queue.isClaimed('dup')).toBe(true);
    expect(queue.isClaimed('other')).toBe(false);
  });

  it('should drop claims once their tasks have run', async () => {
    const queue = new JobQueue(2, silentLogger);
    for (let index = 0; index < 100; index += 1) {
      queue.enqueue({ jobId: `job-${index}`, run: async () => undefined });
    }
    queue.enqueue({ jobId: 'failing', run: () => Promise.reject(new Error('boom')) });

    await queue.onIdle();

    expect(queue.isClaimed('job-0')).toBe(false);
    expect(queue.isClaimed('job-99')).toBe(false);
    expect(queue.isClaimed('failing')).toBe(false);
    expect(queue.enqueue({ jobId: 'job-0', run: async () => undefined })).toBe(true);
    await queue.onIdle();
  });

  it('should not run more tasks at once than the concurrency limit', async () => {
    const queue = new JobQueue(2, silentLogger);
    const gates = [deferred(), deferred(), deferred()];
    let active = 0;
    let peak = 0;

    gates.forEach((gate, index) => {
      queue.enqueue({
        jobId: `job-${index}`,
        run: async () => {
          active += 1;
          peak = Math.max(peak, active);
          await gate.promise;
          active -= 1;
        },
      });
    });

    expect(queue.size()).toEqual({ pending: 1, running: 2 });
    gates.forEach((gate) => gate.resolve());
    await queue.onIdle();

    expect(peak).toBe(2);
    expect(queue.size()).toEqual({ pending: 0, running: 0 });
  });

  it('should keep draining after a task rejects', async () => {
    const queue = new JobQueue(1, silentLogger);
    const ran: string[] = [];

    queue.enqueue({ jobId: 'bad', run: () => Promise.reject(new Error('boom')) });
    queue.enqueue({
      jobId: 'good',
      run: async () => {
        ran.push('good');
      },
    });

    await queue.onIdle();
    await flush();
    expect(ran).toEqual(['good']);
  });

  it('should resolve onIdle immediately when empty', async () => {
    await expect(new JobQueue(1, silentLogger).onIdle()).resolves.toBeUndefined();
  });

  it('should reject a non-positive concurrency', () => {
    expect(() => new JobQueue(0, silentLogger)).toThrow('Job concurrency must be a positive integer, got 0');
  });
});
