import { JobTimeoutError } from '../errors/job-errors';

/**
 * Races `task` against a timer. The timer is always cleared. A value that
 * arrives after the timeout is handed to `disposeLate`, which must not reject.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  task: () => Promise<T>,
  disposeLate?: (value: T) => Promise<void>,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  let timedOut = false;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      timedOut = true;
      reject(new JobTimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  const running = task();
  running.then(
    (value) => {
      if (timedOut && disposeLate) {
        void disposeLate(value);
      }
    },
    // the rejection is delivered through the race below
    () => undefined,
  );

  try {
    return await Promise.race([running, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

/** Resolves after `ms`, or rejects with the signal's reason once aborted. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function abortReason(signal?: AbortSignal): Error {
  const reason: unknown = signal?.reason;
  return reason instanceof Error ? reason : new Error('Aborted');
}
