import { PropagationTimeoutError } from '../errors';

export interface WaitOptions {
  timeoutMs: number;
  intervalMs: number;
  description: string;
  resource?: string;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Poll `check` until it yields a value other than `undefined`, or give up after `timeoutMs`.
 * The check runs at least once even with a zero timeout.
 */
export async function waitUntil<T>(check: () => Promise<T | undefined>, options: WaitOptions): Promise<T> {
  const startTime = Date.now();

  for (;;) {
    const result = await check();
    if (result !== undefined) {
      return result;
    }

    if (Date.now() - startTime >= options.timeoutMs) {
      throw new PropagationTimeoutError(options.description, options.timeoutMs, options.resource);
    }

    await sleep(options.intervalMs);
  }
}

/**
 * Retry `action` while `isRetryable` accepts its error, within the same bound as {@link waitUntil}.
 */
export async function retryWhile<T>(
  action: () => Promise<T>,
  isRetryable: (error: unknown) => boolean,
  options: WaitOptions
): Promise<T> {
  const startTime = Date.now();

  for (;;) {
    try {
      return await action();
    } catch (error) {
      if (!isRetryable(error)) {
        throw error;
      }
      if (Date.now() - startTime >= options.timeoutMs) {
        throw new PropagationTimeoutError(options.description, options.timeoutMs, options.resource);
      }
    }

    await sleep(options.intervalMs);
  }
}
