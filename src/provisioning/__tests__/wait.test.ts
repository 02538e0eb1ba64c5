import { describe, it, expect, vi } from 'vitest';
import { retryWhile, waitUntil } from '../wait';
import { PropagationTimeoutError } from '../../errors';
import { awsError } from '../../__tests__/helpers';

const options = { timeoutMs: 1000, intervalMs: 0, description: 'thing to settle', resource: 'thing' };

describe('waitUntil', () => {
  it('should return the first defined value', async () => {
    const check = vi.fn<[], Promise<string | undefined>>()
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce('ready');

    await expect(waitUntil(check, options)).resolves.toBe('ready');
    expect(check).toHaveBeenCalledTimes(3);
  });

  it('should run the check once even with a zero timeout', async () => {
    const check = vi.fn<[], Promise<boolean | undefined>>().mockResolvedValue(true);

    await expect(waitUntil(check, { ...options, timeoutMs: 0 })).resolves.toBe(true);
    expect(check).toHaveBeenCalledTimes(1);
  });

  it('should time out with a propagation error', async () => {
    const check = vi.fn<[], Promise<boolean | undefined>>().mockResolvedValue(undefined);

    await expect(waitUntil(check, { ...options, timeoutMs: 0 }))
      .rejects.toThrow(new PropagationTimeoutError('thing to settle', 0, 'thing'));
  });

  it('should propagate errors from the check', async () => {
    const check = vi.fn<[], Promise<boolean | undefined>>().mockRejectedValue(new Error('boom'));

    await expect(waitUntil(check, options)).rejects.toThrow('boom');
  });
});

describe('retryWhile', () => {
  const isThrottle = (error: unknown) => error instanceof Error && error.name === 'Throttling';

  it('should retry retryable errors until the action succeeds', async () => {
    const action = vi.fn<[], Promise<string>>()
      .mockRejectedValueOnce(awsError('Throttling'))
      .mockResolvedValueOnce('done');

    await expect(retryWhile(action, isThrottle, options)).resolves.toBe('done');
    expect(action).toHaveBeenCalledTimes(2);
  });

  it('should rethrow errors that are not retryable', async () => {
    const action = vi.fn<[], Promise<string>>().mockRejectedValue(awsError('AccessDenied'));

    await expect(retryWhile(action, isThrottle, options)).rejects.toThrow('AccessDenied');
    expect(action).toHaveBeenCalledTimes(1);
  });

  it('should give up after the timeout', async () => {
    const action = vi.fn<[], Promise<string>>().mockRejectedValue(awsError('Throttling'));

    await expect(retryWhile(action, isThrottle, { ...options, timeoutMs: 0 }))
      .rejects.toBeInstanceOf(PropagationTimeoutError);
  });
});
