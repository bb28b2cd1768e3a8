import { describe, expect, it, vi } from 'vitest';
import { retry } from '../../src/utils/retry';

describe('retry', () => {
  it('returns the first successful result', async () => {
    const operation = vi.fn().mockRejectedValueOnce(new Error('flaky')).mockResolvedValueOnce('ok');
    const onRetry = vi.fn();

    await expect(retry(operation, { attempts: 3, delayMs: 0, onRetry })).resolves.toBe('ok');

    expect(operation).toHaveBeenCalledTimes(2);
    expect(operation).toHaveBeenNthCalledWith(2, 2);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry).toHaveBeenCalledWith(expect.objectContaining({ message: 'flaky' }), 1);
  });

  it('rethrows the last error once the attempts are spent', async () => {
    const operation = vi.fn().mockRejectedValue(new Error('down'));
    await expect(retry(operation, { attempts: 2, delayMs: 0 })).rejects.toThrow('down');
    expect(operation).toHaveBeenCalledTimes(2);
  });
});
