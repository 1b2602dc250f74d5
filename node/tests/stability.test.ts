import { describe, expect, it } from 'vitest';
import { GenerationError, TimeoutError, TurnCancelledError, ValidationError } from '@/stability/errors';
import { retryWithBackoff } from '@/stability/retryWithBackoff';
import { withTimeout } from '@/stability/timeout';

const never = (signal: AbortSignal) =>
  new Promise<never>((_, reject) => signal.addEventListener('abort', () => reject(new Error('aborted'))));

describe('retryWithBackoff', () => {
  it('retries retryable failures within the budget', async () => {
    const attempts: number[] = [];

    const result = await retryWithBackoff(
      async (attempt) => {
        attempts.push(attempt);
        if (attempt < 3) throw new GenerationError('flaky');
        return 'ok';
      },
      { maxRetries: 2, initialDelay: 0 },
    );

    expect(result).toBe('ok');
    expect(attempts).toEqual([1, 2, 3]);
  });

  it('stops at the first non-retryable failure', async () => {
    let calls = 0;

    await expect(
      retryWithBackoff(
        async () => {
          calls++;
          throw new ValidationError('bad input');
        },
        { maxRetries: 3, initialDelay: 0 },
      ),
    ).rejects.toThrow('bad input');
    expect(calls).toBe(1);
  });

  it('does not start once the turn is cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    let calls = 0;

    await expect(
      retryWithBackoff(
        async () => {
          calls++;
        },
        { signal: controller.signal },
      ),
    ).rejects.toBeInstanceOf(TurnCancelledError);
    expect(calls).toBe(0);
  });
});

describe('withTimeout', () => {
  it('returns the result of a fast call', async () => {
    await expect(withTimeout(async () => 42, { timeoutMs: 100, label: 'fast', stage: 'tool' })).resolves.toBe(42);
  });

  it('aborts a slow call and reports a timeout', async () => {
    const error = await withTimeout(never, { timeoutMs: 10, label: 'slow', stage: 'tool' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ message: 'slow timed out after 10ms', retryable: true, stage: 'tool' });
  });

  it('turns a parent abort into cancellation', async () => {
    const controller = new AbortController();
    const pending = withTimeout(never, { timeoutMs: 1000, label: 'slow', stage: 'generate', signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(TurnCancelledError);
  });

  it('passes other failures through', async () => {
    await expect(
      withTimeout(
        async () => {
          throw new Error('boom');
        },
        { timeoutMs: 100, label: 'x', stage: 'tool' },
      ),
    ).rejects.toThrow('boom');
  });
});
