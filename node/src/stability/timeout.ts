import { TimeoutError, TurnCancelledError, type FailureStage } from './errors';

export interface TimeoutOptions {
  timeoutMs: number;
  label: string;
  stage: FailureStage;
  /** The turn's signal. Its abort cancels the call and surfaces as TurnCancelledError. */
  signal?: AbortSignal;
}

/**
 * Races `run` against a timer. `run` receives a signal that fires on timeout or on
 * turn cancellation, so the SDK or HTTP call underneath is aborted too.
 */
export async function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  { timeoutMs, label, stage, signal }: TimeoutOptions,
): Promise<T> {
  if (signal?.aborted) throw new TurnCancelledError(stage);

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;
  let timedOut = false;

  const guard = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
      reject(new TimeoutError(label, timeoutMs, stage));
    }, timeoutMs);
    onParentAbort = () => {
      controller.abort();
      reject(new TurnCancelledError(stage));
    };
    signal?.addEventListener('abort', onParentAbort, { once: true });
  });

  try {
    return await Promise.race([run(controller.signal), guard]);
  } catch (error) {
    if (signal?.aborted) throw new TurnCancelledError(stage);
    // a callee that honors the abort may reject before the guard does
    if (timedOut) throw new TimeoutError(label, timeoutMs, stage);
    throw error;
  } finally {
    clearTimeout(timer);
    if (onParentAbort) signal?.removeEventListener('abort', onParentAbort);
  }
}
