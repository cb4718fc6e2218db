import { setTimeout as delay } from 'node:timers/promises';

export type LateOutcome = 'fulfilled' | 'rejected';

export interface TimeoutOptions {
  /** `null` waits indefinitely */
  timeoutMs: number | null;
  /** Error the wait is abandoned with when `timeoutMs` elapses */
  onTimeout: () => Error;
  /** Abandons the wait (with the signal's reason) when aborted */
  parentSignal?: AbortSignal | undefined;
  /** Called if the operation settles after the wait was abandoned */
  onLateSettlement?: ((outcome: LateOutcome, error?: unknown) => void) | undefined;
}

/**
 * Run `operation` with an AbortSignal, giving up on it after `timeoutMs`.
 *
 * Giving up aborts the signal and rejects; the operation itself stops only
 * if it listens to the signal.
 */
export async function runWithTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: TimeoutOptions,
): Promise<T> {
  const { timeoutMs, parentSignal } = options;
  if (parentSignal?.aborted) {
    throw parentSignal.reason;
  }

  const controller = new AbortController();
  const pending = new Promise<T>((resolve) => resolve(operation(controller.signal)));

  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;
  const interrupted = new Promise<never>((_resolve, reject) => {
    if (timeoutMs !== null) {
      timer = setTimeout(() => {
        const error = options.onTimeout();
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    }
    if (parentSignal !== undefined) {
      onParentAbort = () => {
        controller.abort(parentSignal.reason);
        reject(parentSignal.reason);
      };
      parentSignal.addEventListener('abort', onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([pending, interrupted]);
  } finally {
    clearTimeout(timer);
    if (onParentAbort !== undefined) {
      parentSignal?.removeEventListener('abort', onParentAbort);
    }
    if (controller.signal.aborted) {
      const report = options.onLateSettlement;
      void pending.then(
        () => report?.('fulfilled'),
        (err: unknown) => report?.('rejected', err),
      );
    }
  }
}

/**
 * Wait `ms` milliseconds; rejects early if `signal` aborts.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) {
    signal?.throwIfAborted();
    return;
  }
  await delay(ms, undefined, signal !== undefined ? { signal } : {});
}
