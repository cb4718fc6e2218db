import { describe, it, expect, vi } from 'vitest';
import { setTimeout as delay } from 'node:timers/promises';
import { runWithTimeout, sleep } from './timeout.js';

const timedOut = () => new Error('timed out');

describe('runWithTimeout', () => {
  it('resolves with the operation result', async () => {
    await expect(runWithTimeout(async () => 7, { timeoutMs: 100, onTimeout: timedOut })).resolves.toBe(7);
  });

  it('passes operation errors through', async () => {
    await expect(
      runWithTimeout(
        async () => {
          throw new Error('inner');
        },
        { timeoutMs: 100, onTimeout: timedOut },
      ),
    ).rejects.toThrow('inner');
  });

  it('turns a synchronous throw into a rejection', async () => {
    await expect(
      runWithTimeout(
        () => {
          throw new Error('sync');
        },
        { timeoutMs: 100, onTimeout: timedOut },
      ),
    ).rejects.toThrow('sync');
  });

  it('gives up after the timeout and aborts the signal', async () => {
    let seen: AbortSignal | undefined;
    const started = performance.now();

    await expect(
      runWithTimeout(
        async (signal) => {
          seen = signal;
          await delay(1_000, undefined, { signal });
        },
        { timeoutMs: 30, onTimeout: timedOut },
      ),
    ).rejects.toThrow('timed out');

    expect(performance.now() - started).toBeLessThan(500);
    expect(seen?.aborted).toBe(true);
  });

  it('waits indefinitely when the timeout is null', async () => {
    await expect(
      runWithTimeout(
        async () => {
          await delay(40);
          return 'done';
        },
        { timeoutMs: null, onTimeout: timedOut },
      ),
    ).resolves.toBe('done');
  });

  it('reports how an abandoned operation settled', async () => {
    const onLateSettlement = vi.fn();

    await expect(
      runWithTimeout(
        async () => {
          await delay(40);
          return 'late';
        },
        { timeoutMs: 10, onTimeout: timedOut, onLateSettlement },
      ),
    ).rejects.toThrow('timed out');

    await vi.waitFor(() => expect(onLateSettlement).toHaveBeenCalledWith('fulfilled'));
  });

  it('follows an aborted parent signal', async () => {
    const parent = new AbortController();
    const reason = new Error('deadline');
    setTimeout(() => parent.abort(reason), 20);

    await expect(
      runWithTimeout(
        async (signal) => {
          await delay(1_000, undefined, { signal });
        },
        { timeoutMs: 5_000, onTimeout: timedOut, parentSignal: parent.signal },
      ),
    ).rejects.toBe(reason);
  });

  it('does not start when the parent is already aborted', async () => {
    const parent = new AbortController();
    parent.abort(new Error('already over'));
    const operation = vi.fn(async () => 1);

    await expect(
      runWithTimeout(operation, { timeoutMs: 100, onTimeout: timedOut, parentSignal: parent.signal }),
    ).rejects.toThrow('already over');
    expect(operation).not.toHaveBeenCalled();
  });
});

describe('sleep', () => {
  it('waits roughly the given time', async () => {
    const started = performance.now();
    await sleep(30);
    expect(performance.now() - started).toBeGreaterThanOrEqual(25);
  });

  it('returns at once for zero', async () => {
    await expect(sleep(0)).resolves.toBeUndefined();
  });

  it('rejects when the signal aborts', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);
    await expect(sleep(1_000, controller.signal)).rejects.toThrow();
  });
});
