import { describe, expect, it, vi } from 'vitest';
import { PeriodicScheduler, isAbortError, sleep, type Sleeper } from './scheduler';

describe('sleep', () => {
  it('rejects with an AbortError when the signal aborts', async () => {
    const controller = new AbortController();
    const pending = sleep(60000, controller.signal);
    controller.abort();

    const error = await pending.catch((e: unknown) => e);
    expect(isAbortError(error, controller.signal)).toBe(true);
  });

  it('resolves after the delay', async () => {
    await expect(sleep(1)).resolves.toBeUndefined();
  });
});

describe('isAbortError', () => {
  it('recognises the signal reason and AbortError-named errors', () => {
    const controller = new AbortController();
    const reason = new Error('shutdown');
    controller.abort(reason);

    expect(isAbortError(reason, controller.signal)).toBe(true);
    expect(isAbortError(new DOMException('Aborted', 'AbortError'))).toBe(true);
    expect(isAbortError(new Error('boom'))).toBe(false);
    expect(isAbortError('AbortError')).toBe(false);
  });
});

describe('PeriodicScheduler', () => {
  it('runs the task between interval waits until aborted', async () => {
    const controller = new AbortController();
    const delays: number[] = [];
    const sleeper: Sleeper = async (ms, signal) => {
      delays.push(ms);
      if (delays.length === 3) {
        controller.abort();
      }
      signal?.throwIfAborted();
    };
    const task = vi.fn(async () => {});

    await new PeriodicScheduler(60000, sleeper).run(task, controller.signal);

    expect(task).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([60000, 60000, 60000]);
  });

  it('does not run when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const task = vi.fn(async () => {});

    await new PeriodicScheduler(1000, async () => {}).run(task, controller.signal);

    expect(task).not.toHaveBeenCalled();
  });

  it('skips the wait when the task itself triggered shutdown', async () => {
    const controller = new AbortController();
    const sleeper = vi.fn<Sleeper>(async () => {});

    await new PeriodicScheduler(1000, sleeper).run(async () => {
      controller.abort();
    }, controller.signal);

    expect(sleeper).not.toHaveBeenCalled();
  });

  it('propagates task errors', async () => {
    const controller = new AbortController();
    const failure = new Error('task failed');

    await expect(
      new PeriodicScheduler(1000, async () => {}).run(async () => {
        throw failure;
      }, controller.signal)
    ).rejects.toBe(failure);
  });

  it('propagates sleeper errors that are not aborts', async () => {
    const controller = new AbortController();
    const failure = new Error('timer broken');

    await expect(
      new PeriodicScheduler(1000, async () => {
        throw failure;
      }).run(async () => {}, controller.signal)
    ).rejects.toBe(failure);
  });
});
