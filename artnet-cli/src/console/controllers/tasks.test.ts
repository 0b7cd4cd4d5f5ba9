import { describe, it, expect, vi } from 'vitest';
import { sleep } from 'artnet-shared';
import { TaskGroup } from './tasks';

describe('TaskGroup', () => {
  it('tracks tasks until they settle', async () => {
    const group = new TaskGroup(() => {});
    let done = false;
    group.spawn(async () => {
      await Promise.resolve();
      done = true;
    });
    expect(group.size).toBe(1);
    await group.settled();
    expect(done).toBe(true);
    expect(group.size).toBe(0);
  });

  it('routes failures to the error handler', async () => {
    const onError = vi.fn();
    const group = new TaskGroup(onError);
    group.spawn(async () => {
      throw new Error('boom');
    });
    await group.settled();
    expect(onError).toHaveBeenCalledWith(new Error('boom'));
  });

  it('cancels sleeping tasks and clears their timers', async () => {
    vi.useFakeTimers();
    try {
      const group = new TaskGroup(() => {});
      let woke = false;
      group.spawn(async (signal) => {
        await sleep(60_000, signal);
        woke = true;
      });
      expect(vi.getTimerCount()).toBe(1);
      group.cancel();
      await group.settled();
      expect(woke).toBe(true);
      expect(vi.getTimerCount()).toBe(0);
    } finally {
      vi.useRealTimers();
    }
  });

  it('does not report errors raised after cancellation', async () => {
    const onError = vi.fn();
    const group = new TaskGroup(onError);
    group.spawn(async (signal) => {
      await sleep(10_000, signal);
      throw new Error('aborted');
    });
    group.cancel();
    await group.settled();
    expect(onError).not.toHaveBeenCalled();
  });

  it('ignores spawns after cancel', () => {
    const group = new TaskGroup(() => {});
    group.cancel();
    const task = vi.fn(async () => {});
    group.spawn(task);
    expect(task).not.toHaveBeenCalled();
    expect(group.size).toBe(0);
  });
});
