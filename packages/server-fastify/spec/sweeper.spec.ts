import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { PeriodicTask } from '#sweeper';

import type { Log } from '@credgate/core';

describe('cl:PeriodicTask', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should run the work on every interval once started', async () => {
    const work = vi.fn();
    const task = new PeriodicTask('sweep', 1000, work);

    task.start();
    await vi.advanceTimersByTimeAsync(3000);
    await task.stop();

    expect(work).toHaveBeenCalledTimes(3);
  });

  it('should not schedule twice', async () => {
    const work = vi.fn();
    const task = new PeriodicTask('sweep', 1000, work);

    task.start();
    task.start();
    await vi.advanceTimersByTimeAsync(1000);
    await task.stop();

    expect(work).toHaveBeenCalledTimes(1);
  });

  it('should stop running after stop', async () => {
    const work = vi.fn();
    const task = new PeriodicTask('sweep', 1000, work);

    task.start();
    await task.stop();
    await vi.advanceTimersByTimeAsync(5000);

    expect(work).not.toHaveBeenCalled();
    expect(task.active).toBe(false);
  });

  it('should report whether it is scheduled', async () => {
    const task = new PeriodicTask('sweep', 1000, vi.fn());

    task.start();

    expect(task.active).toBe(true);

    await task.stop();
  });

  it('should not overlap runs', async () => {
    let release = (): void => undefined;
    const work = vi.fn(
      async () =>
        new Promise<void>((resolve) => {
          release = () => resolve();
        }),
    );
    const task = new PeriodicTask('sweep', 1000, work);

    const first = task.runOnce();
    const second = task.runOnce();
    release();
    await Promise.all([first, second]);

    expect(work).toHaveBeenCalledTimes(1);
  });

  it('should log a failed run and keep going', async () => {
    const log = vi.fn<Log>();
    const work = vi
      .fn<() => void>()
      .mockImplementationOnce(() => {
        throw new Error('sweep failed');
      });
    const task = new PeriodicTask('sweep', 1000, work, log);

    await task.runOnce();
    await task.runOnce();

    expect(work).toHaveBeenCalledTimes(2);
    expect(log).toHaveBeenCalledWith('error', 'periodic task failed', {
      task: 'sweep',
      error: expect.objectContaining({
        name: 'Error',
        message: 'sweep failed',
      }),
    });
  });
});
