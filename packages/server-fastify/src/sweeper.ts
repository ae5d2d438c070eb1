import { jsonifyError } from '@credgate/core';

import type { Log } from '@credgate/core';

/** work run on every tick */
export type PeriodicWork = () => void | Promise<void>;

/**
 * runs housekeeping work on a fixed interval
 * the timer never keeps the process alive and ticks never overlap
 */
export class PeriodicTask {
  #name: string;
  #intervalMs: number;
  #work: PeriodicWork;
  #log?: Log;
  #timer?: NodeJS.Timeout;
  #running?: Promise<void>;

  /**
   * creates a periodic task
   * @param name label used in logs
   * @param intervalMs milliseconds between ticks
   * @param work work to run
   * @param log optional logger
   */
  constructor(name: string, intervalMs: number, work: PeriodicWork, log?: Log) {
    this.#name = name;
    this.#intervalMs = intervalMs;
    this.#work = work;
    this.#log = log;
  }

  /** whether the timer is scheduled */
  public get active(): boolean {
    return this.#timer !== undefined;
  }

  /** schedules the task; a second call is a no-op */
  public start(): void {
    if (this.#timer) {
      return;
    }

    this.#timer = setInterval(() => void this.runOnce(), this.#intervalMs);
    this.#timer.unref();
  }

  /** cancels the task and waits for a tick in flight */
  public async stop(): Promise<void> {
    clearInterval(this.#timer);
    this.#timer = undefined;

    await this.#running;
  }

  /**
   * runs the work once unless a previous run is still in flight
   * failures are logged, never thrown
   */
  public async runOnce(): Promise<void> {
    if (this.#running) {
      return this.#running;
    }

    this.#running = this.#execute().finally(() => {
      this.#running = undefined;
    });

    return this.#running;
  }

  async #execute(): Promise<void> {
    try {
      await this.#work();
    } catch (error) {
      this.#log?.('error', 'periodic task failed', {
        task: this.#name,
        error: jsonifyError(error),
      });
    }
  }
}
