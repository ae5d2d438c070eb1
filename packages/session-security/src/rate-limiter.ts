import type { Clock } from '@credgate/core';

/** failure count for one identifier */
interface AttemptWindow {
  count: number;
  firstFailureAt: number;
}

/** options for the failed-attempt limiter */
export interface FailedAttemptLimiterOptions {
  /** failures tolerated before the identifier is blocked */
  maxAttempts: number;
  /** how long failures are remembered after the first one, in milliseconds */
  windowMs: number;
  /** clock, injectable for tests */
  now?: Clock;
}

/** counts failures per identifier, e.g. per peer address */
export class FailedAttemptLimiter {
  #attempts = new Map<string, AttemptWindow>();
  #maxAttempts: number;
  #windowMs: number;
  #now: Clock;

  /**
   * creates a limiter
   * @param options limiter options
   */
  constructor(options: FailedAttemptLimiterOptions) {
    this.#maxAttempts = options.maxAttempts;
    this.#windowMs = options.windowMs;
    this.#now = options.now ?? Date.now;
  }

  /**
   * checks whether an identifier may try again
   * @param identifier key such as a peer address
   * @param maxAttempts override of the configured limit
   * @returns true when the identifier is below the limit
   */
  public isAllowed(identifier: string, maxAttempts?: number): boolean {
    return this.failures(identifier) < (maxAttempts ?? this.#maxAttempts);
  }

  /**
   * records one failure
   * @param identifier key such as a peer address
   * @returns failures within the current window, including this one
   */
  public recordFailure(identifier: string): number {
    const now = this.#now();
    const window = this.#current(identifier, now);
    const next = window
      ? { count: window.count + 1, firstFailureAt: window.firstFailureAt }
      : { count: 1, firstFailureAt: now };

    this.#attempts.set(identifier, next);

    return next.count;
  }

  /**
   * forgets all failures of an identifier
   * @param identifier key such as a peer address
   */
  public reset(identifier: string): void {
    this.#attempts.delete(identifier);
  }

  /**
   * reads the failures within the current window
   * @param identifier key such as a peer address
   * @returns failure count
   */
  public failures(identifier: string): number {
    return this.#current(identifier, this.#now())?.count ?? 0;
  }

  /**
   * drops windows that have elapsed
   * @returns number of identifiers forgotten
   */
  public prune(): number {
    const now = this.#now();
    let pruned = 0;
    for (const identifier of [...this.#attempts.keys()]) {
      if (!this.#current(identifier, now)) {
        pruned++;
      }
    }

    return pruned;
  }

  #current(identifier: string, now: number): AttemptWindow | undefined {
    const window = this.#attempts.get(identifier);
    if (window && now - window.firstFailureAt >= this.#windowMs) {
      this.#attempts.delete(identifier);

      return undefined;
    }

    return window;
  }
}
