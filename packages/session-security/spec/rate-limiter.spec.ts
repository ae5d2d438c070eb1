import { describe, expect, it } from 'vitest';

import { FailedAttemptLimiter } from '#rate-limiter';

describe('cl:FailedAttemptLimiter', () => {
  const createLimiter = (): {
    limiter: FailedAttemptLimiter;
    advance: (ms: number) => void;
  } => {
    let now = 1_000;
    const limiter = new FailedAttemptLimiter({
      maxAttempts: 3,
      windowMs: 60_000,
      now: () => now,
    });

    return { limiter, advance: (ms) => (now += ms) };
  };

  it('should block an identifier once it reaches the limit', () => {
    const { limiter } = createLimiter();

    limiter.recordFailure('10.0.0.1');
    limiter.recordFailure('10.0.0.1');
    expect(limiter.isAllowed('10.0.0.1')).toBe(true);

    expect(limiter.recordFailure('10.0.0.1')).toBe(3);
    expect(limiter.isAllowed('10.0.0.1')).toBe(false);
    expect(limiter.isAllowed('10.0.0.2')).toBe(true);
  });

  it('should honour a per-call limit', () => {
    const { limiter } = createLimiter();

    limiter.recordFailure('10.0.0.1');

    expect(limiter.isAllowed('10.0.0.1', 1)).toBe(false);
  });

  it('should forget failures after reset', () => {
    const { limiter } = createLimiter();
    limiter.recordFailure('10.0.0.1');

    limiter.reset('10.0.0.1');

    expect(limiter.failures('10.0.0.1')).toBe(0);
  });

  it('should forget failures once the window elapses', () => {
    const { limiter, advance } = createLimiter();
    limiter.recordFailure('10.0.0.1');
    limiter.recordFailure('10.0.0.1');
    limiter.recordFailure('10.0.0.1');

    advance(60_000);

    expect(limiter.isAllowed('10.0.0.1')).toBe(true);
    expect(limiter.prune()).toBe(0);
  });

  it('should prune elapsed windows', () => {
    const { limiter, advance } = createLimiter();
    limiter.recordFailure('10.0.0.1');
    limiter.recordFailure('10.0.0.2');

    advance(60_000);

    expect(limiter.prune()).toBe(2);
  });
});
