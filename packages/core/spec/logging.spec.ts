import { describe, expect, it, vi } from 'vitest';

import { filterLog, isLogLevel } from '#logging';

describe('fn:isLogLevel', () => {
  it('should accept known levels', () => {
    expect(isLogLevel('warn')).toBe(true);
  });

  it('should reject unknown levels', () => {
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});

describe('fn:filterLog', () => {
  it('should drop entries below the minimum level', () => {
    const log = vi.fn();
    const filtered = filterLog(log, 'warn');

    filtered('info', 'ignored');
    filtered('warn', 'kept', { principal: 'alice@example.com' });
    filtered('error', 'also kept');

    expect(log).toHaveBeenCalledTimes(2);
    expect(log).toHaveBeenNthCalledWith(1, 'warn', 'kept', {
      principal: 'alice@example.com',
    });
    expect(log).toHaveBeenNthCalledWith(2, 'error', 'also kept', undefined);
  });
});
