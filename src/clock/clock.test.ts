import { describe, it, expect, vi, afterEach } from 'vitest';
import { monotonicClock, systemClock, delayUntil, type Clock } from './clock.js';

describe('monotonicClock', () => {
  it('never goes backwards', () => {
    let previous = monotonicClock.now();
    for (let i = 0; i < 1000; i++) {
      const current = monotonicClock.now();
      expect(current).toBeGreaterThanOrEqual(previous);
      previous = current;
    }
  });
});

describe('systemClock', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('follows fake timers', () => {
    vi.useFakeTimers();
    vi.setSystemTime(1_000);

    expect(systemClock.now()).toBe(1_000);
    vi.advanceTimersByTime(250);
    expect(systemClock.now()).toBe(1_250);
  });
});

describe('delayUntil', () => {
  const clock: Clock = { now: () => 500 };

  it('returns the remaining time', () => {
    expect(delayUntil(clock, 800)).toBe(300);
  });

  it('clamps instants in the past to zero', () => {
    expect(delayUntil(clock, 200)).toBe(0);
    expect(delayUntil(clock, 500)).toBe(0);
  });
});
