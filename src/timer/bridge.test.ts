import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MAX_TIMER_DELAY, TimerBridge, nodeTimers, type TimerPrimitive } from './bridge.js';
import { TimerUnavailableError } from '../errors/index.js';

describe('TimerBridge', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('fires once after the delay', () => {
    const bridge = new TimerBridge();
    const onFire = vi.fn();

    bridge.arm(100, onFire);
    expect(bridge.pendingCount).toBe(1);

    vi.advanceTimersByTime(99);
    expect(onFire).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(onFire).toHaveBeenCalledTimes(1);
    expect(bridge.pendingCount).toBe(0);

    vi.advanceTimersByTime(1000);
    expect(onFire).toHaveBeenCalledTimes(1);
  });

  it('clamps negative delays to zero', () => {
    const bridge = new TimerBridge();
    const onFire = vi.fn();

    bridge.arm(-50, onFire);
    vi.advanceTimersByTime(0);

    expect(onFire).toHaveBeenCalledTimes(1);
  });

  it('disarms a pending timer', () => {
    const bridge = new TimerBridge();
    const onFire = vi.fn();

    const id = bridge.arm(100, onFire);
    expect(bridge.disarm(id)).toBe(true);
    expect(bridge.disarm(id)).toBe(false);

    vi.advanceTimersByTime(200);
    expect(onFire).not.toHaveBeenCalled();
    expect(vi.getTimerCount()).toBe(0);
  });

  it('reports a fired timer as no longer disarmable', () => {
    const bridge = new TimerBridge();
    const id = bridge.arm(10, () => {});

    vi.advanceTimersByTime(10);
    expect(bridge.disarm(id)).toBe(false);
  });

  it('drops pending notifications on dispose', () => {
    const bridge = new TimerBridge();
    const first = vi.fn();
    const second = vi.fn();

    bridge.arm(100, first);
    bridge.arm(200, second);
    bridge.dispose();

    vi.advanceTimersByTime(500);
    expect(first).not.toHaveBeenCalled();
    expect(second).not.toHaveBeenCalled();
    expect(bridge.pendingCount).toBe(0);
    expect(bridge.isDisposed).toBe(true);
  });

  it('refuses to arm after dispose', () => {
    const bridge = new TimerBridge();
    bridge.dispose();

    expect(() => bridge.arm(10, () => {})).toThrow(TimerUnavailableError);
  });

  it('ignores a late callback from a primitive that cannot cancel', () => {
    const callbacks: Array<() => void> = [];
    const primitive: TimerPrimitive = {
      schedule: (_delay, callback) => {
        callbacks.push(callback);
        return () => {};
      },
    };
    const bridge = new TimerBridge(primitive);
    const onFire = vi.fn();

    bridge.arm(10, onFire);
    bridge.dispose();
    callbacks[0]();

    expect(onFire).not.toHaveBeenCalled();
  });

  it('delivers at most once even if the primitive calls back twice', () => {
    const callbacks: Array<() => void> = [];
    const bridge = new TimerBridge({
      schedule: (_delay, callback) => {
        callbacks.push(callback);
        return () => {};
      },
    });
    const onFire = vi.fn();

    bridge.arm(10, onFire);
    callbacks[0]();
    callbacks[0]();

    expect(onFire).toHaveBeenCalledTimes(1);
  });

  it('delivers from a primitive that calls back synchronously', () => {
    const bridge = new TimerBridge({
      schedule: (_delay, callback) => {
        callback();
        return () => {};
      },
    });
    const onFire = vi.fn();

    bridge.arm(0, onFire);

    expect(onFire).toHaveBeenCalledTimes(1);
    expect(bridge.pendingCount).toBe(0);
  });

  describe('waits beyond the setTimeout limit', () => {
    const FOUR_WEEKS = 4 * 7 * 24 * 60 * 60 * 1000;

    it('does not deliver before the full delay', () => {
      const bridge = new TimerBridge();
      const onFire = vi.fn();

      bridge.arm(FOUR_WEEKS, onFire);

      vi.advanceTimersByTime(1000);
      expect(onFire).not.toHaveBeenCalled();

      vi.advanceTimersByTime(MAX_TIMER_DELAY - 1000);
      expect(onFire).not.toHaveBeenCalled();
      expect(bridge.pendingCount).toBe(1);

      vi.advanceTimersByTime(FOUR_WEEKS - MAX_TIMER_DELAY - 1);
      expect(onFire).not.toHaveBeenCalled();

      vi.advanceTimersByTime(1);
      expect(onFire).toHaveBeenCalledTimes(1);
      expect(bridge.pendingCount).toBe(0);
    });

    it('hands the primitive chunks no longer than the limit', () => {
      const delays: number[] = [];
      const callbacks: Array<() => void> = [];
      const bridge = new TimerBridge({
        schedule: (delay, callback) => {
          delays.push(delay);
          callbacks.push(callback);
          return () => {};
        },
      });
      const onFire = vi.fn();

      bridge.arm(MAX_TIMER_DELAY * 2 + 5, onFire);
      callbacks[0]();
      callbacks[1]();
      expect(onFire).not.toHaveBeenCalled();
      callbacks[2]();

      expect(delays).toEqual([MAX_TIMER_DELAY, MAX_TIMER_DELAY, 5]);
      expect(onFire).toHaveBeenCalledTimes(1);
    });

    it('disarms between chunks under the same id', () => {
      const bridge = new TimerBridge();
      const onFire = vi.fn();

      const id = bridge.arm(FOUR_WEEKS, onFire);
      vi.advanceTimersByTime(MAX_TIMER_DELAY);

      expect(bridge.disarm(id)).toBe(true);
      expect(vi.getTimerCount()).toBe(0);

      vi.advanceTimersByTime(FOUR_WEEKS);
      expect(onFire).not.toHaveBeenCalled();
    });

    it('reports a refused later chunk through onError', () => {
      const callbacks: Array<() => void> = [];
      const bridge = new TimerBridge({
        schedule: (_delay, callback) => {
          if (callbacks.length > 0) throw new Error('no handles left');
          callbacks.push(callback);
          return () => {};
        },
      });
      const onFire = vi.fn();
      const onError = vi.fn();

      bridge.arm(MAX_TIMER_DELAY + 10, onFire, onError);
      callbacks[0]();

      expect(onFire).not.toHaveBeenCalled();
      expect(onError).toHaveBeenCalledTimes(1);
      const [error] = onError.mock.calls[0];
      expect(error).toBeInstanceOf(TimerUnavailableError);
      expect(error.message).toBe('Timer refused a 10ms wait: no handles left');
      expect(bridge.pendingCount).toBe(0);
    });
  });

  it('wraps primitive failures in TimerUnavailableError', () => {
    const bridge = new TimerBridge({
      schedule: () => {
        throw new Error('no handles left');
      },
    });

    try {
      bridge.arm(25, () => {});
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(TimerUnavailableError);
      if (error instanceof TimerUnavailableError) {
        expect(error.message).toBe('Timer refused a 25ms wait: no handles left');
        expect(error.operation).toBe('arm');
      }
    }
    expect(bridge.pendingCount).toBe(0);
  });
});

describe('nodeTimers', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('schedules and cancels through setTimeout', () => {
    const fired = vi.fn();
    const cancel = nodeTimers.schedule(50, fired);

    expect(vi.getTimerCount()).toBe(1);
    cancel();
    expect(vi.getTimerCount()).toBe(0);

    nodeTimers.schedule(50, fired);
    vi.advanceTimersByTime(50);
    expect(fired).toHaveBeenCalledTimes(1);
  });
});
