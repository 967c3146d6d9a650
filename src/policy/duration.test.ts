import { describe, it, expect } from 'vitest';
import { toMillis, requireMillis, formatMillis } from './duration.js';
import { ConfigurationError } from '../errors/index.js';

describe('toMillis', () => {
  it('passes plain milliseconds through', () => {
    expect(toMillis(250)).toBe(250);
  });

  it('should convert seconds to ms', () => {
    expect(toMillis({ value: 30, unit: 'seconds' })).toBe(30_000);
  });

  it('should convert minutes to ms', () => {
    expect(toMillis({ value: 5, unit: 'minutes' })).toBe(5 * 60 * 1000);
  });

  it('should convert hours to ms', () => {
    expect(toMillis({ value: 6, unit: 'hours' })).toBe(6 * 60 * 60 * 1000);
  });

  it('should convert days to ms', () => {
    expect(toMillis({ value: 1, unit: 'days' })).toBe(24 * 60 * 60 * 1000);
  });

  it('should convert weeks to ms', () => {
    expect(toMillis({ value: 1, unit: 'weeks' })).toBe(7 * 24 * 60 * 60 * 1000);
  });
});

describe('requireMillis', () => {
  it('accepts the inclusive bound', () => {
    expect(requireMillis('initialDelay', 0, 0, false)).toBe(0);
  });

  it('rejects the exclusive bound', () => {
    expect(() => requireMillis('period', 0, 0, true)).toThrow(ConfigurationError);
  });

  it('reports the original duration as the value', () => {
    const duration = { value: -1, unit: 'seconds' as const };
    try {
      requireMillis('period', duration, 0, true);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.value).toBe(duration);
        expect(error.message).toBe('period must be greater than 0ms, got -1000ms');
      }
    }
  });
});

describe('formatMillis', () => {
  it('picks the largest whole unit', () => {
    expect(formatMillis(2000)).toBe('2s');
    expect(formatMillis(90_000)).toBe('90s');
    expect(formatMillis(3_600_000)).toBe('1h');
    expect(formatMillis(86_400_000)).toBe('1d');
    expect(formatMillis(1_209_600_000)).toBe('2w');
  });

  it('falls back to milliseconds', () => {
    expect(formatMillis(1500)).toBe('1500ms');
    expect(formatMillis(0)).toBe('0ms');
  });
});
