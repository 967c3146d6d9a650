/**
 * Tests for centralized configuration constants
 */
import { describe, it, expect } from 'vitest';
import { EXECUTOR_DEFAULTS, POOL_DEFAULTS, ENV_VARS } from './constants.js';

describe('Configuration Constants', () => {
  describe('EXECUTOR_DEFAULTS', () => {
    it('has sensible default values', () => {
      expect(EXECUTOR_DEFAULTS.NAME).toBe('core_executor');
      expect(EXECUTOR_DEFAULTS.LOG_LEVEL).toBe('warn');
      expect(EXECUTOR_DEFAULTS.DRAIN_ON_SHUTDOWN).toBe(true);
    });
  });

  describe('POOL_DEFAULTS', () => {
    it('has a positive pool size', () => {
      expect(POOL_DEFAULTS.SIZE).toBeGreaterThan(0);
      expect(Number.isInteger(POOL_DEFAULTS.SIZE)).toBe(true);
    });

    it('has a name prefix', () => {
      expect(POOL_DEFAULTS.PREFIX).toBe('pool_thread_');
    });
  });

  describe('ENV_VARS', () => {
    it('namespaces every variable', () => {
      for (const name of Object.values(ENV_VARS)) {
        expect(name.startsWith('TASKLOOP_')).toBe(true);
      }
    });
  });
});
