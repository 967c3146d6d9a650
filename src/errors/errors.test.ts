import { describe, it, expect } from 'vitest';
import {
  SchedulerError,
  ConfigurationError,
  TaskFault,
  TimerUnavailableError,
  PoolClosedError,
  isSchedulerError,
  formatErrors,
  describeCause,
} from './index.js';

describe('Error classes', () => {
  describe('SchedulerError', () => {
    it('should format message and details', () => {
      const error = new SchedulerError('Something went wrong', 'INVALID_TRANSITION', {
        slotId: 'main-1',
        state: 'scheduled',
      });

      expect(error.format()).toBe(
        'SchedulerError: Something went wrong\n  slotId: main-1\n  state: scheduled'
      );
    });

    it('should skip undefined details', () => {
      const error = new SchedulerError('Oops', 'INVALID_TRANSITION', { slotName: undefined });
      expect(error.format()).toBe('SchedulerError: Oops');
    });

    it('should use format for toString', () => {
      const error = new SchedulerError('Oops', 'INVALID_TRANSITION');
      expect(String(error)).toBe('SchedulerError: Oops');
    });
  });

  describe('ConfigurationError', () => {
    it('should carry field and value', () => {
      const error = new ConfigurationError('period must be positive', 'period', -5);

      expect(error.name).toBe('ConfigurationError');
      expect(error.code).toBe('CONFIGURATION');
      expect(error.field).toBe('period');
      expect(error.value).toBe(-5);
      expect(error.format()).toBe(
        'ConfigurationError: period must be positive\n  field: period\n  value: -5'
      );
    });

    it('should be an instance of SchedulerError and Error', () => {
      const error = new ConfigurationError('bad', 'poolSize', 0);
      expect(error).toBeInstanceOf(SchedulerError);
      expect(error).toBeInstanceOf(Error);
      expect(isSchedulerError(error)).toBe(true);
    });
  });

  describe('TaskFault', () => {
    it('should describe the slot and run', () => {
      const cause = new Error('boom');
      const fault = new TaskFault('main-3', 2, cause);

      expect(fault.message).toBe('Task main-3 failed on run 2: boom');
      expect(fault.cause).toBe(cause);
      expect(fault.slotId).toBe('main-3');
      expect(fault.run).toBe(2);
      expect(fault.code).toBe('TASK_FAULT');
    });

    it('should include the slot name when given', () => {
      const fault = new TaskFault('main-1', 1, 'disk full', 'flush');
      expect(fault.message).toBe("Task 'flush' (main-1) failed on run 1: disk full");
      expect(fault.format()).toBe(
        "TaskFault: Task 'flush' (main-1) failed on run 1: disk full\n" +
          '  slotId: main-1\n' +
          '  slotName: flush\n' +
          '  run: 1\n' +
          '  caused by: disk full'
      );
    });
  });

  describe('TimerUnavailableError', () => {
    it('should record the refused operation', () => {
      const error = new TimerUnavailableError('timer refused', 'arm', new Error('no handles'));

      expect(error.operation).toBe('arm');
      expect(error.code).toBe('TIMER_UNAVAILABLE');
      expect(error.format()).toBe(
        'TimerUnavailableError: timer refused\n  operation: arm\n  caused by: no handles'
      );
    });
  });

  describe('PoolClosedError', () => {
    it('should name the pool', () => {
      const error = new PoolClosedError('workers');
      expect(error.message).toBe("Worker pool 'workers' is closed");
      expect(error.pool).toBe('workers');
    });
  });
});

describe('formatErrors', () => {
  it('should join formatted errors with blank lines', () => {
    const errors = [
      new ConfigurationError('first', 'a', 1),
      new PoolClosedError('p'),
    ];

    expect(formatErrors(errors)).toBe(
      'ConfigurationError: first\n  field: a\n  value: 1\n\n' +
        "PoolClosedError: Worker pool 'p' is closed\n  pool: p"
    );
  });
});

describe('describeCause', () => {
  it('should describe errors, strings and other values', () => {
    expect(describeCause(new Error('x'))).toBe('x');
    expect(describeCause('plain')).toBe('plain');
    expect(describeCause(42)).toBe('42');
    expect(describeCause(undefined)).toBe('undefined');
  });
});
