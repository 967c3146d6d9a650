import { TimerUnavailableError, describeCause } from '../errors/index.js';

/**
 * One-shot delayed notification. `schedule` returns a function that cancels
 * the notification if it has not been delivered yet.
 */
export interface TimerPrimitive {
  schedule(delay: number, callback: () => void): () => void;
}

/**
 * Timers on the Node.js event loop. Globals are looked up on every call so
 * fake timers installed after import still apply.
 */
export const nodeTimers: TimerPrimitive = {
  schedule(delay, callback) {
    const timeout = setTimeout(callback, delay);
    return () => clearTimeout(timeout);
  },
};

export type TimerId = number;

/** Longest wait setTimeout honours; larger delays fire after 1ms */
export const MAX_TIMER_DELAY = 2_147_483_647;

/**
 * Couples slots to a timer primitive. Each `arm` produces at most one
 * notification; after `dispose` every pending notification is dropped.
 * Waits longer than MAX_TIMER_DELAY are split into consecutive chunks under
 * the same TimerId.
 */
export class TimerBridge {
  private readonly primitive: TimerPrimitive;
  private readonly pending: Map<TimerId, () => void> = new Map();
  private sequence = 0;
  private disposed = false;

  constructor(primitive: TimerPrimitive = nodeTimers) {
    this.primitive = primitive;
  }

  /**
   * Request `onFire` after `delay` ms. Throws TimerUnavailableError when the
   * bridge is disposed or the primitive refuses. A refusal while re-arming a
   * later chunk goes to `onError`, or is thrown from the timer callback when
   * none is given.
   */
  arm(
    delay: number,
    onFire: () => void,
    onError?: (error: TimerUnavailableError) => void
  ): TimerId {
    if (this.disposed) {
      throw new TimerUnavailableError('Cannot arm a timer after the bridge was disposed', 'arm');
    }

    const id = ++this.sequence;
    const wait = Math.max(0, delay);

    try {
      this.wait(id, wait, onFire, onError);
    } catch (error) {
      this.pending.delete(id);
      throw refused(wait, error);
    }

    return id;
  }

  /**
   * Cancel a pending notification. Returns false if it already fired.
   */
  disarm(id: TimerId): boolean {
    const cancel = this.pending.get(id);
    if (!cancel) return false;

    this.pending.delete(id);
    cancel();
    return true;
  }

  /**
   * Cancel everything and refuse further arms
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    const cancels = [...this.pending.values()];
    this.pending.clear();
    for (const cancel of cancels) {
      cancel();
    }
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  private wait(
    id: TimerId,
    remaining: number,
    onFire: () => void,
    onError?: (error: TimerUnavailableError) => void
  ): void {
    const step = Math.min(remaining, MAX_TIMER_DELAY);
    // Registered before scheduling so a primitive that calls back synchronously still delivers
    this.pending.set(id, noop);

    const cancel = this.primitive.schedule(step, () => {
      if (remaining > step) {
        this.resume(id, remaining - step, onFire, onError);
      } else {
        this.fire(id, onFire);
      }
    });
    if (this.pending.get(id) === noop) {
      this.pending.set(id, cancel);
    }
  }

  private resume(
    id: TimerId,
    remaining: number,
    onFire: () => void,
    onError?: (error: TimerUnavailableError) => void
  ): void {
    if (this.disposed || !this.pending.has(id)) return;

    try {
      this.wait(id, remaining, onFire, onError);
    } catch (error) {
      this.pending.delete(id);
      const unavailable = refused(remaining, error);
      if (!onError) throw unavailable;
      onError(unavailable);
    }
  }

  private fire(id: TimerId, onFire: () => void): void {
    if (this.disposed || !this.pending.delete(id)) return;
    onFire();
  }
}

function refused(delay: number, cause: unknown): TimerUnavailableError {
  return new TimerUnavailableError(
    `Timer refused a ${delay}ms wait: ${describeCause(cause)}`,
    'arm',
    cause
  );
}

function noop(): void {}
