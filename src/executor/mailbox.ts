/**
 * Single-consumer message queue. Messages are handled one at a time, in
 * post order, starting on a microtask after the first post; a handler
 * returning a promise holds back the next message until it settles.
 */
export class Mailbox<M> {
  private queue: M[] = [];
  private draining = false;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly handler: (message: M) => Promise<void> | void,
    private readonly onError: (error: unknown, message: M) => void
  ) {}

  /**
   * Enqueue a message. Returns false (and drops it) once closed.
   */
  post(message: M): boolean {
    if (this.closed) return false;

    this.queue.push(message);
    if (!this.draining) {
      this.draining = true;
      queueMicrotask(() => {
        void this.drain();
      });
    }
    return true;
  }

  /**
   * Resolves once every posted message has been handled
   */
  whenIdle(): Promise<void> {
    if (!this.draining) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Refuse further posts and return the messages that were never handled.
   * A handler already running is not interrupted.
   */
  close(): M[] {
    this.closed = true;
    const dropped = this.queue;
    this.queue = [];
    return dropped;
  }

  get size(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private async drain(): Promise<void> {
    try {
      let message: M | undefined;
      while ((message = this.queue.shift()) !== undefined) {
        try {
          await this.handler(message);
        } catch (error) {
          this.onError(error, message);
        }
      }
    } finally {
      this.draining = false;
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) {
        resolve();
      }
    }
  }
}
