/**
 * Callback Queue
 *
 * The single context on which every result delivery happens. Callbacks are
 * run in FIFO order on a later turn of the event loop, never inside the call
 * that dispatched them.
 */

import { errorDetails } from '../errors/baseErrors';
import { silentLogger, type Logger } from './logging';

export class CallbackQueue {
  private pending: Array<() => void> = [];
  private scheduled = false;
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly logger: Logger = silentLogger) {}

  /**
   * Queue a callback. A callback that throws is logged and does not stop
   * the ones queued after it.
   */
  dispatch(callback: () => void): void {
    this.pending.push(callback);
    this.schedule();
  }

  get size(): number {
    return this.pending.length;
  }

  /**
   * Resolves once every queued callback, including those queued while
   * draining, has run
   */
  whenIdle(): Promise<void> {
    if (!this.scheduled && this.pending.length === 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  private schedule(): void {
    if (this.scheduled) return;
    this.scheduled = true;
    setImmediate(() => this.drain());
  }

  private drain(): void {
    this.scheduled = false;
    const batch = this.pending;
    this.pending = [];

    for (const callback of batch) {
      try {
        callback();
      } catch (error) {
        this.logger.error('Result callback threw', errorDetails(error));
      }
    }

    if (this.pending.length > 0) {
      this.schedule();
      return;
    }

    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach(resolve => resolve());
  }
}
