/**
 * Lifecycle signals
 *
 * The embedding application reports memory pressure and moving to the
 * background through {@link LifecycleSignals}. Components subscribe through a
 * {@link SignalObserver}, which holds its target weakly so that an observer
 * never keeps a discarded cache alive.
 */

import { EventEmitter } from 'node:events';

export type LifecycleSignal = 'memoryPressure' | 'enteredBackground';

export type Unobserver = () => void;

export class LifecycleSignals {
  private readonly emitter = new EventEmitter();

  constructor() {
    // Every cache instance adds its own listeners
    this.emitter.setMaxListeners(0);
  }

  emit(signal: LifecycleSignal): void {
    this.emitter.emit(signal);
  }

  emitMemoryPressure(): void {
    this.emit('memoryPressure');
  }

  emitEnteredBackground(): void {
    this.emit('enteredBackground');
  }

  on(signal: LifecycleSignal, listener: () => void): Unobserver {
    this.emitter.on(signal, listener);
    return () => {
      this.emitter.off(signal, listener);
    };
  }

  listenerCount(signal: LifecycleSignal): number {
    return this.emitter.listenerCount(signal);
  }
}

/**
 * Observes lifecycle signals on behalf of a target object
 *
 * The target is held through a `WeakRef`. Each delivery checks that the
 * target is still alive; once it has been collected the observation removes
 * itself instead of delivering.
 */
export class SignalObserver<T extends object> {
  private readonly target: WeakRef<T>;
  private readonly unobservers = new Set<Unobserver>();

  constructor(private readonly signals: LifecycleSignals, target: T) {
    this.target = new WeakRef(target);
  }

  isAlive(): boolean {
    return this.target.deref() !== undefined;
  }

  /**
   * Perform `handler` with the target each time `signal` is emitted
   *
   * @returns A function removing this observation
   */
  when(signal: LifecycleSignal, handler: (target: T) => void): Unobserver {
    if (!this.isAlive()) {
      return () => {};
    }

    const remove = this.signals.on(signal, () => {
      const target = this.target.deref();
      if (target === undefined) {
        unobserve();
        return;
      }
      handler(target);
    });

    const unobserve: Unobserver = () => {
      remove();
      this.unobservers.delete(unobserve);
    };
    this.unobservers.add(unobserve);
    return unobserve;
  }

  get observationCount(): number {
    return this.unobservers.size;
  }

  removeAll(): void {
    [...this.unobservers].forEach(unobserve => unobserve());
  }
}
