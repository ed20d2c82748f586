/**
 * Lifecycle signal tests
 */

import { describe, it, expect, vi } from 'vitest';
import { LifecycleSignals, SignalObserver } from '../../src/services/lifecycleSignals';

describe('LifecycleSignals', () => {
  it('notifies listeners of the emitted signal only', () => {
    const signals = new LifecycleSignals();
    const pressure = vi.fn();
    const background = vi.fn();
    signals.on('memoryPressure', pressure);
    signals.on('enteredBackground', background);

    signals.emitMemoryPressure();

    expect(pressure).toHaveBeenCalledTimes(1);
    expect(background).not.toHaveBeenCalled();
  });

  it('returns a function that removes the listener', () => {
    const signals = new LifecycleSignals();
    const listener = vi.fn();
    const remove = signals.on('enteredBackground', listener);

    remove();
    signals.emitEnteredBackground();

    expect(listener).not.toHaveBeenCalled();
    expect(signals.listenerCount('enteredBackground')).toBe(0);
  });
});

describe('SignalObserver', () => {
  it('passes the target to the handler', () => {
    const signals = new LifecycleSignals();
    const target = { cleared: 0 };
    const observer = new SignalObserver(signals, target);

    observer.when('memoryPressure', observed => {
      observed.cleared += 1;
    });
    signals.emit('memoryPressure');
    signals.emit('memoryPressure');

    expect(target.cleared).toBe(2);
    expect(observer.isAlive()).toBe(true);
    expect(observer.observationCount).toBe(1);
  });

  it('removes single observations and all of them', () => {
    const signals = new LifecycleSignals();
    const observer = new SignalObserver(signals, {});
    const handler = vi.fn();

    const unobserve = observer.when('memoryPressure', handler);
    observer.when('enteredBackground', handler);
    unobserve();
    expect(observer.observationCount).toBe(1);

    observer.removeAll();
    signals.emitMemoryPressure();
    signals.emitEnteredBackground();

    expect(handler).not.toHaveBeenCalled();
    expect(observer.observationCount).toBe(0);
    expect(signals.listenerCount('enteredBackground')).toBe(0);
  });
});
