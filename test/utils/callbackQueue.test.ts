/**
 * Callback Queue Tests
 */

import { describe, it, expect } from 'vitest';
import { CallbackQueue } from '../../src/utils/callbackQueue';
import { createMockLogger } from '../mocks/logging';

describe('CallbackQueue', () => {
  it('never runs a callback inside dispatch', async () => {
    const queue = new CallbackQueue();
    const calls: string[] = [];

    queue.dispatch(() => calls.push('callback'));
    calls.push('after dispatch');

    expect(calls).toEqual(['after dispatch']);
    await queue.whenIdle();
    expect(calls).toEqual(['after dispatch', 'callback']);
  });

  it('runs callbacks in dispatch order, including ones queued while draining', async () => {
    const queue = new CallbackQueue();
    const calls: number[] = [];

    queue.dispatch(() => {
      calls.push(1);
      queue.dispatch(() => calls.push(3));
    });
    queue.dispatch(() => calls.push(2));

    expect(queue.size).toBe(2);
    await queue.whenIdle();
    expect(calls).toEqual([1, 2, 3]);
    expect(queue.size).toBe(0);
  });

  it('logs a throwing callback and keeps going', async () => {
    const logger = createMockLogger();
    const queue = new CallbackQueue(logger);
    const calls: string[] = [];

    queue.dispatch(() => {
      throw new Error('boom');
    });
    queue.dispatch(() => calls.push('next'));
    await queue.whenIdle();

    expect(calls).toEqual(['next']);
    expect(logger.error).toHaveBeenCalledWith(
      'Result callback threw',
      expect.objectContaining({ error: 'boom', errorType: 'Error' })
    );
  });

  it('resolves whenIdle immediately when nothing is queued', async () => {
    const queue = new CallbackQueue();
    await expect(queue.whenIdle()).resolves.toBeUndefined();
  });
});
