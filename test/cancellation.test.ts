// This test suite verifies cancellation token state transitions, callback isolation, timers, and request tracking.

import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  CancellationManager,
  CancellationToken,
  nodeScheduler,
  raceWithToken,
  type FaultSink,
  type Scheduler
} from '../src/mcp/cancellation.js';
import { CancellationError } from '../src/utils/errors.js';
import { createLogger } from '../src/utils/logger.js';

const logger = createLogger('silent');

// This scheduler stub lets tests fire or inspect timers deterministically.
function createManualScheduler(): Scheduler & { fire: () => void; armed: () => number } {
  const tasks = new Map<number, () => void>();
  let nextId = 1;

  return {
    schedule(_delayMs, task) {
      const id = nextId;
      nextId += 1;
      tasks.set(id, task);
      return () => {
        tasks.delete(id);
      };
    },
    fire() {
      for (const [id, task] of [...tasks]) {
        tasks.delete(id);
        task();
      }
    },
    armed() {
      return tasks.size;
    }
  };
}

describe('cancellation token', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('keeps the first reason and timestamp when cancelled twice', () => {
    let now = 100;
    const token = new CancellationToken({ clock: () => now });

    token.cancel('a');
    now = 200;
    token.cancel('b');

    expect(token.state).toBe('cancelled');
    expect(token.reason).toBe('a');
    expect(token.cancelledAt).toBe(100);
  });

  it('runs callbacks in registration order exactly once', () => {
    const token = CancellationToken.none();
    const calls: string[] = [];
    token.onCancelled(() => calls.push('first'));
    token.onCancelled(() => calls.push('second'));

    token.cancel();
    token.cancel();

    expect(calls).toEqual(['first', 'second']);
  });

  it('runs a callback immediately when subscribing after cancellation', () => {
    const token = CancellationToken.cancelled('done');
    const callback = vi.fn();

    token.onCancelled(callback);

    expect(callback).toHaveBeenCalledTimes(1);
    expect(callback).toHaveBeenCalledWith(token);
  });

  it('isolates failing callbacks and reports them to the fault sink', () => {
    const faultSink = vi.fn<FaultSink>();
    const token = new CancellationToken({ faultSink });
    const after = vi.fn();
    token.onCancelled(() => {
      throw new Error('subscriber failed');
    });
    token.onCancelled(after);

    expect(() => token.cancel('stop')).not.toThrow();
    expect(after).toHaveBeenCalledTimes(1);
    expect(faultSink).toHaveBeenCalledTimes(1);
    expect(faultSink.mock.calls[0]?.[1]).toEqual({ source: 'cancellation_callback' });
  });

  it('stops delivering to closed subscriptions', () => {
    const token = CancellationToken.none();
    const callback = vi.fn();
    token.onCancelled(callback).close();

    token.cancel();

    expect(callback).not.toHaveBeenCalled();
  });

  it('throws CancellationError carrying reason and token only when cancelled', () => {
    const token = CancellationToken.none();
    expect(() => token.throwIfCancelled()).not.toThrow();

    token.cancel('user abort');
    try {
      token.throwIfCancelled();
      expect.unreachable('token should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(CancellationError);
      if (error instanceof CancellationError) {
        expect(error.reason).toBe('user abort');
        expect(error.token).toBe(token);
      }
    }
  });

  it('cancels a timeout token when the scheduler fires', () => {
    const scheduler = createManualScheduler();
    const token = CancellationToken.timeout(50, scheduler);

    expect(token.isCancelled).toBe(false);
    scheduler.fire();

    expect(token.isCancelled).toBe(true);
    expect(token.reason).toBe('Operation timed out after 50ms');
  });

  it('disarms the timer when a timeout token is cancelled early', () => {
    const scheduler = createManualScheduler();
    const token = CancellationToken.timeout(50, scheduler, 'too slow');

    expect(scheduler.armed()).toBe(1);
    token.cancel('finished');

    expect(scheduler.armed()).toBe(0);
    expect(token.reason).toBe('finished');
  });

  it('disposes a timeout token without cancelling it', () => {
    const scheduler = createManualScheduler();
    const token = CancellationToken.timeout(50, scheduler);

    token.dispose();
    token.dispose();

    expect(scheduler.armed()).toBe(0);
    expect(token.isCancelled).toBe(false);
  });

  it('arms a real timer through the node scheduler', () => {
    vi.useFakeTimers();
    const token = CancellationToken.timeout(1000, nodeScheduler, 'deadline');

    vi.advanceTimersByTime(999);
    expect(token.isCancelled).toBe(false);

    vi.advanceTimersByTime(1);
    expect(token.isCancelled).toBe(true);
    expect(token.reason).toBe('deadline');
  });

  it('rejects a raced operation as soon as the token is cancelled', async () => {
    const token = CancellationToken.none();
    const pending = new Promise<string>(() => undefined);
    const raced = raceWithToken(pending, token);

    token.cancel('abandoned');

    await expect(raced).rejects.toBeInstanceOf(CancellationError);
  });

  it('settles a raced operation with its own value before cancellation', async () => {
    const token = CancellationToken.none();

    await expect(raceWithToken(Promise.resolve('value'), token)).resolves.toBe('value');
  });
});

describe('cancellation manager', () => {
  it('cancels a tracked request and forgets it', () => {
    const manager = new CancellationManager({ logger });
    const token = manager.register('req-1', 'tools/call');

    expect(manager.has('req-1')).toBe(true);
    expect(manager.cancel('req-1', 'peer asked')).toBe(true);

    expect(token.isCancelled).toBe(true);
    expect(token.reason).toBe('peer asked');
    expect(manager.has('req-1')).toBe(false);
    expect(manager.cancel('req-1')).toBe(false);
  });

  it('tracks numeric and string ids under the same key', () => {
    const manager = new CancellationManager({ logger });
    const supplied = CancellationToken.none();
    manager.register(7, 'prompts/get', supplied);

    expect(manager.get('7')).toBe(supplied);
    expect(manager.activeRequestIds()).toEqual(['7']);
    expect(manager.unregister(7)).toBe(true);
    expect(manager.get(7)).toBeNull();
  });

  it('cancels every active request', () => {
    const manager = new CancellationManager({ logger });
    const first = manager.register('a', 'tools/call');
    const second = manager.register('b', 'resources/read');

    expect(manager.cancelAll('shutdown')).toBe(2);
    expect(first.reason).toBe('shutdown');
    expect(second.reason).toBe('shutdown');
    expect(manager.activeRequestIds()).toEqual([]);
  });

  it('isolates a failing global listener', () => {
    const faultSink = vi.fn<FaultSink>();
    const manager = new CancellationManager({ logger, faultSink });
    manager.setGlobalListener(() => {
      throw new Error('listener failed');
    });
    manager.register('req', 'tools/call');

    expect(manager.cancel('req')).toBe(true);
    expect(faultSink).toHaveBeenCalledWith(expect.any(Error), { source: 'global_cancellation_listener' });
  });
});
