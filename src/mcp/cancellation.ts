// This module implements cooperative cancellation for long-running invocations and per-request token tracking.

import { CancellationError } from '../utils/errors.js';
import { errorForLog, getFallbackLogger, type LogSink } from '../utils/logger.js';

export type CancellationState = 'pending' | 'cancelled';

export type CancellationCallback = (token: CancellationToken) => void;

// This type receives failures thrown by isolated callbacks; it must not throw itself.
export type FaultSink = (error: unknown, context: { source: string }) => void;

// This interface is the timer dependency a timeout token needs; the returned function disarms the timer.
export interface Scheduler {
  schedule(delayMs: number, task: () => void): () => void;
}

export interface CancellationTokenOptions {
  faultSink?: FaultSink;
  clock?: () => number;
}

export interface Subscription {
  close: () => void;
}

export const nodeScheduler: Scheduler = {
  schedule(delayMs, task) {
    const timer = setTimeout(task, delayMs);
    timer.unref();
    return () => clearTimeout(timer);
  }
};

// This helper builds a fault sink that reports isolated callback failures through a structured logger.
export function createLoggingFaultSink(logger: LogSink): FaultSink {
  return (error, context) => {
    logger.error(
      {
        event: 'isolated_callback_failed',
        source: context.source,
        error: errorForLog(error)
      },
      'isolated_callback_failed'
    );
  };
}

function runIsolated(sink: FaultSink, source: string, action: () => void): void {
  try {
    action();
  } catch (error) {
    sink(error, { source });
  }
}

export class CancellationToken {
  private currentState: CancellationState = 'pending';
  private cancelReason: string | null = null;
  private cancelTimestamp: number | null = null;
  private callbacks: CancellationCallback[] = [];
  private disarmTimer: (() => void) | null = null;
  private readonly faultSink: FaultSink;
  private readonly clock: () => number;

  public constructor(options: CancellationTokenOptions = {}) {
    this.faultSink = options.faultSink ?? createLoggingFaultSink(getFallbackLogger());
    this.clock = options.clock ?? Date.now;
  }

  public static none(options?: CancellationTokenOptions): CancellationToken {
    return new CancellationToken(options);
  }

  public static cancelled(reason?: string, options?: CancellationTokenOptions): CancellationToken {
    const token = new CancellationToken(options);
    token.cancel(reason);
    return token;
  }

  /**
   * Creates a token that the scheduler cancels after `delayMs`. Cancelling the token earlier disarms the timer,
   * and the owner calls `dispose()` once the guarded work settles.
   */
  public static timeout(
    delayMs: number,
    scheduler: Scheduler,
    reason = `Operation timed out after ${delayMs}ms`,
    options?: CancellationTokenOptions
  ): CancellationToken {
    const token = new CancellationToken(options);
    token.disarmTimer = scheduler.schedule(delayMs, () => token.cancel(reason));
    token.onCancelled(() => token.dispose());
    return token;
  }

  public get state(): CancellationState {
    return this.currentState;
  }

  public get isCancelled(): boolean {
    return this.currentState === 'cancelled';
  }

  public get reason(): string | null {
    return this.cancelReason;
  }

  public get cancelledAt(): number | null {
    return this.cancelTimestamp;
  }

  public cancel(reason?: string): void {
    if (this.currentState === 'cancelled') {
      return;
    }

    this.currentState = 'cancelled';
    this.cancelReason = reason ?? null;
    this.cancelTimestamp = this.clock();

    const pending = this.callbacks;
    this.callbacks = [];
    for (const callback of pending) {
      runIsolated(this.faultSink, 'cancellation_callback', () => callback(this));
    }
  }

  public onCancelled(callback: CancellationCallback): Subscription {
    if (this.currentState === 'cancelled') {
      runIsolated(this.faultSink, 'cancellation_callback', () => callback(this));
      return { close: () => undefined };
    }

    this.callbacks.push(callback);
    return {
      close: () => {
        this.callbacks = this.callbacks.filter((registered) => registered !== callback);
      }
    };
  }

  // This method releases the pending timeout without cancelling; it is a no-op for tokens without one.
  public dispose(): void {
    const disarm = this.disarmTimer;
    this.disarmTimer = null;
    disarm?.();
  }

  public throwIfCancelled(): void {
    if (this.currentState === 'cancelled') {
      throw new CancellationError(this);
    }
  }
}

// This helper settles with the operation result unless the token is cancelled first.
export function raceWithToken<T>(operation: Promise<T>, token: CancellationToken): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const subscription = token.onCancelled((cancelled) => reject(new CancellationError(cancelled)));

    operation.then(
      (value) => {
        subscription.close();
        resolve(value);
      },
      (error: unknown) => {
        subscription.close();
        reject(error);
      }
    );
  });
}

export interface CancellationManagerOptions {
  logger?: LogSink;
  faultSink?: FaultSink;
  clock?: () => number;
}

export type GlobalCancellationListener = (requestId: string, token: CancellationToken) => void;

interface TrackedRequest {
  token: CancellationToken;
  method: string;
  registeredAt: number;
}

/**
 * Tracks the token of every in-flight request so a peer's cancellation notice can reach the running handler.
 */
export class CancellationManager {
  private readonly requests = new Map<string, TrackedRequest>();
  private readonly logger: LogSink;
  private readonly faultSink: FaultSink;
  private readonly clock: () => number;
  private globalListener: GlobalCancellationListener | null = null;

  public constructor(options: CancellationManagerOptions = {}) {
    this.logger = options.logger ?? getFallbackLogger();
    this.faultSink = options.faultSink ?? createLoggingFaultSink(this.logger);
    this.clock = options.clock ?? Date.now;
  }

  // A caller-supplied token (for example a timeout token) is tracked instead of a fresh one.
  public register(requestId: string | number, method: string, token?: CancellationToken): CancellationToken {
    const key = String(requestId);
    const tracked = token ?? new CancellationToken({ faultSink: this.faultSink, clock: this.clock });
    this.requests.set(key, { token: tracked, method, registeredAt: this.clock() });

    this.logger.debug(
      { event: 'cancellation_request_registered', requestId: key, method },
      'cancellation_request_registered'
    );
    return tracked;
  }

  public unregister(requestId: string | number): boolean {
    return this.requests.delete(String(requestId));
  }

  public cancel(requestId: string | number, reason?: string): boolean {
    const key = String(requestId);
    const tracked = this.requests.get(key);
    if (!tracked) {
      this.logger.debug(
        { event: 'cancellation_request_unknown', requestId: key, reason: reason ?? null },
        'cancellation_request_unknown'
      );
      return false;
    }

    this.requests.delete(key);
    tracked.token.cancel(reason);

    this.logger.info(
      {
        event: 'cancellation_request_cancelled',
        requestId: key,
        method: tracked.method,
        reason: reason ?? null,
        ageMs: this.clock() - tracked.registeredAt
      },
      'cancellation_request_cancelled'
    );

    const listener = this.globalListener;
    if (listener) {
      runIsolated(this.faultSink, 'global_cancellation_listener', () => listener(key, tracked.token));
    }

    return true;
  }

  public cancelAll(reason?: string): number {
    let cancelled = 0;
    for (const requestId of this.activeRequestIds()) {
      if (this.cancel(requestId, reason)) {
        cancelled += 1;
      }
    }
    return cancelled;
  }

  public get(requestId: string | number): CancellationToken | null {
    return this.requests.get(String(requestId))?.token ?? null;
  }

  public has(requestId: string | number): boolean {
    return this.requests.has(String(requestId));
  }

  public activeRequestIds(): string[] {
    return [...this.requests.keys()];
  }

  public setGlobalListener(listener: GlobalCancellationListener | null): void {
    this.globalListener = listener;
  }
}
