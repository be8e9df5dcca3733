// This module buffers outbound change notifications until the transport drains them.

import { createLoggingFaultSink, type FaultSink, type Subscription } from './cancellation.js';
import { getFallbackLogger, type LogSink } from '../utils/logger.js';

export const NOTIFICATION_KINDS = {
  toolsListChanged: 'notifications/tools/list_changed',
  resourcesListChanged: 'notifications/resources/list_changed',
  promptsListChanged: 'notifications/prompts/list_changed',
  resourceUpdated: 'notifications/resources/updated',
  message: 'notifications/message'
} as const;

export type NotificationKind = (typeof NOTIFICATION_KINDS)[keyof typeof NOTIFICATION_KINDS];

export interface QueuedNotification {
  kind: NotificationKind;
  payload: Record<string, unknown>;
  sequence: number;
}

export type EnqueueListener = (notification: QueuedNotification) => void;

export interface NotificationQueueOptions {
  logger?: LogSink;
  faultSink?: FaultSink;
}

/**
 * Unbounded FIFO of pending notifications. Nothing is coalesced: N mutations produce N records, and consumers
 * that want coalescing do it at drain time.
 */
export class NotificationQueue {
  private pending: QueuedNotification[] = [];
  private nextSequence = 1;
  private readonly listeners = new Set<EnqueueListener>();
  private readonly logger: LogSink;
  private readonly faultSink: FaultSink;

  public constructor(options: NotificationQueueOptions = {}) {
    this.logger = options.logger ?? getFallbackLogger();
    this.faultSink = options.faultSink ?? createLoggingFaultSink(this.logger);
  }

  public enqueue(kind: NotificationKind, payload: Record<string, unknown> = {}): QueuedNotification {
    const notification: QueuedNotification = { kind, payload, sequence: this.nextSequence };
    this.nextSequence += 1;
    this.pending.push(notification);

    this.logger.debug(
      { event: 'notification_enqueued', kind, sequence: notification.sequence, queueSize: this.pending.length },
      'notification_enqueued'
    );

    for (const listener of this.listeners) {
      try {
        listener(notification);
      } catch (error) {
        this.faultSink(error, { source: 'notification_listener' });
      }
    }

    return notification;
  }

  public drain(): QueuedNotification[] {
    const drained = this.pending;
    this.pending = [];
    return drained;
  }

  public peek(): readonly QueuedNotification[] {
    return [...this.pending];
  }

  public size(): number {
    return this.pending.length;
  }

  public onEnqueue(listener: EnqueueListener): Subscription {
    this.listeners.add(listener);
    return {
      close: () => {
        this.listeners.delete(listener);
      }
    };
  }
}
