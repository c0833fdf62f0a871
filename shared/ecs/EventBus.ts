// ============================================
// Event Bus - Queued Pub/Sub
// ============================================

import { consoleLogger, type EcsLogger } from './types';
import type { EventPayload } from './events';

export type EventCallback<T = unknown> = (data: T, timestamp: number) => void;

/**
 * Returned by on()/once(); pass to off() to unsubscribe.
 */
export interface ListenerHandle {
  readonly eventType: string;
  readonly id: number;
}

interface Listener {
  id: number;
  callback: EventCallback<unknown>;
  once: boolean;
  removed: boolean;
}

interface QueuedEvent {
  type: string;
  data: unknown;
  time: number;
}

export interface EventBusOptions {
  logger?: EcsLogger;
  /** Seconds; defaults to performance.now() / 1000 */
  clock?: () => number;
}

/**
 * EventBus - deferred publish/subscribe.
 *
 * emit() only enqueues. processEvents() delivers the batch that was queued
 * when it started; anything emitted by listeners during delivery waits for
 * the next call. Each World owns one bus.
 */
export class EventBus {
  private listeners = new Map<string, Listener[]>();
  private queue: QueuedEvent[] = [];
  private nextListenerId = 1;
  private lastTimestamp = 0;
  private readonly logger: EcsLogger;
  private readonly clock: () => number;

  constructor(options: EventBusOptions = {}) {
    this.logger = options.logger ?? consoleLogger;
    this.clock = options.clock ?? (() => performance.now() / 1000);
  }

  // ============================================
  // Subscription
  // ============================================

  /**
   * Register a listener. Listeners for one event type run in subscription order.
   */
  on<K extends string, T = EventPayload<K>>(eventType: K, callback: EventCallback<T>): ListenerHandle {
    return this.addListener(eventType, callback as EventCallback<unknown>, false);
  }

  /**
   * Register a listener that is removed after its first delivery.
   */
  once<K extends string, T = EventPayload<K>>(eventType: K, callback: EventCallback<T>): ListenerHandle {
    return this.addListener(eventType, callback as EventCallback<unknown>, true);
  }

  /**
   * Remove a listener by handle. Returns false if it was already gone.
   */
  off(handle: ListenerHandle): boolean {
    const list = this.listeners.get(handle.eventType);
    if (!list) return false;

    const index = list.findIndex((listener) => listener.id === handle.id);
    if (index === -1) return false;

    list[index].removed = true;
    list.splice(index, 1);
    if (list.length === 0) {
      this.listeners.delete(handle.eventType);
    }
    return true;
  }

  private addListener(eventType: string, callback: EventCallback<unknown>, once: boolean): ListenerHandle {
    const listener: Listener = { id: this.nextListenerId++, callback, once, removed: false };
    const list = this.listeners.get(eventType);
    if (list) {
      list.push(listener);
    } else {
      this.listeners.set(eventType, [listener]);
    }
    return { eventType, id: listener.id };
  }

  // ============================================
  // Emission & Delivery
  // ============================================

  /**
   * Queue an event. Never calls listeners synchronously.
   */
  emit<K extends string>(eventType: K, data: EventPayload<K>): void {
    const now = Math.max(this.clock(), this.lastTimestamp);
    this.lastTimestamp = now;
    this.queue.push({ type: eventType, data, time: now });
  }

  /**
   * Deliver every event queued before this call.
   * A throwing listener is logged and does not stop delivery to the rest.
   * Returns the number of events processed.
   */
  processEvents(): number {
    const batch = this.queue;
    this.queue = [];

    for (const event of batch) {
      const list = this.listeners.get(event.type);
      if (!list) continue;

      // Snapshot: subscriptions made during delivery start with the next event
      for (const listener of [...list]) {
        if (listener.removed) continue;
        if (listener.once) {
          this.off({ eventType: event.type, id: listener.id });
        }

        try {
          listener.callback(event.data, event.time);
        } catch (error) {
          this.logger.error(
            {
              event: 'listener_error',
              eventType: event.type,
              error: error instanceof Error ? error.message : String(error),
              stack: error instanceof Error ? error.stack : undefined,
            },
            `Listener for "${event.type}" threw an error`
          );
        }
      }
    }

    return batch.length;
  }

  // ============================================
  // Introspection & Cleanup
  // ============================================

  /**
   * Number of events waiting for the next processEvents()
   */
  getPendingEventCount(): number {
    return this.queue.length;
  }

  /**
   * Listener count for one event type, or across all types
   */
  getListenerCount(eventType?: string): number {
    if (eventType !== undefined) {
      return this.listeners.get(eventType)?.length ?? 0;
    }
    let count = 0;
    for (const list of this.listeners.values()) {
      count += list.length;
    }
    return count;
  }

  /**
   * Drop listeners for one event type, or all of them
   */
  clearListeners(eventType?: string): void {
    const lists = eventType !== undefined ? [this.listeners.get(eventType)] : [...this.listeners.values()];
    for (const list of lists) {
      list?.forEach((listener) => {
        listener.removed = true;
      });
    }
    if (eventType !== undefined) {
      this.listeners.delete(eventType);
    } else {
      this.listeners.clear();
    }
  }

  /**
   * Discard queued events without delivering them
   */
  clearQueue(): void {
    this.queue = [];
  }
}
