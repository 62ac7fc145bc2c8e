/**
 * Simple in-memory pub/sub event bus.
 * The ledger emits its notifications here; the WebSocket feed and tests subscribe.
 */

import { LedgerEventMap, LedgerEventSink, LedgerEventType } from '../domain/governance/governanceTypes.js';

export type EventType = LedgerEventType;
export type EventPayload = LedgerEventMap[EventType];

export type EventCallback = (event: EventType, data: EventPayload) => void;
export type ListenerErrorHandler = (event: EventType, error: unknown) => void;

const reportListenerError: ListenerErrorHandler = (event, error) => {
  console.error(`event listener for '${event}' failed`, error);
};

export class EventBus implements LedgerEventSink {
  private listeners: Map<EventType, Set<EventCallback>> = new Map();
  private wildcardListeners: Set<EventCallback> = new Set();

  constructor(private readonly onListenerError: ListenerErrorHandler = reportListenerError) {}

  /**
   * Subscribe to a specific event type, or '*' for all events.
   */
  on(event: EventType | '*', callback: EventCallback): () => void {
    if (event === '*') {
      this.wildcardListeners.add(callback);
      return () => {
        this.wildcardListeners.delete(callback);
      };
    }

    let specific = this.listeners.get(event);
    if (!specific) {
      specific = new Set();
      this.listeners.set(event, specific);
    }
    specific.add(callback);

    return () => {
      this.listeners.get(event)?.delete(callback);
    };
  }

  /**
   * Emit an event to all matching subscribers. A throwing listener is reported
   * to the error handler and does not stop delivery to the others.
   */
  emit<K extends EventType>(event: K, data: LedgerEventMap[K]): void {
    const callbacks = [...(this.listeners.get(event) ?? []), ...this.wildcardListeners];
    for (const cb of callbacks) {
      try {
        cb(event, data);
      } catch (error) {
        this.onListenerError(event, error);
      }
    }
  }

  listenerCount(): number {
    let count = this.wildcardListeners.size;
    for (const set of this.listeners.values()) count += set.size;
    return count;
  }

  /**
   * Remove all listeners. Useful for tests.
   */
  clear(): void {
    this.listeners.clear();
    this.wildcardListeners.clear();
  }
}
