/**
 * @module event-bus
 * In-process implementation of the store {@link @cellpaint/types#EventBus}.
 */

import type { EventBus, EventCallback, EventMap } from '@cellpaint/types';

/** One listener set per event, created on first subscription. */
type ListenerSets = { [K in keyof EventMap]?: Set<EventCallback<K>> };

/**
 * Synchronous event bus. Listeners run in subscription order and may
 * unsubscribe while an event is being delivered.
 */
export class EventBusImpl implements EventBus {
  private listeners: ListenerSets = {};

  /** @inheritdoc */
  on<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void {
    const set: Set<EventCallback<K>> = this.listeners[event] ?? new Set<EventCallback<K>>();
    this.listeners[event] = set;
    set.add(callback);

    return () => {
      set.delete(callback);
      if (set.size === 0 && this.listeners[event] === set) {
        delete this.listeners[event];
      }
    };
  }

  /** @inheritdoc */
  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): void {
    const set = this.listeners[event];
    if (!set) return;

    for (const callback of [...set]) {
      callback(payload);
    }
  }
}
