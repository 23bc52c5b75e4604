/**
 * @module events
 * Type-safe event bus definitions for observing layer stores.
 */

import type { LayerStoreKind } from './layer-store';

/** Payload common to every store event. */
export interface StoreEventPayload {
  /** Kind of store that emitted the event. */
  store: LayerStoreKind;
  /** Name of the layer involved. */
  layerName: string;
}

/** Map of event names to their payload types. */
export interface EventMap {
  /** Fired when `add` changed a store. */
  'store:layer-added': StoreEventPayload;
  /** Fired when `erase` changed a store. `layerName` is the layer actually removed. */
  'store:layer-erased': StoreEventPayload;
  /** Fired when `add` was refused because the additive store is full. */
  'store:add-rejected': StoreEventPayload & { capacity: number };
  /** Fired when `special` changed a store. */
  'store:special': { store: LayerStoreKind };
}

/** Listener for one event. */
export type EventCallback<K extends keyof EventMap> = (payload: EventMap[K]) => void;

/** Typed notification channel the stores report changes to. */
export interface EventBus {
  /** Subscribe to an event. Returns an unsubscribe function. */
  on<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Call every listener of `event` with `payload`, in subscription order. */
  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): void;
}
