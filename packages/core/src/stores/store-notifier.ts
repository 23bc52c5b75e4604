/**
 * @module stores/store-notifier
 * Event and debug-log output shared by the store variants.
 */

import type { EventBus, LayerStoreKind, LayerStoreOptions } from '@cellpaint/types';

/** Emits `store:*` events and opt-in debug lines on behalf of one store. */
export class StoreNotifier {
  private readonly store: LayerStoreKind;
  private readonly eventBus: EventBus | undefined;
  private readonly debug: boolean;

  constructor(store: LayerStoreKind, options: LayerStoreOptions) {
    this.store = store;
    this.eventBus = options.eventBus;
    this.debug = options.debug ?? false;
  }

  added(layerName: string): void {
    this.eventBus?.emit('store:layer-added', { store: this.store, layerName });
  }

  erased(layerName: string): void {
    this.eventBus?.emit('store:layer-erased', { store: this.store, layerName });
  }

  rejected(layerName: string, capacity: number): void {
    this.log(`rejected "${layerName}": store is full (capacity ${capacity})`);
    this.eventBus?.emit('store:add-rejected', { store: this.store, layerName, capacity });
  }

  special(): void {
    this.eventBus?.emit('store:special', { store: this.store });
  }

  /** Write a debug line when the store was created with `debug: true`. */
  log(message: string): void {
    if (!this.debug) return;
    // eslint-disable-next-line no-console
    console.debug(`[layer-store] ${this.store}: ${message}`);
  }
}
