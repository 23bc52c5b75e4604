/**
 * @module store-factory
 * Creates the layer store for a canvas cell from its drawing mode.
 */

import type { CreateLayerStoreOptions, LayerStore, LayerStoreKind } from '@cellpaint/types';
import { AdditiveStore, DEFAULT_ADDITIVE_CAPACITY, SingleSlotStore, ToggleSetStore } from './stores';

/**
 * Creates a store of the given kind.
 *
 * `capacity` applies to additive stores only and defaults to
 * {@link DEFAULT_ADDITIVE_CAPACITY}; `registry` applies to toggle-set stores
 * only. `eventBus` and `debug` are passed to every kind.
 *
 * @example
 * ```ts
 * const store = createLayerStore('additive', { capacity: 8 });
 * store.add(createTransformLayer('half', ({ r, g, b }) => ({ r: r >> 1, g: g >> 1, b: b >> 1 })));
 * ```
 */
export function createLayerStore(kind: 'single-slot', options?: CreateLayerStoreOptions): SingleSlotStore;
export function createLayerStore(kind: 'additive', options?: CreateLayerStoreOptions): AdditiveStore;
export function createLayerStore(kind: 'toggle-set', options?: CreateLayerStoreOptions): ToggleSetStore;
export function createLayerStore(kind: LayerStoreKind, options?: CreateLayerStoreOptions): LayerStore;
export function createLayerStore(kind: LayerStoreKind, options: CreateLayerStoreOptions = {}): LayerStore {
  const { capacity = DEFAULT_ADDITIVE_CAPACITY, registry, ...common } = options;
  switch (kind) {
    case 'single-slot':
      return new SingleSlotStore(common);
    case 'additive':
      return new AdditiveStore(capacity, common);
    case 'toggle-set':
      return new ToggleSetStore({ ...common, registry });
    default: {
      const unknownKind: never = kind;
      throw new Error(`Unknown layer store kind: ${String(unknownKind)}`);
    }
  }
}
