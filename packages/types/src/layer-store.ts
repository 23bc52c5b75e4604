/**
 * @module layer-store
 * Contract shared by the per-cell layer stores and their construction options.
 */

import type { RgbColor } from './common';
import type { EventBus } from './events';
import type { Layer } from './layer';

/** Discriminator for the store variants. */
export type LayerStoreKind = 'single-slot' | 'additive' | 'toggle-set';

/**
 * Per-cell store of drawing layers.
 *
 * One store is created for each canvas cell and lives as long as the cell.
 * All operations are synchronous; `getColor` never mutates state.
 */
export interface LayerStore {
  /** Which composition policy this store implements. */
  readonly kind: LayerStoreKind;

  /**
   * Add a layer to the store.
   * @returns Whether the store actually changed.
   */
  add(layer: Layer): boolean;

  /**
   * Complete an erase action with this layer, following the store's removal policy.
   * @returns Whether the store actually changed.
   */
  erase(layer: Layer): boolean;

  /**
   * Color the cell should show, given the current layers.
   * @param base - Color of the cell with no layers applied.
   * @param timestamp - Current animation timestamp.
   * @param x - Cell column.
   * @param y - Cell row.
   */
  getColor(base: RgbColor, timestamp: number, x: number, y: number): RgbColor;

  /** Store-specific structural transformation ("special mode"). */
  special(): void;
}

/** Looks layers up by name. Used by stores that keep only layer names. */
export interface LayerResolver {
  /** Return the layer registered under `name`, or undefined. */
  get(name: string): Layer | undefined;
  /** Register a layer. Returns false if the name was already taken. */
  register(layer: Layer): boolean;
}

/** Options accepted by every store. */
export interface LayerStoreOptions {
  /** Bus that receives `store:*` events after each state change. */
  eventBus?: EventBus;
  /** Log rejected and skipped operations through `console.debug`. */
  debug?: boolean;
}

/** Options for the additive (bounded FIFO) store. */
export interface AdditiveStoreOptions extends LayerStoreOptions {
  /** Maximum number of layers held at once. Must be a positive integer. */
  capacity?: number;
}

/** Options for the toggled-set store. */
export interface ToggleSetStoreOptions extends LayerStoreOptions {
  /** Where layer names are resolved back to layers. */
  registry?: LayerResolver;
}

/** Options for the store factory; fields that do not apply to a kind are ignored. */
export type CreateLayerStoreOptions = AdditiveStoreOptions & ToggleSetStoreOptions;
