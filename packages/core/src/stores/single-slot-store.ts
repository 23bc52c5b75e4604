/**
 * @module stores/single-slot-store
 * Layer store holding at most one layer.
 *
 * - add: set the single layer.
 * - erase: remove the single layer, whatever layer the caller has selected.
 * - special: invert the color output.
 */

import type { Layer, LayerStore, LayerStoreOptions, RgbColor } from '@cellpaint/types';
import { invertLayer } from '../layer-factory';
import { assertValidLayer } from '../validation';
import { StoreNotifier } from './store-notifier';

/**
 * Single-slot implementation of {@link LayerStore}.
 *
 * Inversion is a presentation toggle: it is applied to the composited color
 * on every `getColor` call and never replaces the held layer.
 */
export class SingleSlotStore implements LayerStore {
  readonly kind = 'single-slot' as const;

  private layer: Layer | null = null;
  private invertMode = false;
  private readonly notifier: StoreNotifier;

  constructor(options: LayerStoreOptions = {}) {
    this.notifier = new StoreNotifier(this.kind, options);
  }

  /** The held layer, or null when the slot is empty. */
  get current(): Layer | null {
    return this.layer;
  }

  /** Whether special mode (color inversion) is on. */
  get inverted(): boolean {
    return this.invertMode;
  }

  /** @inheritdoc */
  add(layer: Layer): boolean {
    assertValidLayer(layer);
    if (this.layer !== null && this.layer.name === layer.name) {
      return false;
    }
    this.layer = layer;
    this.notifier.added(layer.name);
    return true;
  }

  /** @inheritdoc */
  erase(layer: Layer): boolean {
    assertValidLayer(layer);
    const removed = this.layer;
    if (removed === null) {
      return false;
    }
    this.layer = null;
    this.notifier.erased(removed.name);
    return true;
  }

  /** @inheritdoc */
  getColor(base: RgbColor, timestamp: number, x: number, y: number): RgbColor {
    const color = this.layer ? this.layer.apply(base, timestamp, x, y) : base;
    return this.invertMode ? invertLayer.apply(color, timestamp, x, y) : color;
  }

  /** @inheritdoc */
  special(): void {
    this.invertMode = !this.invertMode;
    this.notifier.log(`inverted=${this.invertMode}`);
    this.notifier.special();
  }
}
