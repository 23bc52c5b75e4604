/**
 * @module stores/additive-store
 * Layer store where each added layer applies after all previous ones.
 *
 * - add: append a layer to be applied last.
 * - erase: remove the oldest layer, whatever layer the caller has selected.
 * - special: reverse the order of the current layers.
 */

import type { Layer, LayerStore, LayerStoreOptions, RgbColor } from '@cellpaint/types';
import { BoundedQueue } from '../bounded-queue';
import { assertValidLayer } from '../validation';
import { StoreNotifier } from './store-notifier';

/** Default number of layers an additive store holds. */
export const DEFAULT_ADDITIVE_CAPACITY = 100;

/**
 * Additive implementation of {@link LayerStore}.
 *
 * Layers are kept in a {@link BoundedQueue}; the same layer may appear more
 * than once since the queue records a history of edits. Composition is
 * sequential: each layer receives the color produced by the one before it.
 */
export class AdditiveStore implements LayerStore {
  readonly kind = 'additive' as const;

  private readonly queue: BoundedQueue<Layer>;
  private readonly notifier: StoreNotifier;

  /**
   * Create an empty additive store.
   * @param capacity - Maximum number of layers held (default 100).
   * @param options - Event bus and debug settings.
   */
  constructor(capacity: number = DEFAULT_ADDITIVE_CAPACITY, options: LayerStoreOptions = {}) {
    this.queue = new BoundedQueue<Layer>(capacity);
    this.notifier = new StoreNotifier(this.kind, options);
  }

  get capacity(): number {
    return this.queue.capacity;
  }

  /** Number of layers currently held. */
  get size(): number {
    return this.queue.length;
  }

  get isFull(): boolean {
    return this.queue.isFull;
  }

  /** Held layers, oldest first. The array is a copy. */
  get layers(): Layer[] {
    return this.queue.toArray();
  }

  /** @inheritdoc */
  add(layer: Layer): boolean {
    assertValidLayer(layer);
    if (this.queue.isFull) {
      this.notifier.rejected(layer.name, this.queue.capacity);
      return false;
    }
    this.queue.append(layer);
    this.notifier.added(layer.name);
    return true;
  }

  /** @inheritdoc */
  erase(layer: Layer): boolean {
    assertValidLayer(layer);
    if (this.queue.isEmpty) {
      return false;
    }
    const removed = this.queue.popFront();
    this.notifier.erased(removed.name);
    return true;
  }

  /** @inheritdoc */
  getColor(base: RgbColor, timestamp: number, x: number, y: number): RgbColor {
    let color = base;
    for (const layer of this.queue) {
      color = layer.apply(color, timestamp, x, y);
    }
    return color;
  }

  /** @inheritdoc */
  special(): void {
    if (this.queue.length < 2) {
      return;
    }
    const drained: Layer[] = [];
    while (!this.queue.isEmpty) {
      drained.push(this.queue.popFront());
    }
    for (let i = drained.length - 1; i >= 0; i--) {
      this.queue.append(drained[i]);
    }
    this.notifier.log(`reversed ${drained.length} layers`);
    this.notifier.special();
  }
}
