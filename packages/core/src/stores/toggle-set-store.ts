/**
 * @module stores/toggle-set-store
 * Layer store where each layer is either applied or not.
 *
 * - add: ensure the layer is applied.
 * - erase: ensure the layer is not applied.
 * - special: of the applied layers, remove the one with the median name.
 */

import type { Layer, LayerResolver, LayerStore, RgbColor, ToggleSetStoreOptions } from '@cellpaint/types';
import { LayerRegistry } from '../layer-registry';
import { assertValidLayer } from '../validation';
import { StoreNotifier } from './store-notifier';

/** Compare two names by UTF-16 code units, the order `Array.prototype.sort` uses. */
function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Toggled-set implementation of {@link LayerStore}.
 *
 * Only layer names are stored. Layers are resolved through a
 * {@link LayerResolver} at composition time and always visited in ascending
 * name order, so the output does not depend on insertion order.
 */
export class ToggleSetStore implements LayerStore {
  readonly kind = 'toggle-set' as const;

  private readonly applied = new Set<string>();
  private readonly registry: LayerResolver;
  private readonly notifier: StoreNotifier;

  constructor(options: ToggleSetStoreOptions = {}) {
    this.registry = options.registry ?? new LayerRegistry();
    this.notifier = new StoreNotifier(this.kind, options);
  }

  /** Applied layer names, ascending. The array is a copy. */
  get appliedNames(): string[] {
    return [...this.applied].sort(compareNames);
  }

  /** Number of applied layers. */
  get size(): number {
    return this.applied.size;
  }

  /** Whether a layer with this name is applied. */
  has(name: string): boolean {
    return this.applied.has(name);
  }

  /** @inheritdoc */
  add(layer: Layer): boolean {
    assertValidLayer(layer);
    if (this.applied.has(layer.name)) {
      return false;
    }
    if (!this.registry.register(layer) && this.registry.get(layer.name) === undefined) {
      this.notifier.log(`rejected "${layer.name}": registry cannot resolve it`);
      return false;
    }
    this.applied.add(layer.name);
    this.notifier.added(layer.name);
    return true;
  }

  /** @inheritdoc */
  erase(layer: Layer): boolean {
    assertValidLayer(layer);
    if (!this.applied.delete(layer.name)) {
      return false;
    }
    this.notifier.erased(layer.name);
    return true;
  }

  /** @inheritdoc */
  getColor(base: RgbColor, timestamp: number, x: number, y: number): RgbColor {
    let color = base;
    for (const name of this.appliedNames) {
      const layer = this.registry.get(name);
      if (layer) {
        color = layer.apply(color, timestamp, x, y);
      }
    }
    return color;
  }

  /**
   * Remove the applied name at index `floor(count / 2)` of the ascending order.
   * Does nothing when no layer is applied.
   */
  special(): void {
    const names = this.appliedNames;
    if (names.length === 0) {
      this.notifier.log('special ignored: no applied layers');
      return;
    }
    const median = names[Math.floor(names.length / 2)];
    this.applied.delete(median);
    this.notifier.log(`removed median "${median}"`);
    this.notifier.special();
  }
}
