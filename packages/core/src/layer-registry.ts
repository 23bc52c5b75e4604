/**
 * @module layer-registry
 * Name-keyed lookup of layers, for stores that only remember layer names.
 */

import type { Layer, LayerResolver } from '@cellpaint/types';
import { assertValidLayer } from './validation';

/**
 * In-memory {@link LayerResolver}.
 *
 * The first layer registered under a name keeps it; later registrations of
 * the same name are ignored so that a name always resolves to one layer.
 */
export class LayerRegistry implements LayerResolver {
  private layers = new Map<string, Layer>();

  /**
   * Create a registry, optionally pre-populated.
   * @param layers - Layers to register in order.
   */
  constructor(layers: Iterable<Layer> = []) {
    for (const layer of layers) {
      this.register(layer);
    }
  }

  /** Number of registered layers. */
  get size(): number {
    return this.layers.size;
  }

  /** @inheritdoc */
  register(layer: Layer): boolean {
    assertValidLayer(layer);
    if (this.layers.has(layer.name)) {
      return false;
    }
    this.layers.set(layer.name, layer);
    return true;
  }

  /** @inheritdoc */
  get(name: string): Layer | undefined {
    return this.layers.get(name);
  }

  has(name: string): boolean {
    return this.layers.has(name);
  }

  /** All registered layers, ascending by name. */
  list(): Layer[] {
    return [...this.layers.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }
}
