/**
 * @module layer-factory
 * Factory functions for creating layers.
 * Every layer produced here is frozen and validated.
 */

import type { ColorTransform, Layer, LayerApply } from '@cellpaint/types';
import { invertColor } from './color-utils';
import { assertValidLayer } from './validation';

/**
 * Creates a layer from a name and a color function.
 *
 * @param name  - Identity of the layer; must be non-empty.
 * @param apply - Pure function computing the layer's color on top of the running color.
 * @returns A frozen Layer.
 */
export function createLayer(name: string, apply: LayerApply): Layer {
  const layer: Layer = Object.freeze({ name, apply });
  assertValidLayer(layer);
  return layer;
}

/**
 * Wraps a color transform that ignores time and position into a layer.
 *
 * @param name      - Identity of the layer.
 * @param transform - Function mapping the running color to the next one.
 */
export function createTransformLayer(name: string, transform: ColorTransform): Layer {
  return createLayer(name, (color) => transform(color));
}

/** Inverts every channel (`255 - value`). Applied by the single-slot store in special mode. */
export const invertLayer: Layer = createTransformLayer('invert', invertColor);
