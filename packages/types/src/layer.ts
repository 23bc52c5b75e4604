/**
 * @module layer
 * Layer capability consumed by every layer store.
 * A layer is an immutable, named color effect. Stores never look inside it;
 * they only read its name and call `apply`.
 */

import type { RgbColor } from './common';

/**
 * Pure color function applied to a single canvas cell.
 *
 * @param color - Running color (the cell's base color for the first layer).
 * @param timestamp - Current animation timestamp.
 * @param x - Cell column.
 * @param y - Cell row.
 */
export type LayerApply = (color: RgbColor, timestamp: number, x: number, y: number) => RgbColor;

/** A named drawing effect. Two layers are the same layer when their names match. */
export interface Layer {
  /** Identity of the layer, unique per layer type. */
  readonly name: string;
  /** Compute the color this layer produces on top of `color`. */
  readonly apply: LayerApply;
}

/** Time- and position-independent color transform, wrapped into a layer by the factories. */
export type ColorTransform = (color: RgbColor) => RgbColor;
