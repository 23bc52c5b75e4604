/**
 * @module test-helpers
 * Layers with easily traced, non-commuting effects for store tests.
 */

import type { Layer, RgbColor } from '@cellpaint/types';
import { createLayer } from './layer-factory';

/** Mid-grey base color. */
export const GREY: RgbColor = { r: 100, g: 100, b: 100 };

/** Layer adding `amount` to the red channel. */
export function addRed(name: string, amount: number): Layer {
  return createLayer(name, (color) => ({ ...color, r: color.r + amount }));
}

/** Layer doubling the red channel. */
export function doubleRed(name: string): Layer {
  return createLayer(name, (color) => ({ ...color, r: color.r * 2 }));
}

/** Layer writing the timestamp and cell position into the channels. */
export function stampLayer(name: string): Layer {
  return createLayer(name, (_color, timestamp, x, y) => ({ r: timestamp, g: x, b: y }));
}
