// Color helpers shared by the layer factories.
// All RGB values are in range 0-255.

import type { RgbColor } from '@cellpaint/types';

/**
 * Invert an RGB color.
 *
 * @param color - RGB color to invert
 * @returns Inverted RGB color
 */
export function invertColor(color: RgbColor): RgbColor {
  return {
    r: 255 - color.r,
    g: 255 - color.g,
    b: 255 - color.b,
  };
}

