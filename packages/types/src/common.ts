/**
 * @module common
 * Common primitive types used across all packages.
 */

/** RGB color with integer channels in the 0-255 range. No alpha is carried. */
export interface RgbColor {
  /** Red channel (0-255) */
  readonly r: number;
  /** Green channel (0-255) */
  readonly g: number;
  /** Blue channel (0-255) */
  readonly b: number;
}
