/**
 * @module validation
 * Input checks for caller contract violations.
 * Normal outcomes (full store, absent layer) are never reported here.
 */

import type { Layer } from '@cellpaint/types';

/**
 * Throw unless `capacity` is a positive integer.
 * @param capacity - Value to check.
 * @param label - Name used in the error message.
 */
export function assertCapacity(capacity: number, label = 'capacity'): void {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`${label} must be a positive integer`);
  }
}

/**
 * Throw a TypeError unless `layer` carries a non-empty name and an apply function.
 */
export function assertValidLayer(layer: unknown): asserts layer is Layer {
  if (typeof layer !== 'object' || layer === null) {
    throw new TypeError('Layer must be an object');
  }
  if (!('name' in layer) || typeof layer.name !== 'string' || layer.name === '') {
    throw new TypeError('Layer name must be a non-empty string');
  }
  if (!('apply' in layer) || typeof layer.apply !== 'function') {
    throw new TypeError(`Layer "${layer.name}" has no apply function`);
  }
}
