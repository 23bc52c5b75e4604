import { describe, it, expect } from 'vitest';
import { createLayer, createTransformLayer, invertLayer } from '../layer-factory';
import { assertValidLayer } from '../validation';

describe('createLayer', () => {
  it('creates a layer with the given name and function', () => {
    const layer = createLayer('stamp', (_color, timestamp, x, y) => ({ r: timestamp, g: x, b: y }));

    expect(layer.name).toBe('stamp');
    expect(layer.apply({ r: 0, g: 0, b: 0 }, 5, 6, 7)).toEqual({ r: 5, g: 6, b: 7 });
  });

  it('returns a frozen layer', () => {
    const layer = createLayer('identity', (color) => color);
    expect(Object.isFrozen(layer)).toBe(true);
  });

  it('throws on an empty name', () => {
    expect(() => createLayer('', (color) => color)).toThrow('Layer name must be a non-empty string');
  });
});

describe('createTransformLayer', () => {
  it('applies the transform regardless of time and position', () => {
    const layer = createTransformLayer('gray', ({ r, g, b }) => {
      const v = Math.round((r + g + b) / 3);
      return { r: v, g: v, b: v };
    });

    expect(layer.apply({ r: 30, g: 60, b: 90 }, 0, 0, 0)).toEqual({ r: 60, g: 60, b: 60 });
    expect(layer.apply({ r: 30, g: 60, b: 90 }, 42, 3, 9)).toEqual({ r: 60, g: 60, b: 60 });
  });
});

describe('invertLayer', () => {
  it('inverts each channel', () => {
    expect(invertLayer.name).toBe('invert');
    expect(invertLayer.apply({ r: 10, g: 20, b: 255 }, 0, 0, 0)).toEqual({ r: 245, g: 235, b: 0 });
  });
});

describe('assertValidLayer', () => {
  it('accepts a well-formed layer', () => {
    expect(() => assertValidLayer({ name: 'ok', apply: () => ({ r: 0, g: 0, b: 0 }) })).not.toThrow();
  });

  it('rejects non-objects', () => {
    expect(() => assertValidLayer(null)).toThrow('Layer must be an object');
    expect(() => assertValidLayer('layer')).toThrow(TypeError);
  });

  it('rejects a missing apply function', () => {
    expect(() => assertValidLayer({ name: 'broken' })).toThrow('Layer "broken" has no apply function');
  });

  it('rejects a non-string name', () => {
    expect(() => assertValidLayer({ name: 3, apply: () => null })).toThrow('Layer name must be a non-empty string');
  });
});
