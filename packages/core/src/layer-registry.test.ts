import { describe, it, expect } from 'vitest';
import { LayerRegistry } from './layer-registry';
import { addRed } from './test-helpers';

describe('LayerRegistry', () => {
  it('registers and resolves layers by name', () => {
    const registry = new LayerRegistry();
    const layer = addRed('red', 10);

    expect(registry.register(layer)).toBe(true);
    expect(registry.get('red')).toBe(layer);
    expect(registry.has('red')).toBe(true);
    expect(registry.size).toBe(1);
  });

  it('keeps the first layer registered under a name', () => {
    const first = addRed('red', 10);
    const registry = new LayerRegistry([first]);

    expect(registry.register(addRed('red', 99))).toBe(false);
    expect(registry.get('red')).toBe(first);
  });

  it('returns undefined for unknown names', () => {
    expect(new LayerRegistry().get('missing')).toBeUndefined();
  });

  it('lists layers ascending by name', () => {
    const registry = new LayerRegistry([addRed('c', 1), addRed('a', 1), addRed('b', 1)]);
    expect(registry.list().map((layer) => layer.name)).toEqual(['a', 'b', 'c']);
  });

  it('rejects layers without a name', () => {
    const registry = new LayerRegistry();
    expect(() => registry.register({ name: '', apply: (color) => color })).toThrow(TypeError);
  });
});
