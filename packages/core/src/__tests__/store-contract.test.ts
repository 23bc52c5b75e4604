import { describe, it, expect } from 'vitest';
import type { LayerStoreKind } from '@cellpaint/types';
import { createLayerStore } from '../store-factory';
import { GREY, addRed, doubleRed, stampLayer } from '../test-helpers';

const KINDS: LayerStoreKind[] = ['single-slot', 'additive', 'toggle-set'];

describe.each(KINDS)('%s store contract', (kind) => {
  it('returns the base color when nothing was added', () => {
    expect(createLayerStore(kind).getColor(GREY, 0, 0, 0)).toEqual(GREY);
  });

  it('reports no change when erasing from an empty store', () => {
    expect(createLayerStore(kind).erase(addRed('a', 1))).toBe(false);
  });

  it('reports a change on the first add', () => {
    expect(createLayerStore(kind).add(addRed('a', 1))).toBe(true);
  });

  it('returns identical colors on repeated calls without mutation', () => {
    const store = createLayerStore(kind, { capacity: 4 });
    store.add(addRed('a', 10));
    store.add(doubleRed('b'));
    store.special();

    const first = store.getColor(GREY, 7, 2, 9);
    const second = store.getColor(GREY, 7, 2, 9);
    expect(second).toEqual(first);
  });

  it('does not modify the base color object', () => {
    const store = createLayerStore(kind);
    store.add(stampLayer('stamp'));
    const base = { r: 1, g: 2, b: 3 };

    store.getColor(base, 9, 9, 9);

    expect(base).toEqual({ r: 1, g: 2, b: 3 });
  });

  it('rejects a layer with an empty name', () => {
    expect(() => createLayerStore(kind).add({ name: '', apply: (color) => color })).toThrow(TypeError);
  });
});
