/**
 * @cellpaint/core
 *
 * Per-cell layer stores, the bounded queue behind them, and layer helpers.
 *
 * @packageDocumentation
 */

// Layer stores
export { SingleSlotStore, AdditiveStore, ToggleSetStore, DEFAULT_ADDITIVE_CAPACITY } from './stores';
export { createLayerStore } from './store-factory';

// Supporting structures
export { BoundedQueue } from './bounded-queue';
export { LayerRegistry } from './layer-registry';

// Layer factories
export { createLayer, createTransformLayer, invertLayer } from './layer-factory';

// Validation
export { assertCapacity, assertValidLayer } from './validation';

// Color utilities
export { invertColor } from './color-utils';

// Event bus
export { EventBusImpl } from './event-bus';
