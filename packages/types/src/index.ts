/**
 * @cellpaint/types
 *
 * Shared type definitions for the cell layer stores.
 * This package contains zero runtime code — only TypeScript interfaces
 * and types that serve as the "contract" between packages.
 *
 * @packageDocumentation
 */

// Common primitives
export type { RgbColor } from './common';

// Layer capability
export type { ColorTransform, Layer, LayerApply } from './layer';

// Layer store contract
export type {
  AdditiveStoreOptions,
  CreateLayerStoreOptions,
  LayerResolver,
  LayerStore,
  LayerStoreKind,
  LayerStoreOptions,
  ToggleSetStoreOptions,
} from './layer-store';

// Events
export type { EventBus, EventCallback, EventMap, StoreEventPayload } from './events';
