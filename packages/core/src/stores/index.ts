export { SingleSlotStore } from './single-slot-store';
export { AdditiveStore, DEFAULT_ADDITIVE_CAPACITY } from './additive-store';
export { ToggleSetStore } from './toggle-set-store';
