export { ObservableValue, type AsyncState, type ValueSource } from './observable.js';
export { SubscriptionSlot } from './subscription-slot.js';
export { changesOf, coalesceTriggers } from './triggers.js';
