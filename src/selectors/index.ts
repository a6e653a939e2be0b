export * from './types';
export { ContiguousSelector } from './contiguous';
export { IntermittentSelector } from './intermittent';
export { clipSlotsToWindow } from './clip';
export { SelectorFactory, selectIntervals } from './factory';
