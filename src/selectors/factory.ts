import { Duration } from 'luxon';
import { IntervalMode, PriceMode, PriceSlot, SelectionResult, Window } from '../types';
import { IntervalSelector } from './types';
import { ContiguousSelector } from './contiguous';
import { IntermittentSelector } from './intermittent';

export class SelectorFactory {
  static create(intervalMode: IntervalMode, priceMode: PriceMode): IntervalSelector {
    switch (intervalMode) {
      case IntervalMode.CONTIGUOUS:
        return new ContiguousSelector(priceMode);

      case IntervalMode.INTERMITTENT:
        return new IntermittentSelector(priceMode);

      default: {
        const unknownMode: never = intervalMode;
        throw new Error(`Unknown interval mode: ${String(unknownMode)}`);
      }
    }
  }
}

/**
 * Select the run time for `requiredDuration` inside `window`.
 * Pure: the same inputs always give the same, identically ordered result.
 */
export function selectIntervals(
  window: Window,
  slots: PriceSlot[],
  requiredDuration: Duration,
  priceMode: PriceMode,
  intervalMode: IntervalMode
): SelectionResult {
  return SelectorFactory.create(intervalMode, priceMode).select(window, slots, requiredDuration);
}
