import { DateTime, Duration } from 'luxon';
import { PriceMode, PriceSlot, SelectionResult, Window } from '../types';

export interface SelectorMetadata {
  type: string;
  priceMode: PriceMode;
  description: string;
}

export interface IntervalSelector {
  select(window: Window, slots: PriceSlot[], requiredDuration: Duration): SelectionResult;
  metadata(): SelectorMetadata;
}

/**
 * A price slot clipped to the selection window, with epoch milliseconds
 * cached for the arithmetic.
 */
export interface TimedSlot {
  start: DateTime;
  end: DateTime;
  startMs: number;
  endMs: number;
  price: number;
}
