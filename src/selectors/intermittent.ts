import { Duration } from 'luxon';
import { PriceMode, PriceSlot, SelectedInterval, SelectionResult, Window } from '../types';
import { IntervalSelector, SelectorMetadata, TimedSlot } from './types';
import { clipSlotsToWindow, costOf, emptySelection, shortfallIssues } from './clip';

/**
 * Possibly disjoint slots, picked greedily in price order.
 *
 * Ranks follow the pick order (1 = most favorable price), not the
 * chronological order. Neighbouring picks are kept as separate entries.
 */
export class IntermittentSelector implements IntervalSelector {
  constructor(private priceMode: PriceMode) {}

  select(window: Window, priceSlots: PriceSlot[], requiredDuration: Duration): SelectionResult {
    const requiredMs = requiredDuration.toMillis();
    if (requiredMs <= 0) {
      return emptySelection();
    }

    const slots = clipSlotsToWindow(window, priceSlots);
    const ordered = [...slots].sort((a, b) => this.compare(a, b));

    const intervals: SelectedInterval[] = [];
    let remainingMs = requiredMs;
    let cost = 0;

    for (const slot of ordered) {
      if (remainingMs <= 0) {
        break;
      }

      const lengthMs = slot.endMs - slot.startMs;
      const takenMs = Math.min(lengthMs, remainingMs);

      intervals.push({
        start: slot.start,
        // last pick is cut short at the required duration
        end: takenMs === lengthMs ? slot.end : slot.start.plus({ milliseconds: takenMs }),
        rank: intervals.length + 1,
        price: slot.price,
      });
      cost += costOf(slot.price, takenMs);
      remainingMs -= takenMs;
    }

    const coveredMs = requiredMs - remainingMs;
    const incomplete = remainingMs > 0;

    return {
      intervals,
      duration: Duration.fromMillis(coveredMs),
      cost,
      incomplete,
      issues: incomplete ? shortfallIssues(window, slots, requiredMs) : [],
    };
  }

  metadata(): SelectorMetadata {
    return {
      type: 'intermittent',
      priceMode: this.priceMode,
      description: 'Individual slots ranked by price until the duration is filled',
    };
  }

  private compare(a: TimedSlot, b: TimedSlot): number {
    const byPrice = this.priceMode === PriceMode.CHEAPEST ? a.price - b.price : b.price - a.price;
    return byPrice !== 0 ? byPrice : a.startMs - b.startMs;
  }
}
