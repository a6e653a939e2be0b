import { Duration } from 'luxon';
import { PriceMode, PriceSlot, SelectionResult, Window } from '../types';
import { IntervalSelector, SelectorMetadata, TimedSlot } from './types';
import { clipSlotsToWindow, costOf, emptySelection, shortfallIssues } from './clip';
import { MILLISECONDS_PER_HOUR } from '../time';

const COST_TOLERANCE = 1e-9;

interface Run {
  index: number;
  coveredMs: number;
  cost: number;
}

/**
 * One uninterrupted run of the required length.
 *
 * Every clipped slot start is a candidate run start. A run may only cross
 * slot boundaries where the next slot starts exactly where the previous one
 * ends. The last slot of a run counts only for the part inside the run.
 */
export class ContiguousSelector implements IntervalSelector {
  constructor(private priceMode: PriceMode) {}

  select(window: Window, priceSlots: PriceSlot[], requiredDuration: Duration): SelectionResult {
    const requiredMs = requiredDuration.toMillis();
    if (requiredMs <= 0) {
      return emptySelection();
    }

    const slots = clipSlotsToWindow(window, priceSlots);
    let best: Run | null = null;

    for (let i = 0; i < slots.length; i++) {
      const run = this.measureRun(slots, i, requiredMs);
      if (run.coveredMs < requiredMs) {
        continue;
      }
      // strict: earliest start wins ties
      if (best === null || this.isBetter(run.cost, best.cost)) {
        best = run;
      }
    }

    if (best !== null) {
      const start = slots[best.index].start;
      return {
        intervals: [
          {
            start,
            end: start.plus({ milliseconds: requiredMs }),
            price: best.cost / (requiredMs / MILLISECONDS_PER_HOUR),
          },
        ],
        duration: Duration.fromMillis(requiredMs),
        cost: best.cost,
        incomplete: false,
        issues: [],
      };
    }

    return this.selectLongestRun(window, slots, requiredMs);
  }

  metadata(): SelectorMetadata {
    return {
      type: 'contiguous',
      priceMode: this.priceMode,
      description: 'Single uninterrupted run with the best total price',
    };
  }

  /**
   * Costs are float sums taken in different orders; differences within
   * COST_TOLERANCE count as a tie.
   */
  private isBetter(cost: number, bestCost: number): boolean {
    if (Math.abs(cost - bestCost) <= COST_TOLERANCE * Math.max(1, Math.abs(bestCost))) {
      return false;
    }
    switch (this.priceMode) {
      case PriceMode.CHEAPEST:
        return cost < bestCost;
      case PriceMode.MOST_EXPENSIVE:
        return cost > bestCost;
    }
  }

  /**
   * Walk forward from slots[index] over gap-free neighbours until
   * `limitMs` is covered or the run breaks.
   */
  private measureRun(slots: TimedSlot[], index: number, limitMs: number): Run {
    const runStart = slots[index].startMs;
    const runEnd = runStart + limitMs;
    let boundary = runStart;
    let coveredMs = 0;
    let cost = 0;

    for (let j = index; j < slots.length && coveredMs < limitMs; j++) {
      const slot = slots[j];
      if (slot.startMs !== boundary) {
        break;
      }
      const overlap = Math.min(slot.endMs, runEnd) - slot.startMs;
      coveredMs += overlap;
      cost += costOf(slot.price, overlap);
      boundary = slot.endMs;
    }

    return { index, coveredMs, cost };
  }

  /**
   * Nothing covers the full duration: emit the longest gap-free run
   * (earliest on ties) and flag the result incomplete.
   */
  private selectLongestRun(window: Window, slots: TimedSlot[], requiredMs: number): SelectionResult {
    let longest: Run | null = null;

    let i = 0;
    while (i < slots.length) {
      const run = this.measureRun(slots, i, Number.POSITIVE_INFINITY);
      if (longest === null || run.coveredMs > longest.coveredMs) {
        longest = run;
      }
      // continue after the end of this chain
      let next = i + 1;
      while (next < slots.length && slots[next].startMs === slots[next - 1].endMs) {
        next++;
      }
      i = next;
    }

    const issues = shortfallIssues(window, slots, requiredMs);

    if (longest === null || longest.coveredMs <= 0) {
      return { ...emptySelection(), incomplete: true, issues };
    }

    const start = slots[longest.index].start;
    return {
      intervals: [
        {
          start,
          end: start.plus({ milliseconds: longest.coveredMs }),
          price: longest.cost / (longest.coveredMs / MILLISECONDS_PER_HOUR),
        },
      ],
      duration: Duration.fromMillis(longest.coveredMs),
      cost: longest.cost,
      incomplete: true,
      issues,
    };
  }
}
