import { Duration } from 'luxon';
import { PriceSlot, SelectionIssue, SelectionResult, Window } from '../types';
import { MILLISECONDS_PER_HOUR } from '../time';
import { TimedSlot } from './types';
import { windowMillis } from '../window-resolver';

/**
 * Keep the slots overlapping `window`, clipped to it and ordered by start.
 */
export function clipSlotsToWindow(window: Window, slots: PriceSlot[]): TimedSlot[] {
  const windowStart = window.start.toMillis();
  const windowEnd = window.end.toMillis();

  return slots
    .filter((slot) => slot.start.toMillis() < windowEnd && slot.end.toMillis() > windowStart)
    .map((slot) => {
      const startMs = Math.max(slot.start.toMillis(), windowStart);
      const endMs = Math.min(slot.end.toMillis(), windowEnd);
      return {
        start: startMs === slot.start.toMillis() ? slot.start : window.start,
        end: endMs === slot.end.toMillis() ? slot.end : window.end,
        startMs,
        endMs,
        price: slot.price,
      };
    })
    .sort((a, b) => a.startMs - b.startMs);
}

/**
 * Price x hours for `millis` of a slot
 */
export function costOf(price: number, millis: number): number {
  return (price * millis) / MILLISECONDS_PER_HOUR;
}

/**
 * Why a selection fell short of `requiredMillis`.
 */
export function shortfallIssues(
  window: Window,
  slots: TimedSlot[],
  requiredMillis: number
): SelectionIssue[] {
  const issues: SelectionIssue[] = [];
  const windowLength = windowMillis(window);
  const covered = slots.reduce((sum, slot) => sum + (slot.endMs - slot.startMs), 0);

  if (windowLength < requiredMillis) {
    issues.push('infeasible_duration');
  }
  if (covered < windowLength) {
    issues.push('insufficient_coverage');
  }
  return issues;
}

export function emptySelection(): SelectionResult {
  return {
    intervals: [],
    duration: Duration.fromMillis(0),
    cost: 0,
    incomplete: false,
    issues: [],
  };
}
