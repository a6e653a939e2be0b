import { DateTime, Duration } from 'luxon';
import {
  EvaluatedState,
  IntervalMode,
  PriceMode,
  SelectedIntervalAttribute,
  SelectionResult,
  Window,
} from './types';
import { formatDuration, MILLISECONDS_PER_HOUR } from './time';
import { isWithinWindow } from './window-resolver';

export interface EvaluateStateInput {
  selection: SelectionResult;
  window: Window;
  intervalStart: DateTime;
  duration: Duration;
  priceMode: PriceMode;
  intervalMode: IntervalMode;
  now: DateTime;
}

function toIso(instant: DateTime): string {
  return instant.toISO() ?? instant.toString();
}

/**
 * Project a selection onto the externally visible state.
 */
export function evaluateState(input: EvaluateStateInput): EvaluatedState {
  const { selection, window, intervalStart, duration, priceMode, intervalMode, now } = input;
  const nowMs = now.toMillis();

  const active = selection.intervals.some(
    (interval) => interval.start.toMillis() <= nowMs && nowMs < interval.end.toMillis()
  );
  const enabled = isWithinWindow(window, now);

  const coveredHours = selection.duration.toMillis() / MILLISECONDS_PER_HOUR;

  // chronological for display; rank still tells the pick order
  const data: SelectedIntervalAttribute[] = [...selection.intervals]
    .sort((a, b) => a.start.toMillis() - b.start.toMillis())
    .map((interval) => ({
      start_time: toIso(interval.start),
      end_time: toIso(interval.end),
      ...(interval.rank !== undefined ? { rank: interval.rank } : {}),
      ...(interval.price !== undefined ? { price_per_kwh: interval.price } : {}),
    }));

  return {
    enabled,
    active,
    attributes: {
      earliest_start_time: toIso(window.start),
      latest_end_time: toIso(window.end),
      duration: formatDuration(duration),
      interval_start_time: toIso(intervalStart),
      price_mode: priceMode,
      interval_mode: intervalMode,
      interval_enabled: enabled,
      incomplete: selection.incomplete,
      issues: [...selection.issues],
      mean_price_per_kwh: coveredHours > 0 ? selection.cost / coveredHours : null,
      total_cost: selection.cost,
      data,
    },
  };
}
