import { DateTime } from 'luxon';
import { TimeOfDay, Window } from './types';
import { atTimeOfDay, compareTimeOfDay, formatTimeOfDay } from './time';
import { InvalidWindowError } from './errors';

/**
 * Resolve the [start, end) window that begins at `earliestStart` on the
 * calendar day of `referenceDate`.
 *
 * - equal times: a full day starting at `earliestStart`
 * - `latestEnd` before `earliestStart`: `latestEnd` is on the following day
 * - otherwise both are on the same day
 *
 * Calendar arithmetic happens in the zone of `referenceDate`, so across a
 * DST change a "full day" is 23 or 25 hours long.
 */
export function resolveWindow(
  earliestStart: TimeOfDay,
  latestEnd: TimeOfDay,
  referenceDate: DateTime
): Window {
  if (!referenceDate.isValid) {
    throw new InvalidWindowError(`Invalid reference date: ${referenceDate.invalidExplanation ?? 'unknown'}`);
  }

  const start = atTimeOfDay(referenceDate, earliestStart);
  let end = atTimeOfDay(referenceDate, latestEnd);

  if (compareTimeOfDay(latestEnd, earliestStart) <= 0) {
    end = atTimeOfDay(referenceDate.plus({ days: 1 }), latestEnd);
  }

  if (!start.isValid || !end.isValid || end.toMillis() <= start.toMillis()) {
    throw new InvalidWindowError(
      `Cannot resolve window ${formatTimeOfDay(earliestStart)}-${formatTimeOfDay(latestEnd)} ` +
        `on ${referenceDate.toISODate() ?? 'unknown date'}`
    );
  }

  return { start, end };
}

/**
 * Resolve the window that applies at `now`.
 *
 * Windows that wrap midnight (or span a full day) have two candidates on any
 * calendar day: the one that started yesterday and the one starting today.
 * While `now` is before today's `latestEnd`, yesterday's window is still
 * running, so it wins.
 */
export function resolveWindowAt(
  earliestStart: TimeOfDay,
  latestEnd: TimeOfDay,
  now: DateTime
): Window {
  const wraps = compareTimeOfDay(latestEnd, earliestStart) <= 0;

  if (wraps && now.toMillis() < atTimeOfDay(now, latestEnd).toMillis()) {
    return resolveWindow(earliestStart, latestEnd, now.minus({ days: 1 }));
  }

  return resolveWindow(earliestStart, latestEnd, now);
}

export function isWithinWindow(window: Window, instant: DateTime): boolean {
  const t = instant.toMillis();
  return window.start.toMillis() <= t && t < window.end.toMillis();
}

export function windowMillis(window: Window): number {
  return window.end.toMillis() - window.start.toMillis();
}
