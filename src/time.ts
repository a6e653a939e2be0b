import { DateTime, Duration } from 'luxon';
import { TimeOfDay } from './types';
import { ConfigurationError } from './errors';

const TIME_OF_DAY_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;

/**
 * Parse HH:MM or HH:MM:SS into a TimeOfDay
 */
export function parseTimeOfDay(value: string): TimeOfDay {
  const match = TIME_OF_DAY_PATTERN.exec(value.trim());
  if (!match) {
    throw new ConfigurationError(`Invalid time of day "${value}", expected HH:MM or HH:MM:SS`);
  }

  const hour = Number(match[1]);
  const minute = Number(match[2]);
  const second = match[3] === undefined ? 0 : Number(match[3]);

  if (hour > 23 || minute > 59 || second > 59) {
    throw new ConfigurationError(`Time of day "${value}" is out of range`);
  }

  return { hour, minute, second };
}

/**
 * Format a TimeOfDay as HH:MM:SS
 */
export function formatTimeOfDay(time: TimeOfDay): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return `${pad(time.hour)}:${pad(time.minute)}:${pad(time.second)}`;
}

/**
 * Seconds since midnight
 */
export function secondsOfDay(time: TimeOfDay): number {
  return time.hour * 3600 + time.minute * 60 + time.second;
}

export function compareTimeOfDay(a: TimeOfDay, b: TimeOfDay): number {
  return secondsOfDay(a) - secondsOfDay(b);
}

/**
 * The instant at `time` on the calendar day of `date`, in `date`'s zone.
 */
export function atTimeOfDay(date: DateTime, time: TimeOfDay): DateTime {
  return date.startOf('day').set({
    hour: time.hour,
    minute: time.minute,
    second: time.second,
    millisecond: 0,
  });
}

export const MILLISECONDS_PER_HOUR = 60 * 60 * 1000;

/**
 * Format a duration the way the sensor attributes show it, e.g. "2:30:00"
 */
export function formatDuration(duration: Duration): string {
  return duration.shiftTo('hours', 'minutes', 'seconds').toFormat('h:mm:ss');
}
