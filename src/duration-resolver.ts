import { DateTime, Duration, DurationLikeObject } from 'luxon';
import { DurationSignal, ResolvedDuration, Window } from './types';
import { SignalUnavailableError, extractErrorMessage } from './errors';
import { Logger, getSilentLogger } from './logger';

type DurationUnit = keyof Pick<DurationLikeObject, 'days' | 'hours' | 'minutes' | 'seconds' | 'milliseconds'>;

/**
 * Units of measurement accepted on the remaining-duration signal.
 */
export const DURATION_UNITS: Readonly<Record<string, DurationUnit>> = {
  d: 'days',
  days: 'days',
  h: 'hours',
  hours: 'hours',
  min: 'minutes',
  minutes: 'minutes',
  s: 'seconds',
  sec: 'seconds',
  seconds: 'seconds',
  ms: 'milliseconds',
  msec: 'milliseconds',
  milliseconds: 'milliseconds',
};

/**
 * Convert a raw signal reading into a duration.
 * Throws SignalUnavailableError for missing values, unknown units and
 * negative or non-numeric readings.
 */
export function parseDurationSignal(signal: DurationSignal): Duration {
  if (signal.value === null || signal.value === '') {
    throw new SignalUnavailableError('Duration signal has no value');
  }

  const value = typeof signal.value === 'number' ? signal.value : Number(signal.value);
  if (!Number.isFinite(value)) {
    throw new SignalUnavailableError(`Duration signal value "${String(signal.value)}" is not a number`);
  }
  if (value < 0) {
    throw new SignalUnavailableError(`Duration signal value ${value} is negative`);
  }

  const unit = signal.unit === undefined ? undefined : DURATION_UNITS[signal.unit];
  if (!unit) {
    throw new SignalUnavailableError(
      `Invalid unit of measurement "${signal.unit ?? ''}" for duration signal. ` +
        'Valid units: d, h, min, s, ms'
    );
  }

  const parts: DurationLikeObject = {};
  parts[unit] = value;
  return Duration.fromObject(parts);
}

export interface ResolveDurationInput {
  staticDuration?: Duration;
  /** Current reading; `undefined` when no signal is configured. */
  signal?: DurationSignal | null;
  /** True when the sensor is configured to read its duration from a signal. */
  signalConfigured?: boolean;
  window: Window;
  now: DateTime;
}

/**
 * Determines the duration to schedule for on each evaluation.
 *
 * With an external remaining-duration signal the resolver remembers the
 * last value it saw. When the value changes, the change instant becomes the
 * anchor; an anchor inside the current window moves the effective interval
 * start to that instant. This is the only state kept between evaluations.
 */
export class DurationResolver {
  private lastObservedValue: number | null = null;
  private lastChangedAt: DateTime | null = null;
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? getSilentLogger();
  }

  resolve(input: ResolveDurationInput): ResolvedDuration {
    const { staticDuration, signal, window, now } = input;
    const signalConfigured = input.signalConfigured ?? signal !== undefined;

    if (!signalConfigured) {
      return this.fromStatic(staticDuration, window, 'static');
    }

    let duration: Duration;
    try {
      if (!signal) {
        throw new SignalUnavailableError('Duration signal is not available');
      }
      duration = parseDurationSignal(signal);
    } catch (error: unknown) {
      if (!(error instanceof SignalUnavailableError)) {
        throw error;
      }
      this.logger.warn(`${extractErrorMessage(error)}, falling back to static duration`);
      return this.fromStatic(staticDuration, window, 'fallback');
    }

    const value = duration.toMillis();
    if (this.lastObservedValue !== value) {
      this.lastObservedValue = value;
      this.lastChangedAt = signal?.lastChanged ?? now;
      this.logger.debug(
        `Duration signal changed to ${value} ms at ${this.lastChangedAt.toISO() ?? 'unknown'}`
      );
    }

    const anchor = this.lastChangedAt ?? undefined;
    const anchoredInWindow =
      anchor !== undefined &&
      anchor.toMillis() > window.start.toMillis() &&
      anchor.toMillis() < window.end.toMillis();

    return {
      available: true,
      duration,
      intervalStart: anchoredInWindow ? anchor : window.start,
      anchor,
      source: 'signal',
    };
  }

  private fromStatic(
    staticDuration: Duration | undefined,
    window: Window,
    source: 'static' | 'fallback'
  ): ResolvedDuration {
    if (!staticDuration) {
      return {
        available: false,
        duration: Duration.fromMillis(0),
        intervalStart: window.start,
        source,
      };
    }

    return {
      available: true,
      duration: staticDuration,
      intervalStart: window.start,
      source,
    };
  }
}
