import { DateTime, Duration } from 'luxon';
import {
  DurationSignal,
  PriceSlot,
  SensorConfig,
  SensorState,
  TimeOfDay,
} from './types';
import { parseTimeOfDay } from './time';
import { resolveWindowAt } from './window-resolver';
import { DurationResolver } from './duration-resolver';
import { selectIntervals } from './selectors';
import { evaluateState } from './state-evaluator';
import { PriceCache } from './price-cache';
import { Logger, createChildLogger, getSilentLogger } from './logger';
import { extractErrorMessage } from './errors';

export interface PriceWindowSensorOptions {
  config: SensorConfig;
  priceCache?: PriceCache;
  durationResolver?: DurationResolver;
  logger?: Logger;
  /** Called with every freshly evaluated state. */
  onStateChange?: (state: SensorState) => void;
}

export type Clock = () => DateTime;

/**
 * Binary on/off sensor driven by the price window selection.
 *
 * Every trigger (new prices, a new duration signal reading, a clock tick)
 * runs a complete evaluation and replaces the previous state wholesale.
 */
export class PriceWindowSensor {
  private readonly config: SensorConfig;
  private readonly earliestStart: TimeOfDay;
  private readonly latestEnd: TimeOfDay;
  private readonly staticDuration: Duration | undefined;
  private readonly priceCache: PriceCache;
  private readonly durationResolver: DurationResolver;
  private readonly logger: Logger;
  private readonly onStateChange?: (state: SensorState) => void;

  private signal: DurationSignal | null = null;
  private state: SensorState | null = null;
  private timer: NodeJS.Timeout | null = null;

  constructor(options: PriceWindowSensorOptions) {
    this.config = options.config;
    this.earliestStart = parseTimeOfDay(options.config.earliestStart);
    this.latestEnd = parseTimeOfDay(options.config.latestEnd);
    this.staticDuration =
      options.config.durationSeconds === undefined
        ? undefined
        : Duration.fromObject({ seconds: options.config.durationSeconds });

    this.logger = createChildLogger(options.logger ?? getSilentLogger(), {
      component: `sensor:${options.config.name}`,
    });
    this.priceCache = options.priceCache ?? new PriceCache(undefined, this.logger);
    this.durationResolver = options.durationResolver ?? new DurationResolver(this.logger);
    this.onStateChange = options.onStateChange;
  }

  getState(): SensorState | null {
    return this.state;
  }

  /**
   * New price data arrived.
   */
  async updatePrices(slots: PriceSlot[], now: DateTime = DateTime.now()): Promise<SensorState> {
    await this.priceCache.merge(slots, now);
    return this.evaluate(now);
  }

  /**
   * The remaining-duration signal reported a new reading.
   */
  updateDurationSignal(signal: DurationSignal | null, now: DateTime = DateTime.now()): SensorState {
    this.signal = signal;
    return this.evaluate(now);
  }

  tick(now: DateTime = DateTime.now()): SensorState {
    return this.evaluate(now);
  }

  evaluate(at: DateTime = DateTime.now()): SensorState {
    const now = at.setZone(this.config.timezone);
    const window = resolveWindowAt(this.earliestStart, this.latestEnd, now);

    const slots = this.priceCache.slots();
    if (slots.length === 0) {
      this.logger.warn('No price data available');
      return this.publish(this.unavailable(now));
    }

    const resolved = this.durationResolver.resolve({
      staticDuration: this.staticDuration,
      signal: this.signal,
      signalConfigured: this.config.durationSignal,
      window,
      now,
    });
    if (!resolved.available) {
      this.logger.warn('No usable duration: signal unavailable and no static duration configured');
      return this.publish(this.unavailable(now));
    }

    const selection = selectIntervals(
      { start: resolved.intervalStart, end: window.end },
      slots,
      resolved.duration,
      this.config.priceMode,
      this.config.intervalMode
    );

    if (selection.incomplete) {
      this.logger.warn(
        `Selection incomplete (${selection.issues.join(', ')}): ` +
          `${selection.duration.toMillis()} of ${resolved.duration.toMillis()} ms scheduled`
      );
    }

    const evaluated = evaluateState({
      selection,
      window,
      intervalStart: resolved.intervalStart,
      duration: resolved.duration,
      priceMode: this.config.priceMode,
      intervalMode: this.config.intervalMode,
      now,
    });

    this.logger.debug(
      `Evaluated at ${now.toISO() ?? 'unknown'}: active=${evaluated.active}, ` +
        `enabled=${evaluated.enabled}, ${selection.intervals.length} interval(s)`
    );

    return this.publish({
      available: true,
      active: evaluated.active,
      enabled: evaluated.enabled,
      attributes: evaluated.attributes,
      evaluatedAt: now,
    });
  }

  /**
   * Re-evaluate every `intervalMs`. The timer does not keep the process alive.
   */
  start(intervalMs = 60000, clock: Clock = () => DateTime.now()): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      try {
        this.evaluate(clock());
      } catch (error: unknown) {
        this.logger.error(`Periodic evaluation failed: ${extractErrorMessage(error)}`);
      }
    }, intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  private unavailable(now: DateTime): SensorState {
    return {
      available: false,
      active: false,
      enabled: false,
      attributes: null,
      evaluatedAt: now,
    };
  }

  private publish(state: SensorState): SensorState {
    this.state = state;
    this.onStateChange?.(state);
    return state;
  }
}
