import { DateTime } from 'luxon';
import {
  IntervalMode,
  PriceCache,
  PriceMode,
  PriceSlot,
  PriceWindowSensor,
  SensorConfig,
  SensorState,
} from '../src';

const utc = (iso: string): DateTime => DateTime.fromISO(iso, { zone: 'utc' });

function hourly(startIso: string, prices: number[]): PriceSlot[] {
  const first = utc(startIso);
  return prices.map((price, i) => ({
    start: first.plus({ hours: i }),
    end: first.plus({ hours: i + 1 }),
    price,
  }));
}

// 20:00 on 2024-01-15 through 07:00 on 2024-01-16
const overnight = hourly('2024-01-15T20:00:00Z', [5, 5, 6, 2, 1, 1, 2, 7, 7, 7, 0, 0]);

const nightly: SensorConfig = {
  name: 'dishwasher',
  earliestStart: '22:00',
  latestEnd: '06:00',
  durationSeconds: 4 * 3600,
  durationSignal: false,
  priceMode: PriceMode.CHEAPEST,
  intervalMode: IntervalMode.CONTIGUOUS,
  timezone: 'UTC',
};

describe('PriceWindowSensor', () => {
  test('unavailable without price data', () => {
    const sensor = new PriceWindowSensor({ config: nightly });

    const state = sensor.tick(utc('2024-01-16T00:30:00Z'));

    expect(state.available).toBe(false);
    expect(state.active).toBe(false);
    expect(state.attributes).toBeNull();
  });

  test('selects the cheapest run across midnight', async () => {
    const sensor = new PriceWindowSensor({ config: nightly });

    const state = await sensor.updatePrices(overnight, utc('2024-01-16T00:30:00Z'));

    expect(state.available).toBe(true);
    expect(state.active).toBe(true);
    expect(state.enabled).toBe(true);
    expect(state.attributes?.earliest_start_time).toBe('2024-01-15T22:00:00.000Z');
    expect(state.attributes?.latest_end_time).toBe('2024-01-16T06:00:00.000Z');
    expect(state.attributes?.duration).toBe('4:00:00');
    expect(state.attributes?.total_cost).toBe(6);
    expect(state.attributes?.data).toEqual([
      { start_time: '2024-01-15T23:00:00.000Z', end_time: '2024-01-16T03:00:00.000Z', price_per_kwh: 1.5 },
    ]);
  });

  test('state follows the clock', async () => {
    const sensor = new PriceWindowSensor({ config: nightly });
    await sensor.updatePrices(overnight, utc('2024-01-15T21:00:00Z'));

    const before = sensor.tick(utc('2024-01-15T21:00:00Z'));
    expect(before.enabled).toBe(false);
    expect(before.active).toBe(false);
    expect(before.attributes?.data[0].start_time).toBe('2024-01-15T23:00:00.000Z');

    expect(sensor.tick(utc('2024-01-15T23:00:00Z')).active).toBe(true);

    const after = sensor.tick(utc('2024-01-16T03:00:00Z'));
    expect(after.active).toBe(false);
    expect(after.enabled).toBe(true);
  });

  test('intermittent most expensive hours', async () => {
    const sensor = new PriceWindowSensor({
      config: {
        ...nightly,
        durationSeconds: 2 * 3600,
        priceMode: PriceMode.MOST_EXPENSIVE,
        intervalMode: IntervalMode.INTERMITTENT,
      },
    });

    const state = await sensor.updatePrices(overnight, utc('2024-01-16T03:30:00Z'));

    expect(state.active).toBe(true);
    expect(state.attributes?.data).toEqual([
      { start_time: '2024-01-16T03:00:00.000Z', end_time: '2024-01-16T04:00:00.000Z', rank: 1, price_per_kwh: 7 },
      { start_time: '2024-01-16T04:00:00.000Z', end_time: '2024-01-16T05:00:00.000Z', rank: 2, price_per_kwh: 7 },
    ]);
  });

  test('duration signal moves the interval start', async () => {
    const sensor = new PriceWindowSensor({
      config: { ...nightly, durationSeconds: undefined, durationSignal: true },
    });

    const waiting = await sensor.updatePrices(overnight, utc('2024-01-16T00:30:00Z'));
    expect(waiting.available).toBe(false);

    const state = sensor.updateDurationSignal(
      { value: '2', unit: 'h', lastChanged: utc('2024-01-16T01:00:00Z') },
      utc('2024-01-16T01:30:00Z')
    );

    expect(state.available).toBe(true);
    expect(state.active).toBe(true);
    expect(state.attributes?.interval_start_time).toBe('2024-01-16T01:00:00.000Z');
    expect(state.attributes?.data).toEqual([
      { start_time: '2024-01-16T01:00:00.000Z', end_time: '2024-01-16T03:00:00.000Z', price_per_kwh: 1.5 },
    ]);
  });

  test('unusable signal falls back to the static duration', async () => {
    const sensor = new PriceWindowSensor({ config: { ...nightly, durationSignal: true } });
    await sensor.updatePrices(overnight, utc('2024-01-16T00:30:00Z'));

    const state = sensor.updateDurationSignal({ value: 'unavailable' }, utc('2024-01-16T00:30:00Z'));

    expect(state.available).toBe(true);
    expect(state.attributes?.duration).toBe('4:00:00');
  });

  test('evaluates in the configured time zone', async () => {
    const sensor = new PriceWindowSensor({
      config: { ...nightly, earliestStart: '23:00', latestEnd: '07:00', timezone: 'Europe/Berlin' },
    });

    const state = await sensor.updatePrices(overnight, utc('2024-01-16T00:30:00Z'));

    expect(state.attributes?.earliest_start_time).toBe('2024-01-15T23:00:00.000+01:00');
    expect(state.attributes?.latest_end_time).toBe('2024-01-16T07:00:00.000+01:00');
  });

  test('shares a price cache', async () => {
    const priceCache = new PriceCache();
    await priceCache.merge(overnight, utc('2024-01-16T00:30:00Z'));
    const sensor = new PriceWindowSensor({ config: nightly, priceCache });

    expect(sensor.tick(utc('2024-01-16T00:30:00Z')).available).toBe(true);
  });

  describe('periodic evaluation', () => {
    beforeEach(() => {
      jest.useFakeTimers();
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    test('start and stop', async () => {
      const states: SensorState[] = [];
      const sensor = new PriceWindowSensor({
        config: nightly,
        onStateChange: (state) => states.push(state),
      });
      await sensor.updatePrices(overnight, utc('2024-01-15T21:00:00Z'));
      expect(states).toHaveLength(1);

      let now = utc('2024-01-15T22:00:00Z');
      sensor.start(60000, () => now);
      expect(sensor.isRunning()).toBe(true);

      jest.advanceTimersByTime(60000);
      now = utc('2024-01-15T23:30:00Z');
      jest.advanceTimersByTime(60000);

      expect(states).toHaveLength(3);
      expect(states[1].active).toBe(false);
      expect(states[2].active).toBe(true);
      expect(sensor.getState()).toBe(states[2]);

      sensor.stop();
      expect(sensor.isRunning()).toBe(false);
      jest.advanceTimersByTime(120000);
      expect(states).toHaveLength(3);
    });
  });
});
