import { ConfigurationError, IntervalMode, PriceMode, loadAppConfig, parseSensorConfig } from '../src';

describe('loadAppConfig', () => {
  test('defaults', () => {
    expect(loadAppConfig({})).toEqual({
      logging: { level: 'info', format: 'pretty' },
      database: { path: ':memory:' },
      timezone: 'UTC',
      tickIntervalMs: 60000,
    });
  });

  test('environment overrides', () => {
    const config = loadAppConfig({
      SPOT_WINDOW_LOG_LEVEL: 'debug',
      SPOT_WINDOW_LOG_FORMAT: 'json',
      SPOT_WINDOW_DB_PATH: '/tmp/spot-window.db',
      SPOT_WINDOW_TIMEZONE: 'Europe/Oslo',
      SPOT_WINDOW_TICK_MS: '15000',
    });

    expect(config).toEqual({
      logging: { level: 'debug', format: 'json' },
      database: { path: '/tmp/spot-window.db' },
      timezone: 'Europe/Oslo',
      tickIntervalMs: 15000,
    });
  });

  test('empty variables count as unset', () => {
    expect(loadAppConfig({ SPOT_WINDOW_LOG_LEVEL: '', SPOT_WINDOW_TICK_MS: '' }).tickIntervalMs).toBe(60000);
  });

  test('rejects unknown time zones', () => {
    expect(() => loadAppConfig({ SPOT_WINDOW_TIMEZONE: 'Mars/Base' })).toThrow(
      'Invalid application configuration: timezone: unknown time zone "Mars/Base"'
    );
  });

  test('rejects bad tick intervals', () => {
    expect(() => loadAppConfig({ SPOT_WINDOW_TICK_MS: '-5' })).toThrow(ConfigurationError);
  });
});

describe('parseSensorConfig', () => {
  test('fills in defaults', () => {
    expect(
      parseSensorConfig({ name: 'heater', earliestStart: '06:00', latestEnd: '09:30:15', durationSeconds: 600 })
    ).toEqual({
      name: 'heater',
      earliestStart: '06:00',
      latestEnd: '09:30:15',
      durationSeconds: 600,
      durationSignal: false,
      priceMode: PriceMode.CHEAPEST,
      intervalMode: IntervalMode.CONTIGUOUS,
      timezone: 'UTC',
    });
  });

  test('collects every issue', () => {
    let caught: unknown;
    try {
      parseSensorConfig({ name: 'heater', earliestStart: '6', latestEnd: '09:75', durationSeconds: 600 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught instanceof ConfigurationError ? caught.details : []).toEqual([
      'earliestStart: expected HH:MM or HH:MM:SS',
      'latestEnd: expected HH:MM or HH:MM:SS',
    ]);
  });

  test('rejects unknown modes', () => {
    expect(() =>
      parseSensorConfig({
        name: 'heater',
        earliestStart: '06:00',
        latestEnd: '09:00',
        durationSeconds: 600,
        priceMode: 'average',
      })
    ).toThrow(ConfigurationError);
  });
});
