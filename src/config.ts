/**
 * Configuration schemas using Zod
 */

import { IANAZone } from 'luxon';
import { z } from 'zod';
import { IntervalMode, PriceMode, SensorConfig } from './types';
import { ConfigurationError } from './errors';
import { Logger, createLogger } from './logger';

const TIME_OF_DAY = /^([01]?\d|2[0-3]):[0-5]\d(:[0-5]\d)?$/;

const timeOfDaySchema = z.string().trim().regex(TIME_OF_DAY, 'expected HH:MM or HH:MM:SS');

const timezoneSchema = z
  .string()
  .refine((zone) => IANAZone.isValidZone(zone), (zone) => ({ message: `unknown time zone "${zone}"` }));

/**
 * Sensor definition schema
 */
export const sensorConfigSchema = z
  .object({
    name: z.string().trim().min(1),
    earliestStart: timeOfDaySchema,
    latestEnd: timeOfDaySchema,
    durationSeconds: z.number().nonnegative().optional(),
    durationSignal: z.boolean().default(false),
    priceMode: z.nativeEnum(PriceMode).default(PriceMode.CHEAPEST),
    intervalMode: z.nativeEnum(IntervalMode).default(IntervalMode.CONTIGUOUS),
    timezone: timezoneSchema.default('UTC'),
  })
  .refine((config) => config.durationSignal || config.durationSeconds !== undefined, {
    message: 'durationSeconds is required unless the duration comes from a signal',
    path: ['durationSeconds'],
  });

/**
 * Application configuration schema
 */
export const appConfigSchema = z.object({
  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
    format: z.enum(['json', 'pretty']).default('pretty'),
  }),
  database: z.object({
    path: z.string().default(':memory:'),
  }),
  timezone: timezoneSchema.default('UTC'),
  tickIntervalMs: z.number().int().positive().default(60000),
});

export type AppConfig = z.infer<typeof appConfigSchema>;

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate a sensor definition, filling in defaults.
 */
export function parseSensorConfig(input: unknown): SensorConfig {
  const result = sensorConfigSchema.safeParse(input);
  if (!result.success) {
    const details = describeIssues(result.error);
    throw new ConfigurationError(`Invalid sensor configuration: ${details.join('; ')}`, details);
  }
  return result.data;
}

function optionalNumber(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : Number(value);
}

/**
 * Build the application configuration from environment variables.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = appConfigSchema.safeParse({
    logging: {
      level: env['SPOT_WINDOW_LOG_LEVEL'] || undefined,
      format: env['SPOT_WINDOW_LOG_FORMAT'] || undefined,
    },
    database: {
      path: env['SPOT_WINDOW_DB_PATH'] || undefined,
    },
    timezone: env['SPOT_WINDOW_TIMEZONE'] || undefined,
    tickIntervalMs: optionalNumber(env['SPOT_WINDOW_TICK_MS']),
  });

  if (!result.success) {
    const details = describeIssues(result.error);
    throw new ConfigurationError(`Invalid application configuration: ${details.join('; ')}`, details);
  }
  return result.data;
}

/**
 * Logger honouring the logging section of the application configuration.
 */
export function createAppLogger(config: AppConfig): Logger {
  return createLogger({ level: config.logging.level, json: config.logging.format === 'json' });
}
