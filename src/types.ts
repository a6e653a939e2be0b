import { DateTime, Duration } from 'luxon';

// ===== ENUMS =====

export enum PriceMode {
  CHEAPEST = 'cheapest',
  MOST_EXPENSIVE = 'most_expensive',
}

export enum IntervalMode {
  CONTIGUOUS = 'contiguous',
  INTERMITTENT = 'intermittent',
}

export type SelectionIssue = 'insufficient_coverage' | 'infeasible_duration';

export type DurationSource = 'static' | 'signal' | 'fallback';

// ===== CORE INTERFACES =====

export interface PriceSlot {
  start: DateTime;
  end: DateTime;
  price: number; // currency per kWh, unit is whatever the provider delivers
}

export interface Window {
  start: DateTime;
  end: DateTime; // exclusive
}

export interface TimeOfDay {
  hour: number; // 0-23
  minute: number; // 0-59
  second: number; // 0-59
}

export interface RequiredDuration {
  duration: Duration;
  anchor?: DateTime;
}

export interface SelectedInterval {
  start: DateTime;
  end: DateTime;
  rank?: number; // intermittent only, 1 = most favorable
  price?: number;
}

export interface SelectionResult {
  intervals: SelectedInterval[];
  duration: Duration; // covered by intervals
  cost: number; // sum of price x hours
  incomplete: boolean;
  issues: SelectionIssue[];
}

/**
 * Remaining-duration signal as exposed by an external collaborator.
 * `value` is kept loose because hosts report raw states ("2.5", "unknown").
 */
export interface DurationSignal {
  value: number | string | null;
  unit?: string;
  lastChanged?: DateTime;
}

export interface ResolvedDuration extends RequiredDuration {
  available: boolean;
  intervalStart: DateTime;
  source: DurationSource;
}

// ===== SENSOR =====

export interface SensorConfig {
  name: string;
  earliestStart: string; // HH:MM[:SS]
  latestEnd: string; // HH:MM[:SS]
  durationSeconds?: number;
  durationSignal: boolean;
  priceMode: PriceMode;
  intervalMode: IntervalMode;
  timezone: string;
}

export interface Sensor extends SensorConfig {
  id: number;
  created_at: Date;
  updated_at: Date;
}

export interface SelectedIntervalAttribute {
  start_time: string;
  end_time: string;
  rank?: number;
  price_per_kwh?: number;
}

export interface SensorAttributes {
  earliest_start_time: string;
  latest_end_time: string;
  duration: string;
  interval_start_time: string;
  price_mode: PriceMode;
  interval_mode: IntervalMode;
  interval_enabled: boolean;
  incomplete: boolean;
  issues: SelectionIssue[];
  mean_price_per_kwh: number | null;
  total_cost: number;
  data: SelectedIntervalAttribute[];
}

export interface EvaluatedState {
  enabled: boolean;
  active: boolean;
  attributes: SensorAttributes;
}

export interface SensorState {
  available: boolean;
  active: boolean;
  enabled: boolean;
  attributes: SensorAttributes | null;
  evaluatedAt: DateTime;
}

// ===== INPUT TYPES =====

export interface CreateSensorInput {
  name: string;
  earliestStart: string;
  latestEnd: string;
  durationSeconds?: number;
  durationSignal?: boolean;
  priceMode?: PriceMode;
  intervalMode?: IntervalMode;
  timezone?: string;
}

export type UpdateSensorInput = Partial<CreateSensorInput>;

// ===== DATABASE ROW TYPES =====

export interface PriceSlotRow {
  start_ms: number;
  end_ms: number;
  price: number;
  zone: string;
}

export interface SensorRow {
  id: number;
  name: string;
  earliest_start: string; // HH:MM[:SS]
  latest_end: string; // HH:MM[:SS]
  duration_seconds: number | null;
  duration_signal: number; // 0/1
  price_mode: string;
  interval_mode: string;
  timezone: string;
  created_at: string; // ISO 8601
  updated_at: string; // ISO 8601
}
