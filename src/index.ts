// Database
export { Database } from './database';

// Services
export { SensorService } from './sensor-service';
export { PriceCache, PriceSlotStore, MemoryPriceSlotStore, MergeStats } from './price-cache';

// Sensor (evaluation loop)
export { PriceWindowSensor, PriceWindowSensorOptions, Clock } from './sensor';

// Core
export { resolveWindow, resolveWindowAt, isWithinWindow, windowMillis } from './window-resolver';
export {
  DurationResolver,
  ResolveDurationInput,
  parseDurationSignal,
  DURATION_UNITS,
} from './duration-resolver';
export { evaluateState, EvaluateStateInput } from './state-evaluator';

// Interval selectors
export * from './selectors';

// Time helpers
export {
  parseTimeOfDay,
  formatTimeOfDay,
  compareTimeOfDay,
  atTimeOfDay,
  formatDuration,
} from './time';

// Configuration, logging, errors
export {
  sensorConfigSchema,
  appConfigSchema,
  AppConfig,
  parseSensorConfig,
  loadAppConfig,
  createAppLogger,
} from './config';
export { createLogger, createChildLogger, Logger, LogLevel, LoggerConfig } from './logger';
export {
  ConfigurationError,
  InvalidWindowError,
  SignalUnavailableError,
  NotFoundError,
} from './errors';

// Types
export {
  // Enums
  PriceMode,
  IntervalMode,
  // Interfaces
  SelectionIssue,
  DurationSource,
  PriceSlot,
  Window,
  TimeOfDay,
  RequiredDuration,
  SelectedInterval,
  SelectionResult,
  DurationSignal,
  ResolvedDuration,
  SensorConfig,
  Sensor,
  SelectedIntervalAttribute,
  SensorAttributes,
  EvaluatedState,
  SensorState,
  // Input types
  CreateSensorInput,
  UpdateSensorInput,
  // Row types (for advanced use)
  PriceSlotRow,
  SensorRow,
} from './types';
