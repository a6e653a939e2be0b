import winston, { format } from 'winston';

export type Logger = winston.Logger;

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggerConfig {
  level: LogLevel;
  /** JSON lines instead of the single-line console format. */
  json?: boolean;
  /** Drop every entry. Used as the library default. */
  silent?: boolean;
}

const consoleLine = format.printf(({ timestamp, level, message, component, ...meta }) => {
  const prefix = component ? `[${String(component)}] ` : '';
  const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} ${level}: ${prefix}${String(message)}${rest}`;
});

/**
 * Create a winston logger writing to the console.
 */
export function createLogger(config: LoggerConfig): Logger {
  const { level, json = process.env['NODE_ENV'] === 'production', silent = false } = config;

  return winston.createLogger({
    level,
    silent,
    format: format.combine(
      format.timestamp(),
      format.errors({ stack: true }),
      json ? format.json() : consoleLine
    ),
    transports: [new winston.transports.Console()],
    exitOnError: false,
  });
}

/**
 * Child logger carrying extra fields (usually `component`) on every entry.
 */
export function createChildLogger(logger: Logger, context: Record<string, unknown>): Logger {
  return logger.child(context);
}

let silentLogger: Logger | null = null;

/**
 * Shared logger that discards everything; what library classes use
 * when the host passes none.
 */
export function getSilentLogger(): Logger {
  if (!silentLogger) {
    silentLogger = createLogger({ level: 'error', silent: true });
  }
  return silentLogger;
}
