/**
 * Structured Logger
 *
 * One JSON line per entry on stdout (stderr for errors). The threshold is
 * either fixed at creation (from PrivacyConfig.logging.level) or read from
 * LOG_LEVEL on every write. Components take a Logger so callers can route
 * or capture output.
 */

export const LOG_LEVELS = { debug: 0, info: 1, warn: 2, error: 3 } as const;
export type LogLevel = keyof typeof LOG_LEVELS;

export interface Logger {
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
}

export interface LogEntry {
  ts: string;
  level: LogLevel;
  ns: string;
  msg: string;
  data?: unknown;
}

export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  /** Fixed threshold; when omitted LOG_LEVEL is read on every write */
  level?: LogLevel;
  /** Where entries go; defaults to JSON lines on the process streams */
  sink?: LogSink;
}

/** The part of PrivacyConfig the logger reads */
export interface LoggingConfig {
  logging: { level: LogLevel };
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function envThreshold(): number {
  const env = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isLogLevel(env) ? LOG_LEVELS[env] : LOG_LEVELS.info;
}

export const streamSink: LogSink = (entry) => {
  const line = `${JSON.stringify(entry)}\n`;
  if (entry.level === 'error') process.stderr.write(line);
  else process.stdout.write(line);
};

export function createLogger(namespace: string, options: LoggerOptions = {}): Logger {
  const { level: fixedLevel, sink = streamSink } = options;
  const threshold = () => (fixedLevel ? LOG_LEVELS[fixedLevel] : envThreshold());

  const write = (level: LogLevel, msg: string, data?: unknown) => {
    if (LOG_LEVELS[level] < threshold()) return;
    const entry: LogEntry = { ts: new Date().toISOString(), level, ns: namespace, msg };
    if (data !== undefined) entry.data = data;
    sink(entry);
  };

  return {
    debug: (msg, data?) => write('debug', msg, data),
    info: (msg, data?) => write('info', msg, data),
    warn: (msg, data?) => write('warn', msg, data),
    error: (msg, data?) => write('error', msg, data),
  };
}

/**
 * Logger whose threshold is the configured level, ignoring LOG_LEVEL
 * changes made after the configuration was loaded.
 */
export function createConfiguredLogger(
  namespace: string,
  config: LoggingConfig,
  sink?: LogSink
): Logger {
  return createLogger(namespace, { level: config.logging.level, sink });
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
