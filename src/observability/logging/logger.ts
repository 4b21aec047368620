// ═══════════════════════════════════════════════════════════════════════════════
// STRUCTURED LOGGER — Component Logging with Redaction
// ═══════════════════════════════════════════════════════════════════════════════
//
// - JSON output for production, pretty-print for development
// - Component-based child loggers
// - Redaction of credential-looking fields
//
// Usage:
//   import { getLogger } from '../observability/logging/index.js';
//
//   const logger = getLogger({ component: 'palace' });
//   logger.info('Conversation ingested', { nodes: 3 });
//
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Log levels in order of severity.
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Numeric log level values (Pino-compatible).
 */
export const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
  redact?: boolean;
  serviceName?: string;
  environment?: string;
  timestamp?: boolean;
  /** Receives every formatted line; defaults to the console */
  sink?: (level: LogLevel, line: string) => void;
}

export interface LoggerOptions {
  component?: string;
  context?: Record<string, unknown>;
}

export interface ILogger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, context?: Record<string, unknown>): void;
  child(options: LoggerOptions): ILogger;
  isLevelEnabled(level: LogLevel): boolean;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

let globalConfig: LoggerConfig = {
  level: 'info',
  pretty: process.env.NODE_ENV !== 'production',
  redact: true,
  serviceName: 'memory-palace',
  environment: process.env.NODE_ENV ?? 'development',
  timestamp: true,
};

export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function getEffectiveLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return globalConfig.level ?? 'info';
}

// ─────────────────────────────────────────────────────────────────────────────────
// REDACTION
// ─────────────────────────────────────────────────────────────────────────────────

const SENSITIVE_KEY_PATTERN = /password|secret|token|apikey|api_key|authorization/i;

export function redact(value: unknown, depth = 0): unknown {
  if (depth > 5) return '[MAX_DEPTH]';

  if (Array.isArray(value)) {
    return value.map(item => redact(item, depth + 1));
  }

  if (value && typeof value === 'object' && !(value instanceof Date)) {
    return redactRecord(Object.fromEntries(Object.entries(value)), depth);
  }

  return value;
}

function redactRecord(record: Record<string, unknown>, depth = 0): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(record)) {
    result[key] = SENSITIVE_KEY_PATTERN.test(key) ? '[REDACTED]' : redact(inner, depth + 1);
  }
  return result;
}

// ─────────────────────────────────────────────────────────────────────────────────
// FORMATTERS
// ─────────────────────────────────────────────────────────────────────────────────

function formatError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: error.message,
      errorStack: error.stack?.split('\n').slice(0, 10).join('\n'),
      ...(error.cause ? { errorCause: String(error.cause) } : {}),
    };
  }

  if (typeof error === 'string') {
    return { errorMessage: error };
  }

  return { errorMessage: String(error) };
}

function formatLogEntry(
  level: LogLevel,
  message: string,
  context: Record<string, unknown>,
  component?: string
): Record<string, unknown> {
  const entry: Record<string, unknown> = {
    level,
    levelNum: LOG_LEVELS[level],
    time: globalConfig.timestamp ? new Date().toISOString() : undefined,
    msg: message,
    service: globalConfig.serviceName,
    env: globalConfig.environment,
    ...(component && { component }),
    ...context,
  };

  return globalConfig.redact ? redactRecord(entry) : entry;
}

const COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

const STANDARD_FIELDS = new Set(['level', 'levelNum', 'time', 'msg', 'service', 'env', 'component']);

function prettyPrint(level: LogLevel, entry: Record<string, unknown>): string {
  const time = typeof entry.time === 'string' ? entry.time.split('T')[1]?.replace('Z', '') ?? '' : '';
  const component = typeof entry.component === 'string' ? `[${entry.component}]` : '';

  const contextFields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry)) {
    if (!STANDARD_FIELDS.has(key) && value !== undefined) contextFields[key] = value;
  }

  const contextStr = Object.keys(contextFields).length > 0
    ? ` ${DIM}${JSON.stringify(contextFields)}${RESET}`
    : '';

  return `${DIM}${time}${RESET} ${COLORS[level]}${level.toUpperCase().padEnd(5)}${RESET} ${component} ${String(entry.msg)}${contextStr}`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// OUTPUT
// ─────────────────────────────────────────────────────────────────────────────────

function writeLog(level: LogLevel, entry: Record<string, unknown>): void {
  const line = globalConfig.pretty ? prettyPrint(level, entry) : JSON.stringify(entry);

  if (globalConfig.sink) {
    globalConfig.sink(level, line);
    return;
  }

  if (level === 'error' || level === 'fatal') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGER IMPLEMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

function createLoggerImpl(options: LoggerOptions = {}): ILogger {
  const { component, context: baseContext = {} } = options;

  // Level is read per call so configureLogger() applies to existing loggers.
  const enabled = (level: LogLevel): boolean =>
    LOG_LEVELS[level] >= LOG_LEVELS[getEffectiveLevel()];

  const log = (level: LogLevel, message: string, context: Record<string, unknown> = {}): void => {
    if (!enabled(level)) return;
    writeLog(level, formatLogEntry(level, message, { ...baseContext, ...context }, component));
  };

  const logWithError = (
    level: LogLevel,
    message: string,
    error?: unknown,
    context: Record<string, unknown> = {}
  ): void => {
    if (!enabled(level)) return;
    const errorContext = error !== undefined ? formatError(error) : {};
    writeLog(
      level,
      formatLogEntry(level, message, { ...baseContext, ...context, ...errorContext }, component)
    );
  };

  return {
    trace: (message, context) => log('trace', message, context),
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, error, context) => logWithError('error', message, error, context),
    fatal: (message, error, context) => logWithError('fatal', message, error, context),

    child: (childOptions: LoggerOptions): ILogger =>
      createLoggerImpl({
        component: childOptions.component ?? component,
        context: { ...baseContext, ...childOptions.context },
      }),

    isLevelEnabled: enabled,
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// PUBLIC API
// ─────────────────────────────────────────────────────────────────────────────────

let rootLogger: ILogger | null = null;

/**
 * Get the root logger or create a child logger.
 */
export function getLogger(options?: LoggerOptions): ILogger {
  if (!rootLogger) {
    rootLogger = createLoggerImpl();
  }

  if (options) {
    return rootLogger.child(options);
  }

  return rootLogger;
}

/**
 * Reset the root logger (for testing).
 */
export function resetLogger(): void {
  rootLogger = null;
}

/**
 * Measure and log execution time.
 */
export async function withTiming<T>(
  name: string,
  fn: () => Promise<T>,
  logger?: ILogger
): Promise<T> {
  const log = logger ?? getLogger({ component: 'perf' });
  const start = performance.now();

  try {
    const result = await fn();
    log.debug(`${name} completed`, { durationMs: (performance.now() - start).toFixed(2) });
    return result;
  } catch (error) {
    log.error(`${name} failed`, error, { durationMs: (performance.now() - start).toFixed(2) });
    throw error;
  }
}
