// ═══════════════════════════════════════════════════════════════════════════════
// STRUCTURED LOGGER — Component Loggers with Bound Context
// Module Runtime — Observability
// ═══════════════════════════════════════════════════════════════════════════════
//
// Structured logging with:
// - JSON output for production, pretty-print for development
// - Component-based child loggers
// - Error formatting (name, message, truncated stack, cause)
//
// Usage:
//   import { getLogger } from './observability/logging/index.js';
//
//   const logger = getLogger({ component: 'loader' });
//   logger.info('Loaded module', { module: 'Data.ProfileLoader' });
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

/**
 * Logger configuration options.
 */
export interface LoggerConfig {
  /** Minimum log level */
  level?: LogLevel;

  /** Enable pretty printing (development) */
  pretty?: boolean;

  /** Service name for logs */
  serviceName?: string;

  /** Environment name */
  environment?: string;

  /** Enable timestamp */
  timestamp?: boolean;

  /** Custom base context added to all logs */
  base?: Record<string, unknown>;
}

/**
 * Options for creating a child logger.
 */
export interface LoggerOptions {
  /** Component name */
  component?: string;

  /** Additional context */
  context?: Record<string, unknown>;
}

/**
 * Logger interface used across the runtime.
 */
export interface ILogger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, context?: Record<string, unknown>): void;

  /** Create a child logger with additional context */
  child(options: LoggerOptions): ILogger;

  /** Check if a level is enabled */
  isLevelEnabled(level: LogLevel): boolean;

  /** Log with the elapsed time since `startTime` */
  time(message: string, startTime: number, context?: Record<string, unknown>): void;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

let globalConfig: LoggerConfig = {
  level: 'info',
  pretty: process.env.NODE_ENV !== 'production',
  serviceName: 'module-runtime',
  environment: process.env.NODE_ENV ?? 'development',
  timestamp: true,
};

/**
 * Configure the global logger settings.
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

/**
 * Get the current logger configuration.
 */
export function getLoggerConfig(): LoggerConfig {
  return { ...globalConfig };
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * Get log level from environment or config.
 */
function getEffectiveLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return globalConfig.level ?? 'info';
}

// ─────────────────────────────────────────────────────────────────────────────────
// FORMATTERS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Format error for logging.
 */
export function formatError(error: unknown): Record<string, unknown> {
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

interface LogEntry {
  level: LogLevel;
  levelNum: number;
  time?: string;
  msg: string;
  component?: string;
  fields: Record<string, unknown>;
}

function buildEntry(
  level: LogLevel,
  message: string,
  context: Record<string, unknown>,
  component?: string
): LogEntry {
  return {
    level,
    levelNum: LOG_LEVELS[level],
    time: globalConfig.timestamp ? new Date().toISOString() : undefined,
    msg: message,
    component,
    fields: { ...globalConfig.base, ...context },
  };
}

const COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',  // Gray
  debug: '\x1b[36m',  // Cyan
  info: '\x1b[32m',   // Green
  warn: '\x1b[33m',   // Yellow
  error: '\x1b[31m',  // Red
  fatal: '\x1b[35m',  // Magenta
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

/**
 * Pretty print a log entry (for development).
 */
function prettyPrint(entry: LogEntry): string {
  const levelStr = entry.level.toUpperCase().padEnd(5);
  const timeStr = entry.time ? entry.time.split('T')[1]?.replace('Z', '') ?? '' : '';
  const componentStr = entry.component ? `[${entry.component}]` : '';

  let contextStr = '';
  if (Object.keys(entry.fields).length > 0) {
    contextStr = ` ${DIM}${JSON.stringify(entry.fields)}${RESET}`;
  }

  return `${DIM}${timeStr}${RESET} ${COLORS[entry.level]}${levelStr}${RESET} ${componentStr} ${entry.msg}${contextStr}`;
}

function toJson(entry: LogEntry): string {
  return JSON.stringify({
    level: entry.level,
    levelNum: entry.levelNum,
    time: entry.time,
    msg: entry.msg,
    service: globalConfig.serviceName,
    env: globalConfig.environment,
    ...(entry.component && { component: entry.component }),
    ...entry.fields,
  });
}

// ─────────────────────────────────────────────────────────────────────────────────
// OUTPUT
// ─────────────────────────────────────────────────────────────────────────────────

function writeLog(entry: LogEntry): void {
  const output = globalConfig.pretty ? prettyPrint(entry) : toJson(entry);

  if (entry.level === 'error' || entry.level === 'fatal') {
    console.error(output);
  } else if (entry.level === 'warn') {
    console.warn(output);
  } else {
    console.log(output);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGER IMPLEMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

function createLoggerImpl(options: LoggerOptions = {}): ILogger {
  const { component, context: baseContext = {} } = options;

  // Level is read per call so configureLogger() and LOG_LEVEL apply to
  // loggers created at import time.
  const enabled = (level: LogLevel): boolean =>
    LOG_LEVELS[level] >= LOG_LEVELS[getEffectiveLevel()];

  const log = (level: LogLevel, message: string, context: Record<string, unknown> = {}): void => {
    if (!enabled(level)) {
      return;
    }
    writeLog(buildEntry(level, message, { ...baseContext, ...context }, component));
  };

  const logWithError = (
    level: LogLevel,
    message: string,
    error?: unknown,
    context: Record<string, unknown> = {}
  ): void => {
    if (!enabled(level)) {
      return;
    }
    const errorContext = error ? formatError(error) : {};
    writeLog(buildEntry(level, message, { ...baseContext, ...context, ...errorContext }, component));
  };

  return {
    trace: (message, context) => log('trace', message, context),
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, error, context) => logWithError('error', message, error, context),
    fatal: (message, error, context) => logWithError('fatal', message, error, context),

    child: (childOptions: LoggerOptions): ILogger => {
      return createLoggerImpl({
        component: childOptions.component ?? component,
        context: { ...baseContext, ...childOptions.context },
      });
    },

    isLevelEnabled: enabled,

    time: (message: string, startTime: number, context?: Record<string, unknown>): void => {
      log('info', message, { ...context, durationMs: Date.now() - startTime });
    },
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
