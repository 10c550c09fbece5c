/**
 * Logger Abstraction
 *
 * Console-backed logging shared by the pipeline core, the agents and the CLI.
 *
 * Supports both string messages (simple logging) and structured data objects
 * (production-friendly JSON logging for better parsing and analysis).
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Log level for structured logging.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry for production logging.
 */
export interface StructuredLogEntry {
  /** Event type identifier (e.g., 'step_complete', 'cache_write_failed') */
  readonly event: string;
  /** Optional message for human readability */
  readonly message?: string;
  /** Additional structured data */
  readonly [key: string]: unknown;
}

/**
 * Basic logger interface (string-based).
 */
export interface Logger {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug: (message: string) => void;
}

/**
 * Extended logger interface supporting structured logging.
 */
export interface StructuredLogger extends Logger {
  /**
   * Log structured data at the specified level.
   * In production (JSON mode), outputs as JSON.
   * In development, formats as readable string.
   */
  structured: (level: LogLevel, entry: StructuredLogEntry) => void;
}

/**
 * Context attached to every line of a contextual logger.
 * `correlationId` ties together all log lines of one pipeline run.
 */
export interface LoggingContext {
  readonly correlationId: string;
  readonly [key: string]: unknown;
}

/**
 * Structured logger bound to a logging context.
 */
export interface ContextualLogger extends StructuredLogger {
  readonly context: LoggingContext;
  /** Creates a logger that inherits this context, extended (or overridden) by `extra`. */
  child: (extra: Record<string, unknown>) => ContextualLogger;
}

// ============================================================================
// Configuration
// ============================================================================

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Whether to output logs as JSON (for production log aggregators).
 * Controlled by LOG_FORMAT environment variable.
 */
const isJsonLogging = (): boolean => process.env.LOG_FORMAT === 'json';

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

/**
 * Minimum level that is written. Controlled by LOG_LEVEL (default: info).
 */
function getMinimumLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(configured) ? configured : 'info';
}

function isEnabled(level: LogLevel): boolean {
  return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[getMinimumLevel()];
}

// ============================================================================
// String-Based Logger
// ============================================================================

/**
 * Default logger implementation writing to the console.
 * Debug and info share console.log; warn and error use their own streams.
 */
export const logger: Logger = {
  info: (message: string) => {
    if (isEnabled('info')) console.log(message);
  },
  warn: (message: string) => {
    if (isEnabled('warn')) console.warn(message);
  },
  error: (message: string) => {
    if (isEnabled('error')) console.error(message);
  },
  debug: (message: string) => {
    if (isEnabled('debug')) console.log(message);
  },
};

/**
 * Creates a prefixed logger for specific modules.
 *
 * @param prefix - The prefix to add to all log messages
 * @returns A logger with the prefix prepended to all messages
 *
 * @example
 * const log = createPrefixedLogger('[ResultCache]');
 * log.info('Entry written'); // logs: "[ResultCache] Entry written"
 */
export function createPrefixedLogger(prefix: string): Logger {
  return {
    info: (message: string) => logger.info(`${prefix} ${message}`),
    warn: (message: string) => logger.warn(`${prefix} ${message}`),
    error: (message: string) => logger.error(`${prefix} ${message}`),
    debug: (message: string) => logger.debug(`${prefix} ${message}`),
  };
}

// ============================================================================
// Structured Logger
// ============================================================================

/**
 * Formats a structured log entry as a readable string for development.
 */
function formatStructuredEntry(prefix: string, entry: StructuredLogEntry): string {
  const { event, message, ...rest } = entry;
  const dataStr = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
  const msgStr = message ? `: ${message}` : '';
  return `${prefix} [${event}]${msgStr}${dataStr}`;
}

/**
 * Formats a structured log entry as JSON for production.
 */
function formatStructuredJson(prefix: string, level: LogLevel, entry: StructuredLogEntry): string {
  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    module: prefix.replace(/[[\]]/g, '').trim(),
    ...entry,
  });
}

function logAtLevel(level: LogLevel, message: string): void {
  switch (level) {
    case 'debug':
      logger.debug(message);
      break;
    case 'info':
      logger.info(message);
      break;
    case 'warn':
      logger.warn(message);
      break;
    case 'error':
      logger.error(message);
      break;
  }
}

/**
 * Creates a structured logger for specific modules.
 * Supports both string messages and structured data objects.
 *
 * @example
 * const log = createStructuredLogger('[Orchestrator]');
 * log.structured('info', {
 *   event: 'step_complete',
 *   stepId: 'keyword-mining',
 *   durationMs: 1500,
 * });
 */
export function createStructuredLogger(prefix: string): StructuredLogger {
  return {
    ...createPrefixedLogger(prefix),
    structured: (level: LogLevel, entry: StructuredLogEntry): void => {
      const formatted = isJsonLogging()
        ? formatStructuredJson(prefix, level, entry)
        : formatStructuredEntry(prefix, entry);
      logAtLevel(level, formatted);
    },
  };
}

// ============================================================================
// Contextual Logger
// ============================================================================

/**
 * Generates a short correlation ID: base36 timestamp, dash, base36 random part.
 *
 * @example
 * generateCorrelationId(); // "m1x2k3p4-9f8e7d6c"
 */
export function generateCorrelationId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).slice(2, 10).padEnd(8, '0');
  return `${timestamp}-${random}`;
}

/**
 * Creates a logger whose lines carry the run's correlation ID.
 * In JSON mode the whole context is merged into every structured entry.
 *
 * @example
 * const log = createContextualLogger('[Orchestrator]', { correlationId, runId });
 * log.info('Run started'); // "[Orchestrator] [m1x2k3p4-9f8e7d6c] Run started"
 *
 * const stepLog = log.child({ stepId: 'draft-writer' });
 */
export function createContextualLogger(prefix: string, context: LoggingContext): ContextualLogger {
  const tag = `${prefix} [${context.correlationId}]`;
  const base = createStructuredLogger(tag);

  return {
    ...createPrefixedLogger(tag),
    context,
    structured: (level: LogLevel, entry: StructuredLogEntry): void => {
      base.structured(level, isJsonLogging() ? { ...context, ...entry } : entry);
    },
    child: (extra: Record<string, unknown>) =>
      createContextualLogger(prefix, { ...context, ...extra, correlationId: context.correlationId }),
  };
}
