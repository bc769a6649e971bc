/**
 * Structured Logger
 *
 * Leveled, structured logging for the storage and session components.
 * Outputs: [HH:MM:SS] [LEVEL] [component] message {fields}
 *
 * The destination is passed in at construction. While the terminal UI owns
 * the screen nothing may reach stdout, so lines go to the log file only;
 * `stderr: true` is for the moments before and after the UI runs.
 */

import * as fs from 'node:fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

// ============================================================================
// Level Ordering
// ============================================================================

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

// ============================================================================
// Logger
// ============================================================================

export interface LoggerOptions {
  /** Minimum level written (default: info) */
  level?: LogLevel;
  /** Path appended to; null or undefined disables file output */
  file?: string | null;
  /** Mirror lines to stderr */
  stderr?: boolean;
  /** Clock override for tests */
  now?: () => Date;
}

export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Render an unknown thrown value for a log field.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Create a structured logger for a specific component.
 *
 * @example
 * ```typescript
 * const log = createLogger('store', { file: '.yellow.log' });
 * log.info('Loaded memos', { active: 12, deleted: 3 });
 * log.warn('Cleanup save failed', { error: err.message });
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): Logger {
  const minLevel = options.level ?? 'info';
  const logFile = options.file ?? null;
  const now = options.now ?? (() => new Date());

  function shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
  }

  function formatLine(level: LogLevel, message: string, fields?: Record<string, unknown>): string {
    const timestamp = now().toISOString().slice(11, 19);
    const label = LEVEL_LABELS[level];
    let line = `[${timestamp}] [${label}] [${component}] ${message}`;

    if (fields) {
      const sanitized: Record<string, unknown> = {};
      for (const key of Object.keys(fields)) {
        const val = fields[key];
        if (val !== undefined && val !== null) {
          sanitized[key] = val;
        }
      }
      if (Object.keys(sanitized).length > 0) {
        line += ` ${JSON.stringify(sanitized)}`;
      }
    }

    return line;
  }

  function emit(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    if (!shouldLog(level)) return;

    const line = formatLine(level, message, fields);

    if (options.stderr) {
      process.stderr.write(`${line}\n`);
    }

    if (logFile) {
      try {
        fs.appendFileSync(logFile, `${line}\n`);
      } catch {
        // Can't log logging errors -- avoid infinite loop
      }
    }
  }

  return {
    debug(message, fields) {
      emit('debug', message, fields);
    },
    info(message, fields) {
      emit('info', message, fields);
    },
    warn(message, fields) {
      emit('warn', message, fields);
    },
    error(message, fields) {
      emit('error', message, fields);
    },
  };
}

/**
 * Logger that drops everything.
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

// ============================================================================
// Log File Setup
// ============================================================================

/**
 * Check that the log file can be opened for appending.
 *
 * Returns the path when usable. Otherwise writes a warning to stderr and
 * returns null so the program carries on without file logging.
 */
export function openLogFile(
  logPath: string,
  warn: (message: string) => void = (message) => process.stderr.write(`${message}\n`)
): string | null {
  try {
    const fd = fs.openSync(logPath, 'a');
    fs.closeSync(fd);
    return logPath;
  } catch (error) {
    warn(`Warning: could not set up logging at ${logPath}: ${describeError(error)}`);
    return null;
  }
}
