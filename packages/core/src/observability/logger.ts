/**
 * Structured logging shared by synchronizers, commands and backends.
 *
 * Loggers are silent until they get a sink, are switched to console output,
 * or global debug mode is turned on.
 *
 * @module observability/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

/** One structured log record */
export interface LogEntry {
  readonly level: LogLevel;
  readonly module: string;
  readonly message: string;
  readonly timestamp: number;
  readonly context?: LogContext;
  /** Summary of the error passed to `error()`; `code` is set for coded errors */
  readonly error?: { name: string; message: string; code?: string };
}

/**
 * Logger contract accepted by synchronizers. Any object with these four
 * methods works, so pino or winston instances can be passed through.
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
}

export type LogSink = (entry: LogEntry) => void;

export interface TidewatchLoggerConfig {
  /** Lowest level that is emitted. @default 'info' */
  readonly level?: LogLevel;
  /** @default 'tidewatch' */
  readonly module?: string;
  /** Receives every emitted entry; takes precedence over console output */
  readonly handler?: LogSink;
  /** Print JSON lines to the console */
  readonly json?: boolean;
  /** Print readable lines to the console and emit debug entries */
  readonly debug?: boolean;
}

const SEVERITY: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

let debugEverywhere = false;

/** Force every Tidewatch logger to debug level with console output */
export function setDebugMode(enabled: boolean): void {
  debugEverywhere = enabled;
}

export function isDebugMode(): boolean {
  return debugEverywhere;
}

function consoleFor(level: LogLevel): (...args: unknown[]) => void {
  switch (level) {
    case 'error':
      return console.error;
    case 'warn':
      return console.warn;
    default:
      return console.log;
  }
}

/** Prints one JSON line per entry */
export const jsonConsoleSink: LogSink = (entry) => {
  consoleFor(entry.level)(JSON.stringify(entry));
};

/** Prints `[module] message`, followed by the context object when present */
export const textConsoleSink: LogSink = (entry) => {
  const print = consoleFor(entry.level);
  let line = `[${entry.module}] ${entry.message}`;
  if (entry.error) {
    line += ` (${entry.error.code ?? entry.error.name}: ${entry.error.message})`;
  }
  if (entry.context) {
    print(line, entry.context);
  } else {
    print(line);
  }
};

function summarize(error: Error): NonNullable<LogEntry['error']> {
  const summary = { name: error.name, message: error.message };
  return 'code' in error && typeof error.code === 'string' ? { ...summary, code: error.code } : summary;
}

/**
 * Leveled logger with module prefixes.
 *
 * @example
 * ```typescript
 * import { createLogger } from '@tidewatch/core';
 *
 * const log = createLogger({ module: 'settings', level: 'debug', json: true });
 * log.debug('attached', { identity: 'u1' });
 *
 * const docLog = log.child('doc'); // module "settings:doc"
 * ```
 */
export class TidewatchLogger implements Logger {
  readonly module: string;

  private readonly config: TidewatchLoggerConfig;
  private readonly threshold: LogLevel;
  private readonly sink: LogSink | null;

  constructor(config: TidewatchLoggerConfig = {}) {
    this.config = config;
    this.module = config.module ?? 'tidewatch';
    this.threshold = config.debug ? 'debug' : (config.level ?? 'info');
    this.sink =
      config.handler ?? (config.json ? jsonConsoleSink : config.debug ? textConsoleSink : null);
  }

  /** Logger for a sub-module, sharing this logger's settings */
  child(name: string): TidewatchLogger {
    return new TidewatchLogger({ ...this.config, module: `${this.module}:${name}` });
  }

  /** Whether entries at `level` are emitted */
  isEnabled(level: LogLevel): boolean {
    const threshold = debugEverywhere ? 'debug' : this.threshold;
    return SEVERITY.indexOf(level) >= SEVERITY.indexOf(threshold);
  }

  debug(message: string, context?: LogContext): void {
    this.emit('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.emit('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.emit('warn', message, context);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.emit('error', message, context, error);
  }

  private emit(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!this.isEnabled(level)) return;

    const sink = this.sink ?? (debugEverywhere ? textConsoleSink : null);
    if (!sink) return;

    sink({
      level,
      module: this.module,
      message,
      timestamp: Date.now(),
      ...(context ? { context } : {}),
      ...(error ? { error: summarize(error) } : {}),
    });
  }
}

export function createLogger(config?: TidewatchLoggerConfig): TidewatchLogger {
  return new TidewatchLogger(config);
}

/** Discards everything */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Logger for one component. Tidewatch loggers get a child prefix; foreign
 * loggers are used as they are.
 */
export function scopedLogger(logger: Logger | undefined, module: string): Logger {
  if (!logger) return createLogger({ module: `tidewatch:${module}` });
  return logger instanceof TidewatchLogger ? logger.child(module) : logger;
}
