import { gameConfig } from 'config/game';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  readonly level: LogLevel;
  readonly subsystem: string;
  readonly message: string;
  readonly timestamp: number;
  readonly context?: Record<string, unknown>;
}

export type LogWriter = (entry: LogEntry) => void;
export type NowFn = () => number;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const toIsoTimestamp = (timestamp: number): string => new Date(timestamp).toISOString();

const bindConsole = (method: LogLevel): ((...parts: unknown[]) => void) => {
  const { console } = globalThis;
  const fallback = console.log.bind(console);
  const candidate: ((...parts: unknown[]) => void) | undefined = console[method]?.bind(console);
  return candidate ?? fallback;
};

export const defaultLogWriter: LogWriter = (entry) => {
  const sink = bindConsole(entry.level);
  const prefix = `[${entry.level.toUpperCase()}][${entry.subsystem}]`;
  const timestamp = toIsoTimestamp(entry.timestamp);

  if (entry.context && Object.keys(entry.context).length > 0) {
    sink(`${timestamp} ${prefix} ${entry.message}`, entry.context);
    return;
  }

  sink(`${timestamp} ${prefix} ${entry.message}`);
};

/** Single-line writer for hosts where stdout is reserved, such as the CLI. */
export const createLineWriter = (write: (line: string) => void): LogWriter => (entry) => {
  const prefix = `[${entry.level.toUpperCase()}][${entry.subsystem}]`;
  const context = entry.context && Object.keys(entry.context).length > 0 ? ` ${JSON.stringify(entry.context)}` : '';
  write(`${toIsoTimestamp(entry.timestamp)} ${prefix} ${entry.message}${context}`);
};

export interface Logger {
  readonly debug: (message: string, context?: Record<string, unknown>) => void;
  readonly info: (message: string, context?: Record<string, unknown>) => void;
  readonly warn: (message: string, context?: Record<string, unknown>) => void;
  readonly error: (message: string, context?: Record<string, unknown>) => void;
  readonly child: (subsystem: string) => Logger;
}

export interface LoggerOptions {
  readonly writer?: LogWriter;
  readonly now?: NowFn;
  /** Entries below this level are dropped before reaching the writer */
  readonly minLevel?: LogLevel;
}

const sanitizeSubsystem = (subsystem: string): string => subsystem.trim() || 'unknown';

export const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);

const createLoggerForLevel = (
  level: LogLevel,
  subsystem: string,
  writer: LogWriter,
  now: NowFn,
  minLevel: LogLevel,
): ((message: string, context?: Record<string, unknown>) => void) => {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minLevel]) {
    return () => undefined;
  }

  return (message, context) => {
    const entry: LogEntry = {
      level,
      subsystem,
      message,
      context,
      timestamp: now(),
    };
    writer(entry);
  };
};

export const createLogger = (subsystem: string, options: LoggerOptions = {}): Logger => {
  const writer = options.writer ?? defaultLogWriter;
  const now = options.now ?? Date.now;
  const minLevel = options.minLevel ?? 'debug';
  const normalized = sanitizeSubsystem(subsystem);

  const debug = createLoggerForLevel('debug', normalized, writer, now, minLevel);
  const info = createLoggerForLevel('info', normalized, writer, now, minLevel);
  const warn = createLoggerForLevel('warn', normalized, writer, now, minLevel);
  const error = createLoggerForLevel('error', normalized, writer, now, minLevel);

  const child: Logger['child'] = (suffix) => {
    const combined = `${normalized}:${sanitizeSubsystem(suffix)}`;
    return createLogger(combined, { writer, now, minLevel });
  };

  return {
    debug,
    info,
    warn,
    error,
    child,
  };
};

export const rootLogger = createLogger('ball-tracker', { minLevel: gameConfig.logging.level });
