/**
 * Structured Logging
 *
 * Entries are plain objects handed to a sink. The default sink renders
 * them as one JSON line (production) or a coloured line (development)
 * and writes warnings and errors to stderr, everything else to stdout.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'pretty';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  context?: Record<string, unknown>;
  /** Replaces the default stdout/stderr sink */
  output?: LogSink;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(SEVERITY, value);
}

export function isLogFormat(value: unknown): value is LogFormat {
  return value === 'json' || value === 'pretty';
}

/**
 * Render an entry as a single line (plus the stack, for pretty errors)
 */
export function formatLogEntry(entry: LogEntry, format: LogFormat, color = false): string {
  if (format === 'json') {
    return JSON.stringify(entry);
  }

  const paint = (code: string, text: string) => (color ? code + text + RESET : text);
  let line = `${paint(DIM, entry.timestamp)} ${paint(COLORS[entry.level], entry.level.toUpperCase().padEnd(5))} ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    line += ` ${paint(DIM, JSON.stringify(entry.context))}`;
  }
  if (entry.error) {
    line += `\n${paint(DIM, entry.error.stack ?? `${entry.error.name}: ${entry.error.message}`)}`;
  }
  return line;
}

/**
 * Sink writing to the process streams
 */
export function streamSink(format: LogFormat): LogSink {
  return (entry) => {
    const stream = SEVERITY[entry.level] >= SEVERITY.warn ? process.stderr : process.stdout;
    stream.write(formatLogEntry(entry, format, format === 'pretty' && stream.isTTY) + '\n');
  };
}

/**
 * Structured logger
 */
export class Logger {
  private level: LogLevel;
  private readonly format: LogFormat;
  private readonly context: Record<string, unknown>;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'json';
    this.context = options.context ?? {};
    this.sink = options.output ?? streamSink(this.format);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.write('error', message, context, error);
  }

  /**
   * Logger sharing this one's sink, with extra context on every entry
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      context: { ...this.context, ...context },
      output: this.sink,
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  getFormat(): LogFormat {
    return this.format;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return SEVERITY[level] >= SEVERITY[this.level];
  }

  private write(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: { ...this.context, ...context },
    };
    if (error) {
      entry.error = { name: error.name, message: error.message, stack: error.stack };
    }

    this.sink(entry);
  }
}

/**
 * Fields attached to every entry logged while handling one request
 */
export interface RequestLogContext {
  requestId: string;
  method: string;
  path: string;
}

export function createRequestLogger(baseLogger: Logger, context: RequestLogContext): Logger {
  return baseLogger.child({ ...context });
}

/**
 * Level and format for a NODE_ENV value
 *
 * production: info, json; test: warn, pretty; anything else: debug, pretty
 */
export function loggerDefaults(env = 'development'): Required<Pick<LoggerOptions, 'level' | 'format'>> {
  switch (env) {
    case 'production':
      return { level: 'info', format: 'json' };
    case 'test':
      return { level: 'warn', format: 'pretty' };
    default:
      return { level: 'debug', format: 'pretty' };
  }
}

let defaultLogger: Logger | null = null;

/**
 * Process-wide logger, used where no logger was passed in
 */
export function getLogger(): Logger {
  defaultLogger ??= new Logger(loggerDefaults(process.env.NODE_ENV));
  return defaultLogger;
}

export function setLogger(logger: Logger): void {
  defaultLogger = logger;
}
