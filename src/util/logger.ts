import { appendFileSync } from 'node:fs';
import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

/**
 * A destination for formatted log lines. Sinks are registered on a
 * {@link Logger} by name; a name can only be registered once.
 */
export interface LogSink {
  readonly name: string;
  write(level: LogLevel, message: string, prefix: string): void;
  close?(): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  sinks?: LogSink[];
}

export interface ConsoleSinkOptions {
  timestamps?: boolean;
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  [LogLevel.DEBUG]: chalk.magenta,
  [LogLevel.INFO]: chalk.blue,
  [LogLevel.WARN]: chalk.yellow,
  [LogLevel.ERROR]: chalk.red,
  [LogLevel.SILENT]: (text) => text,
};

export function parseLogLevel(level?: string): LogLevel {
  if (!level) return LogLevel.INFO;

  const normalized = level.toUpperCase();
  switch (normalized) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return LogLevel.INFO;
  }
}

export function consoleSink(options: ConsoleSinkOptions = {}): LogSink {
  const timestamps = options.timestamps ?? false;
  return {
    name: 'console',
    write(level, message, prefix) {
      const parts: string[] = [];
      if (timestamps) {
        parts.push(chalk.gray(`[${new Date().toISOString()}]`));
      }
      parts.push(`[${LEVEL_COLORS[level](LEVEL_NAMES[level])}]`);
      if (prefix) {
        parts.push(chalk.cyan(`[${prefix}]`));
      }
      parts.push(message);
      const line = parts.join(' ');

      if (level >= LogLevel.ERROR) {
        console.error(line);
      } else if (level === LogLevel.WARN) {
        console.warn(line);
      } else {
        console.log(line);
      }
    },
  };
}

/** Appends the bare message to `filePath`, one line per call. */
export function fileSink(filePath: string): LogSink {
  return {
    name: `file:${filePath}`,
    write(_level, message) {
      appendFileSync(filePath, `${message}\n`, 'utf8');
    },
  };
}

function renderArgs(args: unknown[]): string {
  return args
    .map((arg) => (typeof arg === 'object' && arg !== null ? JSON.stringify(arg) : String(arg)))
    .join(' ');
}

export class Logger {
  private level: LogLevel;
  private prefix: string;
  private readonly sinks: Map<string, LogSink>;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? parseLogLevel(process.env.LOG_LEVEL);
    this.prefix = options.prefix ?? '';
    this.sinks = new Map();
    for (const sink of options.sinks ?? [consoleSink()]) {
      this.addSink(sink);
    }
  }

  /** Returns false, leaving the registry untouched, when the name is taken. */
  addSink(sink: LogSink): boolean {
    if (this.sinks.has(sink.name)) {
      return false;
    }
    this.sinks.set(sink.name, sink);
    return true;
  }

  removeSink(name: string): boolean {
    const sink = this.sinks.get(name);
    if (!sink) {
      return false;
    }
    this.sinks.delete(name);
    sink.close?.();
    return true;
  }

  hasSink(name: string): boolean {
    return this.sinks.has(name);
  }

  sinkNames(): string[] {
    return [...this.sinks.keys()];
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (this.level > level) {
      return;
    }

    const formatted = args.length > 0 ? `${message} ${renderArgs(args)}` : message;
    for (const sink of this.sinks.values()) {
      sink.write(level, formatted, this.prefix);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    this.log(LogLevel.DEBUG, message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log(LogLevel.INFO, message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log(LogLevel.WARN, message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log(LogLevel.ERROR, message, args);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  /** Shares this logger's sinks; closing the parent's sinks affects the child. */
  child(prefix: string): Logger {
    return new Logger({
      level: this.level,
      prefix: this.prefix ? `${this.prefix}:${prefix}` : prefix,
      sinks: [...this.sinks.values()],
    });
  }
}

export function createLogger(prefix: string, options: Omit<LoggerOptions, 'prefix'> = {}): Logger {
  return new Logger({ ...options, prefix });
}

// Default logger instance
export const logger = new Logger();
