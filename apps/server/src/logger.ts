export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  level: LogLevel;
  json: boolean;
  color: boolean;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    message: string;
    stack?: string;
    name?: string;
  };
}

export type LogSink = (level: LogLevel, line: string) => void;

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  debug: '\x1b[36m', // Cyan
  info: '\x1b[32m', // Green
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
  timestamp: '\x1b[90m', // Gray
  context: '\x1b[90m', // Gray
};

const levelOrder: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export class Logger {
  constructor(
    private readonly options: LoggerOptions,
    private readonly sink: LogSink = consoleSink,
  ) {}

  get level(): LogLevel {
    return this.options.level;
  }

  isDebugEnabled(): boolean {
    return this.shouldLog('debug');
  }

  private shouldLog(level: LogLevel): boolean {
    return levelOrder[level] >= levelOrder[this.options.level];
  }

  private formatTimestamp(): string {
    // Fixed width: 12 characters
    const now = new Date();
    const hours = now.getHours().toString().padStart(2, '0');
    const minutes = now.getMinutes().toString().padStart(2, '0');
    const seconds = now.getSeconds().toString().padStart(2, '0');
    const ms = now.getMilliseconds().toString().padStart(3, '0');
    return `${hours}:${minutes}:${seconds}.${ms}`.padEnd(12);
  }

  /**
   * Pull an `error` entry out of the context so it can be rendered on its own
   */
  private splitContext(context?: Record<string, unknown>): { rest?: Record<string, unknown>; error?: Error } {
    if (!context || !('error' in context)) {
      return { rest: context };
    }
    const { error, ...rest } = context;
    return {
      rest,
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }

  private formatMessage(level: LogLevel, message: string, context?: Record<string, unknown>): string {
    const { rest, error } = this.splitContext(context);

    if (this.options.json) {
      const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level,
        message,
      };

      if (rest && Object.keys(rest).length > 0) {
        entry.context = rest;
      }

      if (error) {
        entry.error = {
          message: error.message,
          stack: error.stack,
          name: error.name,
        };
      }

      return JSON.stringify(entry);
    }

    const paint = (color: string) => (this.options.color ? color : '');
    const reset = paint(colors.reset);

    // timestamp (12 chars) + 1 space + level (5 chars) + 1 space + message
    const levelUpper = level.toUpperCase().padEnd(5);
    let output = `${paint(colors.timestamp)}${this.formatTimestamp()}${reset} ${paint(colors[level])}${levelUpper}${reset} ${message}`;

    if (rest && Object.keys(rest).length > 0) {
      const contextPairs = Object.entries(rest)
        .filter(([, value]) => value !== undefined)
        .map(([key, value]) => {
          const formattedValue = typeof value === 'string' ? value : JSON.stringify(value);
          return `${key}=${formattedValue}`;
        })
        .join(' ');
      output += ` ${paint(colors.context)}${contextPairs}${reset}`;
    }

    if (error) {
      output += `\n${paint(colors.error)}  Error: ${error.message}${reset}`;
      if (error.stack) {
        const stackLines = error.stack.split('\n').slice(1, 4);
        output += `\n${paint(colors.timestamp)}  ${stackLines.join(`\n${paint(colors.timestamp)}  `)}${reset}`;
      }
    }

    return output;
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog(level)) {
      this.sink(level, this.formatMessage(level, message, context));
    }
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

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context);
  }
}

export function createLogger(options: LoggerOptions, sink?: LogSink): Logger {
  return new Logger(options, sink);
}

/**
 * Logger that drops everything, for tests and embedding
 */
export function createSilentLogger(): Logger {
  return new Logger({ level: 'error', json: false, color: false }, () => {});
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
