// Centralized logging service for csvlint

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_NAMES: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT
};

/**
 * Where formatted lines go. Defaults to the console method for the level.
 */
export type LogSink = (level: LogLevel, line: string) => void;

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
  timestamps?: boolean;
  sink?: LogSink;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: LogLevel.WARN,
  prefix: '[csvlint]',
  timestamps: false
};

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case LogLevel.DEBUG:
      console.debug(line);
      break;
    case LogLevel.INFO:
      console.info(line);
      break;
    case LogLevel.WARN:
      console.warn(line);
      break;
    default:
      console.error(line);
  }
};

/**
 * Parse a level name such as "debug" (case-insensitive)
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  const key = name.trim().toLowerCase();
  return isLevelName(key) ? LEVEL_NAMES[key] : undefined;
}

function isLevelName(value: string): value is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LEVEL_NAMES, value);
}

/**
 * Leveled logger with structured context
 */
export class Logger {
  private config: LoggerConfig;
  private readonly parent: Logger | null;
  private static instance: Logger | null = null;

  constructor(config: Partial<LoggerConfig> = {}, parent: Logger | null = null) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.parent = parent;
  }

  /**
   * Get singleton instance
   */
  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Reconfigure the singleton in place. Children derived from it follow.
   */
  static configure(config: Partial<LoggerConfig>): void {
    const instance = Logger.getInstance();
    instance.config = { ...instance.config, ...config };
  }

  /**
   * On a child this sets the level of the root logger
   */
  setLevel(level: LogLevel): void {
    if (this.parent) {
      this.parent.setLevel(level);
    } else {
      this.config.level = level;
    }
  }

  getLevel(): LogLevel {
    return this.parent ? this.parent.getLevel() : this.config.level;
  }

  /**
   * Derive a logger that adds a scope to the prefix. Level, sink and
   * timestamps are read from this logger on every call.
   */
  child(scope: string): Logger {
    const prefix = this.config.prefix ? `${this.config.prefix} [${scope}]` : `[${scope}]`;
    return new Logger({ prefix }, this);
  }

  private root(): LoggerConfig {
    return this.parent ? this.parent.root() : this.config;
  }

  private format(level: string, message: string, context?: Record<string, unknown>): string {
    const parts: string[] = [];

    if (this.root().timestamps) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    if (this.config.prefix) {
      parts.push(this.config.prefix);
    }

    parts.push(`[${level}]`);
    parts.push(message);

    if (context && Object.keys(context).length > 0) {
      parts.push(JSON.stringify(context));
    }

    return parts.join(' ');
  }

  private write(level: LogLevel, label: string, message: string, context?: Record<string, unknown>): void {
    if (this.getLevel() > level) {
      return;
    }
    const sink = this.root().sink ?? consoleSink;
    sink(level, this.format(label, message, context));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, 'DEBUG', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.INFO, 'INFO', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.WARN, 'WARN', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, 'ERROR', message, context);
  }

  /**
   * Log an error with stack trace
   */
  exception(error: Error, context?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, 'ERROR', error.message, {
      ...context,
      name: error.name,
      stack: error.stack
    });
  }
}

// Export singleton instance
export const logger = Logger.getInstance();
