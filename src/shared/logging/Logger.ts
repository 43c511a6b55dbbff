import { isErrorLike } from '../errors/AppError';

/**
 * Logger interface
 */
export interface ILogger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: unknown, meta?: LogMeta): void;
  fatal(message: string, error?: unknown, meta?: LogMeta): void;
  setLevel?(level: LogLevel | string): void;
}

/**
 * Structured context attached to a log line
 */
export type LogMeta = Record<string, unknown>;

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  FATAL = 4,
  SILENT = 5
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  name?: string;
  timestamp?: boolean;
  colorize?: boolean;
  json?: boolean;
  prettyPrint?: boolean;
  /**
   * Line sink. Defaults to stderr so stdout stays reserved for command output.
   */
  write?: (line: string) => void;
}

/**
 * Log entry
 */
export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  logger: string;
  message: string;
  meta?: LogMeta;
  error?: Error;
}

const writeToStderr = (line: string): void => {
  process.stderr.write(line + '\n');
};

/**
 * Console logger implementation
 */
export class ConsoleLogger implements ILogger {
  private config: LoggerConfig;
  private readonly name: string;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: LogLevel.INFO,
      timestamp: true,
      colorize: process.stderr.isTTY === true,
      json: false,
      prettyPrint: true,
      ...config
    };
    this.name = config.name || 'App';
  }

  configure(config: Partial<LoggerConfig>): void {
    const { name: _name, ...rest } = config;
    this.config = { ...this.config, ...rest };
  }

  debug(message: string, meta?: LogMeta): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log(LogLevel.WARN, message, meta);
  }

  error(message: string, error?: unknown, meta?: LogMeta): void {
    this.log(LogLevel.ERROR, message, meta, toError(error));
  }

  fatal(message: string, error?: unknown, meta?: LogMeta): void {
    this.log(LogLevel.FATAL, message, meta, toError(error));
  }

  setLevel(level: LogLevel | string): void {
    if (typeof level === 'string') {
      const levelValue = parseLogLevel(level);
      if (levelValue !== undefined) {
        this.config.level = levelValue;
      }
    } else {
      this.config.level = level;
    }
  }

  /**
   * Core logging method
   */
  private log(level: LogLevel, message: string, meta?: LogMeta, error?: Error): void {
    if (level < this.config.level) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      logger: this.name,
      message,
      meta,
      error
    };

    if (this.config.json) {
      this.logJson(entry);
    } else {
      this.logPretty(entry);
    }
  }

  private logJson(entry: LogEntry): void {
    const output = {
      timestamp: entry.timestamp.toISOString(),
      level: LogLevel[entry.level],
      logger: entry.logger,
      message: entry.message,
      ...(entry.meta && { meta: entry.meta }),
      ...(entry.error && {
        error: {
          name: entry.error.name,
          message: entry.error.message,
          stack: entry.error.stack
        }
      })
    };

    this.write(JSON.stringify(output));
  }

  private logPretty(entry: LogEntry): void {
    const parts: string[] = [];

    if (this.config.timestamp) {
      parts.push(`[${entry.timestamp.toISOString()}]`);
    }

    parts.push(this.getLevelString(entry.level));
    parts.push(`[${entry.logger}]`);
    parts.push(entry.message);

    if (entry.meta && this.config.prettyPrint && Object.keys(entry.meta).length > 0) {
      parts.push(JSON.stringify(entry.meta));
    }

    this.write(parts.join(' '));

    if (entry.error) {
      this.write(`  Error: ${entry.error.message}`);
      if (entry.error.stack && entry.level >= LogLevel.ERROR) {
        this.write(`  Stack: ${entry.error.stack}`);
      }
    }
  }

  /**
   * Get level string with color
   */
  private getLevelString(level: LogLevel): string {
    const levelName = LogLevel[level];

    if (!this.config.colorize) {
      return `[${levelName}]`;
    }

    // ANSI color codes
    const colors: Record<number, string> = {
      [LogLevel.DEBUG]: '\x1b[36m',
      [LogLevel.INFO]: '\x1b[32m',
      [LogLevel.WARN]: '\x1b[33m',
      [LogLevel.ERROR]: '\x1b[31m',
      [LogLevel.FATAL]: '\x1b[35m'
    };

    const reset = '\x1b[0m';
    return `${colors[level]}[${levelName}]${reset}`;
  }

  private write(line: string): void {
    (this.config.write ?? writeToStderr)(line);
  }
}

/**
 * Logger factory
 */
export class LoggerFactory {
  private static loggers: Map<string, ILogger> = new Map();
  private static defaultConfig: Partial<LoggerConfig> = {
    level: LogLevel.INFO,
    timestamp: true
  };

  /**
   * Create or get logger
   */
  static getLogger(name: string, config?: Partial<LoggerConfig>): ILogger {
    const key = name || 'default';

    const existing = this.loggers.get(key);
    if (existing) {
      return existing;
    }

    const created = new ConsoleLogger({
      ...this.defaultConfig,
      ...config,
      name
    });
    this.loggers.set(key, created);
    return created;
  }

  /**
   * Set default configuration. Also applied to loggers already handed out.
   */
  static setDefaultConfig(config: Partial<LoggerConfig>): void {
    this.defaultConfig = { ...this.defaultConfig, ...config };
    this.loggers.forEach(logger => {
      if (logger instanceof ConsoleLogger) {
        logger.configure(config);
      }
    });
  }

  static clear(): void {
    this.loggers.clear();
  }
}

export function parseLogLevel(level: string): LogLevel | undefined {
  switch (level.toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'FATAL':
      return LogLevel.FATAL;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}

function toError(error: unknown): Error | undefined {
  if (error === undefined || error === null) {
    return undefined;
  }
  return isErrorLike(error) ? error : new Error(String(error));
}
