// Centralized diagnostic logging for probe-preflight
//
// Diagnostics always go to stderr: stdout carries only the report.

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
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
  /** Line sink, stderr by default */
  write?: (line: string) => void;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: LogLevel.WARN,
  prefix: '[preflight]'
};

/**
 * Resolve a level name (case-insensitive). Unknown names yield undefined.
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  if (!name) {
    return undefined;
  }
  const key = name.trim().toLowerCase();
  return isLogLevelName(key) ? LEVEL_NAMES[key] : undefined;
}

function isLogLevelName(name: string): name is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LEVEL_NAMES, name);
}

/**
 * Levelled logger with structured context
 */
export class Logger {
  private config: LoggerConfig;
  private static instance: Logger | null = null;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Reconfigure the shared logger in place, so modules holding `logger` see the change
   */
  static configure(config: Partial<LoggerConfig>): void {
    const shared = Logger.getInstance();
    shared.config = { ...shared.config, ...config };
  }

  private format(level: string, message: string, context?: Record<string, unknown>): string {
    const parts: string[] = [];

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

  private emit(level: LogLevel, label: string, message: string, context?: Record<string, unknown>): void {
    if (this.config.level > level) {
      return;
    }
    const line = this.format(label, message, context);
    if (this.config.write) {
      this.config.write(line);
    } else {
      console.error(line); // eslint-disable-line no-console
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.DEBUG, 'DEBUG', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.INFO, 'INFO', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.WARN, 'WARN', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.ERROR, 'ERROR', message, context);
  }
}

export const logger = Logger.getInstance();
