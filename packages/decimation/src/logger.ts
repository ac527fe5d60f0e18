/**
 * Logging
 *
 * Leveled console logging with a per-system prefix. The default minimum level
 * is WARN so that library calls stay quiet unless a caller opts in.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogContext = Record<string, string | number | boolean>;

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  system: string;
  message: string;
  context?: LogContext;
}

export type LogSink = (entry: LogEntry) => void;

export interface LoggerConfig {
  minLevel: LogLevel;
  /** Replaces console output when set */
  sink?: LogSink;
}

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: LogLevel.WARN,
};

let config: LoggerConfig = { ...DEFAULT_CONFIG };

/**
 * Update the logger configuration
 */
export function configureLogger(update: Partial<LoggerConfig>): void {
  config = { ...config, ...update };
}

/**
 * Restore the default configuration
 */
export function resetLogger(): void {
  config = { ...DEFAULT_CONFIG };
}

function formatContext(context?: LogContext): string {
  if (!context) return "";
  const parts = Object.entries(context).map(([key, value]) => `${key}=${value}`);
  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

function writeToConsole(entry: LogEntry): void {
  const line = `[${entry.system}] ${entry.message}${formatContext(entry.context)}`;
  switch (entry.level) {
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
}

/**
 * Logger bound to one system name
 */
export class SystemLogger {
  constructor(public readonly system: string) {}

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log(LogLevel.ERROR, message, context);
  }

  isEnabled(level: LogLevel): boolean {
    return level >= config.minLevel;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isEnabled(level)) return;
    const entry: LogEntry = {
      timestamp: Date.now(),
      level,
      system: this.system,
      message,
      context,
    };
    (config.sink ?? writeToConsole)(entry);
  }
}

export function createLogger(system: string): SystemLogger {
  return new SystemLogger(system);
}
