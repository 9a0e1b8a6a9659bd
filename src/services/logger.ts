/**
 * Logger service - leveled console logging with timezone-aware timestamps
 */
import { config } from '../config/index';

/**
 * Log level severity ordering
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

/**
 * Parses log level string to enum value
 */
export function parseLogLevel(level: string): LogLevel {
  const normalized = level.toUpperCase();
  switch (normalized) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Formats timestamp in the given timezone as YYYY-MM-DD HH:MM:SS
 */
export function formatTimestamp(date: Date, timeZone: string): string {
  const options: Intl.DateTimeFormatOptions = {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  };
  const formatter = new Intl.DateTimeFormat('en-CA', options);
  const parts = formatter.formatToParts(date);
  const get = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '';
  return `${get('year')}-${get('month')}-${get('day')} ${get('hour')}:${get('minute')}:${get('second')}`;
}

/**
 * Serializes log payloads; Error instances keep their name and message
 */
function serializeData(data: unknown): string {
  if (data instanceof Error) {
    return JSON.stringify({ name: data.name, message: data.message }, null, 2);
  }
  return JSON.stringify(data, null, 2);
}

/**
 * Structured logging with configurable log levels
 */
export class LoggerService {
  private readonly logLevel: LogLevel;
  private readonly timezone: string;

  constructor(logLevel: string = config.logging.logLevel, timezone: string = config.logging.timezone) {
    this.logLevel = parseLogLevel(logLevel);
    this.timezone = timezone;
  }

  /**
   * Formats log message with timestamp and level
   */
  private formatLogMessage(level: string, message: string, data?: unknown): string {
    const timestamp = formatTimestamp(new Date(), this.timezone);
    const baseMsg = `[${timestamp}] [${level}] ${message}`;
    if (data !== undefined) {
      return `${baseMsg}\n${serializeData(data)}`;
    }
    return baseMsg;
  }

  /**
   * Logs debug-level message (most verbose)
   */
  debug(message: string, data?: unknown): void {
    if (this.logLevel <= LogLevel.DEBUG) {
      console.log(this.formatLogMessage('DEBUG', message, data));
    }
  }

  /**
   * Logs info-level message (general information)
   */
  info(message: string, data?: unknown): void {
    if (this.logLevel <= LogLevel.INFO) {
      console.log(this.formatLogMessage('INFO', message, data));
    }
  }

  /**
   * Logs warning-level message
   */
  warn(message: string, data?: unknown): void {
    if (this.logLevel <= LogLevel.WARN) {
      console.warn(this.formatLogMessage('WARN', message, data));
    }
  }

  /**
   * Logs error-level message
   */
  error(message: string, error?: unknown): void {
    if (this.logLevel <= LogLevel.ERROR) {
      console.error(this.formatLogMessage('ERROR', message, error));
    }
  }

  /**
   * Current minimum level
   */
  getLevel(): LogLevel {
    return this.logLevel;
  }
}
