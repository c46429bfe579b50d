// Logging Utility
// Purpose: Structured logging for debugging, monitoring, and auditing

import config from '../config/env';

// Log levels in order of severity
type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const SEVERITY: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

// Log entry structure
interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
}

export type AttendanceEvent =
  | 'clock_in'
  | 'clock_out'
  | 'already_in'
  | 'already_out'
  | 'disqualified'
  | 'entry_edited'
  | 'entry_deleted';

/**
 * Format a log entry as JSON string
 * JSON format is easier to parse by log aggregators
 */
function formatLog(level: LogLevel, message: string, data?: Record<string, unknown>): string {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...(data && { data }),
  };
  return JSON.stringify(entry, (_key, value: unknown) =>
    value instanceof Error ? { name: value.name, message: value.message } : value
  );
}

function enabled(level: LogLevel): boolean {
  return SEVERITY[level] >= SEVERITY[config.LOG_LEVEL];
}

/**
 * Logger object with methods for each log level
 */
export const logger = {
  /**
   * Debug level
   * Use for detailed debugging information
   */
  debug(message: string, data?: Record<string, unknown>): void {
    if (enabled('debug')) {
      console.log(formatLog('debug', message, data));
    }
  },

  /**
   * Info level - normal operations
   */
  info(message: string, data?: Record<string, unknown>): void {
    if (enabled('info')) {
      console.log(formatLog('info', message, data));
    }
  },

  /**
   * Warn level - potential issues
   * Use for non-critical issues that should be investigated
   */
  warn(message: string, data?: Record<string, unknown>): void {
    if (enabled('warn')) {
      console.warn(formatLog('warn', message, data));
    }
  },

  /**
   * Error level - failures
   */
  error(message: string, data?: Record<string, unknown>): void {
    if (enabled('error')) {
      console.error(formatLog('error', message, data));
    }
  },

  /**
   * Log HTTP request (for middleware). Server errors go out at warn.
   */
  request(method: string, path: string, statusCode: number, duration: number, context?: Record<string, unknown>): void {
    const data = {
      method,
      path,
      statusCode,
      duration: `${duration}ms`,
      ...context,
    };
    if (statusCode >= 500) {
      this.warn('HTTP Request', data);
    } else {
      this.info('HTTP Request', data);
    }
  },

  /**
   * Log authentication events
   */
  auth(event: 'login' | 'register' | 'failed_login', userId?: number, details?: Record<string, unknown>): void {
    this.info(`Auth: ${event}`, {
      event,
      ...(userId !== undefined && { userId }),
      ...details,
    });
  },

  /**
   * Log attendance events
   */
  attendance(event: AttendanceEvent, uid: number, details?: Record<string, unknown>): void {
    this.info(`Attendance: ${event}`, {
      event,
      uid,
      ...details,
    });
  },
};

export default logger;
