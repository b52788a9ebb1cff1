import { nowIso } from './date.js';
import { env } from './env.js';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

interface LogEntry {
  level: LogLevel;
  service: string;
  message: string;
  timestamp: string;
  data?: unknown;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * LOG_LEVEL 환경변수 해석 (미설정/잘못된 값이면 INFO)
 */
export function resolveLogLevel(raw = env('LOG_LEVEL')): LogLevel {
  if (!raw) return 'INFO';
  const upper = raw.toUpperCase();
  return isLogLevel(upper) ? upper : 'INFO';
}

export class Logger {
  constructor(
    private serviceName: string,
    private minLevel: LogLevel = resolveLogLevel(),
  ) {}

  private log(level: LogLevel, message: string, data?: unknown) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

    const entry: LogEntry = {
      level,
      service: this.serviceName,
      message,
      timestamp: nowIso(),
      data,
    };

    const formatted = JSON.stringify(entry);

    switch (level) {
      case 'DEBUG':
      case 'INFO':
        console.log(formatted);
        break;
      case 'WARN':
        console.warn(formatted);
        break;
      case 'ERROR':
        console.error(formatted);
        break;
    }
  }

  debug(message: string, data?: unknown) {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: unknown) {
    this.log('INFO', message, data);
  }

  warn(message: string, data?: unknown) {
    this.log('WARN', message, data);
  }

  error(message: string, error?: unknown) {
    const errorData =
      error instanceof Error ? { name: error.name, message: error.message, stack: error.stack } : error;
    this.log('ERROR', message, errorData);
  }
}

export function createLogger(serviceName: string, level?: LogLevel): Logger {
  return new Logger(serviceName, level);
}
