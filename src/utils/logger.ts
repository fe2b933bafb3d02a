import { config } from './config.js';
import { Logger, LogLevel } from '../types/index.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

/**
 * Console logger writing one JSON line per entry
 */
export class ConsoleLogger implements Logger {
  private readonly threshold: number;

  constructor(level: string) {
    const normalized = level.toLowerCase();
    this.threshold = LEVEL_ORDER[isLogLevel(normalized) ? normalized : 'info'];
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.write('error', message, meta);
  }

  private write(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < this.threshold) return;

    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message,
      ...meta,
    });

    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

export const logger: Logger = new ConsoleLogger(config.app.logLevel);
