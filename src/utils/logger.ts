/**
 * Structured logger
 *
 * - pretty output for terminals, JSON lines for log collectors (LOG_FORMAT)
 * - minimum level from LOG_LEVEL
 * - child loggers prefix a component name
 */

import { config } from './config.js';
import type { LogLevel, Logger } from '../types/index.js';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m', // Cyan
  info: '\x1b[32m', // Green
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
};

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component?: string;
  message: string;
  [key: string]: unknown;
}

function formatPretty(entry: LogEntry): string {
  const { timestamp, level, component, message, ...meta } = entry;
  const color = LOG_COLORS[level];
  const scope = component ? ` ${DIM}[${component}]${RESET}` : '';
  const metaStr = Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : '';

  return `${DIM}${timestamp}${RESET} ${color}${level.toUpperCase().padEnd(5)}${RESET}${scope} ${message}${metaStr}`;
}

class ConsoleLogger implements Logger {
  constructor(private readonly component?: string) {}

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[config.app.logLevel]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...meta,
    };
    if (this.component) {
      entry.component = this.component;
    }

    const line = config.app.logFormat === 'json' ? JSON.stringify(entry) : formatPretty(entry);

    // stdout is reserved for the run summary
    console.error(line);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  child(component: string): Logger {
    return new ConsoleLogger(this.component ? `${this.component}:${component}` : component);
  }
}

export const logger: Logger = new ConsoleLogger();
