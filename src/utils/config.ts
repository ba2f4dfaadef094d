import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'path';
import type { Config, LogFormat, LogLevel } from '../types/index.js';

dotenvConfig();

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) ' +
  'AppleWebKit/537.36 (KHTML, like Gecko) ' +
  'Chrome/123.0.0.0 Safari/537.36';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function getEnvVar(key: string): string {
  return process.env[key]?.trim() || '';
}

function getNumberEnvVar(key: string, fallback: number): number {
  const raw = getEnvVar(key);
  const value = Number.parseInt(raw, 10);
  return Number.isNaN(value) || value < 0 ? fallback : value;
}

function getLogLevel(): LogLevel {
  const raw = getEnvVar('LOG_LEVEL').toLowerCase();
  return LOG_LEVELS.find(level => level === raw) ?? 'info';
}

function getLogFormat(): LogFormat {
  const raw = getEnvVar('LOG_FORMAT').toLowerCase();
  if (raw === 'json' || raw === 'pretty') {
    return raw;
  }
  return process.env.NODE_ENV === 'production' ? 'json' : 'pretty';
}

export const config: Config = {
  source: {
    url: getEnvVar('SOURCE_URL') || 'https://www.agroprecios.com/precios-subasta-tabla.php',
    operation: getEnvVar('SOURCE_OPERATION') || '1',
    userAgent: getEnvVar('SOURCE_USER_AGENT') || DEFAULT_USER_AGENT,
    acceptLanguage: getEnvVar('SOURCE_ACCEPT_LANGUAGE') || 'es-ES,es;q=0.9,en;q=0.8',
    referer: getEnvVar('SOURCE_REFERER') || 'https://www.agroprecios.com/',
    timeoutMs: getNumberEnvVar('REQUEST_TIMEOUT_MS', 20000),
  },
  harvest: {
    requestDelayMs: getNumberEnvVar('REQUEST_DELAY_MS', 1000),
    dataDir: resolve(getEnvVar('DATA_DIR') || 'data'),
  },
  app: {
    logLevel: getLogLevel(),
    logFormat: getLogFormat(),
  },
};
