/**
 * Configuration loading and validation for the semester scheduler
 */

import { config as loadEnv } from 'dotenv';
import type { StoreConfig, GoogleStoreConfig } from '../types/index.js';

// Load environment variables
loadEnv();

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Server configuration
 */
export interface ServerConfig {
  name: string;
  version: string;
  logLevel: LogLevel;
}

/**
 * Default settings configuration
 */
export interface DefaultsConfig {
  /** IANA zone name stamped on stored events */
  timezone: string;
  /** The single pinned UTC offset used for every computation, e.g. "+05:30" */
  utcOffset: string;
}

/**
 * Request configuration
 */
export interface RequestConfig {
  timeout: number;
  maxRetries: number;
  retryDelay: number;
}

/**
 * Extraction / intent oracle configuration
 */
export interface OracleConfig {
  apiKey?: string;
  model: string;
  baseURL?: string;
  maxDocumentBytes: number;
}

/**
 * Full application configuration
 */
export interface AppConfig {
  server: ServerConfig;
  defaults: DefaultsConfig;
  request: RequestConfig;
  store: StoreConfig;
  oracle: OracleConfig;
}

export const MAX_DOCUMENT_BYTES = 5 * 1024 * 1024;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Get environment variable with optional default
 */
function getEnv(key: string): string | undefined;
function getEnv(key: string, defaultValue: string): string;
function getEnv(key: string, defaultValue?: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === '' ? defaultValue : value;
}

/**
 * Get number environment variable
 */
function getNumberEnv(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getLogLevel(): LogLevel {
  const value = getEnv('LOG_LEVEL', 'info').toLowerCase();
  return LOG_LEVELS.find(level => level === value) ?? 'info';
}

/**
 * Load Google store configuration from environment
 */
function loadGoogleConfig(): GoogleStoreConfig {
  const accessToken = getEnv('GOOGLE_ACCESS_TOKEN');
  const refreshToken = getEnv('GOOGLE_REFRESH_TOKEN');

  return {
    type: 'google',
    id: getEnv('GOOGLE_STORE_ID', 'google-primary'),
    name: getEnv('GOOGLE_STORE_NAME', 'Google Calendar'),
    clientId: getEnv('GOOGLE_CLIENT_ID'),
    clientSecret: getEnv('GOOGLE_CLIENT_SECRET'),
    redirectUri: getEnv('GOOGLE_REDIRECT_URI'),
    credentials:
      accessToken || refreshToken
        ? {
            accessToken,
            refreshToken,
            tokenExpiry: getEnv('GOOGLE_TOKEN_EXPIRY'),
          }
        : undefined,
    recurringCalendarName: getEnv('RECURRING_CALENDAR_NAME', 'Semester Static Calendar'),
    transientCalendarName: getEnv('TRANSIENT_CALENDAR_NAME', 'Club Temporary Events'),
  };
}

/**
 * Load the store configuration selected by STORE_BACKEND
 */
function loadStore(): StoreConfig {
  const backend = getEnv('STORE_BACKEND', 'google').toLowerCase();

  if (backend === 'memory') {
    return { type: 'memory', id: 'memory', name: 'In-memory store' };
  }

  if (backend !== 'google') {
    console.error(`[semester-scheduler] Unknown STORE_BACKEND "${backend}", using google`);
  }

  return loadGoogleConfig();
}

/**
 * Load full application configuration
 */
export function loadConfig(): AppConfig {
  return {
    server: {
      name: getEnv('MCP_SERVER_NAME', 'semester-scheduler'),
      version: getEnv('MCP_SERVER_VERSION', '1.0.0'),
      logLevel: getLogLevel(),
    },
    defaults: {
      timezone: getEnv('SCHEDULER_TIMEZONE', 'Asia/Kolkata'),
      utcOffset: getEnv('SCHEDULER_UTC_OFFSET', '+05:30'),
    },
    request: {
      timeout: getNumberEnv('REQUEST_TIMEOUT', 30000),
      maxRetries: getNumberEnv('MAX_RETRIES', 3),
      retryDelay: getNumberEnv('RETRY_DELAY_MS', 1000),
    },
    store: loadStore(),
    oracle: {
      apiKey: getEnv('OPENAI_API_KEY'),
      model: getEnv('OPENAI_MODEL', 'gpt-4o-mini'),
      baseURL: getEnv('OPENAI_BASE_URL'),
      maxDocumentBytes: MAX_DOCUMENT_BYTES,
    },
  };
}

/**
 * Singleton configuration instance
 */
let configInstance: AppConfig | null = null;

/**
 * Get configuration (loads once)
 */
export function getConfig(): AppConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}
