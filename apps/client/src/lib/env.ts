/**
 * Environment Configuration for the E2EE Client
 *
 * This module provides centralized access to environment-specific configuration.
 * Values can come from:
 * 1. Process environment variables (VEILPOST_*)
 * 2. Default values for development
 */

import { API } from '@veilpost/shared';

export type Environment = 'development' | 'test' | 'staging' | 'production';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const ENVIRONMENTS: readonly Environment[] = ['development', 'test', 'staging', 'production'];
const LOG_LEVEL_NAMES: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isEnvironment(value: string): value is Environment {
  return ENVIRONMENTS.some((env) => env === value);
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVEL_NAMES.some((level) => level === value);
}

/**
 * Get a configuration value from the environment
 */
function getEnvValue(key: string, defaultValue: string): string {
  const value = process.env[key];
  if (value) return value;
  return defaultValue;
}

/**
 * Determine current environment
 */
export function getEnvironment(): Environment {
  const env = getEnvValue('VEILPOST_ENV', process.env.NODE_ENV ?? 'development');
  return isEnvironment(env) ? env : 'development';
}

/**
 * Check if running in development mode
 */
export function isDevelopment(): boolean {
  return getEnvironment() === 'development';
}

/**
 * Check if running in production mode
 */
export function isProduction(): boolean {
  return getEnvironment() === 'production';
}

/**
 * Application Configuration
 */
export const config = {
  /**
   * Key directory base URL (without /api/v1 suffix)
   */
  get apiBaseUrl(): string {
    return getEnvValue('VEILPOST_API_URL', `http://localhost:${API.DEFAULT_PORT}`);
  },

  /**
   * Full API URL with version prefix
   */
  get apiUrl(): string {
    const base = this.apiBaseUrl.replace(/\/$/, '');
    return base.endsWith(API.BASE_PATH) ? base : `${base}${API.BASE_PATH}`;
  },

  /**
   * Minimum level the logger prints. Errors are always printed.
   */
  get logLevel(): LogLevel {
    const level = getEnvValue('VEILPOST_LOG_LEVEL', isProduction() ? 'warn' : 'debug');
    return isLogLevel(level) ? level : 'info';
  },

  /**
   * Directory holding the encrypted key store
   */
  get keystorePath(): string {
    return getEnvValue('VEILPOST_KEYSTORE_PATH', '.veilpost/keystore');
  },

  /**
   * Base64 master key for the encrypted key store, if provisioned
   */
  get keystoreKey(): string | undefined {
    return process.env.VEILPOST_KEYSTORE_KEY || undefined;
  },

  /**
   * Current environment
   */
  get environment(): Environment {
    return getEnvironment();
  },

  /**
   * Whether running in development mode
   */
  get isDev(): boolean {
    return isDevelopment();
  },

  /**
   * Whether running in production mode
   */
  get isProd(): boolean {
    return isProduction();
  },
} as const;

