/**
 * @exsync/eas-sync - Configuration
 *
 * Connection settings for the CLI and for embedding processes that keep
 * credentials in the environment.
 */

import { createHash } from 'crypto';
import { resolve } from 'path';

import { config as dotenvConfig } from 'dotenv';

import { DEFAULT_DEVICE_TYPE, DEFAULT_TIMEOUT_MS } from './transport/connection-context';

import type { ConnectionSettings } from './transport/connection-context';

// Load environment variables from root .env
dotenvConfig({ path: resolve(__dirname, '../../../.env') });

const REQUIRED_KEYS = ['EAS_SERVER_URL', 'EAS_USERNAME', 'EAS_PASSWORD'] as const;

// =============================================================================
// Environment Variable Helpers
// =============================================================================

/**
 * Get required environment variable or throw
 */
export function getRequiredEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

export function getOptionalEnv(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

/**
 * Numeric variable; unparseable values fall back to the default
 */
export function getNumericEnv(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) {
    return defaultValue;
  }
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

export function getBooleanEnv(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) {
    return defaultValue;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

// =============================================================================
// Configuration Loaders
// =============================================================================

/**
 * Stable per-user device id, used when EAS_DEVICE_ID is unset
 */
export function deriveDeviceId(username: string): string {
  return `exsync${createHash('sha256').update(username.toLowerCase()).digest('hex').slice(0, 24)}`;
}

export function loadConnectionConfig(): ConnectionSettings {
  const username = getRequiredEnv('EAS_USERNAME');
  return {
    serverUrl: getRequiredEnv('EAS_SERVER_URL'),
    username,
    password: getRequiredEnv('EAS_PASSWORD'),
    domain: getOptionalEnv('EAS_DOMAIN', ''),
    deviceId: getOptionalEnv('EAS_DEVICE_ID', deriveDeviceId(username)),
    deviceType: getOptionalEnv('EAS_DEVICE_TYPE', DEFAULT_DEVICE_TYPE),
    acceptAllCertificates: getBooleanEnv('EAS_ACCEPT_ALL_CERTS', false),
    timeoutMs: getNumericEnv('EAS_TIMEOUT_MS', DEFAULT_TIMEOUT_MS),
    workstation: getOptionalEnv('EAS_WORKSTATION', 'EXSYNC'),
  };
}

/**
 * Names of required variables that are unset
 */
export function validateEnvironment(): string[] {
  return REQUIRED_KEYS.filter((key) => !process.env[key]);
}

export function isEnvironmentConfigured(): boolean {
  return validateEnvironment().length === 0;
}
