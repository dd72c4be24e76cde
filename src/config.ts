/**
 * Configuration management with environment variable loading and validation
 * Fails fast at startup if configuration is invalid
 */

import path from 'node:path';
import type { LogLevel, ResolvedConfig, StaticMount } from './types.js';

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

const SIZE_UNITS: Record<string, number> = {
  '': 1,
  k: 1024,
  m: 1024 * 1024,
  g: 1024 * 1024 * 1024,
};

/**
 * Parse and validate port number
 */
function parsePort(value: string | undefined, defaultValue: number, name: string): number {
  const port = value ? parseInt(value, 10) : defaultValue;

  if (isNaN(port)) {
    throw new Error(`${name} must be a valid number`);
  }

  if (port < 1 || port > 65535) {
    throw new Error(`${name} must be between 1 and 65535`);
  }

  return port;
}

/**
 * Parse and validate positive integer
 */
function parsePositiveInt(
  value: string | undefined,
  defaultValue: number,
  name: string
): number {
  const parsed = value ? parseInt(value, 10) : defaultValue;

  if (isNaN(parsed)) {
    throw new Error(`${name} must be a valid number`);
  }

  if (parsed < 1) {
    throw new Error(`${name} must be >= 1`);
  }

  return parsed;
}

/**
 * Parse a byte size such as "1048576", "512k" or "10M"
 */
export function parseByteSize(
  value: string | undefined,
  defaultValue: number,
  name: string
): number {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  const match = /^(\d+)\s*([kmg]?)$/i.exec(value.trim());
  if (!match) {
    throw new Error(`${name} must be a byte count, optionally suffixed with k, m or g`);
  }

  const bytes = parseInt(match[1], 10) * SIZE_UNITS[match[2].toLowerCase()];
  if (!Number.isSafeInteger(bytes)) {
    throw new Error(`${name} is too large`);
  }

  return bytes;
}

/**
 * Parse and validate string value
 */
function parseString(
  value: string | undefined,
  defaultValue: string,
  name: string
): string {
  const trimmed = (value ?? defaultValue).trim();

  if (trimmed === '') {
    throw new Error(`${name} cannot be empty`);
  }

  return trimmed;
}

/**
 * Parse a URL path prefix; trailing slashes are dropped
 */
function parsePrefix(value: string | undefined, defaultValue: string, name: string): string {
  const prefix = parseString(value, defaultValue, name);

  if (!prefix.startsWith('/')) {
    throw new Error(`${name} must start with "/"`);
  }

  return prefix.length > 1 ? prefix.replace(/\/+$/, '') || '/' : prefix;
}

/**
 * Parse a filesystem directory, made absolute against the working directory
 */
function parseDirectory(value: string | undefined, defaultValue: string, name: string): string {
  return path.resolve(parseString(value, defaultValue, name));
}

function parseLogLevel(value: string | undefined, defaultValue: LogLevel): LogLevel {
  const level = (value ?? defaultValue).trim().toLowerCase();
  const known = LOG_LEVELS.find((candidate) => candidate === level);

  if (!known) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
  }

  return known;
}

/**
 * Media mount is optional but needs both halves
 */
function parseMediaMount(env: NodeJS.ProcessEnv): StaticMount | undefined {
  const { MEDIA_URL_PREFIX: prefix, MEDIA_ROOT: root } = env;

  if (prefix === undefined && root === undefined) {
    return undefined;
  }

  if (prefix === undefined || root === undefined) {
    throw new Error('MEDIA_URL_PREFIX and MEDIA_ROOT must be set together');
  }

  return Object.freeze({
    prefix: parsePrefix(prefix, '', 'MEDIA_URL_PREFIX'),
    root: parseDirectory(root, '', 'MEDIA_ROOT'),
  });
}

/**
 * Load and validate gateway configuration from environment variables
 * Throws error immediately if any configuration is invalid (fail-fast)
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): ResolvedConfig {
  const media = parseMediaMount(env);

  return Object.freeze({
    listenPort: parsePort(env.LISTEN_PORT, 8000, 'LISTEN_PORT'),
    staticUrlPrefix: parsePrefix(env.STATIC_URL_PREFIX, '/static', 'STATIC_URL_PREFIX'),
    staticRoot: parseDirectory(env.STATIC_ROOT, '/vol/static', 'STATIC_ROOT'),
    ...(media !== undefined && { media }),
    backend: Object.freeze({
      host: parseString(env.APP_HOST, 'app', 'APP_HOST'),
      port: parsePort(env.APP_PORT, 9000, 'APP_PORT'),
    }),
    maxBodyBytes: parseByteSize(env.MAX_BODY_SIZE, 10 * 1024 * 1024, 'MAX_BODY_SIZE'),
    backendTimeoutMs: parsePositiveInt(env.BACKEND_TIMEOUT_MS, 60_000, 'BACKEND_TIMEOUT_MS'),
    logLevel: parseLogLevel(env.LOG_LEVEL, 'info'),
  });
}
