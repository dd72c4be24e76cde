/**
 * Tests for configuration loading and validation
 */

import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { getConfig, parseByteSize } from './config.js';

const VARS = [
  'LISTEN_PORT',
  'APP_HOST',
  'APP_PORT',
  'STATIC_URL_PREFIX',
  'STATIC_ROOT',
  'MEDIA_URL_PREFIX',
  'MEDIA_ROOT',
  'MAX_BODY_SIZE',
  'BACKEND_TIMEOUT_MS',
  'LOG_LEVEL',
];

describe('getConfig', () => {
  // Store original env to restore after each test
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(() => {
    originalEnv = { ...process.env };
    for (const name of VARS) {
      delete process.env[name];
    }
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('loading from environment', () => {
    it('should load all values from environment variables', () => {
      process.env.LISTEN_PORT = '8080';
      process.env.APP_HOST = 'backend.internal';
      process.env.APP_PORT = '3031';
      process.env.STATIC_URL_PREFIX = '/assets';
      process.env.STATIC_ROOT = '/srv/assets';
      process.env.MAX_BODY_SIZE = '2048';
      process.env.BACKEND_TIMEOUT_MS = '1500';
      process.env.LOG_LEVEL = 'debug';

      const config = getConfig();

      expect(config.listenPort).toBe(8080);
      expect(config.backend).toEqual({ host: 'backend.internal', port: 3031 });
      expect(config.staticUrlPrefix).toBe('/assets');
      expect(config.staticRoot).toBe(path.resolve('/srv/assets'));
      expect(config.maxBodyBytes).toBe(2048);
      expect(config.backendTimeoutMs).toBe(1500);
      expect(config.logLevel).toBe('debug');
      expect(config.media).toBeUndefined();
    });

    it('should read from an explicit env object', () => {
      const config = getConfig({ LISTEN_PORT: '9090' });
      expect(config.listenPort).toBe(9090);
    });
  });

  describe('default values', () => {
    it('should fall back to the proxy defaults', () => {
      const config = getConfig();

      expect(config.listenPort).toBe(8000);
      expect(config.backend).toEqual({ host: 'app', port: 9000 });
      expect(config.staticUrlPrefix).toBe('/static');
      expect(config.staticRoot).toBe(path.resolve('/vol/static'));
      expect(config.maxBodyBytes).toBe(10 * 1024 * 1024);
      expect(config.backendTimeoutMs).toBe(60_000);
      expect(config.logLevel).toBe('info');
    });
  });

  describe('immutability', () => {
    it('should return a frozen configuration', () => {
      const config = getConfig();

      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.backend)).toBe(true);
    });
  });

  describe('prefixes', () => {
    it('should strip trailing slashes from the static prefix', () => {
      process.env.STATIC_URL_PREFIX = '/static///';
      expect(getConfig().staticUrlPrefix).toBe('/static');
    });

    it('should reject a prefix without a leading slash', () => {
      process.env.STATIC_URL_PREFIX = 'static';
      expect(() => getConfig()).toThrow('STATIC_URL_PREFIX must start with "/"');
    });
  });

  describe('media mount', () => {
    it('should load the media mount when both halves are set', () => {
      process.env.MEDIA_URL_PREFIX = '/media/';
      process.env.MEDIA_ROOT = '/vol/media';

      expect(getConfig().media).toEqual({
        prefix: '/media',
        root: path.resolve('/vol/media'),
      });
    });

    it('should reject a media prefix without a root', () => {
      process.env.MEDIA_URL_PREFIX = '/media';
      expect(() => getConfig()).toThrow('MEDIA_URL_PREFIX and MEDIA_ROOT must be set together');
    });
  });

  describe('validation errors', () => {
    it('should throw error for invalid LISTEN_PORT (non-numeric)', () => {
      process.env.LISTEN_PORT = 'invalid';
      expect(() => getConfig()).toThrow('LISTEN_PORT must be a valid number');
    });

    it('should throw error for APP_PORT out of range', () => {
      process.env.APP_PORT = '70000';
      expect(() => getConfig()).toThrow('APP_PORT must be between 1 and 65535');
    });

    it('should throw error for LISTEN_PORT of zero', () => {
      process.env.LISTEN_PORT = '0';
      expect(() => getConfig()).toThrow('LISTEN_PORT must be between 1 and 65535');
    });

    it('should throw error for empty APP_HOST', () => {
      process.env.APP_HOST = '   ';
      expect(() => getConfig()).toThrow('APP_HOST cannot be empty');
    });

    it('should throw error for zero BACKEND_TIMEOUT_MS', () => {
      process.env.BACKEND_TIMEOUT_MS = '0';
      expect(() => getConfig()).toThrow('BACKEND_TIMEOUT_MS must be >= 1');
    });

    it('should throw error for unknown LOG_LEVEL', () => {
      process.env.LOG_LEVEL = 'verbose';
      expect(() => getConfig()).toThrow('LOG_LEVEL must be one of silent, error, warn, info, debug');
    });

    it('should throw error for malformed MAX_BODY_SIZE', () => {
      process.env.MAX_BODY_SIZE = '10 megabytes';
      expect(() => getConfig()).toThrow(
        'MAX_BODY_SIZE must be a byte count, optionally suffixed with k, m or g'
      );
    });
  });
});

describe('parseByteSize', () => {
  it('should accept a plain byte count', () => {
    expect(parseByteSize('10000000', 1, 'SIZE')).toBe(10_000_000);
  });

  it('should accept k, m and g suffixes in either case', () => {
    expect(parseByteSize('512k', 1, 'SIZE')).toBe(524_288);
    expect(parseByteSize('10M', 1, 'SIZE')).toBe(10_485_760);
    expect(parseByteSize('1g', 1, 'SIZE')).toBe(1_073_741_824);
  });

  it('should keep 0 as the unlimited marker', () => {
    expect(parseByteSize('0', 1, 'SIZE')).toBe(0);
  });

  it('should use the default when unset or blank', () => {
    expect(parseByteSize(undefined, 42, 'SIZE')).toBe(42);
    expect(parseByteSize('  ', 42, 'SIZE')).toBe(42);
  });

  it('should reject negative sizes', () => {
    expect(() => parseByteSize('-1', 1, 'SIZE')).toThrow(
      'SIZE must be a byte count, optionally suffixed with k, m or g'
    );
  });
});
