import { describe, it, expect, afterEach, vi } from 'vitest';
import { Logger } from './logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write info with its prefix at the default level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    new Logger('gateway').info('listening');

    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0].slice(1)).toEqual(['[gateway]', 'listening']);
  });

  it('should drop messages below the threshold', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new Logger('gateway', 'warn');

    logger.debug('noise');
    logger.warn('careful');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should write nothing when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    new Logger('gateway', 'silent').error('hidden');

    expect(error).not.toHaveBeenCalled();
  });

  it('should nest child prefixes and share the level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const child = new Logger('gateway', 'info').child('access');

    child.info('GET / 200 1ms');

    expect(child.isEnabled('info')).toBe(true);
    expect(child.isEnabled('debug')).toBe(false);
    expect(log.mock.calls[0].slice(1)).toEqual(['[gateway:access]', 'GET / 200 1ms']);
  });

  it('should pass a silent threshold on to children', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    new Logger('gateway', 'silent').child('access').info('GET / 200 1ms');

    expect(log).not.toHaveBeenCalled();
  });
});
