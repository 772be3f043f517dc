import { describe, test, expect } from '@jest/globals';
import { resolveRuntime, ConfigError } from '../src/config/runtime.js';

describe('resolveRuntime', () => {
  test('defaults', () => {
    expect(resolveRuntime({})).toEqual({
      production: false,
      verbose: false,
      logLevel: 'info',
      pretty: true,
      color: true,
      parseMode: 'strict',
    });
  });

  test('verbose raises the log level unless production', () => {
    expect(resolveRuntime({ DIGITWISE_VERBOSE: 'true' }).logLevel).toBe('trace');
    const prod = resolveRuntime({ DIGITWISE_VERBOSE: 'true', DIGITWISE_PRODUCTION: 'true' });
    expect(prod.verbose).toBe(false);
    expect(prod.logLevel).toBe('info');
    expect(prod.pretty).toBe(false);
    expect(prod.color).toBe(false);
  });

  test('explicit LOG_LEVEL wins', () => {
    expect(resolveRuntime({ LOG_LEVEL: 'silent', DIGITWISE_VERBOSE: 'true' }).logLevel).toBe('silent');
  });

  test('NO_COLOR and parse mode', () => {
    const rt = resolveRuntime({ NO_COLOR: '1', DIGITWISE_PARSE_MODE: 'lenient' });
    expect(rt.color).toBe(false);
    expect(rt.parseMode).toBe('lenient');
  });

  test('empty values fall back to the defaults', () => {
    const rt = resolveRuntime({ LOG_LEVEL: '', DIGITWISE_PARSE_MODE: '', NO_COLOR: '' });
    expect(rt.logLevel).toBe('info');
    expect(rt.parseMode).toBe('strict');
    expect(rt.color).toBe(true);
  });

  test('invalid values name the offending keys', () => {
    let caught: unknown;
    try {
      resolveRuntime({ LOG_LEVEL: 'loud', DIGITWISE_PARSE_MODE: 'sloppy' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.keys.sort()).toEqual(['DIGITWISE_PARSE_MODE', 'LOG_LEVEL']);
    }
  });
});
