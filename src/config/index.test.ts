import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  ConfigError,
  defaultConfig,
  getConfig,
  loadConfigFromEnv,
  resetConfig,
  updateConfig,
} from './index.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected the call to throw');
}

describe('defaultConfig', () => {
  it('should listen on port 8080 on all interfaces', () => {
    expect(defaultConfig.httpProxyPort).toBe(8080);
    expect(defaultConfig.bindAddress).toBe('0.0.0.0');
  });

  it('should respond before dialing by default', () => {
    expect(defaultConfig.okWaitsForUpstream).toBe(false);
  });

  it('should disable the idle timeout and bound the dial', () => {
    expect(defaultConfig.idleTimeout).toBe(0);
    expect(defaultConfig.dialTimeout).toBe(30000);
  });

  it('should use unpooled 32 KiB buffers', () => {
    expect(defaultConfig.bufferSize).toBe(32 * 1024);
    expect(defaultConfig.bufferPoolSize).toBe(0);
  });

  it('should have session logging disabled', () => {
    expect(defaultConfig.logSessions).toBe(false);
    expect(defaultConfig.logLevel).toBe('info');
  });
});

describe('getConfig / updateConfig / resetConfig', () => {
  beforeEach(() => {
    resetConfig();
  });

  afterEach(() => {
    resetConfig();
  });

  it('should start from the defaults', () => {
    expect(getConfig()).toEqual(defaultConfig);
  });

  it('should merge partial updates', () => {
    updateConfig({ idleTimeout: 60000 });
    updateConfig({ okWaitsForUpstream: true });

    const config = getConfig();
    expect(config.idleTimeout).toBe(60000);
    expect(config.okWaitsForUpstream).toBe(true);
    expect(config.httpProxyPort).toBe(8080);
  });

  it('should not modify defaultConfig', () => {
    updateConfig({ httpProxyPort: 3128 });
    expect(defaultConfig.httpProxyPort).toBe(8080);
  });

  it('should restore the defaults', () => {
    updateConfig({ bufferSize: 1024 });
    resetConfig();
    expect(getConfig().bufferSize).toBe(32 * 1024);
  });
});

describe('loadConfigFromEnv', () => {
  it('should return nothing for an empty environment', () => {
    expect(loadConfigFromEnv({})).toEqual({});
  });

  it('should read every supported variable', () => {
    const overrides = loadConfigFromEnv({
      TUNNEL_PORT: '3128',
      TUNNEL_BIND_ADDRESS: '127.0.0.1',
      TUNNEL_IDLE_TIMEOUT_MS: '120000',
      TUNNEL_DIAL_TIMEOUT_MS: '5000',
      TUNNEL_OK_WAITS_FOR_UPSTREAM: 'true',
      TUNNEL_BUFFER_SIZE: '16384',
      TUNNEL_BUFFER_POOL_SIZE: '128',
      TUNNEL_LOG_LEVEL: 'DEBUG',
      TUNNEL_LOG_SESSIONS: 'on',
      TUNNEL_SESSION_LOG_DIR: '/var/log/tunnel',
    });

    expect(overrides).toEqual({
      httpProxyPort: 3128,
      bindAddress: '127.0.0.1',
      idleTimeout: 120000,
      dialTimeout: 5000,
      okWaitsForUpstream: true,
      bufferSize: 16384,
      bufferPoolSize: 128,
      logLevel: 'debug',
      logSessions: true,
      sessionLogDir: '/var/log/tunnel',
    });
  });

  it('should accept the usual boolean spellings', () => {
    expect(loadConfigFromEnv({ TUNNEL_OK_WAITS_FOR_UPSTREAM: '1' }).okWaitsForUpstream).toBe(true);
    expect(loadConfigFromEnv({ TUNNEL_OK_WAITS_FOR_UPSTREAM: 'yes' }).okWaitsForUpstream).toBe(true);
    expect(loadConfigFromEnv({ TUNNEL_OK_WAITS_FOR_UPSTREAM: 'off' }).okWaitsForUpstream).toBe(false);
    expect(loadConfigFromEnv({ TUNNEL_OK_WAITS_FOR_UPSTREAM: 'False' }).okWaitsForUpstream).toBe(false);
  });

  it('should ignore blank addresses and directories', () => {
    expect(loadConfigFromEnv({ TUNNEL_BIND_ADDRESS: ' ', TUNNEL_SESSION_LOG_DIR: '' })).toEqual({});
  });

  it('should reject non-numeric values', () => {
    const err = captureError(() => loadConfigFromEnv({ TUNNEL_PORT: '80a' }));

    expect(err).toBeInstanceOf(ConfigError);
    expect(err).toHaveProperty('key', 'TUNNEL_PORT');
    expect(err).toHaveProperty('message', 'TUNNEL_PORT must be a non-negative integer, got "80a"');
  });

  it('should reject out-of-range values', () => {
    expect(() => loadConfigFromEnv({ TUNNEL_PORT: '70000' })).toThrow(
      'TUNNEL_PORT must be between 0 and 65535, got 70000'
    );
    expect(() => loadConfigFromEnv({ TUNNEL_BUFFER_SIZE: '0' })).toThrow(
      'TUNNEL_BUFFER_SIZE must be between 1 and 16777216, got 0'
    );
  });

  it('should reject negative timeouts', () => {
    expect(() => loadConfigFromEnv({ TUNNEL_IDLE_TIMEOUT_MS: '-1' })).toThrow(ConfigError);
  });

  it('should reject unknown booleans and log levels', () => {
    expect(() => loadConfigFromEnv({ TUNNEL_LOG_SESSIONS: 'maybe' })).toThrow(
      'TUNNEL_LOG_SESSIONS must be a boolean, got "maybe"'
    );
    expect(() => loadConfigFromEnv({ TUNNEL_LOG_LEVEL: 'loud' })).toThrow(
      'TUNNEL_LOG_LEVEL must be one of trace, debug, info, warn, error, silent, got "loud"'
    );
  });
});
