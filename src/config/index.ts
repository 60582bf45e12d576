/**
 * Tunnel Configuration
 * Central configuration for the CONNECT proxy server
 */

import { LOG_LEVELS, type LogLevel } from '../logger/index.js';

export interface TunnelConfig {
  // Server settings
  httpProxyPort: number;
  bindAddress: string; // '0.0.0.0' for LAN access, '127.0.0.1' for localhost only

  // Tunnel behaviour
  idleTimeout: number; // ms without traffic before a tunnel is closed, 0 = disabled
  dialTimeout: number; // ms allowed for the upstream dial, 0 = no deadline
  okWaitsForUpstream: boolean; // respond 200 only after upstream is dialed

  // Relay buffers
  bufferSize: number; // bytes per scratch buffer
  bufferPoolSize: number; // released buffers kept for reuse, 0 = unpooled

  // Logging
  logLevel: LogLevel;
  logSessions: boolean; // Write one JSON file per finished tunnel (disabled by default)
  sessionLogDir: string;
}

export const defaultConfig: TunnelConfig = {
  httpProxyPort: 8080,
  bindAddress: '0.0.0.0',

  idleTimeout: 0,
  dialTimeout: 30000,
  okWaitsForUpstream: false,

  // Same size io copy loops use by default
  bufferSize: 32 * 1024,
  bufferPoolSize: 0,

  logLevel: 'info',
  logSessions: false,
  sessionLogDir: './.tunnel-logs',
};

/**
 * Raised when configuration values cannot be used
 */
export class ConfigError extends Error {
  constructor(
    public readonly key: string,
    message: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

// Current active configuration (mutable for runtime changes)
let currentConfig: TunnelConfig = { ...defaultConfig };

export function getConfig(): TunnelConfig {
  return currentConfig;
}

export function updateConfig(partial: Partial<TunnelConfig>): void {
  currentConfig = { ...currentConfig, ...partial };
}

export function resetConfig(): void {
  currentConfig = { ...defaultConfig };
}

// =============================================================================
// Environment
// =============================================================================

function parseInteger(key: string, value: string, min: number, max: number): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigError(key, `${key} must be a non-negative integer, got "${value}"`);
  }
  const parsed = Number(trimmed);
  if (parsed < min || parsed > max) {
    throw new ConfigError(key, `${key} must be between ${min} and ${max}, got ${parsed}`);
  }
  return parsed;
}

function parseBoolean(key: string, value: string): boolean {
  switch (value.trim().toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
    case 'on':
      return true;
    case '0':
    case 'false':
    case 'no':
    case 'off':
      return false;
    default:
      throw new ConfigError(key, `${key} must be a boolean, got "${value}"`);
  }
}

function parseLevel(key: string, value: string): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value.trim().toLowerCase());
  if (!level) {
    throw new ConfigError(key, `${key} must be one of ${LOG_LEVELS.join(', ')}, got "${value}"`);
  }
  return level;
}

/**
 * Read configuration overrides from TUNNEL_* environment variables.
 * Only variables that are present end up in the result.
 *
 * @param env - Environment to read (defaults to process.env)
 * @throws ConfigError when a variable holds an unusable value
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): Partial<TunnelConfig> {
  const overrides: Partial<TunnelConfig> = {};

  const port = env.TUNNEL_PORT;
  if (port !== undefined) overrides.httpProxyPort = parseInteger('TUNNEL_PORT', port, 0, 65535);

  const bind = env.TUNNEL_BIND_ADDRESS;
  if (bind !== undefined && bind.trim() !== '') overrides.bindAddress = bind.trim();

  const idle = env.TUNNEL_IDLE_TIMEOUT_MS;
  if (idle !== undefined) overrides.idleTimeout = parseInteger('TUNNEL_IDLE_TIMEOUT_MS', idle, 0, 2 ** 31 - 1);

  const dial = env.TUNNEL_DIAL_TIMEOUT_MS;
  if (dial !== undefined) overrides.dialTimeout = parseInteger('TUNNEL_DIAL_TIMEOUT_MS', dial, 0, 2 ** 31 - 1);

  const okWaits = env.TUNNEL_OK_WAITS_FOR_UPSTREAM;
  if (okWaits !== undefined) overrides.okWaitsForUpstream = parseBoolean('TUNNEL_OK_WAITS_FOR_UPSTREAM', okWaits);

  const bufferSize = env.TUNNEL_BUFFER_SIZE;
  if (bufferSize !== undefined) overrides.bufferSize = parseInteger('TUNNEL_BUFFER_SIZE', bufferSize, 1, 16 * 1024 * 1024);

  const poolSize = env.TUNNEL_BUFFER_POOL_SIZE;
  if (poolSize !== undefined) overrides.bufferPoolSize = parseInteger('TUNNEL_BUFFER_POOL_SIZE', poolSize, 0, 65536);

  const level = env.TUNNEL_LOG_LEVEL;
  if (level !== undefined) overrides.logLevel = parseLevel('TUNNEL_LOG_LEVEL', level);

  const logSessions = env.TUNNEL_LOG_SESSIONS;
  if (logSessions !== undefined) overrides.logSessions = parseBoolean('TUNNEL_LOG_SESSIONS', logSessions);

  const logDir = env.TUNNEL_SESSION_LOG_DIR;
  if (logDir !== undefined && logDir.trim() !== '') overrides.sessionLogDir = logDir.trim();

  return overrides;
}
