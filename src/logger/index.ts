/**
 * Logger Module
 *
 * Leveled console logging for the tunnel proxy, plus the per-session
 * JSON log writer.
 *
 * @module logger
 */

export {
  LOG_LEVELS,
  createLogger,
  getLogLevel,
  isLevelEnabled,
  parseLogLevel,
  setLogLevel,
  type LogLevel,
  type Logger,
} from './logger.js';

export {
  logTunnelSession,
  buildSessionLogPath,
  type TunnelSessionLog,
  type TunnelOutcome,
} from './session-logger.js';
