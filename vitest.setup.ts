/**
 * Vitest setup - runs in every test worker before the test files
 * Keeps tunnel logs quiet unless TUNNEL_LOG_LEVEL asks for them
 */
import { parseLogLevel, setLogLevel } from './src/logger/index.js';

setLogLevel(parseLogLevel(process.env.TUNNEL_LOG_LEVEL, 'silent'));
