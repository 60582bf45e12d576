/**
 * Tunnel Session Logger
 *
 * Writes one JSON file per finished CONNECT tunnel to a structured
 * folder hierarchy:
 * [client_ip]/[host]/[yyyy-mm-dd]/[hh.mm.ss]_[port]_[suffix].json
 *
 * Each log file contains the target, timing, byte counts and the outcome
 * of the tunnel. Error messages are stored in full, hidden diagnostic
 * sections included, since these files never reach the client.
 *
 * @module logger/session-logger
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { getConfig } from '../config/index.js';
import { createLogger } from './logger.js';

const log = createLogger('session');

export type TunnelOutcome = 'ok' | 'hijack-failed' | 'respond-failed' | 'dial-failed' | 'relay-failed';

/**
 * Structure of a logged tunnel session
 */
export interface TunnelSessionLog {
  /** Target authority from the CONNECT request line */
  target: string;
  /** Client address as seen by the proxy */
  clientIp: string;
  /** ISO timestamp of when the tunnel was requested */
  startedAt: string;
  /** Session duration in milliseconds */
  durationMs: number;
  /** Bytes relayed client -> upstream */
  bytesUp: number;
  /** Bytes relayed upstream -> client */
  bytesDown: number;
  outcome: TunnelOutcome;
  /** Full error message for failed sessions */
  error?: string;
}

function sanitizeForFilename(str: string): string {
  return str
    .replace(/[<>:"/\\|?*\x00-\x1F\[\]]/g, '_')
    .replace(/\s+/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '')
    .substring(0, 200) || 'unknown';
}

function pad(n: number): string {
  return n.toString().padStart(2, '0');
}

/**
 * Split a target authority into host and port parts for the log path.
 * IPv6 literals keep their address without brackets.
 */
function splitTarget(target: string): { host: string; port: string } {
  const bracketed = /^\[([^\]]*)\](?::(\d*))?$/.exec(target);
  if (bracketed) {
    return { host: bracketed[1], port: bracketed[2] ?? '' };
  }
  const idx = target.lastIndexOf(':');
  if (idx === -1) {
    return { host: target, port: '' };
  }
  return { host: target.slice(0, idx), port: target.slice(idx + 1) };
}

/**
 * Build the log file path for a tunnel session
 *
 * @param baseDir - Base directory for logs
 * @param clientIp - Client IP address
 * @param target - CONNECT authority (host:port)
 * @param timestamp - Session start
 * @returns Object containing directory path and filename
 */
export function buildSessionLogPath(
  baseDir: string,
  clientIp: string,
  target: string,
  timestamp: Date
): { dir: string; filename: string } {
  const { host, port } = splitTarget(target);
  const dateFolder = `${timestamp.getFullYear()}-${pad(timestamp.getMonth() + 1)}-${pad(timestamp.getDate())}`;
  const time = `${pad(timestamp.getHours())}.${pad(timestamp.getMinutes())}.${pad(timestamp.getSeconds())}`;

  // Add a unique suffix to avoid collisions
  const uniqueSuffix = Date.now().toString(36) + Math.random().toString(36).substring(2, 6);

  const dir = join(baseDir, sanitizeForFilename(clientIp), sanitizeForFilename(host), dateFolder);
  const filename = `${time}_${sanitizeForFilename(port)}_${uniqueSuffix}.json`;

  return { dir, filename };
}

/**
 * Log a finished tunnel session to the filesystem
 *
 * Does nothing when session logging is disabled. Write failures are
 * logged and never reach the caller.
 *
 * @returns Path of the written file, or null when nothing was written
 */
export async function logTunnelSession(entry: TunnelSessionLog): Promise<string | null> {
  const config = getConfig();

  if (!config.logSessions) {
    return null;
  }

  try {
    const { dir, filename } = buildSessionLogPath(
      config.sessionLogDir,
      entry.clientIp,
      entry.target,
      new Date(entry.startedAt)
    );

    await mkdir(dir, { recursive: true });

    const logPath = join(dir, filename);
    await writeFile(logPath, JSON.stringify(entry, null, 2), 'utf-8');
    return logPath;
  } catch (err) {
    log.error(`❌ Failed to log tunnel session: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}
