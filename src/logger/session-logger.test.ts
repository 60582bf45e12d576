/**
 * Tunnel Session Logger Tests
 */

import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { buildSessionLogPath, logTunnelSession, type TunnelSessionLog } from './session-logger.js';
import { resetConfig, updateConfig } from '../config/index.js';
import { getLogLevel, setLogLevel } from './logger.js';

describe('Tunnel Session Logger', () => {
  const testLogDir = './.test-tunnel-logs';

  const entry: TunnelSessionLog = {
    target: 'example.com:443',
    clientIp: '192.168.1.10',
    startedAt: new Date(2024, 0, 5, 9, 3, 7).toISOString(),
    durationMs: 1250,
    bytesUp: 512,
    bytesDown: 4096,
    outcome: 'ok',
  };

  beforeEach(() => {
    resetConfig();
  });

  afterEach(async () => {
    resetConfig();
    vi.restoreAllMocks();
    if (existsSync(testLogDir)) {
      await rm(testLogDir, { recursive: true, force: true });
    }
  });

  describe('buildSessionLogPath', () => {
    it('should group logs by client, host and day', () => {
      const { dir, filename } = buildSessionLogPath('/logs', '192.168.1.10', 'example.com:443', new Date(2024, 0, 5, 9, 3, 7));

      expect(dir).toBe(join('/logs', '192.168.1.10', 'example.com', '2024-01-05'));
      expect(filename).toMatch(/^09\.03\.07_443_[a-z0-9]+\.json$/);
    });

    it('should sanitize IPv6 addresses', () => {
      const { dir, filename } = buildSessionLogPath('/logs', '::1', '[2001:db8::1]:8443', new Date(2024, 11, 31, 23, 59, 0));

      expect(dir).toBe(join('/logs', '1', '2001_db8_1', '2024-12-31'));
      expect(filename).toMatch(/^23\.59\.00_8443_/);
    });

    it('should mark a missing port', () => {
      const { filename } = buildSessionLogPath('/logs', '10.0.0.1', 'example.com', new Date(2024, 5, 1, 0, 0, 0));
      expect(filename).toMatch(/^00\.00\.00_unknown_/);
    });

    it('should not reuse a filename', () => {
      const at = new Date(2024, 0, 5, 9, 3, 7);
      const first = buildSessionLogPath('/logs', '10.0.0.1', 'a.test:1', at);
      const second = buildSessionLogPath('/logs', '10.0.0.1', 'a.test:1', at);

      expect(first.filename).not.toBe(second.filename);
    });
  });

  describe('logTunnelSession', () => {
    it('should not write when session logging is disabled', async () => {
      updateConfig({ logSessions: false, sessionLogDir: testLogDir });

      expect(await logTunnelSession(entry)).toBeNull();
      expect(existsSync(testLogDir)).toBe(false);
    });

    it('should write the session as JSON', async () => {
      updateConfig({ logSessions: true, sessionLogDir: testLogDir });

      const logPath = await logTunnelSession(entry);

      expect(logPath).not.toBeNull();
      expect(logPath?.startsWith(join(testLogDir, '192.168.1.10', 'example.com', '2024-01-05'))).toBe(true);
      const content: unknown = JSON.parse(await readFile(logPath ?? '', 'utf-8'));
      expect(content).toEqual(entry);
    });

    it('should keep the full error of a failed session', async () => {
      updateConfig({ logSessions: true, sessionLogDir: testLogDir });
      const failed: TunnelSessionLog = {
        ...entry,
        outcome: 'dial-failed',
        error: 'Unable to reach example.com:443[: connect ECONNREFUSED 10.0.0.1:443]',
      };

      const logPath = await logTunnelSession(failed);
      const content: unknown = JSON.parse(await readFile(logPath ?? '', 'utf-8'));

      expect(content).toHaveProperty('outcome', 'dial-failed');
      expect(content).toHaveProperty('error', 'Unable to reach example.com:443[: connect ECONNREFUSED 10.0.0.1:443]');
    });

    async function blockedLogDir(): Promise<string> {
      await mkdir(testLogDir, { recursive: true });
      const blocker = join(testLogDir, 'not-a-dir');
      await writeFile(blocker, 'x');
      return blocker;
    }

    it('should report write failures without throwing', async () => {
      updateConfig({ logSessions: true, sessionLogDir: await blockedLogDir() });
      const previous = getLogLevel();
      setLogLevel('error');
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});

      try {
        expect(await logTunnelSession(entry)).toBeNull();
      } finally {
        setLogLevel(previous);
      }
      expect(error).toHaveBeenCalledTimes(1);
      expect(String(error.mock.calls[0][0])).toMatch(/^\[session\] ❌ Failed to log tunnel session: /);
    });

    it('should stay quiet about write failures when logging is silenced', async () => {
      updateConfig({ logSessions: true, sessionLogDir: await blockedLogDir() });
      const previous = getLogLevel();
      setLogLevel('silent');
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});

      try {
        expect(await logTunnelSession(entry)).toBeNull();
      } finally {
        setLogLevel(previous);
      }
      expect(error).not.toHaveBeenCalled();
    });
  });
});
