/**
 * Upstream Dialer
 *
 * TCP dialing for the CONNECT interceptor, with cancellation through an
 * AbortSignal, an optional dial deadline and an idle-timeout wrapper for
 * the resulting socket.
 *
 * @module dialer
 */

import { connect, isIP, type Socket } from 'node:net';
import { hide } from '../redact/index.js';
import { DialError, DialTimeoutError, IdleTimeoutError, describeError } from '../tunnel/errors.js';
import type { DialFunction } from '../tunnel/types.js';

export interface ParsedAuthority {
  host: string;
  port: number;
}

/**
 * Split a CONNECT authority into host and port.
 * Accepts `host:port` and `[ipv6]:port`; the port is mandatory.
 *
 * @returns Parsed authority, or null when the string is not a usable target
 */
export function parseAuthority(authority: string): ParsedAuthority | null {
  let host: string;
  let portStr: string;

  const bracketed = /^\[([^\]]+)\]:(\d+)$/.exec(authority);
  if (bracketed) {
    host = bracketed[1];
    portStr = bracketed[2];
    if (isIP(host) !== 6) return null;
  } else {
    const idx = authority.lastIndexOf(':');
    if (idx <= 0) return null;
    host = authority.slice(0, idx);
    portStr = authority.slice(idx + 1);
    // Unbracketed IPv6 is ambiguous
    if (host.includes(':')) return null;
    if (!/^[A-Za-z0-9._-]+$/.test(host)) return null;
  }

  if (!/^\d{1,5}$/.test(portStr)) return null;
  const port = Number(portStr);
  if (port < 1 || port > 65535) return null;

  return { host, port };
}

function networkFamily(network: string): 0 | 4 | 6 | undefined {
  switch (network) {
    case 'tcp':
      return 0;
    case 'tcp4':
      return 4;
    case 'tcp6':
      return 6;
    default:
      return undefined;
  }
}

function abortError(address: string, signal: AbortSignal): DialTimeoutError {
  const reason: unknown = signal.reason;
  const timedOut = reason instanceof Error && reason.name === 'TimeoutError';
  const message = timedOut ? `Timed out dialing ${address}` : `Dial to ${address} canceled`;
  const detail = reason === undefined ? '' : hide(`: ${describeError(reason)}`);
  return new DialTimeoutError(address, `${message}${detail}`, { cause: reason });
}

/**
 * Open a TCP connection to `address` (host:port).
 *
 * Rejects with DialTimeoutError when the signal is (or becomes) aborted
 * before the connection is up, and with DialError otherwise. The public
 * part of a DialError message names only the address; the system error is
 * kept in a hidden section.
 */
export function dialTcp(signal: AbortSignal, network: string, address: string): Promise<Socket> {
  const family = networkFamily(network);
  if (family === undefined) {
    return Promise.reject(new DialError(address, `Unsupported network ${network}`));
  }

  const target = parseAuthority(address);
  if (!target) {
    return Promise.reject(new DialError(address, `Invalid upstream address ${address}`));
  }

  if (signal.aborted) {
    return Promise.reject(abortError(address, signal));
  }

  return new Promise((resolve, reject) => {
    const socket = connect({ host: target.host, port: target.port, family });

    const cleanup = (): void => {
      signal.removeEventListener('abort', onAbort);
      socket.off('error', onError);
      socket.off('connect', onConnect);
    };

    const onAbort = (): void => {
      cleanup();
      socket.destroy();
      reject(abortError(address, signal));
    };

    const onError = (err: Error): void => {
      cleanup();
      socket.destroy();
      reject(new DialError(address, `Unable to reach ${address}${hide(`: ${describeError(err)}`)}`, { cause: err }));
    };

    const onConnect = (): void => {
      cleanup();
      resolve(socket);
    };

    signal.addEventListener('abort', onAbort, { once: true });
    socket.once('error', onError);
    socket.once('connect', onConnect);
  });
}

/**
 * Destroy the socket with IdleTimeoutError once it has been idle for `timeout` ms.
 * A timeout of 0 leaves the socket untouched.
 */
export function withIdleTimeout<T extends Socket>(socket: T, timeout: number): T {
  if (timeout <= 0) return socket;
  socket.setTimeout(timeout, () => {
    socket.destroy(new IdleTimeoutError(timeout));
  });
  return socket;
}

/**
 * Derive a signal that also aborts after `timeout` ms.
 */
function withDeadline(signal: AbortSignal, timeout: number): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onAbort = (): void => controller.abort(signal.reason);

  const timer = setTimeout(() => {
    const reason = new Error(`Dial deadline of ${timeout}ms exceeded`);
    reason.name = 'TimeoutError';
    controller.abort(reason);
  }, timeout);

  if (signal.aborted) {
    controller.abort(signal.reason);
  } else {
    signal.addEventListener('abort', onAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
    },
  };
}

export interface DialerOptions {
  /** Deadline for establishing the connection in ms, 0 = none */
  timeout?: number;
  /** Idle timeout applied to dialed sockets in ms, 0 = none */
  idleTimeout?: number;
  /** Underlying dial, dialTcp by default */
  dial?: (signal: AbortSignal, network: string, address: string) => Promise<Socket>;
}

/**
 * Build the dial function the proxy hands to the interceptor.
 */
export function createDialer(options: DialerOptions = {}): DialFunction {
  const { timeout = 0, idleTimeout = 0, dial = dialTcp } = options;

  return async (signal, network, address) => {
    if (timeout <= 0) {
      return withIdleTimeout(await dial(signal, network, address), idleTimeout);
    }

    const deadline = withDeadline(signal, timeout);
    try {
      return withIdleTimeout(await dial(deadline.signal, network, address), idleTimeout);
    } finally {
      deadline.dispose();
    }
  };
}
