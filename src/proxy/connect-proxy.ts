/**
 * HTTP CONNECT Proxy
 *
 * An HTTP server that answers CONNECT requests with raw TCP tunnels and
 * refuses everything else.
 *
 * Architecture:
 * - the server's `connect` event hands the client socket to a ConnectResponse
 * - the interceptor takes the socket over, dials upstream and relays
 * - metrics and the optional session log are updated when the tunnel ends
 *
 * @module proxy/connect-proxy
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { Socket } from 'node:net';
import type { Duplex } from 'node:stream';
import { getConfig } from '../config/index.js';
import { createDialer, parseAuthority, withIdleTimeout } from '../dialer/index.js';
import { createLogger, logTunnelSession, type TunnelOutcome } from '../logger/index.js';
import {
  recordBandwidth,
  recordDialFailure,
  recordError,
  recordRejected,
  recordRelayError,
  recordTunnel,
  updateTunnels,
} from '../metrics/index.js';
import { createBufferSource, type BufferSource } from '../tunnel/buffer-source.js';
import { ConnectResponse } from '../tunnel/connect-response.js';
import { HijackError, RelayError, ResponseWriteError, describeError } from '../tunnel/errors.js';
import { createConnectInterceptor } from '../tunnel/interceptor.js';
import type { RelayFunction } from '../tunnel/relay.js';
import type { DialFunction, TunnelRequest, TunnelStats } from '../tunnel/types.js';

const log = createLogger('proxy');

// =============================================================================
// Types
// =============================================================================

export interface ConnectProxyOptions {
  /** Idle timeout in ms for both sides of a tunnel, 0 disables */
  idleTimeout?: number;
  /** Deadline for the upstream dial in ms, 0 disables */
  dialTimeout?: number;
  /** Respond 200 only after upstream is connected */
  okWaitsForUpstream?: boolean;
  bufferSource?: BufferSource;
  /** Upstream dialer; a TCP dialer honouring dialTimeout/idleTimeout when omitted */
  dial?: DialFunction;
  relay?: RelayFunction;
}

export type ConnectHandler = (req: IncomingMessage, socket: Duplex, head: Buffer) => Promise<void>;

// =============================================================================
// Client IP Utilities
// =============================================================================

/**
 * Normalize IP address for consistency.
 * Converts IPv6 localhost to IPv4 and removes IPv6 prefix.
 */
export function normalizeIpAddress(ip: string): string {
  if (ip === '::1' || ip === '::ffff:127.0.0.1') {
    return '127.0.0.1';
  }
  return ip.replace(/^::ffff:/, '');
}

function classifyFailure(err: unknown): TunnelOutcome {
  if (err instanceof HijackError) return 'hijack-failed';
  if (err instanceof ResponseWriteError) return 'respond-failed';
  if (err instanceof RelayError) return 'relay-failed';
  // Custom dialers may throw anything, so the rest counts as a dial failure too
  return 'dial-failed';
}

function recordFailure(outcome: TunnelOutcome): void {
  switch (outcome) {
    case 'dial-failed':
      recordDialFailure();
      break;
    case 'relay-failed':
      recordRelayError();
      break;
    default:
      recordError();
  }
}

// =============================================================================
// CONNECT Handler
// =============================================================================

/**
 * Build the `connect` event handler.
 * Options left out fall back to the current configuration.
 */
export function createConnectHandler(options: ConnectProxyOptions = {}): ConnectHandler {
  const config = getConfig();
  const idleTimeout = options.idleTimeout ?? config.idleTimeout;
  const dialTimeout = options.dialTimeout ?? config.dialTimeout;

  const sessionStats = new WeakMap<TunnelRequest, TunnelStats>();

  const interceptor = createConnectInterceptor({
    idleTimeout,
    okWaitsForUpstream: options.okWaitsForUpstream ?? config.okWaitsForUpstream,
    bufferSource: options.bufferSource ?? createBufferSource(config.bufferSize, config.bufferPoolSize),
    dial: options.dial ?? createDialer({ timeout: dialTimeout, idleTimeout }),
    relay: options.relay,
    onRelayFinished: (stats, request) => {
      sessionStats.set(request, stats);
      recordBandwidth(stats.bytesUp, stats.bytesDown);
    },
  });

  return async (req, socket, head) => {
    const clientIp = normalizeIpAddress(req.socket.remoteAddress ?? '');
    const authority = req.url ?? '';
    const startedAt = new Date();

    socket.on('error', (err) => {
      log.debug(`Client socket error (${clientIp}): ${err.message}`);
    });
    if (socket instanceof Socket) {
      withIdleTimeout(socket, idleTimeout);
    }

    const response = new ConnectResponse(socket, head);

    if (!parseAuthority(authority)) {
      log.warn(`🚫 Invalid CONNECT target "${authority}" (client: ${clientIp})`);
      recordRejected();
      await response.respond(400, 'Invalid CONNECT target');
      return;
    }

    // Cancels the dial when the client goes away first
    const controller = new AbortController();
    const onClose = (): void => controller.abort(new Error('Client closed connection'));
    socket.once('close', onClose);

    const request: TunnelRequest = { authority, headers: req.headers, remoteAddress: clientIp };

    recordTunnel();
    updateTunnels(1);
    log.info(`🔒 CONNECT ${authority} (client: ${clientIp})`);

    let outcome: TunnelOutcome = 'ok';
    let error: string | undefined;
    try {
      await interceptor(controller.signal, response, request);
      log.debug(`✅ Tunnel to ${authority} closed`);
    } catch (err) {
      outcome = classifyFailure(err);
      error = describeError(err);
      recordFailure(outcome);
      log.error(`❌ Tunnel to ${authority} failed: ${error}`);
    } finally {
      socket.off('close', onClose);
      updateTunnels(-1);
    }

    const stats = sessionStats.get(request) ?? { bytesUp: 0, bytesDown: 0 };
    const logPath = await logTunnelSession({
      target: authority,
      clientIp,
      startedAt: startedAt.toISOString(),
      durationMs: Date.now() - startedAt.getTime(),
      bytesUp: stats.bytesUp,
      bytesDown: stats.bytesDown,
      outcome,
      ...(error !== undefined && { error }),
    });
    if (logPath) {
      log.debug(`📝 Session logged: ${logPath}`);
    }
  };
}

// =============================================================================
// Server Factory
// =============================================================================

function rejectPlainRequest(req: IncomingMessage, res: ServerResponse): void {
  log.warn(`⚠️ Refusing ${req.method ?? 'unknown'} ${req.url ?? ''}: only CONNECT is supported`);
  recordRejected();
  res.writeHead(405, { Allow: 'CONNECT', 'Content-Type': 'text/plain' });
  res.end('Only CONNECT is supported');
}

/**
 * Create and start the CONNECT proxy server.
 *
 * @param port - Port to listen on
 * @param bindAddress - Address to bind to (default: all interfaces)
 * @param options - Tunnel options; missing values come from the configuration
 * @returns Node.js HTTP server instance
 */
export function createConnectProxy(
  port: number,
  bindAddress: string = '0.0.0.0',
  options: ConnectProxyOptions = {}
): Server {
  const handleConnect = createConnectHandler(options);
  const server = createServer(rejectPlainRequest);

  server.on('connect', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    handleConnect(req, socket, head).catch((err: unknown) => {
      log.error(`❌ CONNECT handler error: ${describeError(err)}`);
      socket.destroy();
    });
  });

  server.on('error', (err) => {
    log.error(`❌ Proxy server error: ${err.message}`);
  });

  server.listen(port, bindAddress, () => {
    log.info(`🌐 CONNECT proxy listening on ${bindAddress}:${port}`);
  });

  return server;
}
