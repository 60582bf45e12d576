/**
 * CONNECT Interceptor
 *
 * Turns a CONNECT request into a raw tunnel: take over the client
 * connection, answer 200 (before or after dialing, depending on
 * `okWaitsForUpstream`), dial upstream, relay until both directions are
 * done, then close everything the session acquired.
 *
 * Exactly one response is written per session. With the default policy
 * (respond before dialing) a failed dial shows up on the client only as
 * the connection closing right after the 200.
 *
 * @module tunnel/interceptor
 */

import type { Duplex } from 'node:stream';
import { createLogger } from '../logger/index.js';
import { DefaultBufferSource, type BufferSource } from './buffer-source.js';
import {
  HijackError,
  RelayError,
  ResponseWriteError,
  describeError,
  isBrokenPipe,
  isEndOfStream,
  isIdleTimeout,
} from './errors.js';
import { bidiCopy, type RelayFunction } from './relay.js';
import { addIdleKeepAlive, respondBadGatewayHijacked, respondHijacked } from './response-writer.js';
import type {
  ConnectOptions,
  DialFunction,
  HijackableResponse,
  Interceptor,
  ResponseHeaders,
  TunnelRequest,
  TunnelStats,
} from './types.js';

const log = createLogger('connect');

/**
 * Create an interceptor for CONNECT requests.
 *
 * @example
 * ```typescript
 * const connect = createConnectInterceptor({
 *   idleTimeout: 70_000,
 *   okWaitsForUpstream: true,
 *   dial: dialTcp,
 * });
 * await connect(signal, new ConnectResponse(socket, head), { authority: req.url ?? '' });
 * ```
 */
export function createConnectInterceptor(options: ConnectOptions): Interceptor {
  const ic = new ConnectInterceptor(options);
  return (signal, response, request) => ic.connect(signal, response, request);
}

class ConnectInterceptor {
  private readonly idleTimeout: number;
  private readonly bufferSource: BufferSource;
  private readonly okWaitsForUpstream: boolean;
  private readonly dial: DialFunction;
  private readonly relay: RelayFunction;
  private readonly onRelayFinished?: (stats: TunnelStats, request: TunnelRequest) => void;

  constructor(options: ConnectOptions) {
    this.idleTimeout = options.idleTimeout ?? 0;
    this.bufferSource = options.bufferSource ?? new DefaultBufferSource();
    this.okWaitsForUpstream = options.okWaitsForUpstream ?? false;
    this.dial = options.dial;
    this.relay = options.relay ?? bidiCopy;
    this.onRelayFinished = options.onRelayFinished;
  }

  async connect(signal: AbortSignal, response: HijackableResponse, request: TunnelRequest): Promise<void> {
    let downstream: Duplex | undefined;
    let upstream: Duplex | undefined;

    try {
      downstream = this.hijack(response);
      downstream.on('error', onConnectionError);

      if (!this.okWaitsForUpstream) {
        await this.respondOK(downstream, request, response.headers);
      }

      // The target comes from the request line, never from the Host header
      try {
        upstream = await this.dial(signal, 'tcp', request.authority);
      } catch (err) {
        if (this.okWaitsForUpstream) {
          log.debug(`Responding Bad Gateway: ${describeError(err)}`);
          await respondBadGatewayHijacked(downstream, request, response.headers, err).catch((writeErr: unknown) => {
            log.debug(`Unable to respond Bad Gateway: ${describeError(writeErr)}`);
          });
        } else {
          log.error(`❌ Dial ${request.authority} failed: ${describeError(err)}`);
        }
        throw err;
      }
      // Until the relay takes over, a reset while the late response is written must not go unhandled
      upstream.on('error', onConnectionError);

      if (this.okWaitsForUpstream) {
        await this.respondOK(downstream, request, response.headers);
      }

      await this.copy(upstream, downstream, request);
    } finally {
      if (downstream) closeConnection(downstream, 'downstream');
      if (upstream) closeConnection(upstream, 'upstream');
    }
  }

  private hijack(response: HijackableResponse): Duplex {
    try {
      return response.hijack();
    } catch (err) {
      // Already hijacked or already answered: a programming error, nothing to retry
      const fullErr = err instanceof HijackError
        ? err
        : new HijackError(`Unable to hijack connection: ${describeError(err)}`, { cause: err });
      log.error(`❌ ${fullErr.message}`);
      throw fullErr;
    }
  }

  private async respondOK(writer: Duplex, request: TunnelRequest, headers: ResponseHeaders): Promise<void> {
    addIdleKeepAlive(headers, this.idleTimeout);
    try {
      await respondHijacked(writer, request, 200, headers);
    } catch (err) {
      const fullErr = new ResponseWriteError(`Unable to respond OK: ${describeError(err)}`, { cause: err });
      log.error(`❌ ${fullErr.message}`);
      throw fullErr;
    }
  }

  private async copy(upstream: Duplex, downstream: Duplex, request: TunnelRequest): Promise<void> {
    const bufOut = this.bufferSource.get();
    try {
      const bufIn = this.bufferSource.get();
      try {
        const { toA: toUpstream, toB: toDownstream } = await this.relay(upstream, downstream, bufOut, bufIn);
        this.onRelayFinished?.({ bytesUp: toUpstream.bytes, bytesDown: toDownstream.bytes }, request);

        // Idle closes are fine for HTTP (RFC 9112 9.8). A broken pipe towards
        // the client means the client left first.
        const readErr = toDownstream.error;
        if (!isEndOfStream(readErr) && !isIdleTimeout(readErr) && !isBrokenPipe(readErr)) {
          throw new RelayError('downstream', readErr);
        }
        const writeErr = toUpstream.error;
        if (!isEndOfStream(writeErr) && !isIdleTimeout(writeErr)) {
          throw new RelayError('upstream', writeErr);
        }
      } finally {
        this.bufferSource.put(bufIn);
      }
    } finally {
      this.bufferSource.put(bufOut);
    }
  }
}

// Left attached: a connection torn down here may still report a late error
function onConnectionError(err: Error): void {
  log.debug(`Connection error: ${describeError(err)}`);
}

function closeConnection(conn: Duplex, label: string): void {
  try {
    conn.destroy();
  } catch (err) {
    log.trace(`Error closing ${label} connection: ${describeError(err)}`);
  }
}
