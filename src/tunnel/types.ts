/**
 * Tunnel Types
 * Shared type definitions for the CONNECT tunnel core
 */

import type { IncomingHttpHeaders } from 'node:http';
import type { Duplex, Readable } from 'node:stream';
import type { BufferSource } from './buffer-source.js';
import type { RelayFunction } from './relay.js';

/**
 * Response headers that can contain single or multiple values.
 * Keys are kept lower-case.
 */
export type ResponseHeaders = Record<string, string | string[] | undefined>;

/**
 * One CONNECT request as the interceptor sees it
 */
export interface TunnelRequest {
  /**
   * Target `host:port` from the CONNECT request line.
   * Never taken from the Host header, which intermediaries may rewrite.
   */
  authority: string;
  /** Request headers, for logging only */
  headers?: IncomingHttpHeaders;
  /** Request body, destroyed once the CONNECT response is written */
  body?: Readable | null;
  /** Client address as seen by the proxy */
  remoteAddress?: string;
}

/**
 * A response sink whose raw connection can be taken over once.
 */
export interface HijackableResponse {
  /** Headers to send with the CONNECT response; mutated by the writer */
  readonly headers: ResponseHeaders;
  /**
   * Take over the raw connection.
   * Throws HijackError on a second call, or after the normal response path ran.
   */
  hijack(): Duplex;
}

/**
 * Connects to an upstream address.
 * Must give up promptly once `signal` aborts.
 */
export type DialFunction = (signal: AbortSignal, network: string, address: string) => Promise<Duplex>;

/**
 * Handles one CONNECT request. Resolves when the tunnel is torn down;
 * rejects with the reason the tunnel failed.
 */
export type Interceptor = (signal: AbortSignal, response: HijackableResponse, request: TunnelRequest) => Promise<void>;

/**
 * Counters reported for a finished (or failed) session
 */
export interface TunnelStats {
  bytesUp: number;
  bytesDown: number;
}

/**
 * Options for createConnectInterceptor
 */
export interface ConnectOptions {
  /** Idle timeout in ms; advertised through Keep-Alive when set. 0 disables. */
  idleTimeout?: number;
  /** Scratch buffer allocator; unpooled 32 KiB buffers when omitted */
  bufferSource?: BufferSource;
  /** Respond 200 only after upstream has been dialed */
  okWaitsForUpstream?: boolean;
  /** Upstream dialer */
  dial: DialFunction;
  /** Relay implementation; bidiCopy when omitted */
  relay?: RelayFunction;
  /** Receives byte counts once a session's relay finishes */
  onRelayFinished?: (stats: TunnelStats, request: TunnelRequest) => void;
}
