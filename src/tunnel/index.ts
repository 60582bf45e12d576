/**
 * Tunnel Module
 *
 * CONNECT tunnel core: interceptor, response writer, buffer sources and
 * the bidirectional relay.
 *
 * @module tunnel
 */

export { createConnectInterceptor } from './interceptor.js';
export { ConnectResponse, type ConnectResponseState } from './connect-response.js';

export {
  addIdleKeepAlive,
  badGatewayMessage,
  canonicalHeaderName,
  respondBadGatewayHijacked,
  respondHijacked,
  serializeResponse,
} from './response-writer.js';

export {
  DEFAULT_BUFFER_SIZE,
  DefaultBufferSource,
  PooledBufferSource,
  createBufferSource,
  type BufferSource,
  type PoolStats,
} from './buffer-source.js';

export { bidiCopy, type RelayFunction, type RelayOutcome, type RelayResult } from './relay.js';

export {
  TunnelError,
  HijackError,
  ResponseWriteError,
  DialError,
  DialTimeoutError,
  RelayError,
  IdleTimeoutError,
  isEndOfStream,
  isIdleTimeout,
  isBrokenPipe,
  describeError,
  type RelayDirection,
} from './errors.js';

export type {
  ConnectOptions,
  DialFunction,
  HijackableResponse,
  Interceptor,
  ResponseHeaders,
  TunnelRequest,
  TunnelStats,
} from './types.js';
