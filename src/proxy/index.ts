/**
 * Proxy Module
 *
 * HTTP server side of the CONNECT proxy.
 *
 * @module proxy
 *
 * @example
 * ```typescript
 * import { createConnectProxy } from './proxy/index.js';
 *
 * // Start the CONNECT proxy on port 8080, answering 200 only after upstream is up
 * const server = createConnectProxy(8080, '0.0.0.0', { okWaitsForUpstream: true });
 * ```
 */

export {
  createConnectProxy,
  createConnectHandler,
  normalizeIpAddress,
  type ConnectHandler,
  type ConnectProxyOptions,
} from './connect-proxy.js';
