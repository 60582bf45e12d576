/**
 * CONNECT Response Sink
 *
 * Wraps the socket handed over by the HTTP server's `connect` event. The
 * socket can either be answered through the normal response path
 * (`respond`) or taken over once (`hijack`), never both.
 *
 * @module tunnel/connect-response
 */

import type { Duplex } from 'node:stream';
import { HijackError } from './errors.js';
import { serializeResponse } from './response-writer.js';
import type { HijackableResponse, ResponseHeaders } from './types.js';

export type ConnectResponseState = 'pending' | 'hijacked' | 'responded';

export class ConnectResponse implements HijackableResponse {
  readonly headers: ResponseHeaders = {};
  private current: ConnectResponseState = 'pending';

  /**
   * @param socket - Raw client connection
   * @param head - Bytes the client sent after the CONNECT request head; replayed on hijack
   */
  constructor(
    private readonly socket: Duplex,
    private readonly head?: Buffer
  ) {}

  get state(): ConnectResponseState {
    return this.current;
  }

  hijack(): Duplex {
    if (this.current === 'hijacked') {
      throw new HijackError('Unable to hijack connection: already hijacked');
    }
    if (this.current === 'responded') {
      throw new HijackError('Unable to hijack connection: response already written');
    }
    if (this.socket.destroyed) {
      throw new HijackError('Unable to hijack connection: connection closed');
    }
    this.current = 'hijacked';
    if (this.head && this.head.length > 0) {
      this.socket.unshift(this.head);
    }
    return this.socket;
  }

  /**
   * Normal response path: write a complete response and close the connection.
   * Rejects when the connection was hijacked or already answered.
   */
  respond(statusCode: number, body?: string): Promise<void> {
    if (this.current !== 'pending') {
      return Promise.reject(new HijackError(`Unable to respond: connection ${this.current}`));
    }
    this.current = 'responded';
    const payload = serializeResponse(statusCode, this.headers, body);
    return new Promise((resolve) => {
      if (this.socket.destroyed) {
        resolve();
        return;
      }
      this.socket.end(payload, () => resolve());
    });
  }
}
