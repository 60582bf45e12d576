/**
 * CONNECT Response Writer
 *
 * Serializes the CONNECT response straight onto a hijacked connection.
 * The HTTP server's own response path is gone at that point, so status
 * line and headers are built here.
 *
 * @module tunnel/response-writer
 */

import { STATUS_CODES } from 'node:http';
import type { Writable } from 'node:stream';
import { clean } from '../redact/index.js';
import type { ResponseHeaders, TunnelRequest } from './types.js';

/** Headers the writer computes itself */
const FRAMING_HEADERS = new Set(['content-length', 'transfer-encoding']);

/**
 * Turn a lower-case header name into its usual wire form (keep-alive -> Keep-Alive).
 */
export function canonicalHeaderName(name: string): string {
  return name
    .toLowerCase()
    .split('-')
    .map((part) => (part ? part[0].toUpperCase() + part.slice(1) : part))
    .join('-');
}

/**
 * Advertise the idle timeout through a Keep-Alive header.
 * Does nothing when the timeout is disabled.
 *
 * @param headers - Response headers (modified in place)
 * @param idleTimeout - Idle timeout in milliseconds
 */
export function addIdleKeepAlive(headers: ResponseHeaders, idleTimeout: number): void {
  if (idleTimeout > 0) {
    const seconds = Math.max(1, Math.floor(idleTimeout / 1000));
    headers['keep-alive'] = `timeout=${seconds}`;
  }
}

/**
 * Build the raw bytes of an HTTP/1.1 response.
 *
 * A 2xx response without body carries no framing headers (RFC 9110 forbids
 * them on a successful CONNECT response). Any other response is framed by
 * Content-Length. Line breaks inside header values are replaced by spaces.
 */
export function serializeResponse(
  statusCode: number,
  headers: ResponseHeaders,
  body?: Buffer | string
): Buffer {
  const reason = STATUS_CODES[statusCode] ?? `status code ${statusCode}`;
  const payload = body === undefined ? undefined : Buffer.isBuffer(body) ? body : Buffer.from(body, 'utf-8');

  const lines = [`HTTP/1.1 ${statusCode} ${reason}`];
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    const key = name.toLowerCase();
    if (FRAMING_HEADERS.has(key)) continue;
    const values = Array.isArray(value) ? value : [value];
    for (const v of values) {
      lines.push(`${canonicalHeaderName(key)}: ${v.replace(/[\r\n]+/g, ' ')}`);
    }
  }

  const successful = statusCode >= 200 && statusCode < 300;
  if (payload !== undefined || !successful) {
    lines.push(`Content-Length: ${payload?.length ?? 0}`);
  }

  const head = Buffer.from(`${lines.join('\r\n')}\r\n\r\n`, 'latin1');
  return payload ? Buffer.concat([head, payload]) : head;
}

function writeAll(writer: Writable, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    writer.write(data, (err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}

/**
 * Write a response onto a hijacked connection.
 *
 * The request body, if any, is destroyed afterwards whether or not the
 * write succeeded.
 *
 * @param writer - Hijacked connection
 * @param request - Request being answered
 * @param statusCode - HTTP status code
 * @param headers - Response headers
 * @param body - Optional response body
 */
export async function respondHijacked(
  writer: Writable,
  request: Pick<TunnelRequest, 'body'>,
  statusCode: number,
  headers: ResponseHeaders,
  body?: Buffer | string
): Promise<void> {
  try {
    await writeAll(writer, serializeResponse(statusCode, headers, body));
  } finally {
    if (request.body && !request.body.destroyed) {
      request.body.destroy();
    }
  }
}

/**
 * Client-facing text for an upstream failure: hidden diagnostic sections
 * are removed, and an empty result falls back to the reason phrase.
 */
export function badGatewayMessage(err: unknown): string {
  const message = clean(err instanceof Error ? err.message : String(err));
  return message || (STATUS_CODES[502] ?? 'Bad Gateway');
}

/**
 * Answer 502 with the redacted error text as body.
 */
export function respondBadGatewayHijacked(
  writer: Writable,
  request: Pick<TunnelRequest, 'body'>,
  headers: ResponseHeaders,
  err: unknown
): Promise<void> {
  return respondHijacked(writer, request, 502, headers, badGatewayMessage(err));
}
