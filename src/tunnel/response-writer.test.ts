import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import {
  addIdleKeepAlive,
  badGatewayMessage,
  canonicalHeaderName,
  respondBadGatewayHijacked,
  respondHijacked,
  serializeResponse,
} from './response-writer.js';
import type { ResponseHeaders } from './types.js';
import { hide } from '../redact/index.js';

function written(stream: PassThrough): string {
  const chunk: unknown = stream.read();
  return Buffer.isBuffer(chunk) ? chunk.toString('latin1') : '';
}

describe('canonicalHeaderName', () => {
  it('should capitalize each word', () => {
    expect(canonicalHeaderName('keep-alive')).toBe('Keep-Alive');
    expect(canonicalHeaderName('x-forwarded-for')).toBe('X-Forwarded-For');
    expect(canonicalHeaderName('ETAG')).toBe('Etag');
  });
});

describe('addIdleKeepAlive', () => {
  it('should advertise the timeout in whole seconds', () => {
    const headers: ResponseHeaders = {};
    addIdleKeepAlive(headers, 30000);
    expect(headers['keep-alive']).toBe('timeout=30');
  });

  it('should round down but never below one second', () => {
    const rounded: ResponseHeaders = {};
    addIdleKeepAlive(rounded, 1500);
    expect(rounded['keep-alive']).toBe('timeout=1');

    const short: ResponseHeaders = {};
    addIdleKeepAlive(short, 200);
    expect(short['keep-alive']).toBe('timeout=1');
  });

  it('should leave headers alone when the timeout is disabled', () => {
    const headers: ResponseHeaders = {};
    addIdleKeepAlive(headers, 0);
    expect(headers).toEqual({});
  });
});

describe('serializeResponse', () => {
  it('should write a bare 200 without framing headers', () => {
    expect(serializeResponse(200, {}).toString('latin1')).toBe('HTTP/1.1 200 OK\r\n\r\n');
  });

  it('should write headers in canonical form', () => {
    const out = serializeResponse(200, { 'keep-alive': 'timeout=5', 'proxy-agent': 'tunnel' });
    expect(out.toString('latin1')).toBe('HTTP/1.1 200 OK\r\nKeep-Alive: timeout=5\r\nProxy-Agent: tunnel\r\n\r\n');
  });

  it('should frame a body with Content-Length', () => {
    const out = serializeResponse(502, {}, 'upstream down');
    expect(out.toString('latin1')).toBe('HTTP/1.1 502 Bad Gateway\r\nContent-Length: 13\r\n\r\nupstream down');
  });

  it('should count body bytes, not characters', () => {
    const out = serializeResponse(400, {}, 'é');
    expect(out.subarray(0, out.length - 2).toString('latin1')).toBe('HTTP/1.1 400 Bad Request\r\nContent-Length: 2\r\n\r\n');
  });

  it('should add Content-Length: 0 to an error without body', () => {
    expect(serializeResponse(404, {}).toString('latin1')).toBe('HTTP/1.1 404 Not Found\r\nContent-Length: 0\r\n\r\n');
  });

  it('should replace caller-supplied framing headers', () => {
    const out = serializeResponse(502, { 'content-length': '99', 'transfer-encoding': 'chunked' }, 'x');
    expect(out.toString('latin1')).toBe('HTTP/1.1 502 Bad Gateway\r\nContent-Length: 1\r\n\r\nx');
  });

  it('should repeat multi-value headers and skip undefined ones', () => {
    const out = serializeResponse(200, { via: ['1.1 a', '1.1 b'], 'x-empty': undefined });
    expect(out.toString('latin1')).toBe('HTTP/1.1 200 OK\r\nVia: 1.1 a\r\nVia: 1.1 b\r\n\r\n');
  });

  it('should not let header values break the response head', () => {
    const out = serializeResponse(200, { 'x-note': 'a\r\nInjected: yes' });
    expect(out.toString('latin1')).toBe('HTTP/1.1 200 OK\r\nX-Note: a Injected: yes\r\n\r\n');
  });

  it('should describe unknown status codes', () => {
    expect(serializeResponse(299, {}).toString('latin1')).toBe('HTTP/1.1 299 status code 299\r\n\r\n');
  });
});

describe('respondHijacked', () => {
  it('should write the response and destroy the request body', async () => {
    const conn = new PassThrough();
    const body = new PassThrough();

    await respondHijacked(conn, { body }, 200, {});

    expect(written(conn)).toBe('HTTP/1.1 200 OK\r\n\r\n');
    expect(body.destroyed).toBe(true);
  });

  it('should destroy the request body when the write fails', async () => {
    const conn = new PassThrough();
    conn.on('error', () => {});
    conn.destroy();
    const body = new PassThrough();

    await expect(respondHijacked(conn, { body }, 200, {})).rejects.toThrow();
    expect(body.destroyed).toBe(true);
  });
});

describe('badGatewayMessage', () => {
  it('should remove hidden details', () => {
    const err = new Error(`Unable to reach db.internal:5432${hide(': connect ECONNREFUSED 10.1.2.3:5432')}`);
    expect(badGatewayMessage(err)).toBe('Unable to reach db.internal:5432');
  });

  it('should fall back to the reason phrase', () => {
    expect(badGatewayMessage(new Error(hide('all internal')))).toBe('Bad Gateway');
  });

  it('should accept non-errors', () => {
    expect(badGatewayMessage('dial refused')).toBe('dial refused');
  });
});

describe('respondBadGatewayHijacked', () => {
  it('should answer 502 with the cleaned message', async () => {
    const conn = new PassThrough();
    const err = new Error(`Unable to reach a.test:1${hide(': refused')}`);

    await respondBadGatewayHijacked(conn, {}, {}, err);

    expect(written(conn)).toBe('HTTP/1.1 502 Bad Gateway\r\nContent-Length: 24\r\n\r\nUnable to reach a.test:1');
  });
});
