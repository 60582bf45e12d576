/**
 * Tunnel Errors
 *
 * Error classes raised along the CONNECT lifecycle, and the checks that
 * separate ordinary connection teardown from real relay failures.
 *
 * @module tunnel/errors
 */

import { reveal } from '../redact/index.js';

export type RelayDirection = 'upstream' | 'downstream';

/**
 * Base class for every error the tunnel core raises
 */
export class TunnelError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TunnelError';
  }
}

/**
 * The raw connection could not be taken over from the response sink:
 * it was already hijacked, or the normal response path already ran.
 */
export class HijackError extends TunnelError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HijackError';
  }
}

/**
 * Writing the CONNECT response onto the hijacked connection failed.
 */
export class ResponseWriteError extends TunnelError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ResponseWriteError';
  }
}

/**
 * Connecting to the upstream address failed.
 * The message may carry a hidden diagnostic section.
 */
export class DialError extends TunnelError {
  constructor(
    public readonly address: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DialError';
  }
}

/**
 * The dial was cut short by the request's signal (deadline or cancellation).
 */
export class DialTimeoutError extends DialError {
  constructor(address: string, message: string, options?: { cause?: unknown }) {
    super(address, message, options);
    this.name = 'DialTimeoutError';
  }
}

/**
 * One relay direction failed with an error that is not part of normal teardown.
 */
export class RelayError extends TunnelError {
  constructor(
    public readonly direction: RelayDirection,
    cause: unknown
  ) {
    super(`Error piping data to ${direction}: ${describeError(cause)}`, { cause });
    this.name = 'RelayError';
  }
}

/**
 * A connection was closed because it carried no traffic for too long.
 */
export class IdleTimeoutError extends TunnelError {
  readonly code = 'ERR_IDLE_TIMEOUT';

  constructor(public readonly timeout: number) {
    super(`Connection idled for ${timeout}ms`);
    this.name = 'IdleTimeoutError';
  }
}

// =============================================================================
// Classification
// =============================================================================

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    const { code } = err;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Whether a relay outcome only says the stream ended.
 */
export function isEndOfStream(err: unknown): boolean {
  if (err === null || err === undefined) return true;
  const code = errorCode(err);
  return code === 'EOF' || code === 'ERR_STREAM_PREMATURE_CLOSE';
}

/**
 * Whether a connection was torn down by the idle-timeout wrapper.
 */
export function isIdleTimeout(err: unknown): boolean {
  return err instanceof IdleTimeoutError || errorCode(err) === 'ERR_IDLE_TIMEOUT';
}

/**
 * Whether a write failed because the peer already went away.
 */
export function isBrokenPipe(err: unknown): boolean {
  if (err === null || err === undefined) return false;
  return errorCode(err) === 'EPIPE' || errorMessage(err).includes('broken pipe');
}

/**
 * One-line description of an error for logs.
 * AggregateError (e.g. every address of a host refusing) lists its inner errors.
 * Hidden sections are shown in brackets.
 */
export function describeError(err: unknown): string {
  let message: string;
  if (err instanceof AggregateError) {
    const inner = err.errors.map((e: unknown) => errorMessage(e)).join('; ');
    message = `${err.message}: [${inner}]`;
  } else {
    message = errorMessage(err);
  }
  return reveal(message);
}
