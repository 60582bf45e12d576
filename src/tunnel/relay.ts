/**
 * Bidirectional Relay
 *
 * Copies bytes between two duplex streams in both directions at once,
 * each direction through its own scratch buffer.
 *
 * @module tunnel/relay
 */

import type { Duplex } from 'node:stream';

export interface RelayOutcome {
  /** Why the direction stopped; null when its source simply ended */
  error: Error | null;
  /** Bytes written to the destination */
  bytes: number;
}

export interface RelayResult {
  /** b -> a */
  toA: RelayOutcome;
  /** a -> b */
  toB: RelayOutcome;
}

/**
 * Relay contract: run both directions concurrently and resolve once both are done.
 * Implementations report failures through the result and never reject.
 */
export type RelayFunction = (a: Duplex, b: Duplex, bufA: Buffer, bufB: Buffer) => Promise<RelayResult>;

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
  return Buffer.from(String(chunk));
}

function writeChunk(dst: Duplex, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    dst.write(data, (err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}

function endStream(dst: Duplex): Promise<void> {
  return new Promise((resolve) => {
    if (dst.destroyed || dst.writableEnded) {
      resolve();
      return;
    }
    dst.end(() => resolve());
  });
}

interface RelayState {
  finished: boolean;
}

/**
 * Pump src into dst through buf. The next chunk is read only after the
 * previous write completed, so buf is never shared between two writes.
 */
async function pump(src: Duplex, dst: Duplex, buf: Buffer, peer: RelayState, self: RelayState): Promise<RelayOutcome> {
  let bytes = 0;
  try {
    // destroyOnReturn: false keeps the write side of src usable after its read side ends
    for await (const chunk of src.iterator({ destroyOnReturn: false })) {
      const data = toBuffer(chunk);
      let offset = 0;
      while (offset < data.length) {
        const n = data.copy(buf, 0, offset);
        await writeChunk(dst, buf.subarray(0, n));
        offset += n;
        bytes += n;
      }
    }
    await endStream(dst);
    return { error: null, bytes };
  } catch (err) {
    // The peer direction already finished: whatever broke here is teardown
    const error = peer.finished ? null : toError(err);
    if (error) {
      src.destroy();
      dst.destroy();
    }
    return { error, bytes };
  } finally {
    self.finished = true;
  }
}

/**
 * Copy b -> a through bufA and a -> b through bufB until both directions finish.
 *
 * A direction whose source ends half-closes its destination. A direction
 * that fails destroys both streams so the other direction stops too; errors
 * a direction hits after the other one finished are not reported.
 */
export async function bidiCopy(a: Duplex, b: Duplex, bufA: Buffer, bufB: Buffer): Promise<RelayResult> {
  // Errors are reported through write callbacks and the iterators;
  // listeners keep an 'error' event from going unhandled meanwhile
  const ignore = (): void => {};
  a.on('error', ignore);
  b.on('error', ignore);

  const stateToA: RelayState = { finished: false };
  const stateToB: RelayState = { finished: false };

  try {
    const [toA, toB] = await Promise.all([
      pump(b, a, bufA, stateToB, stateToA),
      pump(a, b, bufB, stateToA, stateToB),
    ]);
    return { toA, toB };
  } finally {
    a.off('error', ignore);
    b.off('error', ignore);
  }
}
