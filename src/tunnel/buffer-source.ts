/**
 * Buffer Sources
 *
 * Scratch buffers for the relay. A buffer is used by one relay direction
 * at a time and must not be touched by the caller after `put()`.
 *
 * @module tunnel/buffer-source
 */

/** Scratch buffer size used when none is configured (32 KiB) */
export const DEFAULT_BUFFER_SIZE = 32 * 1024;

export interface BufferSource {
  /** Hand out a scratch buffer */
  get(): Buffer;
  /** Take a buffer back once the relay is done with it */
  put(buf: Buffer): void;
}

/**
 * Allocates a fresh buffer on every `get()`; `put()` does nothing.
 */
export class DefaultBufferSource implements BufferSource {
  constructor(private readonly size: number = DEFAULT_BUFFER_SIZE) {}

  get(): Buffer {
    return Buffer.alloc(this.size);
  }

  put(_buf: Buffer): void {
    // unpooled
  }
}

export interface PoolStats {
  /** Buffers currently waiting for reuse */
  pooled: number;
  /** Buffers allocated since creation */
  allocated: number;
  /** `get()` calls answered from the pool */
  reused: number;
}

/**
 * Keeps released buffers for reuse, up to `maxPooled` of them.
 * All sessions run on the same event loop, so get/put need no locking.
 */
export class PooledBufferSource implements BufferSource {
  private readonly free: Buffer[] = [];
  private allocated = 0;
  private reused = 0;

  constructor(
    private readonly size: number = DEFAULT_BUFFER_SIZE,
    private readonly maxPooled: number = 64
  ) {
    if (!Number.isInteger(size) || size <= 0) {
      throw new RangeError(`Buffer size must be a positive integer, got ${size}`);
    }
    if (!Number.isInteger(maxPooled) || maxPooled < 0) {
      throw new RangeError(`Pool size must be a non-negative integer, got ${maxPooled}`);
    }
  }

  get(): Buffer {
    const buf = this.free.pop();
    if (buf) {
      this.reused++;
      return buf;
    }
    this.allocated++;
    // allocUnsafe: contents are always overwritten before they are read
    return Buffer.allocUnsafe(this.size);
  }

  put(buf: Buffer): void {
    if (buf.length !== this.size) return;
    if (this.free.length >= this.maxPooled) return;
    if (this.free.includes(buf)) return;
    this.free.push(buf);
  }

  stats(): PoolStats {
    return {
      pooled: this.free.length,
      allocated: this.allocated,
      reused: this.reused,
    };
  }
}

/**
 * Pick the buffer source for a configuration: pooled when a pool size is set.
 */
export function createBufferSource(size: number, poolSize: number): BufferSource {
  return poolSize > 0 ? new PooledBufferSource(size, poolSize) : new DefaultBufferSource(size);
}
