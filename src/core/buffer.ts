/**
 * Growable byte buffer with explicit ownership transfer.
 *
 * Every stage of the pipeline writes into a `ByteBuffer` and hands the
 * result on with {@link ByteBuffer.take}, which moves the bytes out and
 * leaves the buffer empty. No two owners ever share the same storage.
 *
 * @module core/buffer
 */
import { format } from 'node:util';

/** Anything `drain()` can read: Node readables, async generators, ... */
export type ByteSource = AsyncIterable<Uint8Array | string>;

export class ByteBuffer {
  private chunks: Buffer[] = [];
  private length = 0;
  private freed = false;

  /** Number of bytes currently held. */
  get size(): number {
    return this.length;
  }

  /** Append raw bytes or a UTF-8 string. */
  put(data: Uint8Array | string): this {
    this.assertLive();
    const chunk = typeof data === 'string' ? Buffer.from(data, 'utf8') : Buffer.from(data);
    if (chunk.length > 0) {
      this.chunks.push(chunk);
      this.length += chunk.length;
    }
    return this;
  }

  /** Append a `util.format`-style formatted string. */
  putf(fmt: string, ...args: unknown[]): this {
    return this.put(format(fmt, ...args));
  }

  /**
   * Read `source` to its end, appending everything.
   *
   * Rejects with the source's own error when reading fails; whatever was
   * read before the failure stays in the buffer until the owner frees it.
   */
  async drain(source: ByteSource): Promise<this> {
    this.assertLive();
    for await (const chunk of source) {
      this.put(chunk);
    }
    return this;
  }

  /**
   * Move the contents out. The buffer is empty (and still usable)
   * afterwards.
   */
  take(): Buffer {
    this.assertLive();
    const out = this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks, this.length);
    this.chunks = [];
    this.length = 0;
    return out;
  }

  /** Decode the current contents as UTF-8 without moving them. */
  toString(): string {
    return Buffer.concat(this.chunks, this.length).toString('utf8');
  }

  /** Drop the contents. Any further use throws. */
  free(): void {
    this.chunks = [];
    this.length = 0;
    this.freed = true;
  }

  private assertLive(): void {
    if (this.freed) {
      throw new Error('ByteBuffer used after free()');
    }
  }
}
