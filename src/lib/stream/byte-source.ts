import type { Readable } from "node:stream";
import { SourceReadError } from "../utils/errors.ts";

/**
 * Pull-based source of raw bytes
 *
 * `read(size)` resolves with exactly `size` bytes, or with fewer only when
 * the source has ended. An empty buffer means the source ended before the
 * read started.
 */
export interface ByteSource {
  read(size: number): Promise<Buffer>;
}

function checkReadSize(size: number): void {
  if (!Number.isInteger(size) || size < 0) {
    throw new RangeError(`Read size must be a non-negative integer, got ${size}`);
  }
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
  }
  if (typeof chunk === "string") return Buffer.from(chunk);
  throw new SourceReadError(
    "Unsupported chunk from source",
    new TypeError(`Expected bytes, got ${typeof chunk}`),
  );
}

/**
 * Byte source over any Node readable stream (file, socket, pipe, stdin)
 *
 * Chunks are buffered until a read can be satisfied, so frames may straddle
 * chunk boundaries freely.
 */
export class StreamByteSource implements ByteSource {
  private readonly iterator: AsyncIterator<unknown>;
  private pending: Buffer = Buffer.alloc(0);
  private ended = false;

  constructor(stream: Readable) {
    this.iterator = stream[Symbol.asyncIterator]();
  }

  public async read(size: number): Promise<Buffer> {
    checkReadSize(size);

    while (this.pending.length < size && !this.ended) {
      let result: IteratorResult<unknown>;
      try {
        result = await this.iterator.next();
      } catch (error) {
        this.ended = true;
        const message = error instanceof Error ? error.message : String(error);
        throw new SourceReadError(`Failed to read from source: ${message}`, error);
      }

      if (result.done) {
        this.ended = true;
        break;
      }

      const chunk = toBuffer(result.value);
      this.pending =
        this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);
    }

    const count = Math.min(size, this.pending.length);
    const bytes = Buffer.from(this.pending.subarray(0, count));
    this.pending = this.pending.subarray(count);
    return bytes;
  }
}

/**
 * In-memory byte source
 */
export class BufferByteSource implements ByteSource {
  private readonly data: Buffer;
  private offset = 0;

  constructor(data: Uint8Array) {
    this.data = Buffer.from(data);
  }

  /** Bytes not yet read */
  get remaining(): number {
    return this.data.length - this.offset;
  }

  public async read(size: number): Promise<Buffer> {
    checkReadSize(size);
    const end = Math.min(this.offset + size, this.data.length);
    const bytes = Buffer.from(this.data.subarray(this.offset, end));
    this.offset = end;
    return bytes;
  }
}
