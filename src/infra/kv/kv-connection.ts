// src/infra/kv/kv-connection.ts
import type { Duplex } from "node:stream";
import { DEFAULT_MAX_FRAME_BYTES } from "../../config/env.js";
import { ConnectionError, DecodeError } from "./errors.js";
import type { Frame } from "./protocol/frame.js";
import { Wire } from "./protocol/wire.js";

export type KvConnectionOptions = Readonly<{
  maxFrameBytes?: number;
}>;

const INITIAL_CAPACITY = 4 * 1024;
const RETAINED_CAPACITY = 64 * 1024;

function toChunk(value: unknown): Buffer {
  if (Buffer.isBuffer(value)) return value;
  if (typeof value === "string") return Buffer.from(value, "utf8");
  if (value instanceof Uint8Array) return Buffer.from(value);
  throw ConnectionError.io(new TypeError("stream produced a non-byte chunk"));
}

/**
 * Frame-level view of one byte stream.
 *
 * The stream is pulled only when the buffered bytes do not yet hold a whole
 * frame, so pipelined requests are served from the buffer without a read.
 */
export class KvConnection {
  // unconsumed bytes live in storage[start, end)
  private storage: Buffer = Buffer.alloc(INITIAL_CAPACITY);
  private start = 0;
  private end = 0;
  private closed = false;
  private readonly chunks: AsyncIterator<unknown>;
  private readonly maxFrameBytes: number;

  constructor(
    private readonly stream: Duplex,
    opts: KvConnectionOptions = {},
  ) {
    this.chunks = stream[Symbol.asyncIterator]();
    this.maxFrameBytes = opts.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
  }

  /** Bytes received but not yet consumed as frames. */
  get buffered(): number {
    return this.end - this.start;
  }

  /**
   * Next frame from the peer, or null once the peer has closed cleanly.
   *
   * Rejects with DecodeError on malformed input and ConnectionError when the
   * peer closes mid-frame or the stream fails.
   */
  async readFrame(): Promise<Frame | null> {
    for (;;) {
      const outcome = Wire.decode(this.storage.subarray(this.start, this.end));

      if (outcome.status === "ready") {
        this.consume(outcome.consumed);
        return outcome.frame;
      }

      if (outcome.status === "malformed") {
        throw new DecodeError(outcome.reason);
      }

      if (this.buffered > this.maxFrameBytes) {
        throw ConnectionError.frameTooLarge(this.maxFrameBytes);
      }

      const chunk = await this.pull();
      if (chunk === null) {
        if (this.buffered === 0) return null;
        throw ConnectionError.reset();
      }

      this.append(chunk);
    }
  }

  /** Resolves once the whole encoded frame has been handed to the stream. */
  async writeFrame(frame: Frame): Promise<void> {
    const bytes = Wire.encode(frame);

    await new Promise<void>((resolve, reject) => {
      this.stream.write(bytes, (err) => {
        if (err) reject(ConnectionError.io(err));
        else resolve();
      });
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.stream.destroyed) return;
    this.stream.end(() => this.stream.destroy());
  }

  // Decoded frames own copies of their bytes, so storage may be reused.
  private consume(count: number): void {
    this.start += count;
    if (this.start < this.end) return;

    this.start = 0;
    this.end = 0;
    if (this.storage.length > RETAINED_CAPACITY) {
      this.storage = Buffer.alloc(INITIAL_CAPACITY);
    }
  }

  /**
   * Copy a chunk behind the unconsumed bytes. Capacity doubles when the
   * bytes would fill more than half of it, otherwise they are compacted to
   * the front, so each byte is copied an amortized constant number of times.
   */
  private append(chunk: Buffer): void {
    if (this.end + chunk.length > this.storage.length) {
      const used = this.end - this.start;
      const needed = used + chunk.length;

      if (needed * 2 <= this.storage.length) {
        this.storage.copyWithin(0, this.start, this.end);
      } else {
        let capacity = this.storage.length * 2;
        while (capacity < needed) capacity *= 2;
        const grown = Buffer.allocUnsafe(capacity);
        this.storage.copy(grown, 0, this.start, this.end);
        this.storage = grown;
      }

      this.start = 0;
      this.end = used;
    }

    chunk.copy(this.storage, this.end);
    this.end += chunk.length;
  }

  private async pull(): Promise<Buffer | null> {
    let next: IteratorResult<unknown>;
    try {
      next = await this.chunks.next();
    } catch (err) {
      throw ConnectionError.io(err);
    }
    return next.done ? null : toChunk(next.value);
  }
}
