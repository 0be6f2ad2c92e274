import { Duplex } from "node:stream";
import { Logger } from "../../logger.js";

/** In-process duplex: bytes fed in are read by the code under test, writes are captured. */
export class FakeStream extends Duplex {
  readonly written: Buffer[] = [];

  constructor(private readonly failWrites = false) {
    super();
  }

  override _read(): void {}

  override _write(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    if (this.failWrites) {
      callback(new Error("write refused"));
      return;
    }
    this.written.push(Buffer.from(chunk));
    callback();
  }

  feed(data: string | Buffer): void {
    this.push(typeof data === "string" ? Buffer.from(data, "latin1") : data);
  }

  finish(): void {
    this.push(null);
  }

  output(): string {
    return Buffer.concat(this.written).toString("latin1");
  }
}

export const silentLogger = Logger.create({ logLevel: "silent" });

export const tick = () => new Promise<void>((resolve) => setImmediate(resolve));
