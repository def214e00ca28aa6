import type { Duplex } from "node:stream";
import { ConnectionError, GameWireError } from "../shared/errors.js";
import {
  LENGTH_PREFIX_BYTES,
  isValidFrameLength,
  readFrameLength,
} from "../protocols/wire/codec.js";

/** Largest single write handed to the stream. */
export const WRITE_CHUNK_BYTES = 64 * 1024;

export interface FramedTransportOptions {
  /** Max wait for one complete frame; 0 disables the timeout. */
  readTimeoutMs?: number;
  chunkBytes?: number;
}

/**
 * Length-prefixed frames over a byte stream.
 *
 * Bytes that arrive while no read is pending stay buffered for the next
 * `read()`; the game can push a heartbeat between our requests.
 */
export class FramedTransport {
  private buffer: Buffer = Buffer.alloc(0);
  private waiter: (() => void) | null = null;
  private failure: ConnectionError | null = null;
  private readonly chunkBytes: number;
  readTimeoutMs: number;

  constructor(
    private readonly stream: Duplex,
    options: FramedTransportOptions = {}
  ) {
    this.readTimeoutMs = options.readTimeoutMs ?? 0;
    this.chunkBytes = options.chunkBytes ?? WRITE_CHUNK_BYTES;
    stream.on("data", this.onData);
    stream.on("error", this.onError);
    stream.on("end", this.onEnd);
    stream.on("close", this.onClose);
  }

  /** True once the stream has failed, ended or been closed. */
  get closed(): boolean {
    return this.failure !== null;
  }

  /** Bytes received but not yet consumed by `read()`. */
  get buffered(): number {
    return this.buffer.length;
  }

  async write(data: Buffer, timeoutMs?: number): Promise<void> {
    if (this.failure) throw this.failure;
    for (let offset = 0; offset < data.length; offset += this.chunkBytes) {
      await this.writeChunk(data.subarray(offset, offset + this.chunkBytes), timeoutMs);
    }
  }

  /** Resolve the next complete frame, length prefix included. */
  async read(): Promise<Buffer> {
    if (this.waiter) {
      throw new GameWireError("FramedTransport.read() is already pending");
    }
    const deadline = this.readTimeoutMs > 0 ? Date.now() + this.readTimeoutMs : undefined;
    for (;;) {
      const frame = this.takeFrame();
      if (frame) return frame;
      if (this.failure) throw this.failure;
      await this.waitForData(deadline);
    }
  }

  close(): void {
    this.fail(new ConnectionError("Transport closed"));
    this.stream.destroy();
  }

  private takeFrame(): Buffer | null {
    const length = readFrameLength(this.buffer);
    if (length === null) return null;
    if (!isValidFrameLength(length)) {
      const err = new ConnectionError(`Invalid message length: ${length}`);
      this.fail(err);
      throw err;
    }
    const total = LENGTH_PREFIX_BYTES + length;
    if (this.buffer.length < total) return null;
    const frame = Buffer.from(this.buffer.subarray(0, total));
    this.buffer = this.buffer.subarray(total);
    return frame;
  }

  private waitForData(deadline: number | undefined): Promise<void> {
    return new Promise((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      if (deadline !== undefined) {
        const remaining = Math.max(0, deadline - Date.now());
        timer = setTimeout(() => {
          this.waiter = null;
          reject(new ConnectionError(`Socket read timeout after ${this.readTimeoutMs}ms`));
        }, remaining);
      }
      this.waiter = () => {
        if (timer) clearTimeout(timer);
        resolve();
      };
    });
  }

  private writeChunk(chunk: Buffer, timeoutMs: number | undefined): Promise<void> {
    return new Promise((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          reject(new ConnectionError(`Socket write timeout after ${timeoutMs}ms`));
        }, timeoutMs);
      }
      this.stream.write(chunk, (err?: Error | null) => {
        if (timer) clearTimeout(timer);
        if (err) reject(new ConnectionError(`Error writing to socket: ${err.message}`, { cause: err }));
        else resolve();
      });
    });
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }

  private fail(err: ConnectionError): void {
    if (!this.failure) this.failure = err;
    this.wake();
  }

  private readonly onData = (chunk: Buffer | string): void => {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
    this.buffer = this.buffer.length ? Buffer.concat([this.buffer, bytes]) : bytes;
    this.wake();
  };

  private readonly onError = (err: Error): void => {
    this.fail(new ConnectionError(`Error reading from socket: ${err.message}`, { cause: err }));
  };

  private readonly onEnd = (): void => {
    this.fail(new ConnectionError("Socket closed by peer"));
  };

  private readonly onClose = (): void => {
    this.fail(new ConnectionError("Socket closed"));
  };
}
