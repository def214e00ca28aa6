import net from "node:net";
import { Duplex } from "node:stream";
import { pino, type Logger } from "pino";
import { frame } from "../src/protocols/wire/codec.js";
import type { SocketFactory, SocketLike } from "../src/client/connection.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** A frame as the game saw it: a request or an acknowledgment. */
export type WireMessage =
  | { kind: "request"; id: number; method: string; params: unknown }
  | { kind: "ack"; id: number; status: string };

export function jsonFrame(message: unknown): Buffer {
  return frame(Buffer.from(JSON.stringify(message), "utf8"));
}

/** Splits a byte stream into length-prefixed JSON messages. */
export class FrameReader {
  private buffer = Buffer.alloc(0);

  push(chunk: Buffer): WireMessage[] {
    this.buffer = Buffer.concat([this.buffer, chunk]);
    const out: WireMessage[] = [];
    while (this.buffer.length >= 4) {
      const length = this.buffer.readUInt32LE(0);
      if (this.buffer.length < 4 + length) break;
      const parsed: unknown = JSON.parse(this.buffer.toString("utf8", 4, 4 + length));
      this.buffer = this.buffer.subarray(4 + length);
      if (!isRecord(parsed) || typeof parsed.id !== "number") continue;
      if (typeof parsed.method === "string") {
        out.push({ kind: "request", id: parsed.id, method: parsed.method, params: parsed.params });
      } else if (typeof parsed.status === "string") {
        out.push({ kind: "ack", id: parsed.id, status: parsed.status });
      }
    }
    return out;
  }
}

/**
 * What a scripted game does with one request: frames to send back (objects are
 * JSON-encoded, Buffers go out as they are), now or once a promise settles, or
 * "drop" to close the socket.
 */
export type GameHandler = (request: {
  id: number;
  method: string;
  params: unknown;
}) => Array<unknown> | Promise<Array<unknown>> | "drop";

/** Answer `result` after `ms`. */
export function replyLater(ms: number, result: unknown): GameHandler {
  return (request) =>
    new Promise((resolve) => setTimeout(() => resolve([{ id: request.id, result, error: null }]), ms));
}

function toBytes(reply: unknown): Buffer {
  return Buffer.isBuffer(reply) ? reply : jsonFrame(reply);
}

export const echoHandler: GameHandler = (request) => [
  { id: request.id, result: { method: request.method, params: request.params }, error: null },
];

export interface FakeSocketOptions {
  handler?: GameHandler;
  /** Never complete writes of acknowledgment frames. */
  stallAcks?: boolean;
  /** Never complete any write. */
  stallWrites?: boolean;
}

/** In-memory socket: records what the client writes and answers through `handler`. */
export class FakeSocket extends Duplex implements SocketLike {
  readonly chunks: Buffer[] = [];
  readonly messages: WireMessage[] = [];
  noDelay = false;
  private readonly reader = new FrameReader();

  constructor(private readonly options: FakeSocketOptions = {}) {
    super();
  }

  get written(): Buffer {
    return Buffer.concat(this.chunks);
  }

  setNoDelay(noDelay = true): this {
    this.noDelay = noDelay;
    return this;
  }

  /** Deliver bytes to the client. */
  feed(data: Buffer): void {
    this.push(data);
  }

  feedJson(message: unknown): void {
    this.push(jsonFrame(message));
  }

  override _read(): void {}

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(Buffer.from(chunk));
    if (this.options.stallWrites) return;

    const messages = this.reader.push(chunk);
    this.messages.push(...messages);
    let drop = false;
    for (const message of messages) {
      if (message.kind !== "request" || !this.options.handler) continue;
      const replies = this.options.handler(message);
      if (replies === "drop") {
        drop = true;
      } else if (replies instanceof Promise) {
        void replies.then((late) => this.reply(late));
      } else {
        this.reply(replies);
      }
    }

    if (this.options.stallAcks && messages.some((m) => m.kind === "ack")) return;
    callback();
    if (drop) process.nextTick(() => this.destroy());
  }

  private reply(replies: Array<unknown>): void {
    if (this.destroyed) return;
    for (const reply of replies) this.push(toBytes(reply));
  }
}

/** Socket factory over FakeSockets; the first `refuse` attempts fail to connect. */
export class FakeGame {
  readonly sockets: FakeSocket[] = [];
  private refusals: number;

  constructor(
    private readonly options: FakeSocketOptions = { handler: echoHandler },
    refuse = 0
  ) {
    this.refusals = refuse;
  }

  readonly factory: SocketFactory = () => {
    const socket = new FakeSocket(this.options);
    this.sockets.push(socket);
    if (this.refusals > 0) {
      this.refusals -= 1;
      process.nextTick(() => socket.emit("error", new Error("connect ECONNREFUSED")));
    } else {
      process.nextTick(() => socket.emit("connect"));
    }
    return socket;
  };

  get current(): FakeSocket {
    const socket = this.sockets.at(-1);
    if (!socket) throw new Error("no socket opened yet");
    return socket;
  }

  /** Every message the game received, across reconnects. */
  get messages(): WireMessage[] {
    return this.sockets.flatMap((s) => s.messages);
  }

  get requests(): Array<{ id: number; method: string }> {
    return this.messages.flatMap((m) => (m.kind === "request" ? [{ id: m.id, method: m.method }] : []));
  }

  get acks(): number[] {
    return this.messages.flatMap((m) => (m.kind === "ack" ? [m.id] : []));
  }
}

export interface LogLine {
  level: number;
  msg: string;
}

export const LEVEL = { debug: 20, info: 30, warn: 40, error: 50 } as const;

/** pino logger that keeps every line in memory. */
export function captureLogger(): { logger: Logger; lines: LogLine[]; messages: (level: number) => string[] } {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write(line: string) {
        const parsed: unknown = JSON.parse(line);
        if (isRecord(parsed) && typeof parsed.level === "number" && typeof parsed.msg === "string") {
          lines.push({ level: parsed.level, msg: parsed.msg });
        }
      },
    }
  );
  return {
    logger,
    lines,
    messages: (level) => lines.filter((l) => l.level === level).map((l) => l.msg),
  };
}

export const silentLogger: Logger = pino({ level: "silent" });

export interface FakeGameServer {
  port: number;
  received: WireMessage[];
  close(): Promise<void>;
}

/** A game on a real loopback socket, for tests that go through net. */
export function startFakeGameServer(handler: GameHandler = echoHandler): Promise<FakeGameServer> {
  const received: WireMessage[] = [];
  const sockets = new Set<net.Socket>();
  const server = net.createServer((socket) => {
    sockets.add(socket);
    socket.on("close", () => sockets.delete(socket));
    const reader = new FrameReader();
    socket.on("data", (chunk: Buffer) => {
      for (const message of reader.push(chunk)) {
        received.push(message);
        if (message.kind !== "request") continue;
        const replies = handler(message);
        if (replies === "drop") {
          socket.destroy();
          return;
        }
        const send = (ready: Array<unknown>) => {
          if (!socket.destroyed) for (const reply of ready) socket.write(toBytes(reply));
        };
        if (replies instanceof Promise) void replies.then(send);
        else send(replies);
      }
    });
  });

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error("server has no TCP address"));
        return;
      }
      resolve({
        port: address.port,
        received,
        close: () =>
          new Promise<void>((done) => {
            for (const socket of sockets) socket.destroy();
            server.close(() => done());
          }),
      });
    });
  });
}
