import net from "node:net";
import type { Duplex } from "node:stream";
import type { Logger } from "pino";
import { ConnectionError, errorMessage } from "../shared/errors.js";
import { componentLogger } from "../shared/logging.js";
import { formatEndpoint, isPipeEndpoint, type Endpoint } from "../shared/net.js";
import {
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_READ_TIMEOUT_MS,
} from "../shared/constants.js";
import { FramedTransport } from "../transport/framed.js";

export type ConnectionState = "disconnected" | "connected";

/** The parts of net.Socket the connection manager relies on. */
export interface SocketLike extends Duplex {
  setNoDelay(noDelay?: boolean): unknown;
}

export type SocketFactory = (endpoint: Endpoint) => SocketLike;

export const createSocket: SocketFactory = (endpoint) =>
  isPipeEndpoint(endpoint)
    ? net.createConnection({ path: endpoint.path })
    : net.createConnection({ host: endpoint.host, port: endpoint.port });

export interface ConnectionOptions {
  endpoint: Endpoint;
  connectTimeoutMs?: number;
  /** Steady-state read timeout applied once connected. */
  readTimeoutMs?: number;
  socketFactory?: SocketFactory;
  logger?: Logger;
}

/** Owns the socket to the game and its connected/disconnected lifecycle. */
export class ConnectionManager {
  readonly endpoint: Endpoint;
  private readonly connectTimeoutMs: number;
  private readonly readTimeoutMs: number;
  private readonly socketFactory: SocketFactory;
  private readonly log: Logger;
  private framed: FramedTransport | null = null;
  private connecting: Promise<void> | null = null;
  /** Bumped by every `disconnect()`; an open that started earlier is abandoned. */
  private epoch = 0;

  constructor(options: ConnectionOptions) {
    this.endpoint = options.endpoint;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.readTimeoutMs = options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;
    this.socketFactory = options.socketFactory ?? createSocket;
    this.log = options.logger ?? componentLogger("connection");
  }

  get state(): ConnectionState {
    return this.framed !== null && !this.framed.closed ? "connected" : "disconnected";
  }

  isConnected(): boolean {
    return this.state === "connected";
  }

  /** Open the socket unless already connected; concurrent callers share one attempt. */
  connect(): Promise<void> {
    if (this.isConnected()) return Promise.resolve();
    if (!this.connecting) {
      const attempt: Promise<void> = this.open().finally(() => {
        if (this.connecting === attempt) this.connecting = null;
      });
      this.connecting = attempt;
    }
    return this.connecting;
  }

  ensureConnected(): Promise<void> {
    return this.connect();
  }

  /** Close the socket if one is open, and abandon a connect in progress. Never throws. */
  disconnect(): void {
    this.epoch += 1;
    this.connecting = null;
    this.close(this.framed);
  }

  /** Close `transport` if it is still the current one; a newer connection is left open. */
  discard(transport: FramedTransport): void {
    if (this.framed === transport) this.close(transport);
  }

  /** Forget a transport whose stream has already failed. */
  discardClosed(): void {
    if (this.framed?.closed) this.close(this.framed);
  }

  private close(framed: FramedTransport | null): void {
    this.framed = null;
    if (!framed) return;
    try {
      framed.close();
    } catch (err) {
      this.log.warn(`Error closing socket: ${errorMessage(err)}`);
    }
    this.log.info("Disconnected from game");
  }

  /** The live framed transport, or a ConnectionError if there is none. */
  transport(): FramedTransport {
    if (!this.framed || this.framed.closed) {
      throw new ConnectionError("Not connected to game");
    }
    return this.framed;
  }

  private async open(): Promise<void> {
    this.disconnect();
    const epoch = this.epoch;
    const target = formatEndpoint(this.endpoint);
    this.log.debug(`Connecting to ${target}`);

    let socket: SocketLike;
    try {
      socket = this.socketFactory(this.endpoint);
    } catch (err) {
      throw new ConnectionError(`Failed to connect to ${target}: ${errorMessage(err)}`, { cause: err });
    }

    try {
      await waitForConnect(socket, this.connectTimeoutMs, target);
    } catch (err) {
      socket.destroy();
      this.log.error(errorMessage(err));
      throw err;
    }

    if (epoch !== this.epoch) {
      socket.destroy();
      throw new ConnectionError(`Connection to ${target} abandoned by disconnect`);
    }

    socket.setNoDelay(true);
    this.framed = new FramedTransport(socket, { readTimeoutMs: this.readTimeoutMs });
    this.log.info(`Connected to game at ${target}`);
  }
}

function waitForConnect(socket: SocketLike, timeoutMs: number, target: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const cleanup = () => {
      clearTimeout(timer);
      socket.off("connect", onConnect);
      socket.off("error", onError);
    };
    const onConnect = () => {
      cleanup();
      resolve();
    };
    const onError = (err: Error) => {
      cleanup();
      reject(new ConnectionError(`Failed to connect to ${target}: ${err.message}`, { cause: err }));
    };
    const timer = setTimeout(() => {
      cleanup();
      reject(new ConnectionError(`Connection timeout to ${target}`));
    }, timeoutMs);
    socket.once("connect", onConnect);
    socket.once("error", onError);
  });
}
