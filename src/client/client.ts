/**
 * Client for a game that exposes length-prefixed JSON-RPC over a socket.
 *
 * @example
 * ```typescript
 * import { GameClient } from "gamewire";
 *
 * const client = new GameClient({ endpoint: { host: "localhost", port: 8765 } });
 * await client.connect();
 *
 * const response = await client.callWithRetry("get_player", {});
 * if (response.error) console.error(response.error.message);
 * else console.log(response.result);
 *
 * await client.disconnect();
 * ```
 */
import type { Logger } from "pino";
import {
  ConnectionError,
  ProtocolError,
  errorMessage,
} from "../shared/errors.js";
import { componentLogger, maskSensitiveObject } from "../shared/logging.js";
import type { Endpoint } from "../shared/net.js";
import {
  DEFAULT_ACK_TIMEOUT_MS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_RECONNECT_DELAY_MS,
  HEARTBEAT_METHOD,
} from "../shared/constants.js";
import {
  decodeResponse,
  encodeAcknowledgment,
  encodeRequest,
  isServerHeartbeat,
} from "../protocols/wire/codec.js";
import type { JsonObject } from "../protocols/wire/json.js";
import type { RpcResponse } from "../protocols/wire/types.js";
import type { FramedTransport } from "../transport/framed.js";
import { ConnectionManager, type SocketFactory } from "./connection.js";
import { HeartbeatDaemon } from "./heartbeat.js";
import { RequestIdSequence } from "./ids.js";
import { ExchangeLock } from "./lock.js";
import { callWithRetry } from "./retry.js";

export const DEFAULT_HEARTBEAT_LOCK_TIMEOUT_MS = 5_000;

export interface GameClientOptions {
  endpoint: Endpoint;
  connectTimeoutMs?: number;
  readTimeoutMs?: number;
  reconnectDelayMs?: number;
  ackTimeoutMs?: number;
  heartbeatIntervalMs?: number;
  /** Max wait for the connection before a heartbeat gives up. */
  heartbeatLockTimeoutMs?: number;
  /** Throw ProtocolError on a response id mismatch instead of logging it. */
  strictResponseIds?: boolean;
  socketFactory?: SocketFactory;
  logger?: Logger;
}

export interface CallOptions {
  /** Fail with LockTimeoutError instead of queueing longer than this. */
  lockTimeoutMs?: number;
}

export class GameClient {
  private readonly connection: ConnectionManager;
  private readonly heartbeat: HeartbeatDaemon;
  private readonly lock = new ExchangeLock();
  private readonly ids = new RequestIdSequence();
  private readonly reconnectDelayMs: number;
  private readonly ackTimeoutMs: number;
  private readonly heartbeatLockTimeoutMs: number;
  private readonly strictResponseIds: boolean;
  private readonly log: Logger;
  /** Bumped by `disconnect()`; a connect begun before it leaves the heartbeat alone. */
  private session = 0;

  constructor(options: GameClientOptions) {
    this.log = options.logger ?? componentLogger("client");
    this.reconnectDelayMs = options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS;
    this.ackTimeoutMs = options.ackTimeoutMs ?? DEFAULT_ACK_TIMEOUT_MS;
    this.heartbeatLockTimeoutMs = options.heartbeatLockTimeoutMs ?? DEFAULT_HEARTBEAT_LOCK_TIMEOUT_MS;
    this.strictResponseIds = options.strictResponseIds ?? false;
    this.connection = new ConnectionManager({
      endpoint: options.endpoint,
      connectTimeoutMs: options.connectTimeoutMs,
      readTimeoutMs: options.readTimeoutMs,
      socketFactory: options.socketFactory,
      logger: this.log.child({ component: "connection" }),
    });
    this.heartbeat = new HeartbeatDaemon({
      intervalMs: options.heartbeatIntervalMs,
      isConnected: () => this.isConnected(),
      beat: () => this.sendHeartbeat(),
      logger: this.log.child({ component: "heartbeat" }),
    });
  }

  get endpoint(): Endpoint {
    return this.connection.endpoint;
  }

  /** Id of the most recent request, 0 before the first call. */
  get lastRequestId(): number {
    return this.ids.current;
  }

  isConnected(): boolean {
    return this.connection.isConnected();
  }

  /** Connect if needed and make sure the heartbeat is running. */
  async connect(): Promise<void> {
    const session = this.session;
    await this.connection.connect();
    if (session === this.session) this.heartbeat.start();
  }

  /** Stop the heartbeat, then close the socket once any exchange in flight is done. */
  async disconnect(): Promise<void> {
    this.session += 1;
    await this.heartbeat.stop();
    await this.lock.runExclusive(async () => this.connection.disconnect());
  }

  /**
   * One request/response/ack exchange. Calls queue on the exchange lock, so at
   * most one is on the wire at a time.
   */
  async call(method: string, params: JsonObject = {}, options: CallOptions = {}): Promise<RpcResponse> {
    await this.connect();
    return this.lock.runExclusive(() => this.exchange(method, params), options.lockTimeoutMs);
  }

  callWithRetry(
    method: string,
    params: JsonObject = {},
    maxRetries: number = DEFAULT_MAX_RETRIES,
    options: CallOptions = {}
  ): Promise<RpcResponse> {
    return callWithRetry(
      {
        call: (m, p) => this.call(m, p, options),
        disconnect: () => this.dropDeadConnection(),
        connect: () => this.connect(),
      },
      method,
      params,
      maxRetries,
      { delayMs: this.reconnectDelayMs, logger: this.log.child({ component: "retry" }) }
    );
  }

  /**
   * Retry cleanup. Runs under the exchange lock and only clears a failed
   * transport; another caller may have reconnected since the failed attempt.
   */
  private dropDeadConnection(): Promise<void> {
    return this.lock.runExclusive(async () => this.connection.discardClosed());
  }

  /** Must only run while holding the exchange lock. */
  private async exchange(method: string, params: JsonObject): Promise<RpcResponse> {
    let transport: FramedTransport | null = null;
    try {
      await this.connection.ensureConnected();
      transport = this.connection.transport();
      const id = this.ids.next();
      this.log.debug(`Sending request ${id}: ${method} ${maskSensitiveObject(params)}`);

      await transport.write(encodeRequest(id, method, params));
      const response = await this.receive(transport, id);
      if (response.error) {
        this.log.debug(`Request ${id} returned error ${response.error.code}: ${response.error.message}`);
      }
      await this.acknowledge(transport, response.id);
      return response;
    } catch (err) {
      if (transport) this.connection.discard(transport);
      if (err instanceof ConnectionError || err instanceof ProtocolError) {
        this.log.error(`${err.name} during '${method}': ${err.message}`);
        throw err;
      }
      this.log.error(`Unexpected error during '${method}': ${errorMessage(err)}`);
      throw new ConnectionError(`Unexpected error during call: ${errorMessage(err)}`, { cause: err });
    }
  }

  /** Read the response to `requestId`, skipping one interleaved server heartbeat. */
  private async receive(transport: FramedTransport, requestId: number): Promise<RpcResponse> {
    const response = decodeResponse(await transport.read());
    if (response.id === requestId) return response;

    if (isServerHeartbeat(response)) {
      this.log.debug(`Discarding server heartbeat ${response.id} while waiting for ${requestId}`);
      const next = decodeResponse(await transport.read());
      if (next.id !== requestId) {
        this.onIdMismatch(`Response ID mismatch after server heartbeat: expected ${requestId}, got ${next.id}`);
      }
      return next;
    }

    this.onIdMismatch(`Response ID mismatch: expected ${requestId}, got ${response.id}`);
    return response;
  }

  private onIdMismatch(message: string): void {
    if (this.strictResponseIds) throw new ProtocolError(message);
    this.log.warn(message);
  }

  private async acknowledge(transport: FramedTransport, id: number): Promise<void> {
    try {
      await transport.write(encodeAcknowledgment(id), this.ackTimeoutMs);
    } catch (err) {
      this.log.warn(`Failed to send acknowledgment for ${id}: ${errorMessage(err)}`);
    }
  }

  /** The daemon's beat: straight to the lock, never through `connect()`. */
  private async sendHeartbeat(): Promise<void> {
    const response = await callWithRetry(
      {
        call: (m, p) => this.lock.runExclusive(() => this.exchange(m, p), this.heartbeatLockTimeoutMs),
        disconnect: () => this.dropDeadConnection(),
        connect: () => this.connection.connect(),
      },
      HEARTBEAT_METHOD,
      {},
      1,
      { delayMs: this.reconnectDelayMs, logger: this.log.child({ component: "retry" }) }
    );
    if (response.error) {
      this.log.debug(`Heartbeat answered with error: ${response.error.message}`);
    } else {
      this.log.debug("Heartbeat ok");
    }
  }
}
