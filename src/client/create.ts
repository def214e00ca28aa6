import type { Logger } from "pino";
import type { ClientConfig } from "../config.js";
import { GameClient } from "./client.js";
import type { SocketFactory } from "./connection.js";

/** Build a client from resolved configuration. Nothing connects until first use. */
export function createGameClient(
  config: ClientConfig,
  overrides: { socketFactory?: SocketFactory; logger?: Logger } = {}
): GameClient {
  return new GameClient({
    endpoint: config.endpoint,
    connectTimeoutMs: config.connectTimeoutMs,
    readTimeoutMs: config.readTimeoutMs,
    reconnectDelayMs: config.reconnectDelayMs,
    ackTimeoutMs: config.ackTimeoutMs,
    heartbeatIntervalMs: config.heartbeatIntervalMs,
    strictResponseIds: config.strictResponseIds,
    ...overrides,
  });
}
