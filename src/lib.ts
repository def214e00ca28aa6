export { GameClient, type GameClientOptions, type CallOptions } from "./client/client.js";
export { createGameClient } from "./client/create.js";
export {
  ConnectionManager,
  createSocket,
  type ConnectionState,
  type SocketFactory,
  type SocketLike,
} from "./client/connection.js";
export { HeartbeatDaemon, type HeartbeatOptions } from "./client/heartbeat.js";
export { callWithRetry, type RetryTarget, type RetryOptions } from "./client/retry.js";
export {
  performHandshake,
  parseServerInfo,
  type HandshakeResult,
  type ServerInfo,
} from "./client/handshake.js";
export { FramedTransport } from "./transport/framed.js";
export {
  decodeResponse,
  encodeAcknowledgment,
  encodeRequest,
  frame,
  isServerHeartbeat,
  readFrameLength,
  MAX_MESSAGE_BYTES,
} from "./protocols/wire/codec.js";
export { normalizeErrorCode, RPC_ERROR } from "./protocols/wire/error-codes.js";
export type { JsonObject, JsonValue } from "./protocols/wire/json.js";
export type {
  Acknowledgment,
  RpcErrorInfo,
  RpcRequest,
  RpcResponse,
} from "./protocols/wire/types.js";
export {
  ConfigError,
  ConnectionError,
  GameWireError,
  LockTimeoutError,
  ProtocolError,
} from "./shared/errors.js";
export { loadClientConfig, resolveClientConfig, type ClientConfig } from "./config.js";
export { initLogger } from "./shared/logging.js";
export type { Endpoint } from "./shared/net.js";
