export const VERSION = "0.1.0";

/** Default game endpoint. */
export const DEFAULT_HOST = "localhost";
export const DEFAULT_PORT = 8765;

export const DEFAULT_CONNECT_TIMEOUT_MS = 5_000;
/** Steady-state read timeout; must outlast the heartbeat interval. */
export const DEFAULT_READ_TIMEOUT_MS = 90_000;
export const DEFAULT_RECONNECT_DELAY_MS = 1_000;
export const DEFAULT_ACK_TIMEOUT_MS = 5_000;
export const DEFAULT_HEARTBEAT_INTERVAL_MS = 60_000;
export const HEARTBEAT_STOP_TIMEOUT_MS = 2_000;
export const DEFAULT_MAX_RETRIES = 3;

/** Reserved method names. */
export const HANDSHAKE_METHOD = "handshake";
export const HEARTBEAT_METHOD = "heartbeat";
/** `result.type` of a heartbeat the game pushes on its own. */
export const SERVER_HEARTBEAT_TYPE = "server_heartbeat";
