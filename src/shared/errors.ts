import { getLogger } from "./logging.js";

/** CLI exit codes. */
export const EXIT = {
  SUCCESS: 0,
  GENERIC_ERROR: 1,
  INVALID_ARGS: 2,
  CONNECTION_FAILURE: 3,
  PROTOCOL_FAILURE: 4,
} as const;

export function exit(code: number, message?: string): never {
  if (message) {
    if (code === EXIT.SUCCESS) getLogger().info(message);
    else getLogger().error(message);
  }
  process.exit(code);
}

/** Base class for every error raised by the wire client. */
export class GameWireError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GameWireError";
  }
}

/**
 * Socket-level failure: connect timeout, I/O error, peer closed, bad length prefix.
 * The connection is dropped whenever one of these escapes an exchange.
 */
export class ConnectionError extends GameWireError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConnectionError";
  }
}

/** Transport delivered a frame, but its payload is not a valid response. */
export class ProtocolError extends GameWireError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProtocolError";
  }
}

/** Waiting for the exchange lock took longer than the caller allowed. */
export class LockTimeoutError extends GameWireError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for the connection`);
    this.name = "LockTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class ConfigError extends GameWireError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
