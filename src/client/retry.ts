import { setTimeout as sleep } from "node:timers/promises";
import type { Logger } from "pino";
import { ConnectionError, errorMessage } from "../shared/errors.js";
import { componentLogger } from "../shared/logging.js";
import type { JsonObject } from "../protocols/wire/json.js";
import type { RpcResponse } from "../protocols/wire/types.js";

/** What the retry loop needs from a client. */
export interface RetryTarget {
  call(method: string, params: JsonObject): Promise<RpcResponse>;
  disconnect(): void | Promise<void>;
  connect(): Promise<void>;
}

export interface RetryOptions {
  /** Pause before each reconnect. */
  delayMs: number;
  logger?: Logger;
}

/**
 * Run one logical call with up to `maxRetries` attempts, reconnecting after
 * each ConnectionError. Any other error is rethrown at once.
 */
export async function callWithRetry(
  target: RetryTarget,
  method: string,
  params: JsonObject,
  maxRetries: number,
  options: RetryOptions
): Promise<RpcResponse> {
  const log = options.logger ?? componentLogger("retry");
  let lastError: ConnectionError | undefined;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      return await target.call(method, params);
    } catch (err) {
      if (!(err instanceof ConnectionError)) throw err;
      lastError = err;
      log.warn(`Attempt ${attempt}/${maxRetries} for '${method}' failed: ${err.message}`);
      if (attempt === maxRetries) break;

      await sleep(options.delayMs);
      try {
        await target.disconnect();
      } catch (disconnectError) {
        log.debug(`Ignoring disconnect error: ${errorMessage(disconnectError)}`);
      }
      try {
        await target.connect();
      } catch (connectError) {
        log.debug(`Reconnect failed, retrying anyway: ${errorMessage(connectError)}`);
      }
    }
  }

  log.error(`Giving up on '${method}' after ${maxRetries} attempts`);
  throw lastError ?? new ConnectionError("Call failed with unknown error");
}
