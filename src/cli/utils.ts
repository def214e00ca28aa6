import { loadClientConfig, getDataDir, type ClientConfig } from "../config.js";
import { createGameClient } from "../client/create.js";
import type { GameClient } from "../client/client.js";
import {
  ConfigError,
  ConnectionError,
  EXIT,
  ProtocolError,
  errorMessage,
} from "../shared/errors.js";
import { parseEndpoint } from "../shared/net.js";
import { getLogger } from "../shared/logging.js";
import { isJsonObject, toJsonValue, type JsonObject } from "../protocols/wire/json.js";

/** Options every command receives from the root program. */
export interface GlobalOptions {
  dataDir?: string;
  endpoint?: string;
  logLevel?: string;
  logFormat?: string;
}

export async function resolveConfig(opts: GlobalOptions): Promise<ClientConfig> {
  const config = await loadClientConfig(getDataDir(opts.dataDir));
  if (opts.endpoint) config.endpoint = parseEndpoint(opts.endpoint);
  return config;
}

/** Run `fn` against a fresh client and always disconnect afterwards. `fn` connects on its first call. */
export async function withClient<T>(
  config: ClientConfig,
  fn: (client: GameClient) => Promise<T>
): Promise<T> {
  const client = createGameClient(config);
  try {
    return await fn(client);
  } finally {
    await client.disconnect();
  }
}

/** Parse a CLI params argument; it must be a JSON object. */
export function parseParams(raw: string | undefined): JsonObject {
  if (raw === undefined || raw.trim() === "") return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw) as unknown;
  } catch (err) {
    throw new ConfigError(`params must be valid JSON: ${errorMessage(err)}`);
  }
  const value = toJsonValue(parsed, "params");
  if (!isJsonObject(value)) {
    throw new ConfigError("params must be a JSON object");
  }
  return value;
}

export function exitCodeFor(err: unknown): number {
  if (err instanceof ConnectionError) return EXIT.CONNECTION_FAILURE;
  if (err instanceof ProtocolError) return EXIT.PROTOCOL_FAILURE;
  if (err instanceof ConfigError) return EXIT.INVALID_ARGS;
  return EXIT.GENERIC_ERROR;
}

export function printJson(value: unknown): void {
  process.stdout.write(JSON.stringify(value, null, 2) + "\n");
}

/** Run a command body, mapping failures to exit codes. */
export async function runCommand(fn: () => Promise<number>): Promise<void> {
  try {
    const code = await fn();
    if (code !== EXIT.SUCCESS) process.exitCode = code;
  } catch (err) {
    getLogger().error(errorMessage(err));
    process.exitCode = exitCodeFor(err);
  }
}
