import { readFile, writeFile, mkdir } from "node:fs/promises";
import path from "node:path";
import { homedir } from "node:os";
import { type } from "arktype";
import { ConfigError } from "./shared/errors.js";
import { getEnv } from "./shared/env.js";
import { parsePort, type Endpoint } from "./shared/net.js";
import {
  DEFAULT_ACK_TIMEOUT_MS,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_HEARTBEAT_INTERVAL_MS,
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_READ_TIMEOUT_MS,
  DEFAULT_RECONNECT_DELAY_MS,
} from "./shared/constants.js";
import type { LogLevel } from "./shared/logging.js";

const CONFIG_FILENAME = "gamewire.json";

export function getDataDir(custom?: string): string {
  if (custom) return path.resolve(custom.replace(/^~/, homedir()));
  return path.join(homedir(), ".gamewire");
}

export function getConfigPath(dataDir: string): string {
  return path.join(dataDir, CONFIG_FILENAME);
}

export type ConfigKey =
  | "connection.host"
  | "connection.port"
  | "connection.path"
  | "connection.connectTimeoutMs"
  | "connection.readTimeoutMs"
  | "connection.reconnectDelayMs"
  | "connection.ackTimeoutMs"
  | "heartbeat.intervalMs"
  | "protocol.strictResponseIds"
  | "log.level";

const NUMERIC_KEYS: ConfigKey[] = [
  "connection.port",
  "connection.connectTimeoutMs",
  "connection.readTimeoutMs",
  "connection.reconnectDelayMs",
  "connection.ackTimeoutMs",
  "heartbeat.intervalMs",
];

const BOOLEAN_KEYS: ConfigKey[] = ["protocol.strictResponseIds"];

export const CONFIG_KEYS: ConfigKey[] = [
  "connection.host",
  "connection.port",
  "connection.path",
  "connection.connectTimeoutMs",
  "connection.readTimeoutMs",
  "connection.reconnectDelayMs",
  "connection.ackTimeoutMs",
  "heartbeat.intervalMs",
  "protocol.strictResponseIds",
  "log.level",
];

export function isConfigKey(s: string): s is ConfigKey {
  return CONFIG_KEYS.some((key) => key === s);
}

export type ConfigValue = string | number | boolean;

/** Config shape as stored on disk: flat dotted keys. */
export type FullConfig = Partial<Record<ConfigKey, ConfigValue>>;

const FullConfigSchema = type({
  "connection.host?": "string",
  "connection.port?": "number.integer",
  "connection.path?": "string",
  "connection.connectTimeoutMs?": "number >= 0",
  "connection.readTimeoutMs?": "number >= 0",
  "connection.reconnectDelayMs?": "number >= 0",
  "connection.ackTimeoutMs?": "number >= 0",
  "heartbeat.intervalMs?": "number > 0",
  "protocol.strictResponseIds?": "boolean",
  "log.level?": "'error' | 'warn' | 'info' | 'debug'",
});

const LogLevelSchema = type("'error' | 'warn' | 'info' | 'debug'");

/** Everything a client and the CLI need, with defaults filled in. */
export interface ClientConfig {
  endpoint: Endpoint;
  connectTimeoutMs: number;
  readTimeoutMs: number;
  reconnectDelayMs: number;
  ackTimeoutMs: number;
  heartbeatIntervalMs: number;
  strictResponseIds: boolean;
  logLevel: LogLevel;
}

export const DEFAULT_CLIENT_CONFIG: ClientConfig = {
  endpoint: { host: DEFAULT_HOST, port: DEFAULT_PORT },
  connectTimeoutMs: DEFAULT_CONNECT_TIMEOUT_MS,
  readTimeoutMs: DEFAULT_READ_TIMEOUT_MS,
  reconnectDelayMs: DEFAULT_RECONNECT_DELAY_MS,
  ackTimeoutMs: DEFAULT_ACK_TIMEOUT_MS,
  heartbeatIntervalMs: DEFAULT_HEARTBEAT_INTERVAL_MS,
  strictResponseIds: false,
  logLevel: "info",
};

/** Read the config file; a missing or unreadable file means no overrides. */
export async function readFullConfig(dataDir: string): Promise<FullConfig> {
  let raw: string;
  try {
    raw = await readFile(getConfigPath(dataDir), "utf8");
  } catch {
    return {};
  }
  let data: unknown;
  try {
    data = JSON.parse(raw) as unknown;
  } catch {
    throw new ConfigError(`Config file ${getConfigPath(dataDir)} is not valid JSON`);
  }
  const parsed = FullConfigSchema(data ?? {});
  if (parsed instanceof type.errors) {
    throw new ConfigError(`Invalid config in ${getConfigPath(dataDir)}: ${parsed.summary}`);
  }
  return parsed;
}

export async function writeFullConfig(dataDir: string, cfg: FullConfig): Promise<void> {
  await mkdir(dataDir, { recursive: true });
  await writeFile(getConfigPath(dataDir), JSON.stringify(cfg, null, 2) + "\n", "utf8");
}

export async function configGet(dataDir: string, key: ConfigKey): Promise<ConfigValue | undefined> {
  const cfg = await readFullConfig(dataDir);
  return cfg[key];
}

/** Convert a CLI string into the type stored for `key`. */
export function coerceConfigValue(key: ConfigKey, value: string): ConfigValue {
  if (NUMERIC_KEYS.includes(key)) {
    const n = Number(value);
    if (value.trim() === "" || !Number.isFinite(n)) {
      throw new ConfigError(`${key} expects a number, got "${value}"`);
    }
    return n;
  }
  if (BOOLEAN_KEYS.includes(key)) {
    if (value === "true") return true;
    if (value === "false") return false;
    throw new ConfigError(`${key} expects true or false, got "${value}"`);
  }
  return value;
}

export async function configSet(dataDir: string, key: ConfigKey, value: string): Promise<void> {
  const cfg = await readFullConfig(dataDir);
  const next: FullConfig = { ...cfg, [key]: coerceConfigValue(key, value) };
  const checked = FullConfigSchema(next);
  if (checked instanceof type.errors) {
    throw new ConfigError(`Invalid value for ${key}: ${checked.summary}`);
  }
  await writeFullConfig(dataDir, checked);
}

/** Defaults, then the config file, then GAMEWIRE_* environment variables. */
export function resolveClientConfig(
  file: FullConfig,
  env: NodeJS.ProcessEnv = process.env
): ClientConfig {
  const parsed = FullConfigSchema(file);
  if (parsed instanceof type.errors) {
    throw new ConfigError(`Invalid config: ${parsed.summary}`);
  }
  const defaults = DEFAULT_CLIENT_CONFIG;

  const envPort = getEnv("PORT", env);
  if (envPort !== undefined && parsePort(envPort) === undefined) {
    throw new ConfigError(`GAMEWIRE_PORT must be a port number, got "${envPort}"`);
  }
  const pipePath = getEnv("PIPE", env) ?? parsed["connection.path"];
  const host = getEnv("HOST", env) ?? parsed["connection.host"] ?? DEFAULT_HOST;
  const port = parsePort(envPort) ?? parsePort(parsed["connection.port"]) ?? DEFAULT_PORT;
  const endpoint: Endpoint = pipePath ? { path: pipePath } : { host, port };

  const envLevel = getEnv("LOG_LEVEL", env);
  const logLevel = envLevel !== undefined ? LogLevelSchema(envLevel) : parsed["log.level"] ?? defaults.logLevel;
  if (logLevel instanceof type.errors) {
    throw new ConfigError(`GAMEWIRE_LOG_LEVEL: ${logLevel.summary}`);
  }

  return {
    endpoint,
    connectTimeoutMs: parsed["connection.connectTimeoutMs"] ?? defaults.connectTimeoutMs,
    readTimeoutMs: parsed["connection.readTimeoutMs"] ?? defaults.readTimeoutMs,
    reconnectDelayMs: parsed["connection.reconnectDelayMs"] ?? defaults.reconnectDelayMs,
    ackTimeoutMs: parsed["connection.ackTimeoutMs"] ?? defaults.ackTimeoutMs,
    heartbeatIntervalMs: parsed["heartbeat.intervalMs"] ?? defaults.heartbeatIntervalMs,
    strictResponseIds: parsed["protocol.strictResponseIds"] ?? defaults.strictResponseIds,
    logLevel,
  };
}

export async function loadClientConfig(
  dataDir: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<ClientConfig> {
  return resolveClientConfig(await readFullConfig(dataDir), env);
}
