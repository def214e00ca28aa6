import {
  CONFIG_KEYS,
  configGet,
  configSet,
  getDataDir,
  isConfigKey,
  readFullConfig,
  type ConfigKey,
} from "../../config.js";
import { ConfigError, EXIT } from "../../shared/errors.js";
import { printJson } from "../utils.js";

function requireKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    throw new ConfigError(`Unknown key "${key}". Known keys: ${CONFIG_KEYS.join(", ")}`);
  }
  return key;
}

export async function runConfigGet(key: string, opts: { dataDir?: string }): Promise<number> {
  const value = await configGet(getDataDir(opts.dataDir), requireKey(key));
  if (value !== undefined) process.stdout.write(`${String(value)}\n`);
  return EXIT.SUCCESS;
}

export async function runConfigSet(key: string, value: string, opts: { dataDir?: string }): Promise<number> {
  await configSet(getDataDir(opts.dataDir), requireKey(key), value);
  process.stdout.write(`Set ${key}\n`);
  return EXIT.SUCCESS;
}

export async function runConfigShow(opts: { dataDir?: string }): Promise<number> {
  printJson(await readFullConfig(getDataDir(opts.dataDir)));
  return EXIT.SUCCESS;
}
