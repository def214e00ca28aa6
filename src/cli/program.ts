import { Command } from "commander";
import { VERSION } from "../shared/constants.js";
import { initLogger } from "../shared/logging.js";
import { getEnv } from "../shared/env.js";
import { configGet, getDataDir } from "../config.js";
import { runCall } from "./commands/call.js";
import { runHandshake } from "./commands/handshake.js";
import { runPing } from "./commands/ping.js";
import { runStatus } from "./commands/status.js";
import { runConfigGet, runConfigSet, runConfigShow } from "./commands/config.js";
import { runCommand, type GlobalOptions } from "./utils.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("gamewire")
    .description("Call into a running game over its JSON-RPC socket")
    .version(VERSION)
    .option("--endpoint <host:port|path>", "Game endpoint (overrides config)")
    .option("--data-dir <path>", "Config/data directory", "~/.gamewire")
    .option("--log-level <level>", "Log level: error, warn, info, debug")
    .option("--log-format <format>", "Log format: text, json or plain", "plain")
    .hook("preAction", async (thisCommand) => {
      const opts = thisCommand.opts<GlobalOptions>();
      const configured = await configGet(getDataDir(opts.dataDir), "log.level");
      const level = opts.logLevel ?? getEnv("LOG_LEVEL") ?? (typeof configured === "string" ? configured : "info");
      initLogger(level, opts.logFormat ?? "plain");
    });

  program
    .command("call <method> [params]")
    .description("Call a game method; params is a JSON object")
    .option("--retries <n>", "Attempts before giving up", "3")
    .action((method: string, params: string | undefined, _opts: unknown, command: Command) =>
      runCommand(() => runCall(method, params, command.optsWithGlobals<GlobalOptions & { retries?: string }>()))
    );

  program
    .command("handshake")
    .description("Exchange capabilities and list the methods the game exposes")
    .action((_opts: unknown, command: Command) =>
      runCommand(() => runHandshake(command.optsWithGlobals<GlobalOptions>()))
    );

  program
    .command("ping")
    .description("Send one heartbeat and report the round trip")
    .action((_opts: unknown, command: Command) =>
      runCommand(() => runPing(command.optsWithGlobals<GlobalOptions>()))
    );

  program
    .command("status")
    .description("Show resolved configuration and whether the game is reachable")
    .option("--json", "Print status as JSON")
    .action((_opts: unknown, command: Command) =>
      runCommand(() => runStatus(command.optsWithGlobals<GlobalOptions & { json?: boolean }>()))
    );

  const configCmd = program
    .command("config")
    .description("Manage config (connection.*, heartbeat.intervalMs, protocol.strictResponseIds, log.level)");

  configCmd
    .command("get <key>")
    .description("Get config value")
    .action((key: string, _opts: unknown, command: Command) =>
      runCommand(() => runConfigGet(key, command.optsWithGlobals<GlobalOptions>()))
    );

  configCmd
    .command("set <key> <value>")
    .description("Set config value")
    .action((key: string, value: string, _opts: unknown, command: Command) =>
      runCommand(() => runConfigSet(key, value, command.optsWithGlobals<GlobalOptions>()))
    );

  configCmd
    .command("show")
    .description("Show the config file as JSON")
    .action((_opts: unknown, command: Command) =>
      runCommand(() => runConfigShow(command.optsWithGlobals<GlobalOptions>()))
    );

  return program;
}
