import chalk from "chalk";
import { ConnectionManager } from "../../client/connection.js";
import { getConfigPath, getDataDir } from "../../config.js";
import { VERSION } from "../../shared/constants.js";
import { EXIT, errorMessage } from "../../shared/errors.js";
import { formatEndpoint } from "../../shared/net.js";
import { printJson, resolveConfig, type GlobalOptions } from "../utils.js";

export async function runStatus(opts: GlobalOptions & { json?: boolean }): Promise<number> {
  const config = await resolveConfig(opts);
  const endpoint = formatEndpoint(config.endpoint);
  const configPath = getConfigPath(getDataDir(opts.dataDir));

  const connection = new ConnectionManager({
    endpoint: config.endpoint,
    connectTimeoutMs: config.connectTimeoutMs,
  });
  let reason: string | undefined;
  try {
    await connection.connect();
  } catch (err) {
    reason = errorMessage(err);
  } finally {
    connection.disconnect();
  }
  const reachable = reason === undefined;
  const code = reachable ? EXIT.SUCCESS : EXIT.CONNECTION_FAILURE;

  if (opts.json) {
    printJson({
      version: VERSION,
      endpoint,
      reachable,
      ...(reason ? { reason } : {}),
      configPath,
      heartbeatIntervalMs: config.heartbeatIntervalMs,
      strictResponseIds: config.strictResponseIds,
    });
    return code;
  }

  process.stdout.write("\n");
  process.stdout.write(chalk.bold("gamewire") + "\n");
  process.stdout.write("───────────────────────────────────────────────────────────────\n");
  process.stdout.write(`Version:     v${VERSION}\n`);
  process.stdout.write(`Endpoint:    ${endpoint}\n`);
  process.stdout.write(
    `Game:        ${reachable ? chalk.green("reachable") : chalk.red(`unreachable (${reason})`)}\n`
  );
  process.stdout.write(`Heartbeat:   every ${config.heartbeatIntervalMs}ms\n`);
  process.stdout.write(`Config:      ${configPath}\n`);
  process.stdout.write("───────────────────────────────────────────────────────────────\n\n");
  return code;
}
