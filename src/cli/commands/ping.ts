import { HEARTBEAT_METHOD } from "../../shared/constants.js";
import { EXIT } from "../../shared/errors.js";
import { formatEndpoint } from "../../shared/net.js";
import { resolveConfig, withClient, type GlobalOptions } from "../utils.js";

export async function runPing(opts: GlobalOptions): Promise<number> {
  const config = await resolveConfig(opts);
  const started = Date.now();
  const response = await withClient(config, (client) => client.call(HEARTBEAT_METHOD, {}));
  const elapsed = Date.now() - started;
  if (response.error) {
    process.stderr.write(`heartbeat failed: ${response.error.message}\n`);
    return EXIT.GENERIC_ERROR;
  }
  process.stdout.write(`pong from ${formatEndpoint(config.endpoint)} in ${elapsed}ms\n`);
  return EXIT.SUCCESS;
}
