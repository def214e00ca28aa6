import { performHandshake } from "../../client/handshake.js";
import { EXIT } from "../../shared/errors.js";
import { printJson, resolveConfig, withClient, type GlobalOptions } from "../utils.js";

export async function runHandshake(opts: GlobalOptions): Promise<number> {
  const config = await resolveConfig(opts);
  const result = await withClient(config, (client) => performHandshake(client));
  if (!result.ok) {
    printJson({ error: result.error });
    return EXIT.GENERIC_ERROR;
  }
  printJson(result.info);
  return EXIT.SUCCESS;
}
