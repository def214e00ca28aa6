import { EXIT } from "../../shared/errors.js";
import { DEFAULT_MAX_RETRIES } from "../../shared/constants.js";
import { parseParams, printJson, resolveConfig, withClient, type GlobalOptions } from "../utils.js";

export async function runCall(
  method: string,
  rawParams: string | undefined,
  opts: GlobalOptions & { retries?: string }
): Promise<number> {
  const params = parseParams(rawParams);
  const parsedRetries = opts.retries === undefined ? NaN : Number.parseInt(opts.retries, 10);
  const retries = Number.isNaN(parsedRetries) ? DEFAULT_MAX_RETRIES : parsedRetries;
  const config = await resolveConfig(opts);
  const response = await withClient(config, (client) => client.callWithRetry(method, params, retries));
  printJson(response);
  return response.error ? EXIT.GENERIC_ERROR : EXIT.SUCCESS;
}
