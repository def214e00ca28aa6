import { type } from "arktype";
import { ProtocolError } from "../shared/errors.js";
import { HANDSHAKE_METHOD } from "../shared/constants.js";
import type { JsonObject } from "../protocols/wire/json.js";
import type { RpcErrorInfo, RpcResponse } from "../protocols/wire/types.js";

const HandshakeResultSchema = type({
  "server_name?": "string",
  "version?": "string",
  "available_methods?": "string[]",
  "total_methods?": "number",
  "method_categories?": { "[string]": "string[]" },
  "integrations?": { "[string]": "boolean" },
  "instructions?": "string | null",
});

/** What the game reports about itself after connecting. */
export interface ServerInfo {
  serverName: string;
  version: string;
  availableMethods: string[];
  totalMethods: number;
  methodCategories: Record<string, string[]>;
  integrations: Record<string, boolean>;
  /** Free-form guidance the game wants surfaced to the LLM host. */
  instructions: string | null;
}

export type HandshakeResult =
  | { ok: true; info: ServerInfo }
  | { ok: false; error: RpcErrorInfo };

/** The subset of GameClient a handshake needs. */
export interface HandshakeCaller {
  call(method: string, params?: JsonObject): Promise<RpcResponse>;
}

export function parseServerInfo(result: unknown): ServerInfo {
  const parsed = HandshakeResultSchema(result);
  if (parsed instanceof type.errors) {
    throw new ProtocolError(`Unexpected handshake result: ${parsed.summary}`);
  }
  const availableMethods = parsed.available_methods ?? [];
  return {
    serverName: parsed.server_name ?? "Unknown",
    version: parsed.version ?? "Unknown",
    availableMethods,
    totalMethods: parsed.total_methods ?? availableMethods.length,
    methodCategories: parsed.method_categories ?? {},
    integrations: parsed.integrations ?? {},
    instructions: parsed.instructions ?? null,
  };
}

/**
 * Capability exchange run once after connecting. The engine itself never
 * needs it; tool layers use the method list and instructions.
 */
export async function performHandshake(client: HandshakeCaller): Promise<HandshakeResult> {
  const response = await client.call(HANDSHAKE_METHOD, {});
  if (response.error) return { ok: false, error: response.error };
  return { ok: true, info: parseServerInfo(response.result) };
}
