import { type } from "arktype";
import type { JsonObject, JsonValue } from "./json.js";

export const ACK_STATUS = "received";

export interface RpcRequest {
  id: number;
  method: string;
  params: JsonObject;
}

export interface RpcErrorInfo {
  code: number;
  message: string;
  data: JsonObject | null;
}

/** Exactly one of result/error carries meaning; the other is null. */
export interface RpcResponse {
  id: number;
  result: JsonValue | null;
  error: RpcErrorInfo | null;
}

export interface Acknowledgment {
  id: number;
  status: typeof ACK_STATUS;
}

export const RpcErrorInfoSchema = type({
  code: "number.integer",
  message: "string",
  "data?": "unknown",
});

export const RpcResponseSchema = type({
  id: "number.integer",
  "result?": "unknown",
  "error?": RpcErrorInfoSchema.or("null"),
});
