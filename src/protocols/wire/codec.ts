/**
 * Wire codec: 4-byte little-endian length prefix followed by a UTF-8 JSON payload.
 * Requests and acknowledgments go out, responses come in.
 */
import { type } from "arktype";
import { ProtocolError, errorMessage } from "../../shared/errors.js";
import { SERVER_HEARTBEAT_TYPE } from "../../shared/constants.js";
import { isJsonObject, toJsonObject, toJsonValue, type JsonObject } from "./json.js";
import {
  ACK_STATUS,
  RpcResponseSchema,
  type Acknowledgment,
  type RpcErrorInfo,
  type RpcRequest,
  type RpcResponse,
} from "./types.js";

export const LENGTH_PREFIX_BYTES = 4;
export const MAX_MESSAGE_BYTES = 10 * 1024 * 1024;

export function isValidFrameLength(length: number): boolean {
  return length > 0 && length <= MAX_MESSAGE_BYTES;
}

/** Length announced by a frame's prefix, or null while fewer than 4 bytes are available. */
export function readFrameLength(data: Buffer): number | null {
  return data.length < LENGTH_PREFIX_BYTES ? null : data.readUInt32LE(0);
}

export function frame(payload: Buffer): Buffer {
  const header = Buffer.alloc(LENGTH_PREFIX_BYTES);
  header.writeUInt32LE(payload.length, 0);
  return Buffer.concat([header, payload]);
}

export function encodeJsonFrame(message: RpcRequest | Acknowledgment | RpcResponse): Buffer {
  return frame(Buffer.from(JSON.stringify(message), "utf8"));
}

export function encodeRequest(id: number, method: string, params: JsonObject = {}): Buffer {
  return encodeJsonFrame({ id, method, params });
}

export function encodeAcknowledgment(id: number): Buffer {
  return encodeJsonFrame({ id, status: ACK_STATUS });
}

/** Decode one complete frame (prefix included) into a response. */
export function decodeResponse(data: Buffer): RpcResponse {
  const length = readFrameLength(data);
  if (length === null) {
    throw new ProtocolError(`Message too short: missing length prefix (got ${data.length} bytes)`);
  }
  if (!isValidFrameLength(length)) {
    throw new ProtocolError(`Invalid message length: ${length}`);
  }
  if (data.length < LENGTH_PREFIX_BYTES + length) {
    throw new ProtocolError(
      `Message incomplete: expected ${LENGTH_PREFIX_BYTES + length} bytes, got ${data.length}`
    );
  }

  const text = data.toString("utf8", LENGTH_PREFIX_BYTES, LENGTH_PREFIX_BYTES + length);
  let parsed: unknown;
  try {
    parsed = JSON.parse(text) as unknown;
  } catch (err) {
    throw new ProtocolError(`Invalid JSON: ${errorMessage(err)}`, { cause: err });
  }

  const envelope = RpcResponseSchema(parsed);
  if (envelope instanceof type.errors) {
    throw new ProtocolError(`Invalid response: ${envelope.summary}`);
  }

  let error: RpcErrorInfo | null = null;
  if (envelope.error) {
    const { code, message, data } = envelope.error;
    let errorData: JsonObject | null = null;
    if (data !== undefined && data !== null) {
      if (typeof data !== "object" || Array.isArray(data)) {
        throw new ProtocolError("Invalid response: error.data must be an object");
      }
      errorData = toJsonObject(data, "error.data");
    }
    error = { code, message, data: errorData };
  }

  return {
    id: envelope.id,
    result: envelope.result === undefined ? null : toJsonValue(envelope.result, "result"),
    error,
  };
}

/** A heartbeat the game pushed on its own; it answers no request. */
export function isServerHeartbeat(response: RpcResponse): boolean {
  return isJsonObject(response.result) && response.result.type === SERVER_HEARTBEAT_TYPE;
}
