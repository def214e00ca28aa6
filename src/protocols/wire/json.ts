import { ProtocolError } from "../../shared/errors.js";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

/**
 * Narrow a parsed value to JsonValue, copying objects into fresh records.
 * Throws ProtocolError at the first non-JSON value.
 */
export function toJsonValue(value: unknown, path = "$"): JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") {
    if (!Number.isFinite(value)) throw new ProtocolError(`${path} is not a finite number`);
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown, i) => toJsonValue(item, `${path}[${i}]`));
  }
  if (typeof value === "object") {
    return toJsonObject(value, path);
  }
  throw new ProtocolError(`${path} is not a JSON value (${typeof value})`);
}

export function toJsonObject(value: object, path = "$"): JsonObject {
  return Object.fromEntries(
    Object.entries(value).map(([key, item]): [string, JsonValue] => [key, toJsonValue(item, `${path}.${key}`)])
  );
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
