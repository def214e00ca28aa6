import { DEFAULT_HOST, DEFAULT_PORT } from "./constants.js";

export type Endpoint = { host: string; port: number } | { path: string };

export function isPipeEndpoint(endpoint: Endpoint): endpoint is { path: string } {
  return "path" in endpoint;
}

export function formatEndpoint(endpoint: Endpoint): string {
  return isPipeEndpoint(endpoint) ? endpoint.path : `${endpoint.host}:${endpoint.port}`;
}

export function parsePort(value: string | number | undefined): number | undefined {
  if (value === undefined) return undefined;
  const port = typeof value === "number" ? value : Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) return undefined;
  return port;
}

/**
 * Parse an endpoint string: "host:port", "port", or a socket/pipe path
 * ("/tmp/game.sock", "\\\\.\\pipe\\game").
 */
export function parseEndpoint(value: string): Endpoint {
  const trimmed = value.trim();
  if (!trimmed) return { host: DEFAULT_HOST, port: DEFAULT_PORT };
  if (trimmed.startsWith("/") || trimmed.startsWith("\\\\")) return { path: trimmed };
  const colon = trimmed.lastIndexOf(":");
  if (colon === -1) {
    const port = parsePort(trimmed);
    return port === undefined ? { host: trimmed, port: DEFAULT_PORT } : { host: DEFAULT_HOST, port };
  }
  const host = trimmed.slice(0, colon).trim() || DEFAULT_HOST;
  return { host, port: parsePort(trimmed.slice(colon + 1)) ?? DEFAULT_PORT };
}
