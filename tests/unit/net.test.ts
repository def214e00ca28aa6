import { describe, it, expect } from "vitest";
import { formatEndpoint, parseEndpoint, parsePort } from "../../src/shared/net.js";

describe("parseEndpoint", () => {
  it("returns the default endpoint for an empty string", () => {
    expect(parseEndpoint("")).toEqual({ host: "localhost", port: 8765 });
  });

  it("parses port-only", () => {
    expect(parseEndpoint("9000")).toEqual({ host: "localhost", port: 9000 });
  });

  it("parses host:port", () => {
    expect(parseEndpoint("10.0.0.2:7000")).toEqual({ host: "10.0.0.2", port: 7000 });
    expect(parseEndpoint("game.local:8765")).toEqual({ host: "game.local", port: 8765 });
  });

  it("treats a bare name as a host", () => {
    expect(parseEndpoint("game.local")).toEqual({ host: "game.local", port: 8765 });
  });

  it("uses defaults for missing or bad parts", () => {
    expect(parseEndpoint(":7000")).toEqual({ host: "localhost", port: 7000 });
    expect(parseEndpoint("game.local:bad")).toEqual({ host: "game.local", port: 8765 });
    expect(parseEndpoint("game.local:70000")).toEqual({ host: "game.local", port: 8765 });
  });

  it("recognizes socket and pipe paths", () => {
    expect(parseEndpoint("/tmp/game.sock")).toEqual({ path: "/tmp/game.sock" });
    expect(parseEndpoint("\\\\.\\pipe\\game")).toEqual({ path: "\\\\.\\pipe\\game" });
  });
});

describe("parsePort", () => {
  it("accepts 1 to 65535", () => {
    expect(parsePort("1")).toBe(1);
    expect(parsePort(65535)).toBe(65535);
    expect(parsePort("0")).toBeUndefined();
    expect(parsePort("65536")).toBeUndefined();
    expect(parsePort(undefined)).toBeUndefined();
  });
});

describe("formatEndpoint", () => {
  it("formats both endpoint kinds", () => {
    expect(formatEndpoint({ host: "localhost", port: 8765 })).toBe("localhost:8765");
    expect(formatEndpoint({ path: "/tmp/game.sock" })).toBe("/tmp/game.sock");
  });
});
