import { describe, it, expect } from "vitest";
import { exitCodeFor, parseParams } from "../../src/cli/utils.js";
import { ConfigError, ConnectionError, EXIT, LockTimeoutError, ProtocolError } from "../../src/shared/errors.js";

describe("parseParams", () => {
  it("treats a missing argument as no params", () => {
    expect(parseParams(undefined)).toEqual({});
    expect(parseParams("  ")).toEqual({});
  });

  it("parses a JSON object", () => {
    expect(parseParams('{"x":1,"tags":["a"]}')).toEqual({ x: 1, tags: ["a"] });
  });

  it("rejects invalid JSON", () => {
    expect(() => parseParams("{x:1}")).toThrow(/^params must be valid JSON: /);
  });

  it("rejects JSON that is not an object", () => {
    expect(() => parseParams("[1,2]")).toThrow(new ConfigError("params must be a JSON object"));
    expect(() => parseParams("3")).toThrow("params must be a JSON object");
  });
});

describe("exitCodeFor", () => {
  it("maps errors to exit codes", () => {
    expect(exitCodeFor(new ConnectionError("down"))).toBe(EXIT.CONNECTION_FAILURE);
    expect(exitCodeFor(new ProtocolError("bad"))).toBe(EXIT.PROTOCOL_FAILURE);
    expect(exitCodeFor(new ConfigError("bad"))).toBe(EXIT.INVALID_ARGS);
    expect(exitCodeFor(new LockTimeoutError(5))).toBe(EXIT.GENERIC_ERROR);
    expect(exitCodeFor("odd")).toBe(EXIT.GENERIC_ERROR);
  });
});
