import { Writable } from "node:stream";
import { pino, type Logger } from "pino";
import { PinoPretty } from "pino-pretty";

export type LogLevel = "error" | "warn" | "info" | "debug";
export type LogFormat = "text" | "json" | "plain";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];
export const LOG_FORMATS: readonly LogFormat[] = ["text", "json", "plain"];

const SECRET_KEYS = "token|password|secret|api_?key|auth";

export function redactSecrets(input: string): string {
  return input
    .replace(
      new RegExp(`"(${SECRET_KEYS})"\\s*:\\s*"[^"]*"`, "gi"),
      (_match, name: string) => `"${name}":"[REDACTED]"`
    )
    .replace(
      new RegExp(`\\b(${SECRET_KEYS})\\s*=\\s*([^\\s]+)`, "gi"),
      (_match, name: string) => `${name}=[REDACTED]`
    );
}

/** JSON form of a value with secret-looking fields masked, for debug log lines. */
export function maskSensitiveObject(value: unknown): string {
  try {
    const serialized = JSON.stringify(value);
    if (serialized === undefined) return String(value);
    return redactSecrets(serialized);
  } catch {
    return "[unserializable]";
  }
}

export function isLogLevel(s: string): s is LogLevel {
  return LOG_LEVELS.some((level) => level === s);
}

export function isLogFormat(s: string): s is LogFormat {
  return LOG_FORMATS.some((format) => format === s);
}

function redactingStderr(): Writable {
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      const s = typeof chunk === "string" ? chunk : chunk.toString("utf8");
      process.stderr.write(redactSecrets(s));
      cb();
    },
  });
}

function messageOf(line: string): unknown {
  try {
    const parsed: unknown = JSON.parse(line);
    return typeof parsed === "object" && parsed !== null && "msg" in parsed ? parsed.msg : undefined;
  } catch {
    return line;
  }
}

/** Writable that parses pino JSON lines and writes only the message (no time/level). */
function plainMessageStderr(): Writable {
  let buffer = "";
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      buffer += typeof chunk === "string" ? chunk : chunk.toString("utf8");
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";
      for (const line of lines) {
        if (!line.trim()) continue;
        const msg = messageOf(line);
        if (typeof msg === "string") {
          process.stderr.write(redactSecrets(msg) + "\n");
        }
      }
      cb();
    },
  });
}

let rootLogger: Logger | null = null;

export function initLogger(level = "info", format: string = "plain"): void {
  const logLevel = isLogLevel(level) ? level : "info";
  const logFormat = isLogFormat(format) ? format : "plain";
  if (logFormat === "plain") {
    rootLogger = pino({ level: logLevel, name: "gamewire" }, plainMessageStderr());
  } else if (logFormat === "text") {
    const prettyStream = PinoPretty({ colorize: true, destination: redactingStderr() });
    rootLogger = pino({ level: logLevel, name: "gamewire" }, prettyStream);
  } else {
    rootLogger = pino({ level: logLevel, name: "gamewire" }, redactingStderr());
  }
}

export function getLogger(): Logger {
  if (!rootLogger) {
    initLogger("info", "plain");
  }
  return rootLogger ?? pino({ level: "info", name: "gamewire" }, redactingStderr());
}

/** Child logger tagged with the component that owns it. */
export function componentLogger(component: string): Logger {
  return getLogger().child({ component });
}
