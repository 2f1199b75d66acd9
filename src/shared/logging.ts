import { Writable } from "node:stream";
import pino from "pino";
import pinoPretty from "pino-pretty";
import { getEnv } from "./env.js";

export type LogLevel = "error" | "warn" | "info" | "debug";
export type LogFormat = "text" | "json" | "plain";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];
export const LOG_FORMATS: readonly LogFormat[] = ["text", "json", "plain"];

/** Structured fields that may carry credentials; pino drops their values before serializing. */
const REDACT_PATHS = [
  "pin",
  "*.pin",
  "upiPin",
  "*.upiPin",
  "cardVerification",
  "*.cardVerification",
  "secrets",
  "*.secrets",
];

export function redactSecrets(input: string): string {
  return input
    .replace(
      /\b(upi\s?pin|m-?pin|pin)\s*[=:]\s*\d{4,6}\b/gi,
      (_match, name: string) => `${name}=[REDACTED]`
    )
    .replace(
      /"(upiPin|pin|cardVerification|cardLastSix)"\s*:\s*"[^"]*"/g,
      (_match, name: string) => `"${name}":"[REDACTED]"`
    )
    .replace(
      /\b(cardVerification|cardLastSix)\s*=\s*\S+/g,
      (_match, name: string) => `${name}=[REDACTED]`
    );
}

export function isValidLevel(s: string): s is LogLevel {
  return LOG_LEVELS.some((level) => level === s);
}

export function isValidFormat(s: string): s is LogFormat {
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
        try {
          const o: unknown = JSON.parse(line);
          const msg = o && typeof o === "object" && "msg" in o ? o.msg : undefined;
          if (typeof msg === "string") {
            process.stderr.write(redactSecrets(msg) + "\n");
          }
        } catch {
          process.stderr.write(redactSecrets(line) + "\n");
        }
      }
      cb();
    },
  });
}

let rootLogger: pino.Logger | null = null;

export function initLogger(level = "info", format: LogFormat = "text"): pino.Logger {
  const logLevel = isValidLevel(level) ? level : "info";
  const options: pino.LoggerOptions = {
    level: logLevel,
    name: "ussd-autopilot",
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
  };
  if (format === "plain") {
    rootLogger = pino(options, plainMessageStderr());
  } else {
    const dest = redactingStderr();
    if (format === "text") {
      const prettyStream = pinoPretty({ colorize: true, destination: dest });
      rootLogger = pino(options, prettyStream);
    } else {
      rootLogger = pino(options, dest);
    }
  }
  return rootLogger;
}

function ensureLogger(): pino.Logger {
  if (!rootLogger) {
    return initLogger(getEnv("LOG_LEVEL") ?? "info", "plain");
  }
  return rootLogger;
}

export function getLogger(component?: string): pino.Logger {
  const logger = ensureLogger();
  return component ? logger.child({ component }) : logger;
}

/** Shortens free text for log lines and progress displays. */
export function preview(text: string, max = 80): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max)}...` : flat;
}
