import { readFile, writeFile, mkdir } from "node:fs/promises";
import path from "node:path";
import { homedir } from "node:os";
import { type } from "arktype";
import { ConfigError } from "./shared/errors.js";
import { getEnv } from "./shared/env.js";
import { DEFAULT_SHORT_CODE, DEFAULT_SOURCE_IDS } from "./shared/constants.js";

const CONFIG_FILENAME = "config.json";

export function getDataDir(custom?: string, env: NodeJS.ProcessEnv = process.env): string {
  if (custom) return path.resolve(custom.replace(/^~/, homedir()));
  const fromEnv = getEnv("DATA_DIR", env);
  if (fromEnv) return path.resolve(fromEnv.replace(/^~/, homedir()));
  return path.join(homedir(), ".ussd-autopilot");
}

export function getConfigPath(dataDir: string): string {
  return path.join(dataDir, CONFIG_FILENAME);
}

export type ConfigKey = "log.level" | "log.format" | "ussd.shortCode" | "store.path";

const CONFIG_KEYS: ConfigKey[] = ["log.level", "log.format", "ussd.shortCode", "store.path"];

export function isConfigKey(s: string): s is ConfigKey {
  return CONFIG_KEYS.some((key) => key === s);
}

/**
 * Timing and filtering knobs of the session engine. Delays are milliseconds.
 */
export const EngineConfigSchema = type({
  debounceMs: "number.integer >= 0",
  settleMs: "number.integer >= 0",
  injectionDelayMs: "number.integer >= 0",
  cooldownMs: "number.integer >= 0",
  minSubmitIntervalMs: "number.integer >= 0",
  focusRetryMs: "number.integer >= 0",
  dismissDelayMs: "number.integer >= 0",
  sessionTimeoutMs: "number.integer >= 0",
  previewLength: "number.integer > 0",
  shortCode: "string > 0",
  sourceIds: "string[]",
  logLevel: "'error' | 'warn' | 'info' | 'debug'",
});

export type EngineConfig = typeof EngineConfigSchema.infer;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  debounceMs: 100,
  settleMs: 200,
  injectionDelayMs: 300,
  cooldownMs: 300,
  minSubmitIntervalMs: 300,
  focusRetryMs: 200,
  dismissDelayMs: 500,
  sessionTimeoutMs: 120_000,
  previewLength: 150,
  shortCode: DEFAULT_SHORT_CODE,
  sourceIds: [...DEFAULT_SOURCE_IDS],
  logLevel: "info",
};

/** Full config shape as stored on disk. */
export interface FullConfig {
  [key: string]: unknown;
  engine?: Partial<EngineConfig>;
}

const DEFAULT_CONFIG: FullConfig = {
  "log.level": "info",
  "log.format": "text",
  "ussd.shortCode": DEFAULT_SHORT_CODE,
  engine: {},
};

export async function readFullConfig(dataDir: string): Promise<FullConfig> {
  const configPath = getConfigPath(dataDir);
  let raw: string;
  try {
    raw = await readFile(configPath, "utf8");
  } catch {
    return {};
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file ${configPath} is not valid JSON: ${String(err)}`);
  }
  if (!data || typeof data !== "object" || Array.isArray(data)) return {};
  return Object.fromEntries(Object.entries(data));
}

export async function writeFullConfig(dataDir: string, cfg: FullConfig): Promise<void> {
  await mkdir(dataDir, { recursive: true });
  const configPath = getConfigPath(dataDir);
  await writeFile(configPath, JSON.stringify(cfg, null, 2) + "\n", "utf8");
}

/** Ensure a config file exists with sensible defaults. */
export async function ensureDefaultConfig(dataDir: string): Promise<void> {
  const configPath = getConfigPath(dataDir);
  try {
    await readFile(configPath, "utf8");
    return; // already exists
  } catch {
    try {
      await writeFullConfig(dataDir, DEFAULT_CONFIG);
    } catch (error) {
      // Read-only homes (sandboxes, CI) still run on in-memory defaults.
      const code = error instanceof Error && "code" in error ? error.code : undefined;
      if (code === "EPERM" || code === "EACCES" || code === "EROFS") return;
      throw error;
    }
  }
}

export async function configGet(dataDir: string, key: ConfigKey): Promise<string | undefined> {
  const cfg = await readFullConfig(dataDir);
  const raw = cfg[key];
  return typeof raw === "string" ? raw : undefined;
}

export async function configSet(dataDir: string, key: ConfigKey, value: string): Promise<void> {
  const cfg = await readFullConfig(dataDir);
  cfg[key] = value;
  await writeFullConfig(dataDir, cfg);
}

/** Merge overrides onto the defaults and validate the result. */
export function resolveEngineConfig(...layers: Array<Partial<EngineConfig> | undefined>): EngineConfig {
  const merged: Record<string, unknown> = { ...DEFAULT_ENGINE_CONFIG, sourceIds: [...DEFAULT_ENGINE_CONFIG.sourceIds] };
  for (const layer of layers) {
    if (!layer) continue;
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) merged[key] = Array.isArray(value) ? [...value] : value;
    }
  }
  const out = EngineConfigSchema(merged);
  if (out instanceof type.errors) {
    throw new ConfigError(`Invalid engine config: ${out.summary}`);
  }
  return out;
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  const shortCode = getEnv("SHORT_CODE", env);
  if (shortCode) overrides.shortCode = shortCode;
  const timeout = getEnv("SESSION_TIMEOUT_MS", env);
  if (timeout) overrides.sessionTimeoutMs = Number(timeout);
  const sources = getEnv("SOURCE_IDS", env);
  if (sources) {
    overrides.sourceIds = sources
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean);
  }
  const level = getEnv("LOG_LEVEL", env);
  if (level) overrides.logLevel = level;
  return overrides;
}

function fileOverrides(cfg: FullConfig): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (cfg.engine && typeof cfg.engine === "object") Object.assign(overrides, cfg.engine);
  if (typeof cfg["ussd.shortCode"] === "string") overrides.shortCode = cfg["ussd.shortCode"];
  if (typeof cfg["log.level"] === "string") overrides.logLevel = cfg["log.level"];
  return overrides;
}

/**
 * Defaults, then the config file in `dataDir`, then USSD_AUTOPILOT_* variables.
 * Values of the wrong type surface as a ConfigError naming the offending key.
 */
export async function loadEngineConfig(
  dataDir: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<EngineConfig> {
  const cfg = await readFullConfig(dataDir);
  const merged = { ...fileOverrides(cfg), ...envOverrides(env) };
  const out = EngineConfigSchema({ ...DEFAULT_ENGINE_CONFIG, ...merged });
  if (out instanceof type.errors) {
    throw new ConfigError(`Invalid engine config: ${out.summary}`);
  }
  return out;
}
