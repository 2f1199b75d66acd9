export * from "./engine/index.js";
export * from "./payments/index.js";
export * from "./records/index.js";
export { createAutopilot, type Autopilot, type AutopilotOptions } from "./autopilot.js";
export {
  DEFAULT_ENGINE_CONFIG,
  EngineConfigSchema,
  resolveEngineConfig,
  loadEngineConfig,
  getDataDir,
  configGet,
  configSet,
  type EngineConfig,
  type ConfigKey,
} from "./config.js";
export {
  ActuationError,
  ConfigError,
  DialError,
  InvalidRequestError,
  SnapshotUnavailableError,
} from "./shared/errors.js";
export { initLogger, getLogger, redactSecrets, type LogLevel, type LogFormat } from "./shared/logging.js";
