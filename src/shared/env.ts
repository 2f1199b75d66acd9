/** Environment variables that override values from the config file. */
export const AUTOPILOT_ENV = {
  DATA_DIR: "USSD_AUTOPILOT_DATA_DIR",
  LOG_LEVEL: "USSD_AUTOPILOT_LOG_LEVEL",
  LOG_FORMAT: "USSD_AUTOPILOT_LOG_FORMAT",
  SHORT_CODE: "USSD_AUTOPILOT_SHORT_CODE",
  SESSION_TIMEOUT_MS: "USSD_AUTOPILOT_SESSION_TIMEOUT_MS",
  SOURCE_IDS: "USSD_AUTOPILOT_SOURCE_IDS",
} as const;

export type EnvKey = keyof typeof AUTOPILOT_ENV;

export function getEnv(key: EnvKey, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const value = env[AUTOPILOT_ENV[key]];
  return value === undefined || value === "" ? undefined : value;
}
