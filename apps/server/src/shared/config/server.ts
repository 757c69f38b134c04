/**
 * Gesture server network configuration.
 */
import { type RuntimeEnv, getEnvVar, parseNumericEnv } from "../env";

export const SERVER_DEFAULT_HOST = "127.0.0.1";

export const SERVER_DEFAULT_PORT = 8765;

export const SERVER_HOST_ENV_KEY = "FACECUE_HOST";

export const SERVER_PORT_ENV_KEY = "FACECUE_PORT";

export const THRESHOLDS_PATH_ENV_KEY = "FACECUE_THRESHOLDS_PATH";

/** Relative to the working directory the server is started from. */
export const THRESHOLDS_DEFAULT_PATH = "config/thresholds.json";

export type ServerAddress = {
  host: string;
  port: number;
  /** Set when FACECUE_PORT was present but unusable. */
  rejectedPort?: string;
};

export const resolveServerAddress = (env: RuntimeEnv = process.env): ServerAddress => {
  const host = getEnvVar(SERVER_HOST_ENV_KEY, env)?.trim() ?? SERVER_DEFAULT_HOST;
  const rawPort = getEnvVar(SERVER_PORT_ENV_KEY, env);
  const port = parseNumericEnv(rawPort, { integer: true, min: 0, max: 65535 });

  if (rawPort !== undefined && port === null) {
    return { host, port: SERVER_DEFAULT_PORT, rejectedPort: rawPort };
  }

  return { host, port: port ?? SERVER_DEFAULT_PORT };
};

export const resolveThresholdsPath = (env: RuntimeEnv = process.env): string => {
  return getEnvVar(THRESHOLDS_PATH_ENV_KEY, env)?.trim() ?? THRESHOLDS_DEFAULT_PATH;
};
