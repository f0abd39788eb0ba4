import { fileURLToPath } from "node:url";

export interface ConfigWarning {
  level: "warn" | "error";
  message: string;
}

/**
 * Validate server config at startup. Returns a list of warnings/errors.
 * Callers should log warnings and throw on errors.
 */
export function validateConfig(config: ServerConfig): ConfigWarning[] {
  const issues: ConfigWarning[] = [];

  if (!config.authToken) {
    issues.push({
      level: "warn",
      message: "STRATUS_AUTH_TOKEN is not set — every provisioning request will be rejected",
    });
  }

  if (!config.projectId) {
    issues.push({ level: "error", message: "GCP_PROJECT_ID is not set" });
  }

  if (!config.accessToken) {
    issues.push({ level: "error", message: "GCP_ACCESS_TOKEN is not set" });
  }

  for (const [name, value] of [
    ["POLL_TIMEOUT_SECONDS", config.pollTimeoutSeconds],
    ["POLL_MAX_INTERVAL_SECONDS", config.pollMaxIntervalSeconds],
  ] as const) {
    if (value !== null && (!Number.isInteger(value) || value <= 0)) {
      issues.push({ level: "error", message: `${name} must be a positive integer` });
    }
  }

  return issues;
}

export interface ServerConfig {
  port: number;
  host: string;
  authToken: string | null;
  projectId: string | null;
  accessToken: string | null;
  region: string;
  pluginConfigPath: string;
  /** Overrides for the polling defaults in the plugin config file. */
  pollTimeoutSeconds: number | null;
  pollMaxIntervalSeconds: number | null;
}

function optionalInt(value: string | undefined): number | null {
  return value === undefined || value === "" ? null : Number(value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const defaultPluginConfig = fileURLToPath(
    new URL("../config/plugin.yaml", import.meta.url),
  );

  return {
    port: parseInt(env.PORT ?? "4500", 10),
    host: env.HOST ?? "0.0.0.0",
    authToken: env.STRATUS_AUTH_TOKEN ?? null,
    projectId: env.GCP_PROJECT_ID ?? null,
    accessToken: env.GCP_ACCESS_TOKEN ?? null,
    region: env.GCP_REGION ?? "us-central1",
    pluginConfigPath: env.STRATUS_PLUGIN_CONFIG ?? defaultPluginConfig,
    pollTimeoutSeconds: optionalInt(env.POLL_TIMEOUT_SECONDS),
    pollMaxIntervalSeconds: optionalInt(env.POLL_MAX_INTERVAL_SECONDS),
  };
}
