import path from "path";
import type { LoggingConfig, OutputFormat } from "./types";

/** Name of the installed bin link; never taken as an environment name. */
export const EXECUTABLE_NAME = "inventory";

export const DEFAULT_OUTPUT_FORMAT: OutputFormat = "yaml";

export const DEFAULT_LOGGING: LoggingConfig = {
  level: "warn",
  destination: {
    type: "stderr",
    pretty: false,
  },
  enableTimestamps: true,
};

export const DEFAULT_VAULT_PASSWORD_FILE = "~/.vault_pass.txt";

export const ENV_VARIABLES = {
  env: "INVENTORY_ENV",
  uri: "INVENTORY_URI",
  vaultPasswordFile: "VAULT_PASSWORD_FILE",
  outputFormat: "INVENTORY_FORMAT",
  logLevel: "INVENTORY_LOG_LEVEL",
  logFile: "INVENTORY_LOG_FILE",
  logPretty: "INVENTORY_LOG_PRETTY",
  timeout: "INVENTORY_HTTP_TIMEOUT",
} as const;

/** Root configuration locations tried, in order, when no URI is given. */
export function defaultConfigCandidates(executableDir: string): string[] {
  return [
    path.resolve(executableDir, "..", "etc", "config.yaml"),
    "/etc/inventory-aggregator/config.yaml",
    "/usr/local/etc/inventory-aggregator/config.yaml",
  ];
}
