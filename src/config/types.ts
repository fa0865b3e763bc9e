export type LogLevel =
  | "silent"
  | "fatal"
  | "error"
  | "warn"
  | "info"
  | "debug"
  | "trace";

export type OutputFormat = "yaml" | "json";

export interface LoggingDestination {
  type: "stdout" | "stderr" | "file";
  path?: string;
  pretty?: boolean;
  colorize?: boolean;
}

export interface LoggingConfig {
  level: LogLevel;
  destination?: LoggingDestination;
  enableTimestamps?: boolean;
}

/**
 * Values that may come from flags or from the environment. Every field is a
 * raw, unvalidated string; `ConfigService` validates and applies defaults.
 */
export interface CliRuntimeOptions {
  env?: string;
  uri?: string;
  vaultPasswordFile?: string;
  outputFormat?: string;
  logLevel?: string;
  logFile?: string;
  logPretty?: string;
  timeout?: string;
}

export type EnvironmentSource = "flag" | "env" | "symlink";
export type SettingSource = "flag" | "env" | "default";

export interface VaultConfig {
  passwordFile?: string;
  source: SettingSource;
}

/** Resolved once at start-up and passed down unchanged. */
export interface InventoryRuntimeConfig {
  readonly environment?: string;
  readonly environmentSource?: EnvironmentSource;
  readonly uri?: string;
  readonly vault: VaultConfig;
  readonly outputFormat: OutputFormat;
  readonly logging: LoggingConfig;
  readonly http: { readonly timeoutMs: number };
  /** Path of the running entry point, the target of created symlinks. */
  readonly executable: string;
}
