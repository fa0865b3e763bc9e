import { Inject, Injectable } from "@nestjs/common";
import path from "path";
import { ConfigError } from "../core/errors";
import { expandHome } from "../core/transport/file.transport";
import { DEFAULT_HTTP_TIMEOUT_MS } from "../core/transport/http.transport";
import { parseUri } from "../core/uri/uri-resolver";
import {
  DEFAULT_LOGGING,
  DEFAULT_OUTPUT_FORMAT,
  DEFAULT_VAULT_PASSWORD_FILE,
  EXECUTABLE_NAME,
  defaultConfigCandidates,
} from "./defaults";
import { RUNTIME_CONTEXT, type RuntimeContext } from "./runtime-context";
import { resolveCliRuntimeOptionsFromEnv } from "./runtime-env";
import type {
  CliRuntimeOptions,
  EnvironmentSource,
  InventoryRuntimeConfig,
  LoggingConfig,
  LogLevel,
  OutputFormat,
  SettingSource,
  VaultConfig,
} from "./types";

const OUTPUT_FORMATS: readonly OutputFormat[] = ["yaml", "json"];
const LOG_LEVELS: readonly LogLevel[] = [
  "silent",
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
];

const TRUE_VALUES = ["1", "true", "yes", "on"];
const FALSE_VALUES = ["0", "false", "no", "off"];

interface Setting {
  value: string;
  source: Exclude<SettingSource, "default">;
}

/**
 * Resolves the runtime configuration once per invocation.
 *
 * Precedence is explicit flag, then environment variable, then (for the
 * environment name) the name of the symlink the tool was invoked through,
 * then the built-in default.
 */
@Injectable()
export class ConfigService {
  constructor(
    @Inject(RUNTIME_CONTEXT) private readonly context: RuntimeContext
  ) {}

  resolve(flags: CliRuntimeOptions = {}): InventoryRuntimeConfig {
    const fromEnv = resolveCliRuntimeOptionsFromEnv(this.context.env);
    const pick = (key: keyof CliRuntimeOptions): Setting | undefined => {
      const flag = flags[key];
      if (flag !== undefined) return { value: flag, source: "flag" };
      const env = fromEnv[key];
      if (env !== undefined) return { value: env, source: "env" };
      return undefined;
    };

    const environment = this.resolveEnvironment(pick("env"));

    return {
      ...environment,
      uri: this.resolveUri(pick("uri")),
      vault: this.resolveVault(pick("vaultPasswordFile")),
      outputFormat: this.resolveOutputFormat(pick("outputFormat")),
      logging: this.resolveLogging(
        pick("logLevel"),
        pick("logFile"),
        pick("logPretty")
      ),
      http: { timeoutMs: this.resolveTimeout(pick("timeout")) },
      executable: this.context.executable,
    };
  }

  private resolveEnvironment(
    setting: Setting | undefined
  ): { environment?: string; environmentSource?: EnvironmentSource } {
    if (setting) {
      return { environment: setting.value, environmentSource: setting.source };
    }
    const name = path.basename(this.context.executable);
    if (name !== EXECUTABLE_NAME && this.context.isSymlink(this.context.executable)) {
      return { environment: name, environmentSource: "symlink" };
    }
    return {};
  }

  private resolveUri(setting: Setting | undefined): string | undefined {
    if (setting) {
      return this.absolutizeUri(setting.value);
    }

    const { executable } = this.context;
    const resolved = this.context.isFile(executable)
      ? this.context.realpath(executable)
      : executable;

    return defaultConfigCandidates(path.dirname(resolved)).find((candidate) =>
      this.context.isFile(candidate)
    );
  }

  private absolutizeUri(uri: string): string {
    if (parseUri(uri).scheme !== undefined) {
      return uri;
    }
    return path.resolve(this.context.cwd, expandHome(uri, this.context.homeDir));
  }

  private resolveVault(setting: Setting | undefined): VaultConfig {
    const value = setting?.value ?? DEFAULT_VAULT_PASSWORD_FILE;
    return {
      passwordFile: path.resolve(
        this.context.cwd,
        expandHome(value, this.context.homeDir)
      ),
      source: setting?.source ?? "default",
    };
  }

  private resolveOutputFormat(setting: Setting | undefined): OutputFormat {
    if (!setting) {
      return DEFAULT_OUTPUT_FORMAT;
    }
    const normalized = setting.value.toLowerCase();
    const format = OUTPUT_FORMATS.find((candidate) => candidate === normalized);
    if (!format) {
      throw new ConfigError(
        `Unsupported output format '${setting.value}', expected one of: ${OUTPUT_FORMATS.join(", ")}`
      );
    }
    return format;
  }

  private resolveLogging(
    levelSetting: Setting | undefined,
    fileSetting: Setting | undefined,
    prettySetting: Setting | undefined
  ): LoggingConfig {
    let level = DEFAULT_LOGGING.level;
    if (levelSetting) {
      const normalized = levelSetting.value.toLowerCase();
      const match = LOG_LEVELS.find((candidate) => candidate === normalized);
      if (!match) {
        throw new ConfigError(
          `Unsupported log level '${levelSetting.value}', expected one of: ${LOG_LEVELS.join(", ")}`
        );
      }
      level = match;
    }

    const destination = fileSetting
      ? {
          type: "file" as const,
          path: path.resolve(
            this.context.cwd,
            expandHome(fileSetting.value, this.context.homeDir)
          ),
          pretty: false,
          colorize: false,
        }
      : {
          type: "stderr" as const,
          pretty: this.resolveFlag(prettySetting, "log pretty"),
        };

    return { ...DEFAULT_LOGGING, level, destination };
  }

  private resolveFlag(setting: Setting | undefined, label: string): boolean {
    if (!setting) {
      return false;
    }
    const normalized = setting.value.toLowerCase();
    if (TRUE_VALUES.includes(normalized)) return true;
    if (FALSE_VALUES.includes(normalized)) return false;
    throw new ConfigError(
      `Unsupported ${label} value '${setting.value}', expected true or false`
    );
  }

  private resolveTimeout(setting: Setting | undefined): number {
    if (!setting) {
      return DEFAULT_HTTP_TIMEOUT_MS;
    }
    const timeout = Number(setting.value);
    if (!Number.isInteger(timeout) || timeout <= 0) {
      throw new ConfigError(
        `Timeout must be a positive number of milliseconds, got '${setting.value}'`
      );
    }
    return timeout;
  }
}
