import { Injectable } from "@nestjs/common";
import type { CliRuntimeOptions } from "../config/types";

const RUNTIME_OPTION_KEYS: ReadonlyArray<keyof CliRuntimeOptions> = [
  "env",
  "uri",
  "vaultPasswordFile",
  "outputFormat",
  "logLevel",
  "logFile",
  "timeout",
];

const BOOLEAN_OPTION_KEYS: ReadonlyArray<keyof CliRuntimeOptions> = ["logPretty"];

/** A repeated option keeps its last value. */
function lastString(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    return lastString(value[value.length - 1]);
  }
  return typeof value === "string" ? value : undefined;
}

@Injectable()
export class CliOptionsService {
  parse(options: Record<string, unknown>): CliRuntimeOptions {
    const runtime: CliRuntimeOptions = {};
    for (const key of RUNTIME_OPTION_KEYS) {
      const value = lastString(options[key]);
      if (value !== undefined) {
        runtime[key] = value;
      }
    }
    for (const key of BOOLEAN_OPTION_KEYS) {
      if (options[key] === true) {
        runtime[key] = "true";
      }
    }
    return runtime;
  }
}
