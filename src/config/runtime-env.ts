import { ENV_VARIABLES } from "./defaults";
import type { CliRuntimeOptions } from "./types";

function parseString(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function resolveCliRuntimeOptionsFromEnv(
  env: NodeJS.ProcessEnv
): CliRuntimeOptions {
  const options: CliRuntimeOptions = {};

  for (const [key, variable] of Object.entries(ENV_VARIABLES)) {
    const value = parseString(env[variable]);
    if (value !== undefined && isRuntimeOptionKey(key)) {
      options[key] = value;
    }
  }

  return options;
}

function isRuntimeOptionKey(key: string): key is keyof CliRuntimeOptions {
  return Object.hasOwn(ENV_VARIABLES, key);
}
