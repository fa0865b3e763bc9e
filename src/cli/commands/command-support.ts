import { ConfigError } from "../../core/errors";
import { getCodec } from "../../core/formats/format-codec";
import type { OpenInventoryOptions } from "../../core/inventory/inventory.service";
import type { TreeValue } from "../../core/tree/tree-value";
import type { InventoryRuntimeConfig } from "../../config/types";
import { ENV_VARIABLES } from "../../config/defaults";
import { CliParseError } from "../cli-parser.service";

export const MISSING_ENVIRONMENT_MESSAGE = `Error: Missing environment, use --env or \`export ${ENV_VARIABLES.env}\``;

export function requireEnvironment(config: InventoryRuntimeConfig): string {
  if (!config.environment) {
    throw new CliParseError(MISSING_ENVIRONMENT_MESSAGE);
  }
  return config.environment;
}

export function requireUri(config: InventoryRuntimeConfig): string {
  if (!config.uri) {
    throw new ConfigError(
      `No root configuration found, use --uri or \`export ${ENV_VARIABLES.uri}\``
    );
  }
  return config.uri;
}

export function printTree(tree: TreeValue, config: InventoryRuntimeConfig): void {
  console.log(getCodec(config.outputFormat).serialize(tree).trimEnd());
}

export function inventoryOptions(
  config: InventoryRuntimeConfig
): OpenInventoryOptions {
  return {
    uri: requireUri(config),
    timeoutMs: config.http.timeoutMs,
    vault: {
      passwordFile: config.vault.passwordFile,
      source: config.vault.source,
    },
  };
}
