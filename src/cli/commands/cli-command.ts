import type { InventoryRuntimeConfig } from "../../config/types";
import type { CliArguments } from "../cli-arguments";

export interface CliCommandMetadata {
  readonly name: string;
  readonly description: string;
  readonly aliases?: string[];
  /** Usage of the command's positional argument, e.g. `<dir>`. */
  readonly argument?: string;
}

export interface CliCommand {
  readonly metadata: CliCommandMetadata;
  execute(args: CliArguments, config: InventoryRuntimeConfig): Promise<void>;
}
