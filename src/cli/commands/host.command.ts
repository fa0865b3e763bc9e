import { Injectable } from "@nestjs/common";
import type { InventoryRuntimeConfig } from "../../config/types";
import type { CliArguments } from "../cli-arguments";
import { CliParseError } from "../cli-parser.service";
import type { CliCommand, CliCommandMetadata } from "./cli-command";
import { printTree, requireEnvironment } from "./command-support";

/**
 * Host variables are already part of `_meta.hostvars` in the `list` output,
 * so per-host queries answer with an empty mapping.
 */
@Injectable()
export class HostCommand implements CliCommand {
  readonly metadata: CliCommandMetadata = {
    name: "host",
    description: "Print the variables of one host (always empty).",
    argument: "<name>",
  };

  async execute(args: CliArguments, config: InventoryRuntimeConfig): Promise<void> {
    requireEnvironment(config);
    if (args.positionals.length === 0) {
      throw new CliParseError("host requires a host name.");
    }
    printTree({}, config);
  }
}
