import { Inject, Injectable } from "@nestjs/common";
import fs from "fs/promises";
import path from "path";
import { InventoryService } from "../../core/inventory/inventory.service";
import type { InventoryRuntimeConfig } from "../../config/types";
import { LoggerService } from "../../io/logger.service";
import type { CliArguments } from "../cli-arguments";
import { CliParseError } from "../cli-parser.service";
import type { CliCommand, CliCommandMetadata } from "./cli-command";
import { inventoryOptions } from "./command-support";

/**
 * Creates one symlink per environment pointing back at the executable, so
 * that invoking the link selects that environment by name.
 */
@Injectable()
export class CreateLinksCommand implements CliCommand {
  readonly metadata: CliCommandMetadata = {
    name: "createlinks",
    description: "Create a symlink named after every environment in <dir>.",
    argument: "<dir>",
  };

  constructor(
    @Inject(InventoryService) private readonly inventoryService: InventoryService,
    @Inject(LoggerService) private readonly loggerService: LoggerService
  ) {}

  async execute(args: CliArguments, config: InventoryRuntimeConfig): Promise<void> {
    const [directory] = args.positionals;
    if (!directory) {
      throw new CliParseError("createlinks requires a target directory.");
    }

    const logger = this.loggerService.getLogger("cli:createlinks");
    const builder = await this.inventoryService.open(inventoryOptions(config));
    const linkDir = path.resolve(directory);
    const target = path.relative(linkDir, config.executable);

    let failures = 0;
    for (const environment of builder.listEnvironments()) {
      const link = path.join(linkDir, environment);
      try {
        await fs.symlink(target, link);
        logger.info({ link, target }, "Created environment symlink");
      } catch (error) {
        failures += 1;
        const message = error instanceof Error ? error.message : String(error);
        console.error(
          `This symlink might already exist. Leaving it unchanged. Error: ${message}`
        );
      }
    }

    if (failures > 0) {
      throw new Error(`Failed to create ${failures} of the environment symlinks.`);
    }
  }
}
