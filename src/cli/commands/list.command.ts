import { Inject, Injectable } from "@nestjs/common";
import { InventoryService } from "../../core/inventory/inventory.service";
import type { InventoryRuntimeConfig } from "../../config/types";
import { LoggerService } from "../../io/logger.service";
import type { CliArguments } from "../cli-arguments";
import type { CliCommand, CliCommandMetadata } from "./cli-command";
import { inventoryOptions, printTree, requireEnvironment } from "./command-support";

@Injectable()
export class ListCommand implements CliCommand {
  readonly metadata: CliCommandMetadata = {
    name: "list",
    description: "Print the merged inventory of the selected environment.",
  };

  constructor(
    @Inject(InventoryService) private readonly inventoryService: InventoryService,
    @Inject(LoggerService) private readonly loggerService: LoggerService
  ) {}

  async execute(_args: CliArguments, config: InventoryRuntimeConfig): Promise<void> {
    const environment = requireEnvironment(config);
    const logger = this.loggerService.getLogger("cli:list");
    logger.debug(
      { environment, source: config.environmentSource, uri: config.uri },
      "Building inventory"
    );

    const builder = await this.inventoryService.open(inventoryOptions(config));
    printTree(await builder.generate(environment), config);
  }
}
