import { Inject, Injectable } from "@nestjs/common";
import { InventoryService } from "../../core/inventory/inventory.service";
import type { InventoryRuntimeConfig } from "../../config/types";
import type { CliArguments } from "../cli-arguments";
import type { CliCommand, CliCommandMetadata } from "./cli-command";
import { inventoryOptions, printTree } from "./command-support";

@Injectable()
export class TreeCommand implements CliCommand {
  readonly metadata: CliCommandMetadata = {
    name: "tree",
    description: "Print the declared includes without fetching them.",
  };

  constructor(
    @Inject(InventoryService) private readonly inventoryService: InventoryService
  ) {}

  async execute(_args: CliArguments, config: InventoryRuntimeConfig): Promise<void> {
    const builder = await this.inventoryService.open(inventoryOptions(config));
    printTree(builder.describeIncludes(config.environment), config);
  }
}
