import { Inject, Injectable } from "@nestjs/common";
import { InventoryService } from "../../core/inventory/inventory.service";
import type { InventoryRuntimeConfig } from "../../config/types";
import type { CliArguments } from "../cli-arguments";
import type { CliCommand, CliCommandMetadata } from "./cli-command";
import { inventoryOptions } from "./command-support";

@Injectable()
export class ShowCommand implements CliCommand {
  readonly metadata: CliCommandMetadata = {
    name: "show",
    description:
      "List upstream environments, or the groups of the selected environment.",
  };

  constructor(
    @Inject(InventoryService) private readonly inventoryService: InventoryService
  ) {}

  async execute(_args: CliArguments, config: InventoryRuntimeConfig): Promise<void> {
    const builder = await this.inventoryService.open(inventoryOptions(config));

    if (!config.environment) {
      console.log("Upstream environments:");
      for (const name of builder.listEnvironments()) {
        console.log(name);
      }
      return;
    }

    for (const group of await builder.listGroups(config.environment)) {
      console.log(group);
    }
  }
}
