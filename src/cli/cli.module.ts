import { Module, type Provider } from "@nestjs/common";
import { ConfigModule } from "../config/config.module";
import { CoreModule } from "../core/core.module";
import { IoModule } from "../io/io.module";
import { CliOptionsService } from "./cli-options.service";
import { CliParserService } from "./cli-parser.service";
import { CliRunnerService } from "./cli-runner.service";
import { CLI_COMMANDS } from "./cli.constants";
import { CreateLinksCommand } from "./commands/createlinks.command";
import { HostCommand } from "./commands/host.command";
import { ListCommand } from "./commands/list.command";
import { ShowCommand } from "./commands/show.command";
import { TreeCommand } from "./commands/tree.command";
import type { CliCommand } from "./commands/cli-command";

const commandProviders: Provider[] = [
  ListCommand,
  HostCommand,
  ShowCommand,
  TreeCommand,
  CreateLinksCommand,
  {
    provide: CLI_COMMANDS,
    useFactory: (
      list: ListCommand,
      host: HostCommand,
      show: ShowCommand,
      tree: TreeCommand,
      createLinks: CreateLinksCommand
    ): CliCommand[] => [list, host, show, tree, createLinks],
    inject: [ListCommand, HostCommand, ShowCommand, TreeCommand, CreateLinksCommand],
  },
];

/**
 * CliModule bundles the CLI surface so commands and supporting services can be
 * injected wherever a Nest application context is available.
 */
@Module({
  imports: [ConfigModule, CoreModule, IoModule],
  providers: [
    CliOptionsService,
    CliParserService,
    CliRunnerService,
    ...commandProviders,
  ],
  exports: [CliRunnerService],
})
export class CliModule {}
