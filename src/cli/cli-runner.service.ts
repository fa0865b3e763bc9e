import { Inject, Injectable } from "@nestjs/common";
import { ConfigService } from "../config/config.service";
import { LoggerService } from "../io/logger.service";
import { CLI_COMMANDS } from "./cli.constants";
import type { CliCommand } from "./commands/cli-command";
import type { CliArguments } from "./cli-arguments";
import { CliOptionsService } from "./cli-options.service";
import { CliParserService, CliParseError } from "./cli-parser.service";

const OPTIONS_USAGE = [
  "  -e, --env <name>              environment (or INVENTORY_ENV)",
  "  -u, --uri <uri>               root configuration (or INVENTORY_URI)",
  "      --vault-password-file <p> vault password file (or VAULT_PASSWORD_FILE)",
  "  -o, --output-format <fmt>     yaml or json (or INVENTORY_FORMAT)",
  "      --log-level <level>       log level (or INVENTORY_LOG_LEVEL)",
  "      --log-file <path>         log to a file (or INVENTORY_LOG_FILE)",
  "      --log-pretty              human readable logs on stderr (or INVENTORY_LOG_PRETTY)",
  "      --timeout <ms>            HTTP timeout (or INVENTORY_HTTP_TIMEOUT)",
  "  -h, --help                    show this help",
];

@Injectable()
export class CliRunnerService {
  constructor(
    @Inject(CliParserService) private readonly parser: CliParserService,
    @Inject(CliOptionsService) private readonly optionsService: CliOptionsService,
    @Inject(ConfigService) private readonly configService: ConfigService,
    @Inject(LoggerService) private readonly loggerService: LoggerService,
    @Inject(CLI_COMMANDS) private readonly commands: CliCommand[]
  ) {}

  async run(argv: string[]): Promise<void> {
    const normalizedArgs = argv[0] === "--" ? argv.slice(1) : argv;

    if (normalizedArgs.length === 0 || normalizedArgs.some((token) => this.isHelpRequest(token))) {
      this.printUsage();
      if (normalizedArgs.length === 0) {
        throw new Error("No command provided.");
      }
      return;
    }

    let parsed: CliArguments;
    try {
      parsed = this.parser.parse(normalizedArgs);
    } catch (error) {
      if (error instanceof CliParseError) {
        this.printUsage();
        throw new Error(error.message);
      }
      throw error;
    }

    const command = this.resolveCommand(parsed.command);
    if (!command) {
      throw new Error(`Unknown command: ${parsed.command}`);
    }

    const config = this.configService.resolve(
      this.optionsService.parse(parsed.options)
    );
    this.loggerService.configure(config.logging);
    this.loggerService
      .getLogger("cli")
      .debug(
        { command: command.metadata.name, environment: config.environment },
        "Executing command"
      );

    await command.execute(parsed, config);
  }

  private resolveCommand(name: string): CliCommand | undefined {
    const normalized = name.toLowerCase();
    return this.commands.find((command) => {
      const { metadata } = command;
      if (metadata.name === normalized) {
        return true;
      }
      return metadata.aliases?.some((alias) => alias.toLowerCase() === normalized);
    });
  }

  private isHelpRequest(token: string): boolean {
    return ["help", "-h", "--help"].includes(token);
  }

  private printUsage(): void {
    const rows = this.commands.map(({ metadata }) => {
      const usage = metadata.argument
        ? `--${metadata.name} ${metadata.argument}`
        : `--${metadata.name}`;
      return `  ${usage.padEnd(28)}${metadata.description}`;
    });

    console.log("Usage: inventory <mode> [options]");
    console.log("");
    console.log("Modes (also accepted as command words, e.g. `inventory list`):");
    for (const row of rows) {
      console.log(row);
    }
    console.log("");
    console.log("Options:");
    for (const row of OPTIONS_USAGE) {
      console.log(row);
    }
  }
}
