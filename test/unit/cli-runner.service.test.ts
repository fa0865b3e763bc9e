import "reflect-metadata";
import { describe, it, expect, vi, afterEach } from "vitest";
import { CliOptionsService } from "../../src/cli/cli-options.service";
import { CliParserService } from "../../src/cli/cli-parser.service";
import { CliRunnerService } from "../../src/cli/cli-runner.service";
import type { CliCommand } from "../../src/cli/commands/cli-command";
import { ConfigService } from "../../src/config/config.service";
import type { RuntimeContext } from "../../src/config/runtime-context";
import { ConfigError } from "../../src/core/errors";
import { LoggerService } from "../../src/io/logger.service";

afterEach(() => {
  vi.restoreAllMocks();
});

const context: RuntimeContext = {
  env: { INVENTORY_URI: "/srv/inventory/config.yaml" },
  executable: "/opt/inventory/bin/inventory",
  cwd: "/work",
  homeDir: "/home/ops",
  isSymlink: () => false,
  isFile: () => false,
  realpath: (filePath) => filePath,
};

const createStubCommand = (name: string, aliases: string[] = []) => {
  const execute = vi.fn<CliCommand["execute"]>().mockResolvedValue(undefined);
  const command: CliCommand = {
    metadata: { name, description: `${name} description`, aliases },
    execute,
  };
  return { command, execute };
};

const createRunner = () => {
  const list = createStubCommand("list");
  const show = createStubCommand("show", ["groups"]);
  const runner = new CliRunnerService(
    new CliParserService(),
    new CliOptionsService(),
    new ConfigService(context),
    new LoggerService(),
    [list.command, show.command]
  );
  return { runner, list, show };
};

describe("CliRunnerService", () => {
  it("prints usage and fails without arguments", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const { runner } = createRunner();

    await expect(runner.run([])).rejects.toThrowError("No command provided.");
    expect(log).toHaveBeenCalledWith("Usage: inventory <mode> [options]");
  });

  it("prints usage for --help without executing anything", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const { runner, list } = createRunner();

    await runner.run(["--list", "--help"]);

    expect(list.execute).not.toHaveBeenCalled();
    expect(log).toHaveBeenCalledWith(`  ${"--list".padEnd(28)}list description`);
  });

  it("prints usage and rethrows parse errors", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const { runner } = createRunner();

    await expect(runner.run(["--list", "--bogus"])).rejects.toThrowError(
      "Unknown option: --bogus"
    );
    expect(log).toHaveBeenCalledWith("Usage: inventory <mode> [options]");
  });

  it("executes the selected command with the resolved configuration", async () => {
    const { runner, list } = createRunner();

    await runner.run(["--", "--list", "-e", "prod", "-o", "json"]);

    expect(list.execute).toHaveBeenCalledTimes(1);
    const [args, config] = list.execute.mock.calls[0] ?? [];
    expect(args).toEqual({
      command: "list",
      options: { env: "prod", outputFormat: "json" },
      positionals: [],
    });
    expect(config).toMatchObject({
      environment: "prod",
      environmentSource: "flag",
      uri: "/srv/inventory/config.yaml",
      outputFormat: "json",
    });
  });

  it("fails on a command without a registered handler", async () => {
    const { runner } = createRunner();
    await expect(runner.run(["--tree"])).rejects.toThrowError("Unknown command: tree");
  });

  it("propagates configuration errors before executing", async () => {
    const { runner, show } = createRunner();

    await expect(runner.run(["show", "--timeout", "-5"])).rejects.toThrowError(
      "Option --timeout requires a value."
    );
    await expect(runner.run(["show", "--timeout=-5"])).rejects.toThrowError(ConfigError);
    expect(show.execute).not.toHaveBeenCalled();
  });
});
