import { Injectable } from "@nestjs/common";
import type { CliArguments } from "./cli-arguments";

export class CliParseError extends Error {}

/** Modes that may be selected by flag; `true` when the flag takes a value. */
const MODE_FLAGS = new Map<string, { command: string; takesValue: boolean }>([
  ["--list", { command: "list", takesValue: false }],
  ["--host", { command: "host", takesValue: true }],
  ["--show", { command: "show", takesValue: false }],
  ["--tree", { command: "tree", takesValue: false }],
  ["--createlinks", { command: "createlinks", takesValue: true }],
]);

const COMMAND_WORDS = new Set(["list", "host", "show", "tree", "createlinks"]);

function selectMode(current: string | undefined, mode: string, token: string): string {
  if (current !== undefined && current !== mode) {
    throw new CliParseError(`Conflicting modes: ${current} and ${token}; choose one.`);
  }
  return mode;
}

@Injectable()
export class CliParserService {
  private static readonly OPTION_ALIASES = new Map<string, string>([
    ["--env", "env"],
    ["-e", "env"],
    ["--uri", "uri"],
    ["-u", "uri"],
    ["--vault-password-file", "vaultPasswordFile"],
    ["--output-format", "outputFormat"],
    ["-o", "outputFormat"],
    ["--log-level", "logLevel"],
    ["--log-file", "logFile"],
    ["--timeout", "timeout"],
  ]);

  private static readonly BOOLEAN_FLAGS = new Map<string, string>([
    ["--log-pretty", "logPretty"],
  ]);

  parse(argv: string[]): CliArguments {
    if (argv.length === 0) {
      throw new CliParseError("No command provided.");
    }

    let command: string | undefined;
    const options: Record<string, unknown> = {};
    const positionals: string[] = [];

    for (let i = 0; i < argv.length; i += 1) {
      const raw = argv[i];
      if (raw === "--") {
        positionals.push(...argv.slice(i + 1));
        break;
      }

      if (!raw.startsWith("-")) {
        if (command === undefined && positionals.length === 0) {
          if (!COMMAND_WORDS.has(raw.toLowerCase())) {
            throw new CliParseError(`Unknown command: ${raw}`);
          }
          command = selectMode(command, raw.toLowerCase(), raw);
          continue;
        }
        positionals.push(raw);
        continue;
      }

      const separator = raw.startsWith("--") ? raw.indexOf("=") : -1;
      const token = separator === -1 ? raw : raw.slice(0, separator);
      const inlineValue = separator === -1 ? undefined : raw.slice(separator + 1);

      const takeValue = (): string => {
        if (inlineValue !== undefined) {
          return inlineValue;
        }
        const next = argv[i + 1];
        if (next === undefined || next.startsWith("-")) {
          throw new CliParseError(`Option ${token} requires a value.`);
        }
        i += 1;
        return next;
      };

      const mode = MODE_FLAGS.get(token);
      if (mode) {
        command = selectMode(command, mode.command, token);
        if (mode.takesValue) {
          positionals.unshift(takeValue());
        } else if (inlineValue !== undefined) {
          throw new CliParseError(`Option ${token} does not take a value.`);
        }
        continue;
      }

      const booleanKey = CliParserService.BOOLEAN_FLAGS.get(token);
      if (booleanKey) {
        if (inlineValue !== undefined) {
          throw new CliParseError(`Option ${token} does not take a value.`);
        }
        options[booleanKey] = true;
        continue;
      }

      const optionKey = CliParserService.OPTION_ALIASES.get(token);
      if (!optionKey) {
        throw new CliParseError(`Unknown option: ${token}`);
      }

      const value = takeValue();
      const existing = options[optionKey];
      if (existing === undefined) {
        options[optionKey] = value;
        continue;
      }

      if (Array.isArray(existing)) {
        existing.push(value);
        continue;
      }

      options[optionKey] = [existing, value];
    }

    if (command === undefined) {
      throw new CliParseError("No command provided.");
    }

    return { command, options, positionals };
  }
}
