import path from "path";
import yaml from "yaml";
import { ParseError, UnsupportedFormatError } from "../errors";
import { parseUri } from "../uri/uri-resolver";
import { toTreeValue, type TreeValue } from "../tree/tree-value";

export type DataFormat = "yaml" | "json";

export interface FormatCodec {
  readonly format: DataFormat;
  parse(text: string, source: string): TreeValue;
  serialize(tree: TreeValue): string;
}

const FORMAT_ALIASES = new Map<string, DataFormat>([
  ["yaml", "yaml"],
  ["yml", "yaml"],
  ["json", "json"],
]);

const describeCause = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const YAML_CODEC: FormatCodec = {
  format: "yaml",
  parse(text, source) {
    let parsed: unknown;
    try {
      parsed = yaml.parse(text);
    } catch (error) {
      throw new ParseError(
        `Failed to parse YAML from ${source}: ${describeCause(error)}`,
        { uri: source },
        { cause: error }
      );
    }
    return toTreeValue(parsed ?? null, source);
  },
  serialize(tree) {
    return yaml.stringify(tree);
  },
};

export const JSON_CODEC: FormatCodec = {
  format: "json",
  parse(text, source) {
    let parsed: unknown;
    try {
      parsed = text.trim() === "" ? null : JSON.parse(text);
    } catch (error) {
      throw new ParseError(
        `Failed to parse JSON from ${source}: ${describeCause(error)}`,
        { uri: source },
        { cause: error }
      );
    }
    return toTreeValue(parsed, source);
  },
  serialize(tree) {
    return `${JSON.stringify(tree, null, 2)}\n`;
  },
};

const CODECS: Record<DataFormat, FormatCodec> = {
  yaml: YAML_CODEC,
  json: JSON_CODEC,
};

export function getCodec(format: DataFormat): FormatCodec {
  return CODECS[format];
}

/** Accepts `yaml`, `yml` or `json` in any case, with or without a dot. */
export function normalizeFormat(name: string, source?: string): DataFormat {
  const key = name.trim().toLowerCase().replace(/^\./, "");
  const format = FORMAT_ALIASES.get(key);
  if (!format) {
    throw new UnsupportedFormatError(name, source ? { uri: source } : {});
  }
  return format;
}

/** Derives the format from the suffix of the URI path. */
export function inferFormat(uri: string): DataFormat {
  const extension = path.posix.extname(parseUri(uri).path);
  return normalizeFormat(extension, uri);
}
