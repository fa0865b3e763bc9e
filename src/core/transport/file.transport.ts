import fs from "fs/promises";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";
import { NotFoundError, RetrievalFailedError } from "../errors";
import { parseUri } from "../uri/uri-resolver";
import type { FragmentTransport } from "./transport.types";

const MISSING_CODES = new Set(["ENOENT", "ENOTDIR"]);

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function expandHome(filePath: string, homeDir = os.homedir()): string {
  if (filePath === "~") return homeDir;
  if (filePath.startsWith("~/")) return path.join(homeDir, filePath.slice(2));
  return filePath;
}

export class FileTransport implements FragmentTransport {
  readonly schemes = ["file"] as const;

  toLocalPath(uri: string): string {
    if (parseUri(uri).scheme === undefined) {
      return path.resolve(expandHome(uri));
    }
    try {
      return fileURLToPath(uri);
    } catch (error) {
      throw new RetrievalFailedError(
        `Cannot map ${uri} to a local file`,
        { uri },
        undefined,
        { cause: error }
      );
    }
  }

  async read(uri: string): Promise<string> {
    const localPath = this.toLocalPath(uri);
    try {
      const data = await fs.readFile(localPath, "utf-8");
      return data.trim();
    } catch (error) {
      const code = errorCode(error);
      if (code !== undefined && MISSING_CODES.has(code)) {
        throw new NotFoundError(`The file ${localPath} was not found`, { uri }, { cause: error });
      }
      throw new RetrievalFailedError(
        `Could not read file ${localPath}: ${error instanceof Error ? error.message : String(error)}`,
        { uri },
        undefined,
        { cause: error }
      );
    }
  }
}
