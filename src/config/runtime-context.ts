import fs from "fs";
import os from "os";
import path from "path";

/** What the configuration resolver needs to know about the running process. */
export interface RuntimeContext {
  readonly env: NodeJS.ProcessEnv;
  /** The invoked entry point, as typed (not resolved through symlinks). */
  readonly executable: string;
  readonly cwd: string;
  readonly homeDir: string;
  isSymlink(filePath: string): boolean;
  isFile(filePath: string): boolean;
  realpath(filePath: string): string;
}

export const RUNTIME_CONTEXT = Symbol("INVENTORY_RUNTIME_CONTEXT");

export function createProcessRuntimeContext(
  proc: NodeJS.Process = process
): RuntimeContext {
  return {
    env: proc.env,
    executable: path.resolve(proc.argv[1] ?? proc.argv0),
    cwd: proc.cwd(),
    homeDir: os.homedir(),
    isSymlink: (filePath) =>
      fs.lstatSync(filePath, { throwIfNoEntry: false })?.isSymbolicLink() ?? false,
    isFile: (filePath) =>
      fs.statSync(filePath, { throwIfNoEntry: false })?.isFile() ?? false,
    realpath: (filePath) => fs.realpathSync(filePath),
  };
}
