import fs from "fs/promises";
import os from "os";
import path from "path";

export interface FixtureDir {
  readonly root: string;
  write(relativePath: string, content: string): Promise<string>;
  cleanup(): Promise<void>;
}

export async function createFixtureDir(prefix = "inventory-test-"): Promise<FixtureDir> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  return {
    root,
    async write(relativePath, content) {
      const target = path.join(root, relativePath);
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, content, "utf-8");
      return target;
    },
    async cleanup() {
      await fs.rm(root, { recursive: true, force: true });
    },
  };
}
