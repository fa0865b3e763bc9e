export type KeyPath = readonly string[];

/**
 * Segments are taken as given from a list. A string is split on `/` when it
 * contains one (`_meta/hostvars/web1.example.com`), otherwise on `.`
 * (`all.vars`). Empty segments are dropped, so `/` addresses the root.
 */
export function parseKeyPath(key: string | readonly string[]): KeyPath {
  if (typeof key !== "string") {
    return key.filter((segment) => segment.length > 0);
  }
  const separator = key.includes("/") ? "/" : ".";
  return key.split(separator).filter((segment) => segment.length > 0);
}

export function formatKeyPath(path: KeyPath): string {
  return path.join("/");
}

