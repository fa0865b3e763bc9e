import { TypeMismatchError } from "../errors";
import { formatKeyPath, type KeyPath } from "../tree/key-path";
import { assertType } from "../tree/type-guard";
import {
  canonicalKey,
  cloneTree,
  getEntry,
  isMapping,
  isSequence,
  kindOf,
  setEntry,
  type TreeMapping,
  type TreeSequence,
  type TreeValue,
} from "../tree/tree-value";

/**
 * `union`: host collections. Sequences are combined as sets, mappings merge
 * recursively, and any other collision is a `TypeMismatch`.
 *
 * `overlay`: variables. Mappings merge recursively, everything else is
 * replaced by the incoming value.
 */
export type MergePolicy = "union" | "overlay";

/** Base elements first, then unseen incoming ones, each without duplicates. */
export function unionSequences(
  base: TreeSequence,
  incoming: TreeSequence
): TreeSequence {
  const seen = new Set<string>();
  const result: TreeSequence = [];
  for (const item of [...base, ...incoming]) {
    const key = canonicalKey(item);
    if (!seen.has(key)) {
      seen.add(key);
      result.push(cloneTree(item));
    }
  }
  return result;
}

function conflict(
  base: TreeValue,
  incoming: TreeValue,
  section: string,
  path: KeyPath
): TypeMismatchError {
  const baseKind = kindOf(base);
  const incomingKind = kindOf(incoming);
  const at = path.length > 0 ? formatKeyPath(path) : "<root>";
  const reason =
    baseKind === incomingKind
      ? `conflicting ${baseKind} values`
      : `cannot merge ${incomingKind} into ${baseKind}`;
  return new TypeMismatchError(
    `${reason} at '${at}' in section '${section}'`,
    {
      actual: incomingKind,
      allowed: baseKind === "scalar" ? [] : [baseKind],
    },
    { section, keyPath: at }
  );
}

function mergeValue(
  base: TreeValue,
  incoming: TreeValue,
  section: string,
  policy: MergePolicy,
  path: KeyPath
): TreeValue {
  if (isMapping(base) && isMapping(incoming)) {
    return mergeMappingsAt(base, incoming, section, policy, path);
  }
  if (policy === "overlay") {
    return cloneTree(incoming);
  }
  if (isSequence(base) && isSequence(incoming)) {
    return unionSequences(base, incoming);
  }
  throw conflict(base, incoming, section, path);
}

function mergeMappingsAt(
  base: TreeMapping,
  incoming: TreeMapping,
  section: string,
  policy: MergePolicy,
  path: KeyPath
): TreeMapping {
  const result: TreeMapping = {};
  for (const [key, value] of Object.entries(base)) {
    const other = getEntry(incoming, key);
    setEntry(
      result,
      key,
      other === undefined
        ? cloneTree(value)
        : mergeValue(value, other, section, policy, [...path, key])
    );
  }
  for (const [key, value] of Object.entries(incoming)) {
    if (!Object.hasOwn(base, key)) {
      setEntry(result, key, cloneTree(value));
    }
  }
  return result;
}

/**
 * Merges `incoming` into `base` without touching either. `section` names the
 * fragment being merged and ends up in any `TypeMismatch` raised.
 */
export function mergeTrees(
  base: TreeValue,
  incoming: TreeValue,
  section: string,
  policy: MergePolicy
): TreeValue {
  return mergeValue(base, incoming, section, policy, []);
}

export function mergeMappings(
  base: TreeMapping,
  incoming: TreeMapping,
  section: string,
  policy: MergePolicy
): TreeMapping {
  return mergeMappingsAt(base, incoming, section, policy, []);
}

/**
 * Merges `incoming` into the subtree of `tree` addressed by `keyPath`. A
 * missing subtree is created from `incoming` as-is, with any missing parent
 * mappings; an existing one is merged under `policy`.
 */
export function mergeAt(
  tree: TreeMapping,
  keyPath: KeyPath,
  incoming: TreeValue,
  section: string,
  policy: MergePolicy
): TreeMapping {
  const descend = (node: TreeMapping, depth: number): TreeMapping => {
    const key = keyPath[depth];
    const traversed = keyPath.slice(0, depth + 1);
    const existing = getEntry(node, key);
    const isLast = depth === keyPath.length - 1;

    let next: TreeValue;
    if (existing === undefined) {
      next = cloneTree(incoming);
      for (let index = keyPath.length - 1; index > depth; index -= 1) {
        const wrapper: TreeMapping = {};
        setEntry(wrapper, keyPath[index], next);
        next = wrapper;
      }
    } else if (isLast) {
      next = mergeValue(existing, incoming, section, policy, traversed);
    } else if (isMapping(existing)) {
      next = descend(existing, depth + 1);
    } else {
      throw new TypeMismatchError(
        `invalid type '${kindOf(existing)}' at '${formatKeyPath(traversed)}' in section '${section}', must be: mapping`,
        { actual: kindOf(existing), allowed: ["mapping"] },
        { section, keyPath: formatKeyPath(keyPath) }
      );
    }

    const result: TreeMapping = {};
    for (const [childKey, value] of Object.entries(node)) {
      setEntry(result, childKey, childKey === key ? next : cloneTree(value));
    }
    if (existing === undefined) {
      setEntry(result, key, next);
    }
    return result;
  };

  if (keyPath.length === 0) {
    assertType(incoming, ["mapping"], section);
    return mergeMappings(tree, incoming, section, policy);
  }
  return descend(tree, 0);
}
