import { TypeMismatchError, type InventoryErrorContext } from "../errors";
import {
  kindOf,
  isMapping,
  isSequence,
  type TreeKind,
  type TreeMapping,
  type TreeSequence,
  type TreeValue,
} from "./tree-value";

type KindToValue = {
  mapping: TreeMapping;
  sequence: TreeSequence;
  scalar: Exclude<TreeValue, TreeMapping | TreeSequence>;
};

/**
 * Fails with `TypeMismatch` unless `value` is one of `allowed`. `section`
 * is the human readable location, e.g. `prod:include_hosts`.
 */
export function assertType<K extends TreeKind>(
  value: TreeValue,
  allowed: readonly K[],
  section: string,
  context: InventoryErrorContext = {}
): asserts value is KindToValue[K] {
  const actual = kindOf(value);
  const kinds: readonly TreeKind[] = allowed;
  if (kinds.includes(actual)) {
    return;
  }
  throw new TypeMismatchError(
    `invalid type '${actual}' in section '${section}', must be: ${allowed.join(", ")}`,
    { actual, allowed },
    { section, ...context }
  );
}

/** `[a, b]` becomes `{hosts: [a, b]}`; mappings pass through unchanged. */
export function convertSequenceToMapping(
  value: TreeValue,
  section: string
): TreeMapping {
  if (isSequence(value)) {
    return { hosts: value };
  }
  if (isMapping(value)) {
    return value;
  }
  throw new TypeMismatchError(
    `invalid type '${kindOf(value)}' in section '${section}', must be: sequence, mapping`,
    { actual: kindOf(value), allowed: ["sequence", "mapping"] },
    { section }
  );
}
