import { ParseError, type TreeKindName } from "../errors";

export type TreeScalar = string | number | boolean | null;
export type TreeSequence = TreeValue[];
export interface TreeMapping {
  [key: string]: TreeValue;
}
export type TreeValue = TreeScalar | TreeSequence | TreeMapping;

export type TreeKind = TreeKindName;

export function isSequence(value: TreeValue): value is TreeSequence {
  return Array.isArray(value);
}

export function isMapping(value: TreeValue): value is TreeMapping {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function kindOf(value: TreeValue): TreeKind {
  if (isSequence(value)) return "sequence";
  if (isMapping(value)) return "mapping";
  return "scalar";
}

export function getEntry(
  mapping: TreeMapping,
  key: string
): TreeValue | undefined {
  return Object.hasOwn(mapping, key) ? mapping[key] : undefined;
}

/** Assigns an own property, so keys such as `__proto__` stay plain data. */
export function setEntry(
  mapping: TreeMapping,
  key: string,
  value: TreeValue
): void {
  Object.defineProperty(mapping, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

export function cloneTree(value: TreeValue): TreeValue {
  if (isSequence(value)) {
    return value.map(cloneTree);
  }
  if (isMapping(value)) {
    return cloneMapping(value);
  }
  return value;
}

export function cloneMapping(mapping: TreeMapping): TreeMapping {
  const copy: TreeMapping = {};
  for (const [key, child] of Object.entries(mapping)) {
    setEntry(copy, key, cloneTree(child));
  }
  return copy;
}

/**
 * Stable textual identity of a value, used to compare sequence elements.
 * Mapping keys are sorted so `{a: 1, b: 2}` and `{b: 2, a: 1}` are equal.
 */
export function canonicalKey(value: TreeValue): string {
  if (isSequence(value)) {
    return `[${value.map(canonicalKey).join(",")}]`;
  }
  if (isMapping(value)) {
    const entries = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalKey(value[key])}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value);
}

function isPlainObject(value: object): boolean {
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Narrows a parser result to a tree value. Anything a YAML or JSON document
 * cannot express as plain data (dates, binary, class instances) is rejected.
 */
export function toTreeValue(input: unknown, source: string): TreeValue {
  const visit = (value: unknown, path: string): TreeValue => {
    if (
      value === null ||
      typeof value === "string" ||
      typeof value === "number" ||
      typeof value === "boolean"
    ) {
      return value;
    }
    if (Array.isArray(value)) {
      return value.map((item: unknown, index) => visit(item, `${path}[${index}]`));
    }
    if (typeof value === "object" && isPlainObject(value)) {
      const mapping: TreeMapping = {};
      for (const [key, child] of Object.entries(value)) {
        setEntry(mapping, key, visit(child, path ? `${path}.${key}` : key));
      }
      return mapping;
    }
    const at = path === "" ? "document root" : `'${path}'`;
    throw new ParseError(`Unsupported value of type ${typeof value} at ${at}`, {
      uri: source,
    });
  };

  return visit(input, "");
}
