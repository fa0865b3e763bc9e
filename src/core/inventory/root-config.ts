import { toFragmentRef, type FragmentRef } from "../fragments/fragment-ref";
import { assertType } from "../tree/type-guard";
import {
  getEntry,
  type TreeMapping,
  type TreeValue,
} from "../tree/tree-value";

export const FRAGMENT_CATEGORIES = [
  "include",
  "include_hosts",
  "include_group_vars",
  "include_host_vars",
] as const;

export type FragmentCategory = (typeof FRAGMENT_CATEGORIES)[number];

export interface RootConfig {
  readonly uri: string;
  readonly environments: TreeMapping;
}

/** The ordered fragment references of one environment, per category. */
export type EnvironmentPlan = Record<FragmentCategory, FragmentRef[]>;

export const ROOT_SECTION = "root configuration";

export function parseRootConfig(document: TreeValue, uri: string): RootConfig {
  assertType(document, ["mapping"], ROOT_SECTION, { uri });
  const environments = getEntry(document, "environments") ?? {};
  assertType(environments, ["mapping"], `${ROOT_SECTION}:environments`, { uri });
  return { uri, environments };
}

export function emptyPlan(): EnvironmentPlan {
  return {
    include: [],
    include_hosts: [],
    include_group_vars: [],
    include_host_vars: [],
  };
}

/**
 * Reads the category lists of an environment entry. A `null` entry or a
 * missing category counts as empty.
 */
export function toEnvironmentPlan(
  environment: string,
  entry: TreeValue
): EnvironmentPlan {
  const plan = emptyPlan();
  if (entry === null) {
    return plan;
  }
  assertType(entry, ["mapping"], environment, { environment });

  for (const category of FRAGMENT_CATEGORIES) {
    const references: TreeValue = getEntry(entry, category) ?? null;
    if (references === null) {
      continue;
    }
    const section = `${environment}:${category}`;
    assertType(references, ["sequence"], section, { environment, category });
    plan[category] = references.map((reference, index) =>
      toFragmentRef(reference, `${section}[${index}]`)
    );
  }
  return plan;
}
