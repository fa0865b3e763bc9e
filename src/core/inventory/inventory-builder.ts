import type { Logger } from "pino";
import { InventoryError } from "../errors";
import type { FragmentLoader } from "../fragments/fragment-loader";
import { describeFragmentRef, type FragmentRef } from "../fragments/fragment-ref";
import { mergeAt, mergeMappings, type MergePolicy } from "../merge/merge-engine";
import { formatKeyPath } from "../tree/key-path";
import {
  cloneTree,
  getEntry,
  setEntry,
  type TreeMapping,
  type TreeValue,
} from "../tree/tree-value";
import { assertType, convertSequenceToMapping } from "../tree/type-guard";
import { resolveUri } from "../uri/uri-resolver";
import {
  emptyPlan,
  toEnvironmentPlan,
  type EnvironmentPlan,
  type FragmentCategory,
  type RootConfig,
} from "./root-config";

export type BuildState =
  | "Init"
  | "ResolveEnvironment"
  | "MergeHosts"
  | "MergeGroupVars"
  | "MergeHostVars"
  | "Normalize"
  | "Done"
  | "Failed";

const META_KEY = "_meta";
const HOSTVARS_KEY = "hostvars";
const PLATFORM_NAME_KEY = "platform_name";

interface WorkingTrees {
  hosts: TreeMapping;
  groupVars: TreeMapping;
  hostVars: TreeMapping;
}

/**
 * Builds inventory documents from one loaded root configuration. Fragments
 * are fetched one at a time in declared order; later fragments take
 * precedence.
 */
export class InventoryBuilder {
  constructor(
    readonly root: RootConfig,
    private readonly loader: FragmentLoader,
    private readonly logger: Logger
  ) {}

  /** Environment names declared upstream, sorted. */
  listEnvironments(): string[] {
    return Object.keys(this.root.environments).sort();
  }

  /**
   * The raw include lists, neither fetched nor merged: every environment, or
   * the entry of `environment` (`null` when it is not declared).
   */
  describeIncludes(environment?: string): TreeValue {
    if (environment === undefined) {
      return cloneTree(this.root.environments);
    }
    const entry = getEntry(this.root.environments, environment);
    return entry === undefined ? null : cloneTree(entry);
  }

  /** Top-level groups of the built inventory, without `_meta`, sorted. */
  async listGroups(environment: string): Promise<string[]> {
    const inventory = await this.generate(environment);
    return Object.keys(inventory)
      .filter((group) => group !== META_KEY)
      .sort();
  }

  async generate(environment: string): Promise<TreeMapping> {
    const logger = this.logger.child({ environment });
    let state: BuildState = "Init";
    const enter = (next: BuildState) => {
      logger.debug({ from: state, to: next }, "Inventory build state change");
      state = next;
    };

    try {
      enter("ResolveEnvironment");
      const plan = this.resolveEnvironment(environment, logger);

      enter("MergeHosts");
      let hosts: TreeMapping = {};
      hosts = await this.mergeCategory(hosts, environment, plan, "include", "union");
      hosts = await this.mergeCategory(hosts, environment, plan, "include_hosts", "union");

      enter("MergeGroupVars");
      const groupVars = await this.mergeCategory(
        {},
        environment,
        plan,
        "include_group_vars",
        "overlay"
      );

      enter("MergeHostVars");
      const hostVars = await this.mergeCategory(
        {},
        environment,
        plan,
        "include_host_vars",
        "overlay"
      );

      enter("Normalize");
      const inventory = this.normalize(environment, { hosts, groupVars, hostVars });

      enter("Done");
      return inventory;
    } catch (error) {
      if (error instanceof InventoryError) {
        error.withContext({ environment });
      }
      logger.debug({ state, err: error }, "Inventory build failed");
      enter("Failed");
      throw error;
    }
  }

  private resolveEnvironment(environment: string, logger: Logger): EnvironmentPlan {
    const entry = getEntry(this.root.environments, environment);
    if (entry === undefined) {
      logger.info(
        { kind: "UnknownEnvironment", uri: this.root.uri },
        "Environment is not declared upstream, producing an empty inventory"
      );
      return emptyPlan();
    }
    return toEnvironmentPlan(environment, entry);
  }

  private async mergeCategory(
    tree: TreeMapping,
    environment: string,
    plan: EnvironmentPlan,
    category: FragmentCategory,
    policy: MergePolicy
  ): Promise<TreeMapping> {
    let working = tree;
    for (const [index, reference] of plan[category].entries()) {
      const section = `${environment}:${category}[${index}]`;
      let uri: string | undefined;
      try {
        uri = resolveUri(this.root.uri, reference.path);
        const fragment = await this.loader.load(
          uri,
          reference.kind === "keyed" ? reference.format : undefined
        );
        working = this.mergeFragment(working, fragment, reference, section, policy);
        this.logger.debug(
          { environment, category, fragment: describeFragmentRef(reference), uri },
          "Merged fragment"
        );
      } catch (error) {
        if (error instanceof InventoryError) {
          error.withContext({
            environment,
            category,
            uri,
            keyPath: keyPathOf(reference),
          });
        }
        throw error;
      }
    }
    return working;
  }

  private mergeFragment(
    working: TreeMapping,
    fragment: TreeValue,
    reference: FragmentRef,
    section: string,
    policy: MergePolicy
  ): TreeMapping {
    const key = reference.kind === "keyed" ? reference.key : undefined;
    if (key !== undefined) {
      const target = policy === "union" ? normalizeGroups(working, section) : working;
      return mergeAt(target, key, fragment, section, policy);
    }

    assertType(fragment, ["mapping"], section);
    if (policy === "union") {
      return mergeMappings(
        normalizeGroups(working, section),
        normalizeGroups(fragment, section),
        section,
        policy
      );
    }
    return mergeMappings(working, fragment, section, policy);
  }

  private normalize(environment: string, trees: WorkingTrees): TreeMapping {
    const inventory: TreeMapping = {};

    // host variables: declared in _meta, then the host variable overlay
    const meta = getEntry(trees.hosts, META_KEY) ?? {};
    assertType(meta, ["mapping"], `${environment}:${META_KEY}`);
    const hostvarsSection = `${environment}:${META_KEY}.${HOSTVARS_KEY}`;
    const declaredHostvars = getEntry(meta, HOSTVARS_KEY) ?? {};
    assertType(declaredHostvars, ["mapping"], hostvarsSection);
    const hostvars: TreeMapping = {};
    for (const [host, vars] of Object.entries(declaredHostvars)) {
      assertType(vars, ["mapping"], `${hostvarsSection}.${host}`);
      setEntry(hostvars, host, cloneTree(vars));
    }
    for (const [host, vars] of Object.entries(trees.hostVars)) {
      const section = `${environment}:include_host_vars:${host}`;
      assertType(vars, ["mapping"], section);
      const current = getEntry(hostvars, host) ?? {};
      assertType(current, ["mapping"], `${hostvarsSection}.${host}`);
      setEntry(hostvars, host, mergeMappings(current, vars, section, "overlay"));
    }
    const normalizedMeta = cloneMetaExtras(meta);
    normalizedMeta[HOSTVARS_KEY] = hostvars;
    inventory[META_KEY] = normalizedMeta;

    // every group is a mapping with a `vars` mapping
    for (const [group, value] of Object.entries(trees.hosts)) {
      if (group === META_KEY) continue;
      const section = `${environment}:${group}`;
      const body = convertSequenceToMapping(value, section);
      const vars = getEntry(body, "vars") ?? {};
      assertType(vars, ["mapping"], `${section}.vars`);
      const normalized: TreeMapping = {};
      for (const [key, child] of Object.entries(body)) {
        setEntry(normalized, key, cloneTree(child));
      }
      normalized.vars = cloneTree(vars);
      setEntry(inventory, group, normalized);
    }

    // group variables overlay each group's vars
    for (const [group, vars] of Object.entries(trees.groupVars)) {
      const section = `${environment}:include_group_vars:${group}`;
      assertType(vars, ["mapping"], section);
      const target = getEntry(inventory, group) ?? { vars: {} };
      assertType(target, ["mapping"], `${environment}:${group}`);
      const current = getEntry(target, "vars") ?? {};
      assertType(current, ["mapping"], `${environment}:${group}.vars`);
      setEntry(inventory, group, {
        ...target,
        vars: mergeMappings(current, vars, section, "overlay"),
      });
    }

    const all = getEntry(inventory, "all") ?? { vars: {} };
    assertType(all, ["mapping"], `${environment}:all`);
    const allVars = getEntry(all, "vars") ?? {};
    assertType(allVars, ["mapping"], `${environment}:all.vars`);
    if (getEntry(allVars, PLATFORM_NAME_KEY) === undefined) {
      inventory.all = {
        ...all,
        vars: { ...allVars, [PLATFORM_NAME_KEY]: environment },
      };
    }

    return inventory;
  }
}

/** Fragments may list a group as a bare sequence of hosts. */
function normalizeGroups(tree: TreeMapping, section: string): TreeMapping {
  const result: TreeMapping = {};
  for (const [group, value] of Object.entries(tree)) {
    setEntry(
      result,
      group,
      group === META_KEY ? value : convertSequenceToMapping(value, `${section}:${group}`)
    );
  }
  return result;
}

function cloneMetaExtras(meta: TreeMapping): TreeMapping {
  const extras: TreeMapping = {};
  for (const [key, value] of Object.entries(meta)) {
    if (key !== HOSTVARS_KEY) setEntry(extras, key, cloneTree(value));
  }
  return extras;
}

function keyPathOf(reference: FragmentRef): string | undefined {
  return reference.kind === "keyed" && reference.key
    ? formatKeyPath(reference.key)
    : undefined;
}
