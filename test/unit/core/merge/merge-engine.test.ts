import { describe, expect, it } from "vitest";
import { TypeMismatchError } from "../../../../src/core/errors";
import {
  mergeAt,
  mergeMappings,
  mergeTrees,
  unionSequences,
} from "../../../../src/core/merge/merge-engine";
import type { TreeMapping } from "../../../../src/core/tree/tree-value";

const section = "prod:include_hosts[1]";

function mismatch(act: () => unknown): TypeMismatchError {
  try {
    act();
  } catch (error) {
    if (error instanceof TypeMismatchError) return error;
    throw error;
  }
  throw new Error("expected a TypeMismatchError");
}

describe("unionSequences", () => {
  it("keeps base order and appends unseen elements", () => {
    expect(unionSequences(["h1", "h2"], ["h2", "h3"])).toEqual(["h1", "h2", "h3"]);
  });

  it("deduplicates structurally equal mappings", () => {
    expect(unionSequences([{ a: 1, b: 2 }], [{ b: 2, a: 1 }, { c: 3 }])).toEqual([
      { a: 1, b: 2 },
      { c: 3 },
    ]);
  });
});

describe("union policy", () => {
  it("unions host lists of the same group", () => {
    expect(
      mergeMappings(
        { grp: { hosts: ["h1", "h2"] } },
        { grp: { hosts: ["h2", "h3"] } },
        section,
        "union"
      )
    ).toEqual({ grp: { hosts: ["h1", "h2", "h3"] } });
  });

  it("adds keys missing from the base", () => {
    expect(mergeMappings({ web: { hosts: ["h1"] } }, { db: { hosts: ["h9"] } }, section, "union")).toEqual({
      web: { hosts: ["h1"] },
      db: { hosts: ["h9"] },
    });
  });

  it("fails on conflicting scalars instead of overwriting", () => {
    const error = mismatch(() =>
      mergeMappings(
        { web: { vars: { role: "frontend" } } },
        { web: { vars: { role: "backend" } } },
        section,
        "union"
      )
    );
    expect(error.message).toBe(
      "conflicting scalar values at 'web/vars/role' in section 'prod:include_hosts[1]'"
    );
    expect(error.context.keyPath).toBe("web/vars/role");
    expect(error.actual).toBe("scalar");
    expect(error.allowed).toEqual([]);
  });

  it("fails on mismatched kinds", () => {
    const error = mismatch(() =>
      mergeMappings({ web: { hosts: ["h1"] } }, { web: { hosts: { h1: null } } }, section, "union")
    );
    expect(error.message).toBe(
      "cannot merge mapping into sequence at 'web/hosts' in section 'prod:include_hosts[1]'"
    );
    expect(error.allowed).toEqual(["sequence"]);
  });

  it("fails on two top-level scalars", () => {
    const error = mismatch(() => mergeTrees("a", "b", section, "union"));
    expect(error.context.keyPath).toBe("<root>");
  });
});

describe("overlay policy", () => {
  it("recurses into mappings and lets incoming values win", () => {
    expect(
      mergeMappings(
        { web: { role: "frontend", ports: [80], tls: { enabled: false } } },
        { web: { ports: [443], tls: { enabled: true, cert: "web.pem" } } },
        section,
        "overlay"
      )
    ).toEqual({
      web: { role: "frontend", ports: [443], tls: { enabled: true, cert: "web.pem" } },
    });
  });

  it("replaces values of a different kind", () => {
    expect(mergeTrees({ a: 1 }, ["x"], section, "overlay")).toEqual(["x"]);
  });
});

describe("purity", () => {
  it("leaves both inputs untouched and shares no nodes with them", () => {
    const base: TreeMapping = { web: { hosts: ["h1"], vars: { a: 1 } } };
    const incoming: TreeMapping = { web: { hosts: ["h2"] }, db: { hosts: ["h3"] } };
    const baseCopy = structuredClone(base);
    const incomingCopy = structuredClone(incoming);

    const merged = mergeMappings(base, incoming, section, "union");

    expect(base).toEqual(baseCopy);
    expect(incoming).toEqual(incomingCopy);
    expect(merged.db).not.toBe(incoming.db);
    expect(merged.web).not.toBe(base.web);
  });
});

describe("mergeAt", () => {
  it("creates a missing path verbatim", () => {
    expect(
      mergeAt({ web: { hosts: ["h1"] } }, ["_meta", "hostvars", "h1"], { port: 22 }, section, "union")
    ).toEqual({
      web: { hosts: ["h1"] },
      _meta: { hostvars: { h1: { port: 22 } } },
    });
  });

  it("merges into an existing subtree under the policy", () => {
    expect(
      mergeAt({ web: { hosts: ["h1"], vars: {} } }, ["web", "hosts"], ["h1", "h2"], section, "union")
    ).toEqual({ web: { hosts: ["h1", "h2"], vars: {} } });
  });

  it("rejects a non-mapping intermediate", () => {
    const error = mismatch(() => mergeAt({ web: ["h1"] }, ["web", "vars"], { a: 1 }, section, "overlay"));
    expect(error.message).toBe(
      "invalid type 'sequence' at 'web' in section 'prod:include_hosts[1]', must be: mapping"
    );
    expect(error.context.keyPath).toBe("web/vars");
  });

  it("requires a mapping when the key path is empty", () => {
    expect(() => mergeAt({}, [], ["h1"], section, "union")).toThrowError(TypeMismatchError);
    expect(mergeAt({ a: { x: 1 } }, [], { a: { y: 2 } }, section, "overlay")).toEqual({
      a: { x: 1, y: 2 },
    });
  });
});
