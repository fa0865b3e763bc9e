import { describe, expect, it } from "vitest";
import { TypeMismatchError } from "../../../../src/core/errors";
import {
  describeFragmentRef,
  toFragmentRef,
} from "../../../../src/core/fragments/fragment-ref";
import type { TreeValue } from "../../../../src/core/tree/tree-value";

const section = "prod:include_hosts[0]";

describe("toFragmentRef", () => {
  it("reads a plain string as a bare reference", () => {
    expect(toFragmentRef("hosts/web.yaml", section)).toEqual({
      kind: "bare",
      path: "hosts/web.yaml",
    });
  });

  it("reads a mapping with key and format as a keyed reference", () => {
    expect(
      toFragmentRef({ path: "vars.txt", key: "all/vars", format: "YML" }, section)
    ).toEqual({ kind: "keyed", path: "vars.txt", key: ["all", "vars"], format: "YML" });
  });

  it("accepts key lists and dotted keys", () => {
    expect(toFragmentRef({ path: "a.yaml", key: ["_meta", "hostvars"] }, section)).toEqual({
      kind: "keyed",
      path: "a.yaml",
      key: ["_meta", "hostvars"],
    });
    expect(toFragmentRef({ path: "a.yaml", key: "all.vars" }, section)).toEqual({
      kind: "keyed",
      path: "a.yaml",
      key: ["all", "vars"],
    });
  });

  it("drops a key that addresses the root", () => {
    expect(toFragmentRef({ path: "a.yaml", key: "/" }, section)).toEqual({
      kind: "keyed",
      path: "a.yaml",
    });
  });

  it("rejects other shapes with the section in the error", () => {
    const values: TreeValue[] = [42, ["a.yaml"], { key: "all" }, { path: 7 }];
    for (const value of values) {
      let caught: unknown;
      try {
        toFragmentRef(value, section);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(TypeMismatchError);
      expect(caught).toHaveProperty("context.section", section);
      expect(caught).toHaveProperty(
        "message",
        expect.stringMatching(/^invalid fragment reference in section 'prod:include_hosts\[0\]': /)
      );
    }
  });
});

describe("describeFragmentRef", () => {
  it("shows the key path of keyed references", () => {
    expect(describeFragmentRef({ kind: "keyed", path: "a.yaml", key: ["all", "vars"] })).toBe(
      "a.yaml -> all/vars"
    );
    expect(describeFragmentRef({ kind: "bare", path: "a.yaml" })).toBe("a.yaml");
  });
});
