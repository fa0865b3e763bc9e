import { describe, expect, it } from "vitest";
import { TypeMismatchError, ParseError } from "../../../../src/core/errors";
import { parseKeyPath, formatKeyPath } from "../../../../src/core/tree/key-path";
import {
  canonicalKey,
  kindOf,
  toTreeValue,
} from "../../../../src/core/tree/tree-value";
import {
  assertType,
  convertSequenceToMapping,
} from "../../../../src/core/tree/type-guard";

describe("kindOf", () => {
  it("classifies mappings, sequences and scalars", () => {
    expect(kindOf({ a: 1 })).toBe("mapping");
    expect(kindOf([1, 2])).toBe("sequence");
    expect(kindOf("text")).toBe("scalar");
    expect(kindOf(null)).toBe("scalar");
  });
});

describe("assertType", () => {
  it("accepts an allowed kind", () => {
    expect(() => assertType({}, ["mapping"], "prod:include_hosts")).not.toThrow();
  });

  it("names the actual kind, the allowed kinds and the section", () => {
    let caught: unknown;
    try {
      assertType([1], ["mapping", "scalar"], "prod:include_hosts");
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(TypeMismatchError);
    if (!(caught instanceof TypeMismatchError)) return;
    expect(caught.kind).toBe("TypeMismatch");
    expect(caught.actual).toBe("sequence");
    expect(caught.allowed).toEqual(["mapping", "scalar"]);
    expect(caught.context.section).toBe("prod:include_hosts");
    expect(caught.message).toBe(
      "invalid type 'sequence' in section 'prod:include_hosts', must be: mapping, scalar"
    );
  });
});

describe("convertSequenceToMapping", () => {
  it("wraps a sequence in a hosts mapping", () => {
    expect(convertSequenceToMapping(["h1", "h2"], "web")).toEqual({ hosts: ["h1", "h2"] });
  });

  it("passes mappings through", () => {
    const group = { hosts: ["h1"], vars: { a: 1 } };
    expect(convertSequenceToMapping(group, "web")).toBe(group);
  });

  it("rejects scalars", () => {
    expect(() => convertSequenceToMapping("h1", "prod:web")).toThrowError(
      "invalid type 'scalar' in section 'prod:web', must be: sequence, mapping"
    );
  });
});

describe("canonicalKey", () => {
  it("ignores mapping key order", () => {
    expect(canonicalKey({ a: 1, b: [2] })).toBe(canonicalKey({ b: [2], a: 1 }));
  });

  it("distinguishes a string from a number", () => {
    expect(canonicalKey("1")).not.toBe(canonicalKey(1));
  });
});

describe("toTreeValue", () => {
  it("keeps plain data", () => {
    expect(toTreeValue({ a: [1, "x", null, true] }, "mem")).toEqual({
      a: [1, "x", null, true],
    });
  });

  it("rejects values that are not plain data", () => {
    expect(() => toTreeValue({ when: new Date(0) }, "mem")).toThrowError(ParseError);
    expect(() => toTreeValue({ when: new Date(0) }, "mem")).toThrowError(
      "Unsupported value of type object at 'when'"
    );
  });

  it("keeps __proto__ as an ordinary key", () => {
    const tree = toTreeValue(JSON.parse('{"__proto__": {"polluted": true}}'), "mem");
    expect(Object.keys(tree ?? {})).toEqual(["__proto__"]);
    expect(Object.getPrototypeOf(tree)).toBe(Object.prototype);
  });
});

describe("key paths", () => {
  it("splits on slashes when present", () => {
    expect(parseKeyPath("_meta/hostvars/web1.example.com")).toEqual([
      "_meta",
      "hostvars",
      "web1.example.com",
    ]);
  });

  it("splits on dots otherwise", () => {
    expect(parseKeyPath("all.vars")).toEqual(["all", "vars"]);
  });

  it("drops empty segments", () => {
    expect(parseKeyPath("/a//b/")).toEqual(["a", "b"]);
    expect(parseKeyPath(["a", "", "b"])).toEqual(["a", "b"]);
    expect(parseKeyPath("/")).toEqual([]);
  });

  it("formats with slashes", () => {
    expect(formatKeyPath(["all", "vars"])).toBe("all/vars");
  });
});
