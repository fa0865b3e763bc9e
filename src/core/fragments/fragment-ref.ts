import { z } from "zod";
import { TypeMismatchError } from "../errors";
import { kindOf, type TreeValue } from "../tree/tree-value";
import { parseKeyPath, type KeyPath } from "../tree/key-path";

const keySchema = z.union([
  z.string().min(1, "key must not be empty"),
  z.array(z.string()).min(1, "key must list at least one segment"),
]);

const keyedReferenceSchema = z
  .object({
    path: z.string().min(1, "path must be a non-empty string"),
    key: keySchema.optional(),
    format: z.string().min(1).optional(),
  })
  .passthrough();

const fragmentReferenceSchema = z.union([
  z.string().min(1, "reference must be a non-empty string"),
  keyedReferenceSchema,
]);

/**
 * A plain URI is merged at the root of the working tree. The mapping form may
 * carry a key path to merge into and an explicit parser.
 */
export type FragmentRef =
  | { readonly kind: "bare"; readonly path: string }
  | {
      readonly kind: "keyed";
      readonly path: string;
      readonly key?: KeyPath;
      readonly format?: string;
    };

export function toFragmentRef(value: TreeValue, section: string): FragmentRef {
  const parsed = fragmentReferenceSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new TypeMismatchError(
      `invalid fragment reference in section '${section}': ${where}${issue?.message ?? "unrecognised shape"}`,
      { actual: kindOf(value), allowed: ["scalar", "mapping"] },
      { section }
    );
  }

  const reference = parsed.data;
  if (typeof reference === "string") {
    return { kind: "bare", path: reference };
  }

  const key = reference.key === undefined ? undefined : parseKeyPath(reference.key);
  return {
    kind: "keyed",
    path: reference.path,
    ...(key !== undefined && key.length > 0 ? { key } : {}),
    ...(reference.format !== undefined ? { format: reference.format } : {}),
  };
}

export function describeFragmentRef(ref: FragmentRef): string {
  return ref.kind === "keyed" && ref.key ? `${ref.path} -> ${ref.key.join("/")}` : ref.path;
}
