import path from "path";
import { UnsupportedSchemeError } from "../errors";

export const SUPPORTED_SCHEMES = ["file", "http", "https"] as const;
export type SupportedScheme = (typeof SUPPORTED_SCHEMES)[number];

const SCHEME_PATTERN = /^([a-zA-Z][a-zA-Z0-9+.-]*):/;

export interface UriParts {
  /** Lower-cased scheme, absent for plain filesystem paths. */
  scheme?: string;
  authority?: string;
  path: string;
  /** Query and fragment, including their leading `?` or `#`. */
  suffix: string;
}

export function parseUri(uri: string): UriParts {
  const match = SCHEME_PATTERN.exec(uri);
  const scheme = match?.[1]?.toLowerCase();
  let rest = match ? uri.slice(match[0].length) : uri;

  let authority: string | undefined;
  if (scheme !== undefined && rest.startsWith("//")) {
    const end = rest.slice(2).search(/[/?#]/);
    authority = end === -1 ? rest.slice(2) : rest.slice(2, end + 2);
    rest = end === -1 ? "" : rest.slice(end + 2);
  }

  const suffixStart = rest.search(/[?#]/);
  return {
    scheme,
    authority,
    path: suffixStart === -1 ? rest : rest.slice(0, suffixStart),
    suffix: suffixStart === -1 ? "" : rest.slice(suffixStart),
  };
}

export function isSupportedScheme(scheme: string): scheme is SupportedScheme {
  return SUPPORTED_SCHEMES.some((candidate) => candidate === scheme);
}

function joinRelative(base: string, ref: string): string {
  if (parseUri(base).scheme !== undefined) {
    return new URL(ref, base).toString();
  }
  if (ref.startsWith("/")) {
    return path.posix.normalize(ref);
  }
  return path.posix.join(path.posix.dirname(base), ref);
}

/**
 * Turns a fragment reference into a fetchable location.
 *
 * References without a scheme are always relative to `base`. References with
 * a supported scheme are used as-is when their path is absolute and are
 * otherwise resolved against `base` like any relative path.
 */
export function resolveUri(base: string, ref: string): string {
  const parts = parseUri(ref);
  if (parts.scheme === undefined) {
    return joinRelative(base, ref);
  }
  if (!isSupportedScheme(parts.scheme)) {
    throw new UnsupportedSchemeError(parts.scheme, { uri: ref });
  }
  if (parts.path.startsWith("/")) {
    return ref;
  }
  return joinRelative(base, `${parts.path}${parts.suffix}`);
}
