import { describe, expect, it } from "vitest";
import { UnsupportedSchemeError } from "../../../../src/core/errors";
import { parseUri, resolveUri } from "../../../../src/core/uri/uri-resolver";

describe("parseUri", () => {
  it("splits scheme, authority, path and suffix", () => {
    expect(parseUri("HTTPS://example.com:8080/a/b.yaml?x=1#top")).toEqual({
      scheme: "https",
      authority: "example.com:8080",
      path: "/a/b.yaml",
      suffix: "?x=1#top",
    });
  });

  it("treats a plain path as scheme-less", () => {
    expect(parseUri("hosts/web.yaml")).toEqual({
      scheme: undefined,
      authority: undefined,
      path: "hosts/web.yaml",
      suffix: "",
    });
  });
});

describe("resolveUri", () => {
  const fileBase = "/srv/inventory/config.yaml";
  const httpBase = "https://example.com/inventory/config.yaml";

  it("joins relative paths to the directory of a filesystem base", () => {
    expect(resolveUri(fileBase, "hosts/web.yaml")).toBe("/srv/inventory/hosts/web.yaml");
    expect(resolveUri(fileBase, "../shared/vars.yaml")).toBe("/srv/shared/vars.yaml");
  });

  it("lets an absolute path replace a filesystem base", () => {
    expect(resolveUri(fileBase, "/etc/inventory/web.yaml")).toBe("/etc/inventory/web.yaml");
  });

  it("resolves against an HTTP base", () => {
    expect(resolveUri(httpBase, "hosts/web.yaml")).toBe(
      "https://example.com/inventory/hosts/web.yaml"
    );
    expect(resolveUri(httpBase, "/shared/web.yaml")).toBe("https://example.com/shared/web.yaml");
    expect(resolveUri(httpBase, "web.yaml?ref=main")).toBe(
      "https://example.com/inventory/web.yaml?ref=main"
    );
  });

  it("keeps absolute references with a supported scheme", () => {
    expect(resolveUri(fileBase, "https://other.example/web.yaml")).toBe(
      "https://other.example/web.yaml"
    );
    expect(resolveUri(httpBase, "file:///etc/inventory/web.yaml")).toBe(
      "file:///etc/inventory/web.yaml"
    );
  });

  it("resolves a scheme-prefixed relative path against the base", () => {
    expect(resolveUri(fileBase, "file:hosts.yaml")).toBe("/srv/inventory/hosts.yaml");
  });

  it("rejects other schemes", () => {
    expect(() => resolveUri(fileBase, "ftp://example.com/web.yaml")).toThrowError(
      UnsupportedSchemeError
    );
    expect(() => resolveUri(fileBase, "ftp://example.com/web.yaml")).toThrowError(
      "Unsupported URI scheme 'ftp'"
    );
  });
});
