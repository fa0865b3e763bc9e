export type InventoryErrorKind =
  | "UnsupportedScheme"
  | "NotFound"
  | "RetrievalFailed"
  | "UnsupportedFormat"
  | "ParseError"
  | "TypeMismatch"
  | "BadKey"
  | "CorruptBlob"
  | "ConfigError";

/**
 * Where an error happened. Inner layers fill in what they know (usually the
 * URI); the inventory builder adds the environment, category and key path on
 * the way out.
 */
export interface InventoryErrorContext {
  environment?: string;
  category?: string;
  uri?: string;
  keyPath?: string;
  section?: string;
}

const CONTEXT_LABELS: ReadonlyArray<[keyof InventoryErrorContext, string]> = [
  ["environment", "environment"],
  ["category", "category"],
  ["section", "section"],
  ["uri", "uri"],
  ["keyPath", "key"],
];

export class InventoryError extends Error {
  readonly kind: InventoryErrorKind;
  readonly context: InventoryErrorContext;

  constructor(
    kind: InventoryErrorKind,
    message: string,
    context: InventoryErrorContext = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
    this.context = { ...context };
  }

  /**
   * Adds context the error was raised without. Values already present win,
   * since the innermost layer knows the most precise location.
   */
  withContext(extra: InventoryErrorContext): this {
    for (const [key] of CONTEXT_LABELS) {
      const value = extra[key];
      if (value !== undefined && this.context[key] === undefined) {
        this.context[key] = value;
      }
    }
    return this;
  }

  describe(): string {
    const details = CONTEXT_LABELS.flatMap(([key, label]) => {
      const value = this.context[key];
      return value === undefined ? [] : [`${label}=${value}`];
    });
    const suffix = details.length > 0 ? ` [${details.join(" ")}]` : "";
    return `${this.kind}: ${this.message}${suffix}`;
  }
}

export class UnsupportedSchemeError extends InventoryError {
  constructor(readonly scheme: string, context: InventoryErrorContext = {}) {
    super("UnsupportedScheme", `Unsupported URI scheme '${scheme}'`, context);
  }
}

export class NotFoundError extends InventoryError {
  constructor(
    message: string,
    context: InventoryErrorContext = {},
    options?: { cause?: unknown }
  ) {
    super("NotFound", message, context, options);
  }
}

export class RetrievalFailedError extends InventoryError {
  constructor(
    message: string,
    context: InventoryErrorContext = {},
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super("RetrievalFailed", message, context, options);
  }
}

export class UnsupportedFormatError extends InventoryError {
  constructor(readonly format: string, context: InventoryErrorContext = {}) {
    super(
      "UnsupportedFormat",
      `Unsupported data type: ${format === "" ? "<none>" : format}`,
      context
    );
  }
}

export class ParseError extends InventoryError {
  constructor(
    message: string,
    context: InventoryErrorContext = {},
    options?: { cause?: unknown }
  ) {
    super("ParseError", message, context, options);
  }
}

export type TreeKindName = "mapping" | "sequence" | "scalar";

export class TypeMismatchError extends InventoryError {
  readonly actual: TreeKindName;
  readonly allowed: readonly TreeKindName[];

  constructor(
    message: string,
    details: { actual: TreeKindName; allowed: readonly TreeKindName[] },
    context: InventoryErrorContext = {}
  ) {
    super("TypeMismatch", message, context);
    this.actual = details.actual;
    this.allowed = [...details.allowed];
  }
}

export type SecretDecryptFailure = "BadKey" | "CorruptBlob";

export class SecretDecryptError extends InventoryError {
  constructor(
    failure: SecretDecryptFailure,
    message: string,
    context: InventoryErrorContext = {}
  ) {
    super(failure, message, context);
  }
}

export class ConfigError extends InventoryError {
  constructor(message: string, context: InventoryErrorContext = {}) {
    super("ConfigError", message, context);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof InventoryError) {
    return error.describe();
  }
  return error instanceof Error ? error.message : String(error);
}
