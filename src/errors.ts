/**
 * Error taxonomy for the prompt library.
 *
 * Every error carries a {@link ErrorKind} so callers can tell apart
 * "fix your input" from "retry later" from "the stores need repair" without
 * matching on messages.
 */

/** What a caller should do about an error. */
export type ErrorKind = "input" | "retry" | "repair";

/** Base class for all domain errors raised by the library. */
export class PromptLibraryError extends Error {
  public readonly kind: ErrorKind;

  public constructor(kind: ErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PromptLibraryError";
    this.kind = kind;
  }
}

/** Empty or oversized text, unknown category, out-of-range options. */
export class ValidationError extends PromptLibraryError {
  public constructor(message: string) {
    super("input", message);
    this.name = "ValidationError";
  }
}

export class PromptNotFoundError extends PromptLibraryError {
  public readonly id: string;

  public constructor(id: string) {
    super("input", `Prompt not found: ${id}`);
    this.name = "PromptNotFoundError";
    this.id = id;
  }
}

/** Base for embedding backend failures. */
export class ProviderError extends PromptLibraryError {
  public constructor(kind: ErrorKind, message: string, options?: ErrorOptions) {
    super(kind, message, options);
    this.name = "ProviderError";
  }
}

/** Backend unreachable, returned an HTTP error, or timed out. Transient. */
export class ProviderUnavailableError extends ProviderError {
  public constructor(message: string, options?: ErrorOptions) {
    super("retry", message, options);
    this.name = "ProviderUnavailableError";
  }
}

/**
 * A vector does not have the dimension the collection expects, or the
 * collection was built under another provider identity. Never retried:
 * writing on would corrupt the index, so the fix is a rebuild.
 */
export class DimensionMismatchError extends ProviderError {
  public readonly expected: number;
  public readonly actual: number;

  public constructor(message: string, expected: number, actual: number) {
    super("repair", message);
    this.name = "DimensionMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

/** Catalog and vector index disagree about what is indexed. */
export class ConsistencyError extends PromptLibraryError {
  /** Catalog entries with no vectors. */
  public readonly missingVectors: readonly string[];
  /** Prompt ids that have vectors but no catalog entry. */
  public readonly orphanVectors: readonly string[];

  public constructor(missingVectors: readonly string[], orphanVectors: readonly string[]) {
    super(
      "repair",
      `Catalog and vector index drifted (missing vectors: ${missingVectors.length}, orphan vectors: ${orphanVectors.length}). Run a rebuild.`,
    );
    this.name = "ConsistencyError";
    this.missingVectors = missingVectors;
    this.orphanVectors = orphanVectors;
  }
}

/** File, catalog or index read/write failure. */
export class StorageError extends PromptLibraryError {
  public readonly path: string;

  public constructor(path: string, message: string, options?: ErrorOptions) {
    super("retry", `${message} (${path})`, options);
    this.name = "StorageError";
    this.path = path;
  }
}

/** True when `err` is a Node.js system error with the given code (e.g. ENOENT). */
export function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}
