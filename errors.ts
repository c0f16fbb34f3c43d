/**
 * Error kinds and result types for agent-recall
 */

export type MemoryErrorKind =
  | "InvalidArgument"
  | "EmbeddingUnavailable"
  | "StoreUnavailable"
  | "StoreQueryError"
  | "StoreProtocolError"
  | "NotFound"
  | "FeatureUnavailable";

export class MemoryError extends Error {
  readonly kind: MemoryErrorKind;

  constructor(kind: MemoryErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MemoryError";
    this.kind = kind;
  }
}

export function isMemoryError(err: unknown): err is MemoryError {
  return err instanceof MemoryError;
}

// --------------------------------------------------------------------------
// Results
// --------------------------------------------------------------------------

export type Result<T> = { ok: true; value: T } | { ok: false; error: MemoryError };

/**
 * Run an operation and capture a MemoryError as a failed result.
 * Anything that is not a MemoryError is a bug and is rethrown.
 */
export async function attempt<T>(fn: () => Promise<T>): Promise<Result<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (err) {
    if (isMemoryError(err)) return { ok: false, error: err };
    throw err;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
