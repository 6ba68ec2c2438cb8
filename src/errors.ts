// ── Error Taxonomy ───────────────────────────────────────
//
// Everything the memory core can raise extends MemoryCoreError, so callers
// can branch on `instanceof` or on the stable `code` string.

export type MemoryErrorCode =
  | "STORE_UNAVAILABLE"
  | "CONFIG_INVALID"
  | "CLASSIFIER_ERROR"
  | "RESPONDER_ERROR";

export class MemoryCoreError extends Error {
  readonly code: MemoryErrorCode;
  override readonly cause?: unknown;

  constructor(code: MemoryErrorCode, message: string, cause?: unknown) {
    super(message);
    this.name = "MemoryCoreError";
    this.code = code;
    this.cause = cause;
  }
}

/** Durable or ephemeral store could not be reached or returned garbage. */
export class StoreUnavailableError extends MemoryCoreError {
  readonly store: "durable" | "ephemeral";

  constructor(store: "durable" | "ephemeral", message: string, cause?: unknown) {
    super("STORE_UNAVAILABLE", `[${store}] ${message}`, cause);
    this.name = "StoreUnavailableError";
    this.store = store;
  }
}

/** Routing table, threshold or another config value failed to parse. */
export class ConfigInvalidError extends MemoryCoreError {
  readonly field?: string;

  constructor(message: string, field?: string, cause?: unknown) {
    super(
      "CONFIG_INVALID",
      field ? `Invalid "${field}": ${message}` : message,
      cause,
    );
    this.name = "ConfigInvalidError";
    this.field = field;
  }
}

export class ClassifierError extends MemoryCoreError {
  constructor(message: string, cause?: unknown) {
    super("CLASSIFIER_ERROR", message, cause);
    this.name = "ClassifierError";
  }
}

export class ResponderError extends MemoryCoreError {
  constructor(message: string, cause?: unknown) {
    super("RESPONDER_ERROR", message, cause);
    this.name = "ResponderError";
  }
}

/** Best-effort message extraction for log lines. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
