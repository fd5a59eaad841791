/**
 * Structured error hierarchy for the extraction core.
 *
 * All errors extend {@link ExtractionError} to enable type-safe catch blocks:
 *
 * ```ts
 * try {
 *   EntityCollection.deserialize(json);
 * } catch (e) {
 *   if (e instanceof SerializationError) { console.error(e.issues); }
 * }
 * ```
 *
 * @module errors
 */

/** Base error for all extraction errors. Includes an error code for programmatic matching. */
export class ExtractionError extends Error {
  readonly code: string;
  constructor(code: string, message: string) {
    super(message);
    this.name = "ExtractionError";
    this.code = code;
  }
}

/** Thrown when a record or configuration violates its invariants. */
export class ValidationError extends ExtractionError {
  readonly field?: string;
  constructor(message: string, field?: string) {
    super("VALIDATION_ERROR", field ? `Invalid "${field}": ${message}` : message);
    this.name = "ValidationError";
    this.field = field;
  }
}

/** Thrown when an interchange record cannot be decoded. Nothing is populated on failure. */
export class SerializationError extends ExtractionError {
  readonly issues: string[];
  constructor(message: string, issues: string[] = []) {
    super("SERIALIZATION_ERROR", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "SerializationError";
    this.issues = issues;
  }
}

/** Wraps anything an extraction capability threw. */
export class CapabilityError extends ExtractionError {
  readonly extractor: string;
  constructor(extractor: string, message: string, cause?: unknown, code = "CAPABILITY_ERROR") {
    super(code, `Extractor "${extractor}" failed: ${message}`);
    this.name = "CapabilityError";
    this.extractor = extractor;
    this.cause = cause;
  }

  static from(extractor: string, error: unknown): CapabilityError {
    if (error instanceof CapabilityError) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new CapabilityError(extractor, message, error);
  }
}

/** Thrown when a capability does not settle within the configured timeout. */
export class CapabilityTimeoutError extends CapabilityError {
  readonly timeoutMs: number;
  constructor(extractor: string, timeoutMs: number) {
    super(extractor, `timed out after ${timeoutMs}ms`, undefined, "CAPABILITY_TIMEOUT");
    this.name = "CapabilityTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** Thrown when a model-backed capability cannot load its model. */
export class ModelUnavailableError extends CapabilityError {
  readonly model: string;
  constructor(extractor: string, model: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : cause === undefined ? "unknown reason" : String(cause);
    super(extractor, `model "${model}" could not be loaded (${reason})`, cause, "MODEL_UNAVAILABLE");
    this.name = "ModelUnavailableError";
    this.model = model;
  }
}
