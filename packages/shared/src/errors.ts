/**
 * Tessera Error Hierarchy
 *
 * Structured error classes for consistent error handling across the engine.
 * All errors extend TesseraError which provides:
 * - Unique error codes for programmatic handling
 * - Rich metadata for debugging
 * - Serialization support so tick results can be logged or shipped to devtools
 * - Type guards for catching specific error types
 *
 * @example Inspecting a tick result
 * ```typescript
 * const result = root.runTick();
 * if (isAuthorEvaluationError(result.evaluationError)) {
 *   console.log(result.evaluationError.identity, result.evaluationError.toJSON());
 * }
 * for (const failure of result.failedEffects) {
 *   console.log(failure.error.code, failure.error.identity);
 * }
 * ```
 */

// =============================================================================
// Base Error
// =============================================================================

/**
 * Error codes for programmatic error handling.
 * Format: CATEGORY_SPECIFIC (e.g., EVALUATION_FAILED, HOST_ENTITY_MISSING)
 */
export type TesseraErrorCode =
  // Evaluation (author errors)
  | "EVALUATION_FAILED"
  | "EVALUATION_IDENTITY_COLLISION"
  // State
  | "STATE_SHAPE_MISMATCH"
  | "STATE_INVALID"
  | "STATE_OUTSIDE_EVALUATION"
  // Host
  | "HOST_MUTATION_FAILED"
  | "HOST_ENTITY_MISSING"
  // Configuration
  | "CONFIG_INVALID"
  // Context
  | "CONTEXT_NOT_FOUND"
  | "CONTEXT_INVALID";

/**
 * Serialized error format for transport
 */
export interface SerializedTesseraError {
  name: string;
  code: TesseraErrorCode;
  message: string;
  details?: Record<string, unknown>;
  cause?: SerializedTesseraError | { message: string; name?: string };
  stack?: string;
}

/**
 * Base class for all Tessera errors.
 * Provides consistent structure, serialization, and type identification.
 */
export class TesseraError extends Error {
  /** Unique error code for programmatic handling */
  readonly code: TesseraErrorCode;

  /** Additional error details */
  readonly details: Record<string, unknown>;

  constructor(
    code: TesseraErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(message, { cause });
    this.name = "TesseraError";
    this.code = code;
    this.details = details;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);

    // Capture stack trace (V8 engines - Node.js specific)
    const ErrorWithCapture = Error as typeof Error & {
      captureStackTrace?: (target: object, constructor?: abstract new (...args: never[]) => unknown) => void;
    };
    if (typeof ErrorWithCapture.captureStackTrace === "function") {
      ErrorWithCapture.captureStackTrace(this, new.target);
    }
  }

  /**
   * Serialize error for transport (JSON-safe)
   */
  toJSON(): SerializedTesseraError {
    const serialized: SerializedTesseraError = {
      name: this.name,
      code: this.code,
      message: this.message,
    };

    if (Object.keys(this.details).length > 0) {
      serialized.details = this.details;
    }

    if (this.cause) {
      if (this.cause instanceof TesseraError) {
        serialized.cause = this.cause.toJSON();
      } else if (this.cause instanceof Error) {
        serialized.cause = {
          message: this.cause.message,
          name: this.cause.name,
        };
      }
    }

    if (this.stack) {
      serialized.stack = this.stack;
    }

    return serialized;
  }

  /**
   * Create error from serialized format
   */
  static fromJSON(json: SerializedTesseraError): TesseraError {
    let cause: Error | undefined;
    if (json.cause) {
      cause =
        "code" in json.cause
          ? TesseraError.fromJSON(json.cause)
          : new Error(json.cause.message);
    }

    return new TesseraError(json.code, json.message, json.details, cause);
  }
}

// =============================================================================
// Evaluation Errors
// =============================================================================

/**
 * Error thrown when a composable fails during evaluation.
 * Aborts the whole tick; the previously committed tree stays authoritative.
 *
 * @example
 * ```typescript
 * throw new AuthorEvaluationError('<Counter>#0', 'Composable threw during evaluation', cause);
 * ```
 */
export class AuthorEvaluationError extends TesseraError {
  /** Identity path of the node whose evaluation failed */
  readonly identity: string | null;

  constructor(
    identity: string | null,
    message: string,
    cause?: Error,
    code: "EVALUATION_FAILED" | "EVALUATION_IDENTITY_COLLISION" = "EVALUATION_FAILED",
    details: Record<string, unknown> = {},
  ) {
    super(code, message, { ...(identity !== null && { identity }), ...details }, cause);
    this.name = "AuthorEvaluationError";
    this.identity = identity;
  }

  /**
   * Wrap whatever a composable threw, keeping Tessera errors as the cause.
   */
  static fromThrown(identity: string | null, thrown: unknown, phase = "evaluate"): AuthorEvaluationError {
    const cause = ensureError(thrown);
    return new AuthorEvaluationError(
      identity,
      identity === null
        ? `${phase} failed: ${cause.message}`
        : `${phase} failed at ${identity}: ${cause.message}`,
      cause,
      "EVALUATION_FAILED",
      { phase },
    );
  }
}

/**
 * Error thrown when two siblings resolve to the same identity.
 *
 * @example
 * ```typescript
 * throw new IdentityCollisionError('(List)#0/Item[1]', '(List)#0', [0, 3]);
 * ```
 */
export class IdentityCollisionError extends AuthorEvaluationError {
  /** The colliding sibling indices */
  readonly indices: readonly [number, number];

  constructor(identity: string, parent: string | null, indices: readonly [number, number]) {
    super(
      identity,
      `duplicate sibling identity "${identity}" under ${parent ?? "the root"} (child indices ${indices[0]} and ${indices[1]})`,
      undefined,
      "EVALUATION_IDENTITY_COLLISION",
      { parent, indices: [...indices] },
    );
    this.name = "IdentityCollisionError";
    this.indices = indices;
  }
}

// =============================================================================
// State Errors
// =============================================================================

/**
 * Error thrown when a state slot is reused with an initializer of a different shape.
 * A programming error: surfaced, never retried.
 */
export class StateShapeMismatchError extends TesseraError {
  readonly identity: string;
  readonly slot: string;
  readonly expectedShape: string;
  readonly receivedShape: string;

  constructor(identity: string, slot: string, expectedShape: string, receivedShape: string) {
    super(
      "STATE_SHAPE_MISMATCH",
      `state slot "${slot}" of ${identity} was created as ${expectedShape} but is now initialized as ${receivedShape}`,
      { identity, slot, expectedShape, receivedShape },
    );
    this.name = "StateShapeMismatchError";
    this.identity = identity;
    this.slot = slot;
    this.expectedShape = expectedShape;
    this.receivedShape = receivedShape;
  }
}

/**
 * Error thrown when an operation is attempted in an invalid state.
 *
 * @example
 * ```typescript
 * throw new StateError('ticking', 'idle', 'runTick() called while a tick is running');
 * throw StateError.outsideEvaluation('useState');
 * ```
 */
export class StateError extends TesseraError {
  /** Current state */
  readonly current: string;

  /** Expected/required state (optional) */
  readonly expectedState?: string;

  constructor(
    current: string,
    expectedState: string | undefined,
    message: string,
    code: "STATE_INVALID" | "STATE_OUTSIDE_EVALUATION" = "STATE_INVALID",
    cause?: Error,
  ) {
    super(code, message, { current, ...(expectedState && { expectedState }) }, cause);
    this.name = "StateError";
    this.current = current;
    this.expectedState = expectedState;
  }

  /**
   * Create error for scope access after the composable returned
   */
  static outsideEvaluation(operation: string): StateError {
    return new StateError(
      "closed",
      "evaluating",
      `${operation}() can only be called while the composable is being evaluated`,
      "STATE_OUTSIDE_EVALUATION",
    );
  }
}

// =============================================================================
// Host Errors
// =============================================================================

/**
 * Error recorded when the host rejects one effect.
 * Isolated to that effect; the remaining effects of the pass still apply.
 */
export class HostMutationError extends TesseraError {
  /** Identity path the failed effect targeted */
  readonly identity: string;

  /** Effect type ("mount", "update", "move", "unmount") */
  readonly effect: string;

  constructor(
    identity: string,
    effect: string,
    message: string,
    code: "HOST_MUTATION_FAILED" | "HOST_ENTITY_MISSING" = "HOST_MUTATION_FAILED",
    cause?: Error,
  ) {
    super(code, message, { identity, effect }, cause);
    this.name = "HostMutationError";
    this.identity = identity;
    this.effect = effect;
  }

  /**
   * Create error for an identity with no bound entity
   */
  static entityMissing(identity: string, effect: string): HostMutationError {
    return new HostMutationError(
      identity,
      effect,
      `no entity is bound to ${identity}`,
      "HOST_ENTITY_MISSING",
    );
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown when options fail schema validation.
 */
export class ConfigError extends TesseraError {
  /** Human-readable validation issues, one per failing field */
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], cause?: Error) {
    super("CONFIG_INVALID", message, { issues: [...issues] }, cause);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

// =============================================================================
// Context Errors
// =============================================================================

/**
 * Error thrown when the kernel context is missing or invalid.
 */
export class ContextError extends TesseraError {
  constructor(
    message: string,
    code: "CONTEXT_NOT_FOUND" | "CONTEXT_INVALID" = "CONTEXT_NOT_FOUND",
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(code, message, details, cause);
    this.name = "ContextError";
  }

  /**
   * Create "context not found" error with helpful message
   */
  static notFound(): ContextError {
    return new ContextError(
      "Context not found. Ensure you are running within a Context.run() block or inside a tick.",
      "CONTEXT_NOT_FOUND",
    );
  }
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if error is any Tessera error
 */
export function isTesseraError(error: unknown): error is TesseraError {
  return error instanceof TesseraError;
}

/**
 * Check if error is an AuthorEvaluationError (including identity collisions)
 */
export function isAuthorEvaluationError(error: unknown): error is AuthorEvaluationError {
  return error instanceof AuthorEvaluationError;
}

/**
 * Check if error is an IdentityCollisionError
 */
export function isIdentityCollisionError(error: unknown): error is IdentityCollisionError {
  return error instanceof IdentityCollisionError;
}

/**
 * Check if error is a StateShapeMismatchError
 */
export function isStateShapeMismatchError(error: unknown): error is StateShapeMismatchError {
  return error instanceof StateShapeMismatchError;
}

/**
 * Check if error is a StateError
 */
export function isStateError(error: unknown): error is StateError {
  return error instanceof StateError;
}

/**
 * Check if error is a HostMutationError
 */
export function isHostMutationError(error: unknown): error is HostMutationError {
  return error instanceof HostMutationError;
}

/**
 * Check if error is a ConfigError
 */
export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/**
 * Check if error is a ContextError
 */
export function isContextError(error: unknown): error is ContextError {
  return error instanceof ContextError;
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Ensure a value is an Error, wrapping if necessary.
 * Useful for catch blocks that might receive non-Error values.
 */
export function ensureError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(String(value));
}

/**
 * Wrap any error as a Tessera error if it isn't already.
 */
export function wrapAsTesseraError(
  error: unknown,
  defaultCode: TesseraErrorCode = "STATE_INVALID",
): TesseraError {
  if (error instanceof TesseraError) {
    return error;
  }
  const err = ensureError(error);
  return new TesseraError(defaultCode, err.message, {}, err);
}
