/**
 * # Tessera Shared
 *
 * Platform-independent definitions shared across all Tessera packages.
 *
 * ## Errors
 *
 * Every failure the engine reports is a {@link TesseraError} with a stable code:
 *
 * - **AuthorEvaluationError** - a composable threw; the tick is skipped
 * - **IdentityCollisionError** - two siblings resolved to the same identity
 * - **StateShapeMismatchError** - a state slot was reused with another shape
 * - **HostMutationError** - the host rejected one effect
 * - **StateError / ConfigError / ContextError** - engine misuse
 *
 * ## Usage
 *
 * ```typescript
 * import { isHostMutationError } from 'tessera-shared';
 *
 * for (const failure of result.failedEffects) {
 *   if (isHostMutationError(failure.error)) retryLater(failure.error.identity);
 * }
 * ```
 *
 * @module tessera-shared
 */

export * from "./errors";
