import type { TesseraError } from "tessera-shared";
import type { FailedEffect } from "../applier/applier";
import type { Effect } from "../reconciler/effects";

export type TickStatus = "idle" | "committed" | "skipped";

/**
 * Outcome of one tick. Nothing thrown by composables, callbacks or the host
 * escapes `runTick`; it all lands here.
 */
export interface TickResult {
  readonly tick: number;
  /**
   * - `idle`: nothing was dirty
   * - `committed`: a new tree version was committed (possibly with failed effects)
   * - `skipped`: evaluation failed or the call was rejected; nothing changed
   */
  readonly status: TickStatus;
  /** Version of the committed tree after this tick, null before the first commit */
  readonly version: number | null;
  readonly appliedEffects: readonly Effect[];
  readonly failedEffects: readonly FailedEffect[];
  readonly evaluationError: TesseraError | null;
  /** Errors thrown by update mutators, post-commit effects and state cleanups */
  readonly callbackErrors: readonly TesseraError[];
}

export function emptyTickResult(tick: number, status: TickStatus, version: number | null): TickResult {
  return {
    tick,
    status,
    version,
    appliedEffects: [],
    failedEffects: [],
    evaluationError: null,
    callbackErrors: [],
  };
}
