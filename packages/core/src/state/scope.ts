/**
 * Scope - the per-composable hook surface.
 *
 * State lives in named slots of the composable's identity rather than in
 * call order, so hooks may be called conditionally. Anything evaluation
 * needs to persist (memo values, effect deps, ref bindings) is deferred
 * until the pass commits; a failed pass leaves the store untouched apart
 * from cells it created, which are rolled back.
 */

import { StateError } from "tessera-shared";
import type { Identity, IdentityPath } from "../tree/identity";
import { depsEqual } from "../utils/equality";
import type { StateRef } from "./state-ref";
import type { CellAddress, CellOptions, StateStore, UpdateTarget } from "./store";

// =============================================================================
// Types
// =============================================================================

export interface StateHandle<T> {
  /** Value in the frozen snapshot of this pass */
  readonly value: T;
  /** Queue a replacement value */
  set(next: T): void;
  /** Queue a mutator; mutators queued in one tick apply in order */
  update(mutator: (prev: T) => T): void;
  /** Queue a replacement that does not trigger re-evaluation */
  setSilently(next: T): void;
}

export type EffectCleanup = () => void;
export type EffectCallback = () => void | EffectCleanup;

export interface Scope {
  readonly identity: Identity;

  useState<T>(slot: string, initial: T | (() => T), options?: CellOptions<T>): StateHandle<T>;

  /** Bind an external state ref to a slot of this composable */
  useStateRef<T>(ref: StateRef<T>, initial: T | (() => T), options?: CellOptions<T>): StateHandle<T>;

  useMemo<T>(slot: string, factory: () => T, deps: readonly unknown[]): T;

  /**
   * Run `effect` after the pass commits: on first commit, whenever `deps`
   * change, or after every evaluation when `deps` is omitted. The returned
   * cleanup runs before the next run and when the composable unmounts.
   */
  useEffect(slot: string, effect: EffectCallback, deps?: readonly unknown[]): void;

  /** `useEffect` with empty deps */
  useMount(slot: string, callback: EffectCallback): void;
}

export interface PendingEffect {
  readonly owner: IdentityPath;
  readonly slot: string;
  run(): void;
}

/**
 * Where a scope sends work that must wait for commit.
 */
export interface EvaluationSink {
  readonly store: StateStore;
  defer(write: () => void): void;
  scheduleEffect(effect: PendingEffect): void;
}

interface MemoState<T> {
  value: T;
  deps: readonly unknown[];
}

interface EffectState {
  deps: readonly unknown[] | undefined;
  cleanup: EffectCleanup | undefined;
}

const effectCellOptions: CellOptions<EffectState> = {
  cleanup: (state) => state.cleanup?.(),
};

export const MEMO_SLOT_PREFIX = "@memo:";
export const EFFECT_SLOT_PREFIX = "@effect:";
export const REF_SLOT_PREFIX = "@ref:";

// =============================================================================
// Implementation
// =============================================================================

export function createStateHandle<T>(store: StateStore, target: UpdateTarget<T>, value: T): StateHandle<T> {
  return {
    value,
    set: (next) => store.requestUpdate(target, () => next),
    update: (mutator) => store.requestUpdate(target, mutator),
    setSilently: (next) => store.requestUpdate(target, () => next, { silent: true }),
  };
}

export class EvaluationScope implements Scope {
  private open = true;

  constructor(
    readonly identity: Identity,
    private readonly sink: EvaluationSink,
  ) {}

  close(): void {
    this.open = false;
  }

  private assertOpen(operation: string): void {
    if (!this.open) {
      throw StateError.outsideEvaluation(operation);
    }
  }

  private address(slot: string): CellAddress {
    return { owner: this.identity.path, slot };
  }

  useState<T>(slot: string, initial: T | (() => T), options?: CellOptions<T>): StateHandle<T> {
    this.assertOpen("useState");
    const address = this.address(slot);
    const value = this.sink.store.getOrInit(address, initial, options);
    return createStateHandle(this.sink.store, address, value);
  }

  useStateRef<T>(ref: StateRef<T>, initial: T | (() => T), options?: CellOptions<T>): StateHandle<T> {
    this.assertOpen("useStateRef");
    const { store } = this.sink;
    const address = this.address(REF_SLOT_PREFIX + ref.name);
    const value = store.getOrInit(address, initial, options);
    this.sink.defer(() => store.bindRef(ref, address));
    return createStateHandle(store, address, value);
  }

  useMemo<T>(slot: string, factory: () => T, deps: readonly unknown[]): T {
    this.assertOpen("useMemo");
    const { store } = this.sink;
    const address = this.address(MEMO_SLOT_PREFIX + slot);
    const cached = store.get<MemoState<T>>(address);
    if (cached && depsEqual(cached.deps, deps)) {
      return cached.value;
    }

    const value = factory();
    const memo: MemoState<T> = { value, deps: [...deps] };
    this.sink.defer(() => store.write(address, memo));
    return value;
  }

  useEffect(slot: string, effect: EffectCallback, deps?: readonly unknown[]): void {
    this.assertOpen("useEffect");
    const { store } = this.sink;
    const address = this.address(EFFECT_SLOT_PREFIX + slot);
    const previous = store.get<EffectState>(address);
    if (previous && deps !== undefined && depsEqual(previous.deps, deps)) {
      return;
    }

    const nextDeps = deps === undefined ? undefined : [...deps];
    this.sink.scheduleEffect({
      owner: this.identity.path,
      slot,
      run: () => {
        const current = store.get<EffectState>(address);
        store.write(address, { deps: nextDeps, cleanup: undefined }, effectCellOptions);
        current?.cleanup?.();
        const cleanup = effect();
        if (typeof cleanup === "function") {
          store.write(address, { deps: nextDeps, cleanup }, effectCellOptions);
        }
      },
    });
  }

  useMount(slot: string, callback: EffectCallback): void {
    this.assertOpen("useMount");
    this.useEffect(slot, callback, []);
  }
}
