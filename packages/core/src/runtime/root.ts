/**
 * Root - one independent tree bound to a host world.
 *
 * A root owns its state store, entity registry and scheduler. Each tick
 * drains queued updates, re-evaluates what they dirtied, reconciles the
 * result against the committed tree, applies the effects and commits.
 *
 * @example
 * ```typescript
 * const root = createRoot(createElement(App, {}), host, { name: "hud" });
 *
 * function frame() {
 *   const result = root.runTick();
 *   for (const failure of result.failedEffects) {
 *     console.warn(failure.error.message);
 *   }
 * }
 * ```
 */

import { EventEmitter } from "node:events";
import {
  AuthorEvaluationError,
  isTesseraError,
  StateError,
  type TesseraError,
} from "tessera-shared";
import { Context, Logger, type KernelLogger, type TickPhase } from "tessera-kernel";
import { EffectApplier } from "../applier/applier";
import type { HostWorld } from "../applier/host";
import { EntityRegistry } from "../applier/registry";
import { resolveRootOptions, type RootOptions, type RootOptionsInput } from "../config";
import { countEffects, type Effect } from "../reconciler/effects";
import { reconcile } from "../reconciler/reconcile";
import { manualScheduler, type TickScheduler } from "../scheduler/scheduler";
import { StateStore, type UpdateOptions, type UpdateTarget } from "../state/store";
import { treeToDebugString } from "../tree/debug";
import type { Child } from "../tree/element";
import { Evaluation } from "../tree/evaluate";
import type { IdentityPath } from "../tree/identity";
import { nodesEqual, type Node, type TreeVersion } from "../tree/node";
import { TreeIndex } from "../tree/tree-index";
import { emptyTickResult, type TickResult } from "./tick-result";

export interface RootHandles<H> {
  /** Parent entity for top-level nodes */
  container?: H | null;
  /** Defaults to a manual scheduler: the host calls `runTick` itself */
  scheduler?: TickScheduler;
}

interface EvaluatedPass {
  evaluation: Evaluation;
  next: TreeVersion;
  effects: Effect[];
}

export class Root<H> {
  readonly options: RootOptions;
  readonly store: StateStore;
  readonly registry = new EntityRegistry<H>();
  readonly scheduler: TickScheduler;
  /** Tick events: `tick:committed`, `tick:skipped`, `effect:failed`, `purity:violation` */
  readonly events = new EventEmitter();

  private readonly applier: EffectApplier<H>;
  private readonly log: KernelLogger = Logger.for("Root");
  private committed: TreeVersion | null = null;
  private index = TreeIndex.empty();
  private tickCount = 0;
  private ticking = false;
  private unmounted = false;
  private readonly invalidated = new Set<IdentityPath>();
  private invalidateAll = false;

  constructor(
    private readonly app: Child,
    host: HostWorld<H>,
    options: RootOptionsInput = {},
    handles: RootHandles<H> = {},
  ) {
    this.options = resolveRootOptions(options);
    this.scheduler = handles.scheduler ?? manualScheduler();
    this.store = new StateStore({ onEnqueue: () => this.requestTick() });
    this.applier = new EffectApplier({
      host,
      registry: this.registry,
      store: this.store,
      container: handles.container ?? null,
    });
    this.requestTick();
  }

  get name(): string {
    return this.options.name;
  }

  /** Last committed tree, null before the first tick */
  get tree(): TreeVersion | null {
    return this.committed;
  }

  get treeIndex(): TreeIndex {
    return this.index;
  }

  get ticks(): number {
    return this.tickCount;
  }

  get pendingUpdates(): number {
    return this.store.pendingUpdates;
  }

  get isUnmounted(): boolean {
    return this.unmounted;
  }

  // ===========================================================================
  // Update channel
  // ===========================================================================

  /**
   * Queue a state update for the next tick. The only legal way to change
   * state from outside evaluation.
   */
  requestUpdate<T>(target: UpdateTarget<T>, mutator: (prev: T) => T, options?: UpdateOptions): void {
    if (this.unmounted) {
      this.log.debug("update after unmount ignored");
      return;
    }
    this.store.requestUpdate(target, mutator, options);
  }

  /**
   * Force re-evaluation of `path` (or of everything) on the next tick.
   */
  invalidate(path?: IdentityPath): void {
    if (path === undefined) {
      this.invalidateAll = true;
    } else {
      this.invalidated.add(path);
    }
    this.requestTick();
  }

  private requestTick(): void {
    if (!this.unmounted) {
      this.scheduler.schedule(() => {
        this.runTick();
      });
    }
  }

  // ===========================================================================
  // Ticks
  // ===========================================================================

  /**
   * Run one drain, evaluate, reconcile, apply, commit cycle.
   */
  runTick(): TickResult {
    if (this.ticking) {
      return this.reject(new StateError("ticking", "idle", "runTick() called while a tick is running"));
    }
    if (this.unmounted) {
      return this.reject(new StateError("unmounted", "mounted", "runTick() called after unmount()"));
    }

    this.scheduler.cancel();
    const tick = ++this.tickCount;
    return this.inTick(tick, "drain", () => this.tick(tick));
  }

  /**
   * Unmount every node bottom-up, evict all state and stop accepting ticks.
   */
  unmount(): TickResult {
    if (this.ticking) {
      return this.reject(new StateError("ticking", "idle", "unmount() called while a tick is running"));
    }
    if (this.unmounted) {
      return this.reject(new StateError("unmounted", "mounted", "unmount() called twice"));
    }

    this.scheduler.cancel();
    this.unmounted = true;
    const dropped = this.store.clearQueue();
    const tick = ++this.tickCount;

    return this.inTick(tick, "unmount", () => {
      const previous = this.committed;
      const next: TreeVersion = { version: (previous?.version ?? 0) + 1, roots: [] };
      const effects = previous ? reconcile(previous, next) : [];
      const applied = this.applier.apply(effects, TreeIndex.empty());
      const callbackErrors = [...applied.callbackErrors, ...this.store.evictAll()];

      this.committed = previous ? next : null;
      this.index = TreeIndex.empty();
      this.log.debug({ dropped, effects: effects.length }, "root unmounted");

      return this.finish({
        tick,
        status: effects.length > 0 ? "committed" : "idle",
        version: this.committed?.version ?? null,
        appliedEffects: applied.applied,
        failedEffects: applied.failed,
        evaluationError: null,
        callbackErrors,
      });
    });
  }

  private inTick(tick: number, phase: TickPhase, fn: () => TickResult): TickResult {
    const ctx = Context.create({ root: this.name, tick, phase, events: this.events });
    this.ticking = true;
    try {
      return Context.run(ctx, fn);
    } finally {
      this.ticking = false;
    }
  }

  private tick(tick: number): TickResult {
    const drained = this.store.drain();
    const callbackErrors: TesseraError[] = [...drained.errors];

    const dirty = new Set([...drained.dirty, ...this.invalidated]);
    const forceAll = this.invalidateAll || this.committed === null;
    this.invalidated.clear();
    this.invalidateAll = false;

    const known = [...dirty].filter((path) => this.index.has(path));
    if (!forceAll && known.length === 0) {
      return this.finish({ ...emptyTickResult(tick, "idle", this.committed?.version ?? null), callbackErrors });
    }

    Context.setPhase("evaluate");
    this.store.begin();
    let pass: EvaluatedPass;
    try {
      pass = this.evaluatePass(forceAll, known);
    } catch (error) {
      const rolledBack = this.store.rollback();
      // drained updates stay applied; their owners render on the next tick
      for (const path of dirty) {
        this.invalidated.add(path);
      }
      if (forceAll) {
        this.invalidateAll = true;
      }
      const evaluationError = isTesseraError(error) ? error : AuthorEvaluationError.fromThrown(null, error);
      this.log.error(
        { err: evaluationError, code: evaluationError.code, rolledBack },
        "evaluation failed, tick skipped",
      );
      return this.finish({
        ...emptyTickResult(tick, "skipped", this.committed?.version ?? null),
        evaluationError,
        callbackErrors,
      });
    }
    this.store.commit();
    pass.evaluation.commit();

    Context.setPhase("apply");
    const nextIndex = TreeIndex.build(pass.next.roots);
    const applied = this.applier.apply(pass.effects, nextIndex);
    callbackErrors.push(...applied.callbackErrors);
    for (const failure of applied.failed) {
      Context.emit("effect:failed", failure);
    }
    this.committed = pass.next;
    this.index = nextIndex;

    Context.setPhase("effects");
    for (const effect of pass.evaluation.effects) {
      try {
        effect.run();
      } catch (error) {
        callbackErrors.push(AuthorEvaluationError.fromThrown(effect.owner, error, "effect"));
      }
    }

    this.log.debug(
      {
        effects: countEffects(applied.applied),
        failed: applied.failed.length,
        rendered: pass.evaluation.rendered,
        reused: pass.evaluation.reused,
      },
      "tick committed",
    );

    return this.finish({
      tick,
      status: "committed",
      version: pass.next.version,
      appliedEffects: applied.applied,
      failedEffects: applied.failed,
      evaluationError: null,
      callbackErrors,
    });
  }

  private evaluatePass(forceAll: boolean, dirty: readonly IdentityPath[]): EvaluatedPass {
    const evaluate = () => {
      if (forceAll || this.options.dirtyTracking === "root") {
        const evaluation = new Evaluation({ store: this.store });
        return { evaluation, roots: evaluation.children(this.app, null) };
      }
      const evaluation = new Evaluation({ store: this.store, previous: this.index, dirty: new Set(dirty) });
      return { evaluation, roots: this.evaluateDirty(evaluation, dirty) };
    };

    const { evaluation, roots } = evaluate();
    if (this.options.strict) {
      this.checkPurity(roots, evaluate().roots);
    }

    const next: TreeVersion = { version: (this.committed?.version ?? 0) + 1, roots };
    Context.setPhase("reconcile");
    return { evaluation, next, effects: reconcile(this.committed, next) };
  }

  /**
   * Re-evaluate the lowest common ancestor of the dirty identities and
   * splice it into a path copy of the committed tree.
   */
  private evaluateDirty(evaluation: Evaluation, dirty: readonly IdentityPath[]): Node[] {
    const ancestor = this.index.lowestCommonAncestor(dirty);
    const entry = ancestor === null ? undefined : this.index.get(ancestor);
    const source = entry?.node.source;
    if (!entry || !source) {
      return evaluation.children(this.app, null);
    }
    const replacement = evaluation.node(source, entry.node.identity);
    return this.index.replace(entry.node.identity.path, replacement);
  }

  private checkPurity(first: readonly Node[], second: readonly Node[]): void {
    if (nodesEqual(first, second)) {
      return;
    }
    this.log.warn(
      { first: treeToDebugString(first), second: treeToDebugString(second) },
      "evaluation is not pure: two passes over the same state produced different trees",
    );
    Context.emit("purity:violation", { first, second });
  }

  private reject(error: StateError): TickResult {
    this.log.warn({ err: error }, error.message);
    return { ...emptyTickResult(this.tickCount, "skipped", this.committed?.version ?? null), evaluationError: error };
  }

  private finish(result: TickResult): TickResult {
    if (result.status !== "idle") {
      Context.emit(`tick:${result.status}`, result);
    }
    return result;
  }

  toDebugString(): string {
    return treeToDebugString(this.committed?.roots ?? []);
  }
}

/**
 * Create a root. Nothing is evaluated until the first tick.
 *
 * @throws ConfigError when `options` fail validation
 */
export function createRoot<H>(
  app: Child,
  host: HostWorld<H>,
  options: RootOptionsInput = {},
  handles: RootHandles<H> = {},
): Root<H> {
  return new Root(app, host, options, handles);
}
