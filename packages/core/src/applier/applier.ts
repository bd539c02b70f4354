/**
 * Effect Applier - executes an effect list against the host world.
 *
 * Effects apply strictly in order. A rejected effect becomes a
 * HostMutationError in the result and the rest still apply; the caller
 * commits the new tree either way.
 */

import {
  ensureError,
  HostMutationError,
  isHostMutationError,
  type TesseraError,
} from "tessera-shared";
import { Logger, type KernelLogger } from "tessera-kernel";
import type { IdentityPath } from "../tree/identity";
import type { TreeIndex } from "../tree/tree-index";
import type { Effect, MountEffect, MoveEffect, UnmountEffect, UpdateEffect } from "../reconciler/effects";
import type { StateStore } from "../state/store";
import { componentsOf, diffComponents, isEmptyDiff } from "./components";
import type { HostWorld } from "./host";
import type { EntityRegistry } from "./registry";

export interface FailedEffect {
  readonly effect: Effect;
  readonly error: HostMutationError;
}

export interface ApplyResult {
  applied: Effect[];
  failed: FailedEffect[];
  /** Errors thrown by state cleanups during unmount */
  callbackErrors: TesseraError[];
}

export interface EffectApplierOptions<H> {
  host: HostWorld<H>;
  registry: EntityRegistry<H>;
  store: StateStore;
  /** Parent entity for top-level nodes */
  container?: H | null;
  log?: KernelLogger;
}

export class EffectApplier<H> {
  private readonly host: HostWorld<H>;
  private readonly registry: EntityRegistry<H>;
  private readonly store: StateStore;
  private readonly container: H | null;
  private readonly log: KernelLogger;

  constructor(options: EffectApplierOptions<H>) {
    this.host = options.host;
    this.registry = options.registry;
    this.store = options.store;
    this.container = options.container ?? null;
    this.log = options.log ?? Logger.for("EffectApplier");
  }

  /**
   * Apply `effects` in order. `next` is the index of the tree the effects
   * lead to; moves read the final sibling order from it.
   */
  apply(effects: readonly Effect[], next: TreeIndex): ApplyResult {
    const result: ApplyResult = { applied: [], failed: [], callbackErrors: [] };

    for (const effect of effects) {
      try {
        this.applyOne(effect, next, result);
        result.applied.push(effect);
      } catch (error) {
        const failure = this.toHostError(effect, error);
        result.failed.push({ effect, error: failure });
        this.log.warn(
          { identity: effect.identity, effect: effect.type, code: failure.code, err: failure },
          "host rejected effect",
        );
      }
    }

    return result;
  }

  private applyOne(effect: Effect, next: TreeIndex, result: ApplyResult): void {
    switch (effect.type) {
      case "mount":
        return this.mount(effect);
      case "update":
        return this.update(effect);
      case "move":
        return this.move(effect, next);
      case "unmount":
        return this.unmount(effect, result);
    }
  }

  private parentHandle(parent: IdentityPath | null, effect: Effect): H | null {
    if (parent === null) {
      return this.container;
    }
    const handle = this.registry.get(parent);
    if (handle === undefined) {
      throw new HostMutationError(
        effect.identity,
        effect.type,
        `parent ${parent} of ${effect.identity} has no entity`,
        "HOST_ENTITY_MISSING",
      );
    }
    return handle;
  }

  private handleOf(effect: Effect): H {
    const handle = this.registry.get(effect.identity);
    if (handle === undefined) {
      throw HostMutationError.entityMissing(effect.identity, effect.type);
    }
    return handle;
  }

  private mount(effect: MountEffect): void {
    const parent = this.parentHandle(effect.parent, effect);
    const handle = this.host.createEntity(componentsOf(effect.node), { parent, index: effect.index });
    this.registry.bind(effect.identity, effect.parent, handle, effect.index);
  }

  private update(effect: UpdateEffect): void {
    const diff = diffComponents(
      componentsOf({ type: effect.node.type, props: effect.prevProps }),
      componentsOf({ type: effect.node.type, props: effect.nextProps }),
    );
    if (isEmptyDiff(diff)) {
      return;
    }
    this.host.setComponents(this.handleOf(effect), diff);
  }

  private move(effect: MoveEffect, next: TreeIndex): void {
    const parent = this.parentHandle(effect.parent, effect);
    const current = this.registry.childrenOf(effect.parent);
    const desired = next
      .childrenOf(effect.parent)
      .map((node) => node.identity.path)
      .filter((path) => this.registry.has(path));

    if (desired.length === current.length && desired.every((path, i) => path === current[i])) {
      return;
    }

    const handles: H[] = [];
    for (const path of desired) {
      const handle = this.registry.get(path);
      if (handle !== undefined) handles.push(handle);
    }
    this.host.reorderSiblings(parent, handles);
    this.registry.setOrder(effect.parent, desired);
  }

  private unmount(effect: UnmountEffect, result: ApplyResult): void {
    const handle = this.registry.unbind(effect.identity, effect.parent);
    result.callbackErrors.push(...this.store.evict(effect.identity));
    if (handle === undefined) {
      throw HostMutationError.entityMissing(effect.identity, effect.type);
    }
    this.host.destroyEntity(handle);
  }

  private toHostError(effect: Effect, error: unknown): HostMutationError {
    if (isHostMutationError(error)) {
      return error;
    }
    const cause = ensureError(error);
    return new HostMutationError(
      effect.identity,
      effect.type,
      `${effect.type} failed at ${effect.identity}: ${cause.message}`,
      "HOST_MUTATION_FAILED",
      cause,
    );
  }
}
