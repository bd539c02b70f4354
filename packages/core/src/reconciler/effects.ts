import type { Props } from "../tree/element";
import type { IdentityPath } from "../tree/identity";
import type { Node } from "../tree/node";

/**
 * Create the entity and state for `identity`, placed at `index` under `parent`.
 */
export interface MountEffect {
  readonly type: "mount";
  readonly identity: IdentityPath;
  readonly parent: IdentityPath | null;
  readonly index: number;
  readonly node: Node;
}

/**
 * Props of a reused node changed.
 */
export interface UpdateEffect {
  readonly type: "update";
  readonly identity: IdentityPath;
  readonly prevProps: Props;
  readonly nextProps: Props;
  readonly node: Node;
}

/**
 * A reused node changed position; `index` is its final sibling position.
 */
export interface MoveEffect {
  readonly type: "move";
  readonly identity: IdentityPath;
  readonly parent: IdentityPath | null;
  readonly index: number;
}

/**
 * Destroy the entity and state of `identity`. Emitted bottom-up.
 */
export interface UnmountEffect {
  readonly type: "unmount";
  readonly identity: IdentityPath;
  readonly parent: IdentityPath | null;
  readonly node: Node;
}

export type Effect = MountEffect | UpdateEffect | MoveEffect | UnmountEffect;

export type EffectType = Effect["type"];

export function describeEffect(effect: Effect): string {
  switch (effect.type) {
    case "mount":
      return `Mount(${effect.identity} @ ${effect.index})`;
    case "update":
      return `Update(${effect.identity})`;
    case "move":
      return `Move(${effect.identity} -> ${effect.index})`;
    case "unmount":
      return `Unmount(${effect.identity})`;
  }
}

export function countEffects(effects: readonly Effect[]): Record<EffectType, number> {
  const counts: Record<EffectType, number> = { mount: 0, update: 0, move: 0, unmount: 0 };
  for (const effect of effects) {
    counts[effect.type]++;
  }
  return counts;
}
