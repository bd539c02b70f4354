import type { ComponentMap } from "../tree/element";

export interface Placement<H> {
  /** Parent entity, or the root container (null when the root has none) */
  readonly parent: H | null;
  /** Position among the parent's children */
  readonly index: number;
}

export interface ComponentDiff {
  /** Components to add or replace */
  readonly set: ComponentMap;
  /** Component names to remove */
  readonly remove: readonly string[];
}

/**
 * The four mutations the engine performs on a host world. Implementations
 * signal rejection by throwing; the applier records the failure against the
 * effect and carries on.
 *
 * @typeParam H - The host's entity handle
 */
export interface HostWorld<H> {
  createEntity(components: ComponentMap, placement: Placement<H>): H;
  destroyEntity(handle: H): void;
  setComponents(handle: H, diff: ComponentDiff): void;
  reorderSiblings(parent: H | null, ordered: readonly H[]): void;
}
