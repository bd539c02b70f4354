/**
 * Reconciler - diff two tree versions into an ordered effect list.
 *
 * Per parent:
 * 1. unmount removed and replaced children, in old order, each subtree bottom-up
 * 2. for each new child in order: mount its whole subtree top-down, or emit
 *    an update when its props changed and recurse into its children
 * 3. move reused children that fall outside the longest run already in
 *    relative order
 *
 * A parent is therefore mounted before its children, unmounted after them,
 * and every subtree's effects are contiguous.
 */

import { IdentityCollisionError } from "tessera-shared";
import type { IdentityPath } from "../tree/identity";
import { sameKind, type Node, type TreeVersion } from "../tree/node";
import { valueEquals } from "../utils/equality";
import type { Effect } from "./effects";
import { longestIncreasingSubsequence } from "./lis";

function indexByIdentity(parent: IdentityPath | null, nodes: readonly Node[]): Map<IdentityPath, number> {
  const index = new Map<IdentityPath, number>();
  nodes.forEach((node, position) => {
    const path = node.identity.path;
    const first = index.get(path);
    if (first !== undefined) {
      throw new IdentityCollisionError(path, parent, [first, position]);
    }
    index.set(path, position);
  });
  return index;
}

function mountSubtree(node: Node, parent: IdentityPath | null, index: number, effects: Effect[]): void {
  effects.push({ type: "mount", identity: node.identity.path, parent, index, node });
  node.children.forEach((child, position) => mountSubtree(child, node.identity.path, position, effects));
}

function unmountSubtree(node: Node, parent: IdentityPath | null, effects: Effect[]): void {
  for (const child of node.children) {
    unmountSubtree(child, node.identity.path, effects);
  }
  effects.push({ type: "unmount", identity: node.identity.path, parent, node });
}

function reconcileChildren(
  parent: IdentityPath | null,
  prevChildren: readonly Node[],
  nextChildren: readonly Node[],
  effects: Effect[],
): void {
  const prevIndex = indexByIdentity(parent, prevChildren);
  indexByIdentity(parent, nextChildren);

  // Previous position of each new child when it is reused, -1 otherwise
  const sources = nextChildren.map((node) => {
    const position = prevIndex.get(node.identity.path);
    return position !== undefined && sameKind(prevChildren[position], node) ? position : -1;
  });
  const reused = new Set<number>(sources.filter((position) => position >= 0));

  prevChildren.forEach((node, position) => {
    if (!reused.has(position)) {
      unmountSubtree(node, parent, effects);
    }
  });

  nextChildren.forEach((node, position) => {
    const source = sources[position];
    if (source < 0) {
      mountSubtree(node, parent, position, effects);
      return;
    }

    const previous = prevChildren[source];
    if (previous === node) {
      return;
    }
    if (!valueEquals(previous.props, node.props)) {
      effects.push({
        type: "update",
        identity: node.identity.path,
        prevProps: previous.props,
        nextProps: node.props,
        node,
      });
    }
    reconcileChildren(node.identity.path, previous.children, node.children, effects);
  });

  const stable = new Set(longestIncreasingSubsequence(sources));
  sources.forEach((source, position) => {
    if (source >= 0 && !stable.has(position)) {
      effects.push({ type: "move", identity: nextChildren[position].identity.path, parent, index: position });
    }
  });
}

/**
 * Compute the effects that turn `prev` into `next`. A null `prev` mounts
 * everything.
 *
 * @throws IdentityCollisionError when siblings of either tree share an identity
 */
export function reconcile(prev: TreeVersion | null, next: TreeVersion): Effect[] {
  const effects: Effect[] = [];
  reconcileChildren(null, prev?.roots ?? [], next.roots, effects);
  return effects;
}
