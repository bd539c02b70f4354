import type { Identity, Key } from "./identity";
import type { Element, ElementType, Props } from "./element";
import { valueEquals } from "../utils/equality";

export type NodeType = ElementType;

/**
 * One composable instance in one tree version.
 *
 * Nodes are immutable and hold no parent pointers; use a TreeIndex to walk
 * upwards. Subtrees that did not change between versions are shared by
 * reference.
 */
export interface Node {
  readonly type: NodeType;
  readonly kind: string;
  readonly key: Key | null;
  readonly identity: Identity;
  /** For elements, the host component map */
  readonly props: Props;
  readonly children: readonly Node[];
  /** Description this node was evaluated from; excluded from equality */
  readonly source: Element | null;
}

/**
 * A complete, immutable snapshot of the tree at one evaluation pass.
 */
export interface TreeVersion {
  readonly version: number;
  readonly roots: readonly Node[];
}

export function sameKind(a: Pick<Node, "type" | "kind">, b: Pick<Node, "type" | "kind">): boolean {
  return a.type === b.type && a.kind === b.kind;
}

export function nodeEquals(a: Node, b: Node): boolean {
  if (a === b) return true;
  return (
    sameKind(a, b) &&
    a.identity.path === b.identity.path &&
    valueEquals(a.props, b.props) &&
    nodesEqual(a.children, b.children)
  );
}

export function nodesEqual(a: readonly Node[], b: readonly Node[]): boolean {
  return a.length === b.length && a.every((node, i) => nodeEquals(node, b[i]));
}

/**
 * Value equality of two tree versions, ignoring version numbers.
 */
export function treeEquals(a: TreeVersion, b: TreeVersion): boolean {
  return nodesEqual(a.roots, b.roots);
}
