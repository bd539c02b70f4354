import type { IdentityPath } from "./identity";
import type { Node } from "./node";

export interface IndexEntry {
  readonly node: Node;
  readonly parent: IdentityPath | null;
  readonly depth: number;
  /** Position among the parent's children (or among the roots) */
  readonly position: number;
}

/**
 * Parent links and positions for one tree version, kept outside the nodes.
 */
export class TreeIndex {
  private readonly entries = new Map<IdentityPath, IndexEntry>();

  private constructor(readonly roots: readonly Node[]) {}

  static build(roots: readonly Node[]): TreeIndex {
    const index = new TreeIndex(roots);
    const visit = (nodes: readonly Node[], parent: IdentityPath | null, depth: number) => {
      nodes.forEach((node, position) => {
        index.entries.set(node.identity.path, { node, parent, depth, position });
        visit(node.children, node.identity.path, depth + 1);
      });
    };
    visit(roots, null, 0);
    return index;
  }

  static empty(): TreeIndex {
    return new TreeIndex([]);
  }

  get size(): number {
    return this.entries.size;
  }

  get(path: IdentityPath): IndexEntry | undefined {
    return this.entries.get(path);
  }

  has(path: IdentityPath): boolean {
    return this.entries.has(path);
  }

  childrenOf(parent: IdentityPath | null): readonly Node[] {
    if (parent === null) {
      return this.roots;
    }
    return this.entries.get(parent)?.node.children ?? [];
  }

  /**
   * The path itself followed by each ancestor up to its root.
   */
  ancestors(path: IdentityPath): IdentityPath[] {
    const chain: IdentityPath[] = [];
    let current: IdentityPath | null = path;
    while (current !== null) {
      const entry = this.entries.get(current);
      if (!entry) break;
      chain.push(current);
      current = entry.parent;
    }
    return chain;
  }

  /**
   * Deepest node covering every given path. Returns null when the paths
   * live under different roots, and ignores paths not in this tree.
   */
  lowestCommonAncestor(paths: Iterable<IdentityPath>): IdentityPath | null {
    let chain: IdentityPath[] | null = null;
    let depth = 0;

    for (const path of paths) {
      if (!this.entries.has(path)) continue;

      if (chain === null) {
        chain = this.ancestors(path);
        continue;
      }

      let current: IdentityPath | null = path;
      let found = -1;
      while (current !== null && found < 0) {
        found = chain.indexOf(current);
        current = this.entries.get(current)?.parent ?? null;
      }
      if (found < 0) {
        return null;
      }
      depth = Math.max(depth, found);
    }

    return chain === null ? null : chain[depth];
  }

  /**
   * Path-copy `roots`, swapping the node at `path` for `replacement`.
   * Untouched subtrees are shared with the original.
   */
  replace(path: IdentityPath, replacement: Node): Node[] {
    let entry = this.entries.get(path);
    if (!entry) {
      throw new Error(`cannot replace ${path}: not in tree`);
    }

    let current = replacement;
    while (entry.parent !== null) {
      const parent = this.entries.get(entry.parent);
      if (!parent) {
        throw new Error(`cannot replace ${path}: ancestor ${entry.parent} not in tree`);
      }
      const children = parent.node.children.slice();
      children[entry.position] = current;
      current = { ...parent.node, children };
      entry = parent;
    }

    const roots = this.roots.slice();
    roots[entry.position] = current;
    return roots;
  }
}
