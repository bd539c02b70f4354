import { identitySegment } from "./identity";
import type { Node, TreeVersion } from "./node";

function formatProp(value: unknown): string {
  if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return JSON.stringify(value);
  }
  if (value === undefined) return "undefined";
  if (typeof value === "function") return "fn";
  if (Array.isArray(value)) return `[${value.length}]`;
  return "{…}";
}

function formatNode(node: Node): string {
  const props = Object.entries(node.props)
    .filter(([name]) => name !== "children")
    .map(([name, value]) => `${name}=${formatProp(value)}`);
  const head = `${identitySegment(node.identity)} <${node.type}>`;
  return props.length > 0 ? `${head} ${props.join(" ")}` : head;
}

/**
 * Indented dump of a tree, one node per line.
 *
 * @example
 * ```
 * <App>#0 <composable>
 *   (List)#0 <list>
 *     Item["a"] <element> label="first"
 * ```
 */
export function treeToDebugString(tree: TreeVersion | readonly Node[]): string {
  const roots = "roots" in tree ? tree.roots : tree;
  const lines: string[] = [];
  const visit = (nodes: readonly Node[], depth: number) => {
    for (const node of nodes) {
      lines.push("  ".repeat(depth) + formatNode(node));
      visit(node.children, depth + 1);
    }
  };
  visit(roots, 0);
  return lines.join("\n");
}
