import type { ComponentMap } from "../tree/element";
import type { Node } from "../tree/node";
import { valueEquals } from "../utils/equality";
import type { ComponentDiff } from "./host";

/**
 * Components an entity carries for `node`: an element's props, nothing for
 * composables and control flow.
 */
export function componentsOf(node: Pick<Node, "type" | "props">): ComponentMap {
  return node.type === "element" ? node.props : {};
}

export function diffComponents(prev: ComponentMap, next: ComponentMap): ComponentDiff {
  const set: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(next)) {
    if (!Object.prototype.hasOwnProperty.call(prev, name) || !valueEquals(prev[name], value)) {
      set[name] = value;
    }
  }
  const remove = Object.keys(prev).filter((name) => !Object.prototype.hasOwnProperty.call(next, name));
  return { set, remove };
}

export function isEmptyDiff(diff: ComponentDiff): boolean {
  return diff.remove.length === 0 && Object.keys(diff.set).length === 0;
}
