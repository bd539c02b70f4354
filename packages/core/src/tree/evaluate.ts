/**
 * Evaluation: descriptions in, nodes out.
 *
 * Evaluation is a pure function of props and the frozen state snapshot.
 * Composables get a scope whose writes are collected here and applied by
 * `commit()` once the whole pass has succeeded.
 */

import { AuthorEvaluationError, isTesseraError } from "tessera-shared";
import {
  createElement,
  Fragment,
  isElement,
  type Child,
  type ComposableElement,
  type Element,
} from "./element";
import { isWithin, resolveSiblingIdentities, type Identity, type IdentityPath } from "./identity";
import type { Node, TreeVersion } from "./node";
import type { TreeIndex } from "./tree-index";
import { EvaluationScope, type EvaluationSink, type PendingEffect } from "../state/scope";
import { StateStore } from "../state/store";
import { valueEquals } from "../utils/equality";

export interface EvaluationOptions {
  store: StateStore;
  /**
   * Committed tree. Together with `dirty`, lets clean composables whose
   * props did not change be reused instead of re-rendered.
   */
  previous?: TreeIndex | null;
  /** Owners that must be re-rendered; null re-renders everything */
  dirty?: ReadonlySet<IdentityPath> | null;
}

/**
 * Flatten a child description into its elements, dropping holes.
 */
export function flattenChildren(child: Child, parent: IdentityPath | null, out: Element[] = []): Element[] {
  if (child === null || child === undefined || typeof child === "boolean") {
    return out;
  }
  if (isElement(child)) {
    out.push(child);
    return out;
  }
  if (Array.isArray(child)) {
    for (const item of child) {
      flattenChildren(item, parent, out);
    }
    return out;
  }
  throw new AuthorEvaluationError(parent, `invalid child of type ${typeof child} under ${parent ?? "the root"}`);
}

/**
 * One evaluation pass.
 */
export class Evaluation implements EvaluationSink {
  readonly store: StateStore;
  private readonly previous: TreeIndex | null;
  private readonly dirty: ReadonlySet<IdentityPath> | null;
  private readonly deferred: Array<() => void> = [];
  private readonly pending: PendingEffect[] = [];

  /** Composables rendered in this pass */
  rendered = 0;
  /** Composables reused from the previous tree */
  reused = 0;

  constructor(options: EvaluationOptions) {
    this.store = options.store;
    this.previous = options.previous ?? null;
    this.dirty = options.dirty ?? null;
  }

  defer(write: () => void): void {
    this.deferred.push(write);
  }

  scheduleEffect(effect: PendingEffect): void {
    this.pending.push(effect);
  }

  /** Effects collected in evaluation order */
  get effects(): readonly PendingEffect[] {
    return this.pending;
  }

  /**
   * Apply the deferred writes of this pass. Call once, after it succeeded.
   */
  commit(): void {
    for (const write of this.deferred.splice(0)) {
      write();
    }
  }

  /**
   * Evaluate a child description into sibling nodes under `parent`.
   */
  children(child: Child, parent: IdentityPath | null): Node[] {
    const elements = flattenChildren(child, parent);
    const identities = resolveSiblingIdentities(parent, elements);
    return elements.map((element, i) => this.node(element, identities[i]));
  }

  /**
   * Evaluate one element at a known identity.
   */
  node(element: Element, identity: Identity): Node {
    const base = { kind: element.kind, key: element.key, identity, source: element };
    const path = identity.path;

    switch (element.type) {
      case "element":
        return { ...base, type: "element", props: element.props, children: this.children(element.children, path) };

      case "fragment":
        return { ...base, type: "fragment", props: {}, children: this.children(element.children, path) };

      case "conditional": {
        const branch = element.when
          ? createElement(Fragment, { key: "then" }, element.then)
          : element.otherwise === null || element.otherwise === undefined
            ? null
            : createElement(Fragment, { key: "else" }, element.otherwise);
        return { ...base, type: "conditional", props: { when: element.when }, children: this.children(branch, path) };
      }

      case "list":
        return { ...base, type: "list", props: {}, children: this.children(element.items, path) };

      case "composable":
        return this.reuse(element, identity) ?? this.render(element, identity);
    }
  }

  private render(element: ComposableElement, identity: Identity): Node {
    const scope = new EvaluationScope(identity, this);
    let output: Child;
    try {
      output = element.composable.render(element.props, scope);
    } catch (error) {
      throw isTesseraError(error) ? error : AuthorEvaluationError.fromThrown(identity.path, error);
    } finally {
      scope.close();
    }
    this.rendered++;

    return {
      type: "composable",
      kind: element.kind,
      key: element.key,
      identity,
      props: element.props,
      children: this.children(output, identity.path),
      source: element,
    };
  }

  private reuse(element: ComposableElement, identity: Identity): Node | null {
    if (!this.previous || !this.dirty) {
      return null;
    }

    const previous = this.previous.get(identity.path)?.node;
    const source = previous?.source;
    if (!previous || !source || source.type !== "composable" || source.composable !== element.composable) {
      return null;
    }
    if (!valueEquals(previous.props, element.props)) {
      return null;
    }
    for (const path of this.dirty) {
      if (isWithin(path, identity.path)) {
        return null;
      }
    }

    this.reused++;
    return previous;
  }
}

/**
 * Evaluate a description against a detached store. Meant for tests and
 * tooling; effects are collected but never run.
 */
export function buildTree(child: Child, options: { store?: StateStore; version?: number } = {}): TreeVersion {
  const evaluation = new Evaluation({ store: options.store ?? new StateStore() });
  const roots = evaluation.children(child, null);
  evaluation.commit();
  return { version: options.version ?? 1, roots };
}
