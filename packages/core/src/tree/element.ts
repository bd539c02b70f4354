/**
 * Description elements: the input to evaluation.
 *
 * Authors build descriptions with `createElement` and the control-flow
 * helpers; evaluation turns them into `Node`s with resolved identities.
 *
 * @example
 * ```typescript
 * const Counter = defineComposable("Counter", (props: { label: string }, scope) => {
 *   const count = scope.useState("count", 0);
 *   return createElement("Text", { value: `${props.label}: ${count.value}` });
 * });
 *
 * const app = createElement(Fragment, null,
 *   createElement(Counter, { label: "hits" }),
 *   show(isOpen, createElement("Panel", { width: 200 })),
 *   list(todos, (todo) => todo.id, (todo) => createElement(TodoItem, { todo })),
 * );
 * ```
 */

import type { Key } from "./identity";
import type { Scope } from "../state/scope";

export type Props = Readonly<Record<string, unknown>>;

/** Host components of an element, keyed by component name */
export type ComponentMap = Readonly<Record<string, unknown>>;

export const ELEMENT_TYPE = Symbol.for("tessera.element");
export const COMPOSABLE_TYPE = Symbol.for("tessera.composable");

/** Marker passed to createElement for an unnamed grouping */
export const Fragment = Symbol.for("tessera.fragment");

export const FRAGMENT_KIND = "Fragment";
export const SHOW_KIND = "Show";
export const LIST_KIND = "List";

export type Child = Element | null | undefined | boolean | readonly Child[];

export type ComposableFn<P extends Props = Props> = (props: P, scope: Scope) => Child;

/**
 * A named composable. The name is its kind: two composables with the same
 * name are the same kind and share state across a swap.
 */
export interface Composable<P extends Props = Props> {
  readonly [COMPOSABLE_TYPE]: true;
  readonly displayName: string;
  render(props: P, scope: Scope): Child;
}

interface ElementBase {
  readonly $$typeof: typeof ELEMENT_TYPE;
  readonly kind: string;
  readonly key: Key | null;
}

export interface HostElement extends ElementBase {
  readonly type: "element";
  readonly props: ComponentMap;
  readonly children: readonly Child[];
}

export interface ComposableElement extends ElementBase {
  readonly type: "composable";
  readonly props: Props;
  readonly composable: Composable;
}

export interface FragmentElement extends ElementBase {
  readonly type: "fragment";
  readonly children: readonly Child[];
}

export interface ConditionalElement extends ElementBase {
  readonly type: "conditional";
  readonly when: boolean;
  readonly then: Child;
  readonly otherwise: Child;
}

export interface ListElement extends ElementBase {
  readonly type: "list";
  /** Keyed item elements, already rendered */
  readonly items: readonly Element[];
}

export type Element = HostElement | ComposableElement | FragmentElement | ConditionalElement | ListElement;

export type ElementType = Element["type"];

export type KeyProp = {
  key?: Key | null;
};

// =============================================================================
// Composables
// =============================================================================

/**
 * Name a composable function. Plain functions passed to createElement are
 * wrapped on the fly and named after `fn.name`.
 */
export function defineComposable<P extends Props>(name: string, render: ComposableFn<P>): Composable<P> {
  return {
    [COMPOSABLE_TYPE]: true,
    displayName: name,
    render,
  };
}

export function isComposable(value: unknown): value is Composable {
  return typeof value === "object" && value !== null && COMPOSABLE_TYPE in value;
}

const wrappedFunctions = new WeakMap<Function, Composable>();

function toComposable<P extends Props>(fn: ComposableFn<P>): Composable<P> {
  const cached = wrappedFunctions.get(fn);
  if (cached) {
    return cached;
  }
  const composable = defineComposable(fn.name || "Anonymous", fn);
  wrappedFunctions.set(fn, composable);
  return composable;
}

// =============================================================================
// createElement
// =============================================================================

function splitKey(props: (Record<string, unknown> & KeyProp) | null | undefined): { key: Key | null; rest: Props } {
  if (!props) {
    return { key: null, rest: {} };
  }
  const { key, ...rest } = props;
  return { key: key ?? null, rest };
}

export function createElement(
  type: string,
  props?: (Record<string, unknown> & KeyProp) | null,
  ...children: Child[]
): HostElement;
export function createElement<P extends Props>(
  type: Composable<P> | ComposableFn<P>,
  props: P & KeyProp,
  ...children: Child[]
): ComposableElement;
export function createElement(type: typeof Fragment, props?: KeyProp | null, ...children: Child[]): FragmentElement;
export function createElement(
  type: string | Composable<never> | ComposableFn<never> | typeof Fragment,
  props?: (Record<string, unknown> & KeyProp) | null,
  ...children: Child[]
): Element {
  const { key, rest } = splitKey(props);

  if (type === Fragment) {
    return { $$typeof: ELEMENT_TYPE, type: "fragment", kind: FRAGMENT_KIND, key, children };
  }

  if (typeof type === "string") {
    return { $$typeof: ELEMENT_TYPE, type: "element", kind: type, key, props: rest, children };
  }

  const composable = isComposable(type) ? type : toComposable(type);
  return {
    $$typeof: ELEMENT_TYPE,
    type: "composable",
    kind: composable.displayName,
    key,
    props: children.length > 0 ? { ...rest, children } : rest,
    composable,
  };
}

export function isElement(value: unknown): value is Element {
  return typeof value === "object" && value !== null && "$$typeof" in value && value.$$typeof === ELEMENT_TYPE;
}

/**
 * Copy an element with a different key.
 */
export function withKey<E extends Element>(element: E, key: Key | null): E {
  return { ...element, key };
}

// =============================================================================
// Control flow
// =============================================================================

/**
 * Conditional content. The active branch is wrapped in a fragment keyed
 * "then" or "else", so flipping the condition unmounts one branch and mounts
 * the other instead of reusing state between them.
 */
export function show(when: boolean, then: Child, otherwise: Child = null, key: Key | null = null): ConditionalElement {
  return { $$typeof: ELEMENT_TYPE, type: "conditional", kind: SHOW_KIND, key, when, then, otherwise };
}

/**
 * Keyed list. `keyOf` decides each item's key and overrides any key the
 * rendered element already carries; items rendering to null are skipped.
 */
export function list<T>(
  items: Iterable<T>,
  keyOf: (item: T, index: number) => Key,
  render: (item: T, index: number) => Element | null | undefined,
  key: Key | null = null,
): ListElement {
  const rendered: Element[] = [];
  let index = 0;
  for (const item of items) {
    const element = render(item, index);
    if (element) {
      rendered.push(withKey(element, keyOf(item, index)));
    }
    index++;
  }
  return { $$typeof: ELEMENT_TYPE, type: "list", kind: LIST_KIND, key, items: rendered };
}
