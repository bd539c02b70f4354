/**
 * Identity resolution.
 *
 * A node's identity is its type and kind plus either its explicit key or its
 * ordinal among unkeyed siblings of the same type and kind. Segments are
 * joined from the top of the tree into a path, the join key for state cells
 * and entities. Host elements print bare (`Text#0`), composables in angle
 * brackets (`<Counter>#0`) and control flow in parentheses (`(List)#0`), so a
 * composable named like a host tag never shares its identity.
 *
 * Unkeyed identity is positional: inserting an unkeyed sibling in front of
 * others of the same kind shifts their ordinals and hands them each other's
 * state. Lists whose items move should be keyed.
 */

import { AuthorEvaluationError, IdentityCollisionError } from "tessera-shared";
import type { ElementType } from "./element";

export type Key = string | number;

/** Identity path, e.g. `<App>#0/(List)#0/Item["a"]` */
export type IdentityPath = string;

export interface Identity {
  readonly path: IdentityPath;
  readonly type: ElementType;
  readonly kind: string;
  readonly key: Key | null;
  /** Position among unkeyed siblings of the same type and kind; null for keyed nodes */
  readonly ordinal: number | null;
}

export const PATH_SEPARATOR = "/";

const RESERVED_IN_KIND = /[/[\]#<>()]/;

export function formatKey(key: Key): string {
  return typeof key === "number" ? String(key) : JSON.stringify(key);
}

function qualifiedKind(type: ElementType, kind: string): string {
  switch (type) {
    case "element":
      return kind;
    case "composable":
      return `<${kind}>`;
    default:
      return `(${kind})`;
  }
}

export function identitySegment(identity: Pick<Identity, "type" | "kind" | "key" | "ordinal">): string {
  const name = qualifiedKind(identity.type, identity.kind);
  if (identity.key !== null) {
    return `${name}[${formatKey(identity.key)}]`;
  }
  return `${name}#${identity.ordinal ?? 0}`;
}

export function joinPath(parent: IdentityPath | null, segment: string): IdentityPath {
  return parent === null ? segment : `${parent}${PATH_SEPARATOR}${segment}`;
}

/**
 * Whether `path` is `ancestor` itself or lies below it.
 */
export function isWithin(path: IdentityPath, ancestor: IdentityPath): boolean {
  return path === ancestor || path.startsWith(ancestor + PATH_SEPARATOR);
}

/**
 * Resolve identities for one sibling list.
 *
 * @throws IdentityCollisionError when two siblings share a type, kind and key
 * @throws AuthorEvaluationError when a kind contains a character reserved for paths
 */
export function resolveSiblingIdentities(
  parent: IdentityPath | null,
  siblings: ReadonlyArray<{ type: ElementType; kind: string; key: Key | null }>,
): Identity[] {
  const ordinals = new Map<string, number>();
  const seen = new Map<IdentityPath, number>();

  return siblings.map((sibling, index) => {
    const { type, kind, key } = sibling;
    if (kind.length === 0 || RESERVED_IN_KIND.test(kind)) {
      throw new AuthorEvaluationError(parent, `invalid kind ${JSON.stringify(kind)} under ${parent ?? "the root"}`);
    }

    let ordinal: number | null = null;
    if (key === null) {
      const name = qualifiedKind(type, kind);
      ordinal = ordinals.get(name) ?? 0;
      ordinals.set(name, ordinal + 1);
    }

    const identity: Identity = {
      type,
      kind,
      key,
      ordinal,
      path: joinPath(parent, identitySegment({ type, kind, key, ordinal })),
    };

    const first = seen.get(identity.path);
    if (first !== undefined) {
      throw new IdentityCollisionError(identity.path, parent, [first, index]);
    }
    seen.set(identity.path, index);

    return identity;
  });
}
