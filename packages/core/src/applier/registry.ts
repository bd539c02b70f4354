import type { IdentityPath } from "../tree/identity";

/**
 * Identity ↔ entity bindings plus the child order the host was last given.
 * One registry per root; mutated only while effects apply.
 */
export class EntityRegistry<H> {
  private readonly handles = new Map<IdentityPath, H>();
  private readonly order = new Map<IdentityPath | null, IdentityPath[]>();

  get size(): number {
    return this.handles.size;
  }

  get(path: IdentityPath): H | undefined {
    return this.handles.get(path);
  }

  has(path: IdentityPath): boolean {
    return this.handles.has(path);
  }

  /**
   * Bind `path` to `handle` and insert it at `index` among its siblings.
   */
  bind(path: IdentityPath, parent: IdentityPath | null, handle: H, index: number): void {
    this.handles.set(path, handle);
    const siblings = this.order.get(parent) ?? [];
    siblings.splice(Math.min(index, siblings.length), 0, path);
    this.order.set(parent, siblings);
  }

  /**
   * Remove the binding of `path`; returns the handle it had, if any.
   */
  unbind(path: IdentityPath, parent: IdentityPath | null): H | undefined {
    const handle = this.handles.get(path);
    this.handles.delete(path);
    this.order.delete(path);

    const siblings = this.order.get(parent);
    if (siblings) {
      const position = siblings.indexOf(path);
      if (position >= 0) siblings.splice(position, 1);
      if (siblings.length === 0) this.order.delete(parent);
    }
    return handle;
  }

  childrenOf(parent: IdentityPath | null): readonly IdentityPath[] {
    return this.order.get(parent) ?? [];
  }

  setOrder(parent: IdentityPath | null, ordered: readonly IdentityPath[]): void {
    this.order.set(parent, [...ordered]);
  }

  entries(): IterableIterator<[IdentityPath, H]> {
    return this.handles.entries();
  }

  clear(): void {
    this.handles.clear();
    this.order.clear();
  }
}
