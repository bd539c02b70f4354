import { createElement, defineComposable, list, type Props } from "../tree/element";
import { buildTree } from "../tree/evaluate";
import type { TreeVersion } from "../tree/node";
import { TreeIndex } from "../tree/tree-index";
import { reconcile } from "../reconciler/reconcile";
import { StateStore } from "../state/store";
import { MemoryHost } from "../testing/memory-host";
import { EffectApplier } from "./applier";
import { EntityRegistry } from "./registry";

const e = createElement;
const empty: TreeVersion = { version: 0, roots: [] };

function setup(container: number | null = null) {
  const host = new MemoryHost();
  const registry = new EntityRegistry<number>();
  const store = new StateStore();
  const applier = new EffectApplier({ host, registry, store, container });
  const apply = (prev: TreeVersion | null, next: TreeVersion) =>
    applier.apply(reconcile(prev, next), TreeIndex.build(next.roots));
  return { host, registry, store, applier, apply };
}

describe("EffectApplier", () => {
  describe("mount", () => {
    it("creates entities parents first with their components", () => {
      const { host, registry, apply } = setup();
      const tree = buildTree(e("Panel", { width: 200 }, e("Text", { value: "hi" })));

      const result = apply(null, tree);

      expect(result.applied).toHaveLength(2);
      expect(result.failed).toEqual([]);
      expect(registry.get("Panel#0")).toBe(1);
      expect(registry.get("Panel#0/Text#0")).toBe(2);
      expect(host.components(1)).toEqual({ width: 200 });
      expect(host.childrenOf(null)).toEqual([1]);
      expect(host.childrenOf(1)).toEqual([2]);
    });

    it("gives composables and control flow an entity without components", () => {
      const Label = defineComposable("Label", (props: { text: string }) => e("Text", { value: props.text }));
      const { host, registry, apply } = setup();

      apply(null, buildTree(e(Label, { text: "hp" })));

      expect(host.components(1)).toEqual({});
      expect(registry.get("<Label>#0/Text#0")).toBe(2);
      expect(host.parentOf(2)).toBe(1);
    });

    it("places top-level entities under the container", () => {
      const host = new MemoryHost();
      const container = host.createEntity({ scene: "main" }, { parent: null, index: 0 });
      const applier = new EffectApplier({
        host,
        registry: new EntityRegistry<number>(),
        store: new StateStore(),
        container,
      });
      const tree = buildTree(e("Panel"));

      applier.apply(reconcile(null, tree), TreeIndex.build(tree.roots));

      expect(host.childrenOf(container)).toEqual([2]);
    });

    it("inserts at the mounted index among existing siblings", () => {
      const { host, apply } = setup();
      const prev = buildTree([e("Item", { key: "b" }), e("Item", { key: "c" })]);
      const next = buildTree([e("Item", { key: "a" }), e("Item", { key: "b" }), e("Item", { key: "c" })]);

      apply(null, prev);
      apply(prev, next);

      expect(host.childrenOf(null)).toEqual([3, 1, 2]);
    });
  });

  describe("update", () => {
    it("sends only the component diff", () => {
      const { host, apply } = setup();
      const prev = buildTree(e("Panel", { width: 200, color: "red", visible: true }));
      const next = buildTree(e("Panel", { width: 300, visible: true }));

      apply(null, prev);
      host.clearCalls();
      apply(prev, next);

      expect(host.calls).toEqual([{ op: "set", handle: 1, set: { width: 300 }, remove: ["color"] }]);
      expect(host.components(1)).toEqual({ width: 300, visible: true });
    });

    it("applies composable updates without touching the host", () => {
      const Label = defineComposable("Label", (_props: Props) => null);
      const { host, apply } = setup();
      const prev = buildTree(e(Label, { text: "a" }));
      const next = buildTree(e(Label, { text: "b" }));

      apply(null, prev);
      host.clearCalls();
      const result = apply(prev, next);

      expect(result.applied.map((effect) => effect.type)).toEqual(["update"]);
      expect(host.calls).toEqual([]);
    });
  });

  describe("move", () => {
    const items = (keys: string[]) => buildTree(list(keys, (key) => key, (key) => e("Item", { key })));

    it("reorders the parent's children once", () => {
      const { host, apply } = setup();
      const prev = items(["a", "b", "c"]);
      const next = items(["c", "a", "b"]);

      apply(null, prev);
      host.clearCalls();
      const result = apply(prev, next);

      expect(result.applied.map((effect) => effect.type)).toEqual(["move"]);
      expect(host.calls).toEqual([{ op: "reorder", parent: 1, ordered: [4, 2, 3] }]);
      expect(host.childrenOf(1)).toEqual([4, 2, 3]);
    });

    it("collapses several moves under one parent into one reorder", () => {
      const { host, apply } = setup();
      const prev = items(["a", "b", "c", "d", "e"]);
      const next = items(["e", "d", "c", "b", "a"]);

      apply(null, prev);
      host.clearCalls();
      const result = apply(prev, next);

      expect(result.applied).toHaveLength(4);
      expect(host.callsOf("reorder")).toHaveLength(1);
      expect(host.childrenOf(1)).toEqual([6, 5, 4, 3, 2]);
    });
  });

  describe("unmount", () => {
    it("destroys bottom-up and evicts state", () => {
      const { host, registry, store, apply } = setup();
      const tree = buildTree(e("Panel", null, e("Text")));
      const cleanup = vi.fn();

      apply(null, tree);
      store.getOrInit({ owner: "Panel#0", slot: "open" }, true, { cleanup });
      host.clearCalls();
      const result = apply(tree, empty);

      expect(host.callsOf("destroy").map((call) => call.handle)).toEqual([2, 1]);
      expect(host.size).toBe(0);
      expect(registry.size).toBe(0);
      expect(cleanup).toHaveBeenCalledWith(true);
      expect(store.has({ owner: "Panel#0", slot: "open" })).toBe(false);
      expect(result.callbackErrors).toEqual([]);
    });

    it("reports failing cleanups and still destroys the entity", () => {
      const { host, store, apply } = setup();
      const tree = buildTree(e("Panel"));

      apply(null, tree);
      store.getOrInit({ owner: "Panel#0", slot: "timer" }, 1, {
        cleanup: () => {
          throw new Error("already stopped");
        },
      });
      const result = apply(tree, empty);

      expect(result.failed).toEqual([]);
      expect(result.callbackErrors.map((error) => error.message)).toEqual([
        "cleanup failed at Panel#0: already stopped",
      ]);
      expect(host.size).toBe(0);
    });

    it("fails when no entity is bound", () => {
      const { apply } = setup();
      const tree = buildTree(e("Panel"));

      const result = apply(tree, empty);

      expect(result.failed).toHaveLength(1);
      expect(result.failed[0].error.code).toBe("HOST_ENTITY_MISSING");
      expect(result.failed[0].error.message).toBe("no entity is bound to Panel#0");
    });
  });

  describe("partial failure", () => {
    it("isolates a rejected effect and applies the rest", () => {
      const { host, registry, apply } = setup();
      host.failWhen((operation) => operation.op === "create" && operation.components.name === "b");
      const tree = buildTree([
        e("Item", { key: "a", name: "a" }),
        e("Item", { key: "b", name: "b" }),
        e("Item", { key: "c", name: "c" }),
      ]);

      const result = apply(null, tree);

      expect(result.applied.map((effect) => effect.identity)).toEqual(['Item["a"]', 'Item["c"]']);
      expect(result.failed).toHaveLength(1);
      const { error } = result.failed[0];
      expect(error.code).toBe("HOST_MUTATION_FAILED");
      expect(error.identity).toBe('Item["b"]');
      expect(error.effect).toBe("mount");
      expect(error.message).toBe('mount failed at Item["b"]: host rejected create');
      expect(host.size).toBe(2);
      expect(registry.has('Item["b"]')).toBe(false);
    });

    it("fails children whose parent entity is missing", () => {
      const { host, apply } = setup();
      host.failWhen((operation) => operation.op === "create" && "width" in operation.components);
      const tree = buildTree(e("Panel", { width: 1 }, e("Text", { value: "x" })));

      const result = apply(null, tree);

      expect(result.failed.map((failure) => failure.error.message)).toEqual([
        "mount failed at Panel#0: host rejected create",
        "parent Panel#0 of Panel#0/Text#0 has no entity",
      ]);
      expect(result.failed[1].error.code).toBe("HOST_ENTITY_MISSING");
      expect(host.size).toBe(0);
    });
  });
});
