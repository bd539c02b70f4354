import { isAuthorEvaluationError, isConfigError, isStateError } from "tessera-shared";
import { Logger } from "tessera-kernel";
import { describeEffect } from "../reconciler/effects";
import { microtaskScheduler } from "../scheduler/scheduler";
import { createStateRef } from "../state/state-ref";
import { createElement, defineComposable, list, type Props } from "../tree/element";
import { MemoryHost } from "../testing/memory-host";
import { waitForEvent } from "../testing/helpers";
import { createRoot, type Root } from "./root";
import type { TickResult } from "./tick-result";

const e = createElement;

function counterApp() {
  const stats = { renders: 0 };
  const Counter = defineComposable("Counter", (_props: Props, scope) => {
    stats.renders++;
    const count = scope.useState("count", 0);
    return e("Text", { value: count.value });
  });
  return { stats, app: e(Counter, {}) };
}

function pairApp() {
  const renders: string[] = [];
  const Counter = defineComposable("Counter", (props: { label: string }, scope) => {
    renders.push(props.label);
    const count = scope.useState("count", 0);
    return e("Text", { value: `${props.label}:${count.value}` });
  });
  const App = defineComposable("App", () => {
    renders.push("App");
    return [e(Counter, { key: "a", label: "a" }), e(Counter, { key: "b", label: "b" })];
  });
  return { renders, app: e(App, {}) };
}

const countOf = (owner: string) => ({ owner, slot: "count" });
const increment = (n: number) => n + 1;

describe("Root", () => {
  beforeAll(() => {
    Logger.configure({ level: "silent" });
  });

  afterAll(() => {
    Logger.reset();
  });

  describe("first tick", () => {
    it("mounts the whole tree", () => {
      const host = new MemoryHost();
      const { app } = counterApp();
      const root = createRoot(app, host);

      const result = root.runTick();

      expect(result.status).toBe("committed");
      expect(result.version).toBe(1);
      expect(result.appliedEffects.map(describeEffect)).toEqual(["Mount(<Counter>#0 @ 0)", "Mount(<Counter>#0/Text#0 @ 0)"]);
      expect(host.components(2)).toEqual({ value: 0 });
      expect(root.toDebugString()).toBe("<Counter>#0 <composable>\n  Text#0 <element> value=0");
    });

    it("asks the scheduler for a tick on creation and on every update", () => {
      const scheduler = { name: "spy", schedule: vi.fn(), cancel: vi.fn() };
      const { app } = counterApp();
      const root = createRoot(app, new MemoryHost(), {}, { scheduler });

      expect(scheduler.schedule).toHaveBeenCalledTimes(1);
      root.runTick();
      expect(scheduler.cancel).toHaveBeenCalledTimes(1);
      root.requestUpdate(countOf("<Counter>#0"), increment);
      expect(scheduler.schedule).toHaveBeenCalledTimes(2);
    });

    it("places top-level entities under the container", () => {
      const host = new MemoryHost();
      const container = host.createEntity({}, { parent: null, index: 0 });
      const root = createRoot(counterApp().app, host, {}, { container });

      root.runTick();

      expect(host.childrenOf(container)).toEqual([2]);
    });

    it("rejects invalid options", () => {
      let thrown: unknown;
      try {
        createRoot(null, new MemoryHost(), { name: "" });
      } catch (error) {
        thrown = error;
      }
      expect(isConfigError(thrown)).toBe(true);
    });
  });

  describe("updates", () => {
    it("coalesces queued updates into one evaluation", () => {
      const host = new MemoryHost();
      const { stats, app } = counterApp();
      const root = createRoot(app, host);
      root.runTick();
      stats.renders = 0;

      root.requestUpdate(countOf("<Counter>#0"), increment);
      root.requestUpdate(countOf("<Counter>#0"), increment);
      const result = root.runTick();

      expect(stats.renders).toBe(1);
      expect(root.store.get(countOf("<Counter>#0"))).toBe(2);
      expect(result.appliedEffects.map(describeEffect)).toEqual(["Update(<Counter>#0/Text#0)"]);
      expect(host.components(2)).toEqual({ value: 2 });
    });

    it("is idle when nothing is dirty", () => {
      const { stats, app } = counterApp();
      const root = createRoot(app, new MemoryHost());
      root.runTick();

      const result = root.runTick();

      expect(result.status).toBe("idle");
      expect(result.version).toBe(1);
      expect(stats.renders).toBe(1);
    });

    it("is idle when an update leaves the value unchanged", () => {
      const { stats, app } = counterApp();
      const root = createRoot(app, new MemoryHost());
      root.runTick();

      root.requestUpdate(countOf("<Counter>#0"), (n: number) => n);
      expect(root.runTick().status).toBe("idle");
      expect(stats.renders).toBe(1);
    });

    it("does not re-evaluate for silent updates", () => {
      const { stats, app } = counterApp();
      const root = createRoot(app, new MemoryHost());
      root.runTick();

      root.requestUpdate(countOf("<Counter>#0"), increment, { silent: true });

      expect(root.runTick().status).toBe("idle");
      expect(root.store.get(countOf("<Counter>#0"))).toBe(1);
      expect(stats.renders).toBe(1);
    });

    it("drops updates for cells that do not exist", () => {
      const { app } = counterApp();
      const root = createRoot(app, new MemoryHost());
      root.runTick();

      root.requestUpdate(countOf("Nowhere#0"), increment);

      expect(root.runTick().status).toBe("idle");
    });

    it("reports throwing mutators and keeps going", () => {
      const { app } = counterApp();
      const root = createRoot(app, new MemoryHost());
      root.runTick();

      root.requestUpdate(countOf("<Counter>#0"), (): number => {
        throw new Error("bad mutator");
      });
      root.requestUpdate(countOf("<Counter>#0"), increment);
      const result = root.runTick();

      expect(result.status).toBe("committed");
      expect(result.callbackErrors.map((error) => error.message)).toEqual(["update failed at <Counter>#0: bad mutator"]);
      expect(root.store.get(countOf("<Counter>#0"))).toBe(1);
    });

    it("updates through a state ref and moves keyed children", () => {
      const host = new MemoryHost();
      const order = createStateRef<number[]>("order");
      const App = defineComposable("App", (_props: Props, scope) => {
        const ids = scope.useStateRef(order, [1, 2]).value;
        return list(ids, (id) => id, (id) => e("Item", { id }));
      });
      const root = createRoot(e(App, {}), host);
      root.runTick();

      root.requestUpdate(order, () => [2, 1]);
      const result = root.runTick();

      expect(result.appliedEffects).toEqual([{ type: "move", identity: "<App>#0/(List)#0/Item[2]", parent: "<App>#0/(List)#0", index: 0 }]);
      expect(host.callsOf("reorder")).toEqual([{ op: "reorder", parent: 2, ordered: [4, 3] }]);
    });
  });

  describe("subtree re-evaluation", () => {
    it("re-renders only the dirty composable", () => {
      const { renders, app } = pairApp();
      const root = createRoot(app, new MemoryHost());
      root.runTick();
      const before = root.tree;
      renders.length = 0;

      root.requestUpdate(countOf('<App>#0/<Counter>["a"]'), increment);
      const result = root.runTick();

      expect(renders).toEqual(["a"]);
      expect(result.appliedEffects.map(describeEffect)).toEqual(['Update(<App>#0/<Counter>["a"]/Text#0)']);
      expect(root.tree?.roots[0].children[1]).toBe(before?.roots[0].children[1]);
    });

    it("re-renders from the common ancestor of several dirty composables", () => {
      const { renders, app } = pairApp();
      const root = createRoot(app, new MemoryHost());
      root.runTick();
      renders.length = 0;

      root.requestUpdate(countOf('<App>#0/<Counter>["a"]'), increment);
      root.requestUpdate(countOf('<App>#0/<Counter>["b"]'), increment);
      root.runTick();

      expect(renders).toEqual(["App", "a", "b"]);
    });

    it("re-renders everything when tracking is per root", () => {
      const { renders, app } = pairApp();
      const root = createRoot(app, new MemoryHost(), { dirtyTracking: "root" });
      root.runTick();
      renders.length = 0;

      root.requestUpdate(countOf('<App>#0/<Counter>["a"]'), increment);
      root.runTick();

      expect(renders).toEqual(["App", "a", "b"]);
    });

    it("re-renders invalidated identities", () => {
      const { renders, app } = pairApp();
      const root = createRoot(app, new MemoryHost());
      root.runTick();
      renders.length = 0;

      root.invalidate('<App>#0/<Counter>["b"]');
      const result = root.runTick();

      expect(renders).toEqual(["b"]);
      expect(result.status).toBe("committed");
      expect(result.appliedEffects).toEqual([]);

      renders.length = 0;
      root.invalidate();
      root.runTick();
      expect(renders).toEqual(["App", "a", "b"]);
    });
  });

  describe("evaluation errors", () => {
    function fragileApp() {
      const Fragile = defineComposable("Fragile", (_props: Props, scope) => {
        const count = scope.useState("count", 0);
        if (count.value === 1) {
          scope.useState("extra", "created during a failed pass");
          throw new Error("boom");
        }
        return e("Text", { value: count.value });
      });
      return e(Fragile, {});
    }

    it("skips the tick and keeps the committed tree", () => {
      const host = new MemoryHost();
      const root = createRoot(fragileApp(), host);
      root.runTick();
      const committed = root.tree;

      root.requestUpdate(countOf("<Fragile>#0"), increment);
      const result = root.runTick();

      expect(result.status).toBe("skipped");
      expect(result.version).toBe(1);
      expect(isAuthorEvaluationError(result.evaluationError)).toBe(true);
      expect(result.evaluationError?.message).toBe("evaluate failed at <Fragile>#0: boom");
      expect(root.tree).toBe(committed);
      expect(host.components(2)).toEqual({ value: 0 });
    });

    it("rolls back cells created by the failed pass", () => {
      const root = createRoot(fragileApp(), new MemoryHost());
      root.runTick();

      root.requestUpdate(countOf("<Fragile>#0"), increment);
      root.runTick();

      expect(root.store.has({ owner: "<Fragile>#0", slot: "extra" })).toBe(false);
      expect(root.store.get(countOf("<Fragile>#0"))).toBe(1);
    });

    it("recovers on the next update", () => {
      const host = new MemoryHost();
      const root = createRoot(fragileApp(), host);
      root.runTick();
      root.requestUpdate(countOf("<Fragile>#0"), increment);
      root.runTick();

      root.requestUpdate(countOf("<Fragile>#0"), increment);
      const result = root.runTick();

      expect(result.status).toBe("committed");
      expect(result.version).toBe(2);
      expect(host.components(2)).toEqual({ value: 2 });
    });

    it("re-renders owners dirtied by a skipped tick on the next one", () => {
      const A = defineComposable("A", (_props: Props, scope) => {
        const count = scope.useState("count", 0);
        return e("Text", { value: count.value });
      });
      const B = defineComposable("B", (_props: Props, scope) => {
        if (scope.useState("boom", false).value) {
          throw new Error("boom");
        }
        return null;
      });
      const App = defineComposable("App", () => [e(A, {}), e(B, {})]);
      const host = new MemoryHost();
      const root = createRoot(e(App, {}), host);
      root.runTick();
      const boom = { owner: "<App>#0/<B>#0", slot: "boom" };

      root.requestUpdate(countOf("<App>#0/<A>#0"), () => 5);
      root.requestUpdate(boom, () => true);
      expect(root.runTick().status).toBe("skipped");

      root.requestUpdate(boom, () => false);
      const result = root.runTick();

      expect(result.status).toBe("committed");
      expect(result.appliedEffects.map(describeEffect)).toEqual(["Update(<App>#0/<A>#0/Text#0)"]);
      expect(root.registry.get("<App>#0/<A>#0/Text#0")).toBe(3);
      expect(host.components(3)).toEqual({ value: 5 });
    });

    it("retries a skipped tick without new updates", () => {
      const host = new MemoryHost();
      const root = createRoot(fragileApp(), host);
      root.runTick();
      root.requestUpdate(countOf("<Fragile>#0"), increment);
      expect(root.runTick().status).toBe("skipped");

      expect(root.runTick().status).toBe("skipped");
    });

    it("skips the first tick on an identity collision", () => {
      const root = createRoot([e("Item", { key: 1 }), e("Item", { key: 1 })], new MemoryHost());

      const result = root.runTick();

      expect(result.status).toBe("skipped");
      expect(result.evaluationError?.code).toBe("EVALUATION_IDENTITY_COLLISION");
      expect(root.tree).toBeNull();
    });
  });

  describe("host failures", () => {
    it("commits the tree and reports the failed effect", async () => {
      const host = new MemoryHost();
      host.failWhen((operation) => operation.op === "create" && operation.components.name === "b");
      const root = createRoot([e("Item", { key: 1, name: "a" }), e("Item", { key: 2, name: "b" })], host);
      const failed = waitForEvent(root.events, "effect:failed");

      const result = root.runTick();

      expect(result.status).toBe("committed");
      expect(result.version).toBe(1);
      expect(result.failedEffects.map((failure) => failure.effect.identity)).toEqual(["Item[2]"]);
      expect(root.registry.has("Item[1]")).toBe(true);
      expect((await failed).root).toBe("root");
    });
  });

  describe("effects", () => {
    it("runs after commit and cleans up before re-running and on unmount", () => {
      const log: string[] = [];
      const Tracker = defineComposable("Tracker", (_props: Props, scope) => {
        const count = scope.useState("count", 0);
        scope.useEffect(
          "watch",
          () => {
            log.push(`run ${count.value}`);
            return () => log.push(`cleanup ${count.value}`);
          },
          [count.value],
        );
        return null;
      });
      const root = createRoot(e(Tracker, {}), new MemoryHost());

      root.runTick();
      expect(log).toEqual(["run 0"]);

      root.requestUpdate(countOf("<Tracker>#0"), increment);
      root.runTick();
      expect(log).toEqual(["run 0", "cleanup 0", "run 1"]);

      root.unmount();
      expect(log).toEqual(["run 0", "cleanup 0", "run 1", "cleanup 1"]);
    });

    it("does not re-run when deps are unchanged", () => {
      const runs = vi.fn();
      const Widget = defineComposable("Widget", (_props: Props, scope) => {
        const count = scope.useState("count", 0);
        scope.useMount("init", runs);
        return e("Text", { value: count.value });
      });
      const root = createRoot(e(Widget, {}), new MemoryHost());

      root.runTick();
      root.requestUpdate(countOf("<Widget>#0"), increment);
      root.runTick();

      expect(runs).toHaveBeenCalledTimes(1);
    });

    it("reports throwing effects without failing the tick", () => {
      const Thrower = defineComposable("Thrower", (_props: Props, scope) => {
        scope.useMount("init", () => {
          throw new Error("nope");
        });
        return null;
      });
      const root = createRoot(e(Thrower, {}), new MemoryHost());

      const result = root.runTick();

      expect(result.status).toBe("committed");
      expect(result.callbackErrors.map((error) => error.message)).toEqual(["effect failed at <Thrower>#0: nope"]);
    });

    it("rejects a nested tick", () => {
      const seen: { nested?: TickResult } = {};
      const holder: { root?: Root<number> } = {};
      const Reentrant = defineComposable("Reentrant", (_props: Props, scope) => {
        scope.useMount("tick", () => {
          seen.nested = holder.root?.runTick();
        });
        return null;
      });
      holder.root = createRoot(e(Reentrant, {}), new MemoryHost());

      const result = holder.root.runTick();

      expect(result.status).toBe("committed");
      expect(seen.nested?.status).toBe("skipped");
      expect(isStateError(seen.nested?.evaluationError)).toBe(true);
      expect(seen.nested?.evaluationError?.message).toBe("runTick() called while a tick is running");
    });
  });

  describe("strict mode", () => {
    it("flags composables whose output differs between passes", () => {
      let calls = 0;
      const Impure = defineComposable("Impure", () => e("Text", { value: calls++ }));
      const root = createRoot(e(Impure, {}), new MemoryHost(), { strict: true });
      const violations = vi.fn();
      root.events.on("purity:violation", violations);

      const result = root.runTick();

      expect(result.status).toBe("committed");
      expect(violations).toHaveBeenCalledTimes(1);
    });

    it("stays quiet for pure composables", () => {
      const root = createRoot(counterApp().app, new MemoryHost(), { strict: true });
      const violations = vi.fn();
      root.events.on("purity:violation", violations);

      root.runTick();

      expect(violations).not.toHaveBeenCalled();
    });
  });

  describe("unmount", () => {
    it("unmounts bottom-up and evicts all state", () => {
      const host = new MemoryHost();
      const root = createRoot(counterApp().app, host);
      root.runTick();

      const result = root.unmount();

      expect(result.appliedEffects.map(describeEffect)).toEqual(["Unmount(<Counter>#0/Text#0)", "Unmount(<Counter>#0)"]);
      expect(host.size).toBe(0);
      expect(root.store.size).toBe(0);
      expect(root.isUnmounted).toBe(true);
    });

    it("refuses ticks and ignores updates afterwards", () => {
      const root = createRoot(counterApp().app, new MemoryHost());
      root.runTick();
      root.unmount();

      root.requestUpdate(countOf("<Counter>#0"), increment);
      const result = root.runTick();

      expect(root.pendingUpdates).toBe(0);
      expect(result.status).toBe("skipped");
      expect(result.evaluationError?.message).toBe("runTick() called after unmount()");
      expect(root.unmount().evaluationError?.message).toBe("unmount() called twice");
    });
  });

  describe("microtask scheduling", () => {
    it("ticks once per burst of updates", async () => {
      const host = new MemoryHost();
      const { stats, app } = counterApp();
      const root = createRoot(app, host, { name: "hud" }, { scheduler: microtaskScheduler() });

      const first = await waitForEvent(root.events, "tick:committed");
      expect(first.tick).toBe(1);
      expect(first.root).toBe("hud");

      root.requestUpdate(countOf("<Counter>#0"), increment);
      root.requestUpdate(countOf("<Counter>#0"), increment);
      const second = await waitForEvent(root.events, "tick:committed");

      expect(second.tick).toBe(2);
      expect(stats.renders).toBe(2);
      expect(host.components(2)).toEqual({ value: 2 });
    });
  });
});
