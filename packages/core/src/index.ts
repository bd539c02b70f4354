/**
 * # Tessera
 *
 * Declarative composition for entity-component worlds. Describe a tree of
 * composables; on each tick Tessera re-evaluates what changed, diffs it
 * against the committed tree and applies the minimal set of entity
 * mutations to your host.
 *
 * ## Key Features
 *
 * - **Composables** - Plain functions of props and slot-addressed state
 * - **Keyed identity** - State and entities follow keys across reorders
 * - **Minimal effects** - Mount, update, move and unmount, with LIS-based moves
 * - **Partial failure isolation** - One rejected host call never aborts a tick
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createElement, createRoot, defineComposable, list } from 'tessera';
 *
 * const Inventory = defineComposable("Inventory", (props: { items: Item[] }, scope) => {
 *   const selected = scope.useState<string | null>("selected", null);
 *   return list(props.items, (item) => item.id, (item) =>
 *     createElement("Slot", { icon: item.icon, highlighted: item.id === selected.value }),
 *   );
 * });
 *
 * const root = createRoot(createElement(Inventory, { items }), host);
 * root.runTick();
 * ```
 *
 * @module tessera
 */

// Tree model
export * from "./tree/identity";
export * from "./tree/element";
export * from "./tree/node";
export * from "./tree/tree-index";
export * from "./tree/evaluate";
export * from "./tree/debug";

// State
export * from "./state/store";
export * from "./state/scope";
export * from "./state/state-ref";

// Reconciliation
export * from "./reconciler/effects";
export * from "./reconciler/lis";
export * from "./reconciler/reconcile";

// Host
export * from "./applier/host";
export * from "./applier/components";
export * from "./applier/registry";
export * from "./applier/applier";

// Runtime
export * from "./scheduler/scheduler";
export * from "./runtime/tick-result";
export * from "./runtime/root";
export * from "./config";
export * from "./utils";

export * from "tessera-shared";
