import { Logger } from "tessera-kernel";
import { createElement, createRoot } from "tessera";
import { bagOpen, Hud, inventory } from "./components";
import { ConsoleHost } from "./console-host";

Logger.configure({ level: "info", prettyPrint: true });

const log = Logger.for("inventory-example");
const host = new ConsoleHost();
const root = createRoot(createElement(Hud, {}), host, { name: "hud", strict: true });

// One scripted input per frame
const frames: Array<() => void> = [
  () => root.requestUpdate(bagOpen, () => true),
  () =>
    root.requestUpdate(inventory, () => [
      { id: "potion", name: "Potion", quantity: 3 },
      { id: "arrow", name: "Arrow", quantity: 40 },
    ]),
  () => root.requestUpdate(inventory, (items) => [...items].reverse()),
  () => root.requestUpdate(inventory, (items) => items.filter((item) => item.id !== "potion")),
  () => root.requestUpdate(bagOpen, () => false),
];

for (const input of [() => undefined, ...frames]) {
  input();
  const result = root.runTick();
  log.info(
    { tick: result.tick, status: result.status, effects: result.appliedEffects.length, failed: result.failedEffects.length },
    "frame",
  );
}

log.info(`\n${root.toDebugString()}`);
root.unmount();
log.info({ entities: host.world.size }, "unmounted");
