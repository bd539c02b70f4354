import { Logger, type KernelLogger } from "tessera-kernel";
import type { ComponentDiff, ComponentMap, HostWorld, Placement } from "tessera";
import { MemoryHost } from "tessera/testing";

/**
 * Host world that keeps entities in memory and logs every mutation.
 */
export class ConsoleHost implements HostWorld<number> {
  readonly world = new MemoryHost();
  private readonly log: KernelLogger = Logger.for("ConsoleHost");

  createEntity(components: ComponentMap, placement: Placement<number>): number {
    const handle = this.world.createEntity(components, placement);
    this.log.info({ handle, parent: placement.parent, index: placement.index, components }, "spawn");
    return handle;
  }

  destroyEntity(handle: number): void {
    this.world.destroyEntity(handle);
    this.log.info({ handle }, "despawn");
  }

  setComponents(handle: number, diff: ComponentDiff): void {
    this.world.setComponents(handle, diff);
    this.log.info({ handle, set: diff.set, remove: diff.remove }, "insert components");
  }

  reorderSiblings(parent: number | null, ordered: readonly number[]): void {
    this.world.reorderSiblings(parent, ordered);
    this.log.info({ parent, ordered }, "reorder children");
  }
}
