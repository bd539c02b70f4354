import {
  AuthorEvaluationError,
  StateShapeMismatchError,
  type TesseraError,
} from "tessera-shared";
import { Logger, type KernelLogger } from "tessera-kernel";
import type { IdentityPath } from "../tree/identity";
import { shapeOf } from "../utils/equality";
import { StateRef } from "./state-ref";

// =============================================================================
// Types
// =============================================================================

/**
 * Address of one state cell: the owning identity plus a slot name.
 */
export interface CellAddress {
  readonly owner: IdentityPath;
  readonly slot: string;
}

export interface CellOptions<T> {
  /** Runs with the final value when the owner is evicted */
  cleanup?: (value: T) => void;
}

export interface UpdateOptions {
  /** Change the value without scheduling re-evaluation of the owner */
  silent?: boolean;
}

export type UpdateTarget<T> = CellAddress | StateRef<T>;

export interface DrainResult {
  /** Owners whose value changed through a non-silent update */
  dirty: Set<IdentityPath>;
  applied: number;
  dropped: number;
  /** Mutators that threw */
  errors: TesseraError[];
}

interface Cell {
  value: unknown;
  /** Shape of the value the cell was created with */
  readonly shape: string;
  cleanup?(value: unknown): void;
}

interface PendingUpdate {
  readonly target: UpdateTarget<unknown>;
  readonly silent: boolean;
  mutate(prev: unknown): unknown;
}

export interface StateStoreOptions {
  /** Called whenever an update is queued */
  onEnqueue?: () => void;
  log?: KernelLogger;
}

function isLazy<T>(initializer: T | (() => T)): initializer is () => T {
  return typeof initializer === "function";
}

export function formatAddress(address: CellAddress): string {
  return `${address.owner}:${address.slot}`;
}

// =============================================================================
// StateStore
// =============================================================================

/**
 * Persistent state cells keyed by identity, independent of tree rebuilds.
 *
 * Cells are read during evaluation through `getOrInit` and only ever change
 * through queued updates, so one evaluation pass sees a frozen snapshot.
 * Each root owns its own store.
 */
export class StateStore {
  private readonly cells = new Map<IdentityPath, Map<string, Cell>>();
  private readonly refBindings = new Map<StateRef<unknown>, CellAddress>();
  private queue: PendingUpdate[] = [];
  private created: CellAddress[] | null = null;
  private readonly onEnqueue?: () => void;
  private readonly log: KernelLogger;

  constructor(options: StateStoreOptions = {}) {
    this.onEnqueue = options.onEnqueue;
    this.log = options.log ?? Logger.for("StateStore");
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  has(address: CellAddress): boolean {
    return this.cells.get(address.owner)?.has(address.slot) ?? false;
  }

  get<T>(address: CellAddress): T | undefined {
    return this.cells.get(address.owner)?.get(address.slot)?.value as T | undefined;
  }

  /**
   * Return the cell's value, creating the cell on first use.
   *
   * A function initializer is called only when the cell is created. A value
   * initializer is also checked against the shape the cell was created with.
   *
   * @throws StateShapeMismatchError when the slot is reused for a value of another shape
   */
  getOrInit<T>(address: CellAddress, initializer: T | (() => T), options: CellOptions<T> = {}): T {
    const existing = this.cells.get(address.owner)?.get(address.slot);
    if (existing) {
      if (!isLazy(initializer)) {
        const received = shapeOf(initializer);
        if (received !== existing.shape) {
          throw new StateShapeMismatchError(address.owner, address.slot, existing.shape, received);
        }
      }
      return existing.value as T;
    }

    const value = isLazy(initializer) ? initializer() : initializer;
    this.createCell(address, value, options.cleanup);
    return value;
  }

  /**
   * Set a cell directly, creating it when missing. Used when an evaluation
   * pass commits its deferred writes; authors go through `requestUpdate`.
   */
  write<T>(address: CellAddress, value: T, options: CellOptions<T> = {}): void {
    const cell = this.cells.get(address.owner)?.get(address.slot);
    if (cell) {
      cell.value = value;
      return;
    }
    this.createCell(address, value, options.cleanup);
  }

  private createCell<T>(address: CellAddress, value: T, cleanup: ((value: T) => void) | undefined): void {
    let owned = this.cells.get(address.owner);
    if (!owned) {
      owned = new Map();
      this.cells.set(address.owner, owned);
    }
    owned.set(address.slot, { value, shape: shapeOf(value), cleanup });
    this.created?.push(address);
  }

  owners(): IdentityPath[] {
    return [...this.cells.keys()];
  }

  slotsOf(owner: IdentityPath): string[] {
    return [...(this.cells.get(owner)?.keys() ?? [])];
  }

  get size(): number {
    let total = 0;
    for (const owned of this.cells.values()) {
      total += owned.size;
    }
    return total;
  }

  // ---------------------------------------------------------------------------
  // Update channel
  // ---------------------------------------------------------------------------

  /**
   * Queue a mutation for the next drain. Never applied synchronously;
   * updates to one cell apply in submission order.
   */
  requestUpdate<T>(target: UpdateTarget<T>, mutator: (prev: T) => T, options: UpdateOptions = {}): void {
    this.queue.push({ target, silent: options.silent ?? false, mutate: mutator });
    this.onEnqueue?.();
  }

  get pendingUpdates(): number {
    return this.queue.length;
  }

  /**
   * Apply queued updates in order. Updates queued while draining wait for
   * the next drain.
   */
  drain(): DrainResult {
    const batch = this.queue;
    this.queue = [];

    const result: DrainResult = { dirty: new Set(), applied: 0, dropped: 0, errors: [] };

    for (const update of batch) {
      const address = this.resolveTarget(update.target);
      const cell = address ? this.cells.get(address.owner)?.get(address.slot) : undefined;
      if (!address || !cell) {
        result.dropped++;
        const target = update.target instanceof StateRef ? update.target.toString() : formatAddress(update.target);
        this.log.debug({ target }, "dropped update for missing cell");
        continue;
      }

      let next: unknown;
      try {
        next = update.mutate(cell.value);
      } catch (error) {
        result.errors.push(AuthorEvaluationError.fromThrown(address.owner, error, "update"));
        continue;
      }

      const changed = !Object.is(cell.value, next);
      cell.value = next;
      result.applied++;
      if (changed && !update.silent) {
        result.dirty.add(address.owner);
      }
    }

    return result;
  }

  /**
   * Drop every queued update; returns how many were dropped.
   */
  clearQueue(): number {
    const count = this.queue.length;
    this.queue = [];
    return count;
  }

  // ---------------------------------------------------------------------------
  // State refs
  // ---------------------------------------------------------------------------

  bindRef<T>(ref: StateRef<T>, address: CellAddress): void {
    const previous = this.refBindings.get(ref);
    if (previous && formatAddress(previous) !== formatAddress(address)) {
      this.log.debug({ ref: ref.name, from: formatAddress(previous), to: formatAddress(address) }, "state ref rebound");
    }
    this.refBindings.set(ref, address);
  }

  resolveRef<T>(ref: StateRef<T>): CellAddress | undefined {
    return this.refBindings.get(ref);
  }

  private resolveTarget(target: UpdateTarget<unknown>): CellAddress | undefined {
    return target instanceof StateRef ? this.refBindings.get(target) : target;
  }

  // ---------------------------------------------------------------------------
  // Eviction
  // ---------------------------------------------------------------------------

  /**
   * Run each cell's cleanup and remove every cell of `owner`. A later
   * `getOrInit` for the same identity starts a fresh lifecycle.
   *
   * @returns errors thrown by cleanups
   */
  evict(owner: IdentityPath): TesseraError[] {
    const errors: TesseraError[] = [];
    const owned = this.cells.get(owner);
    this.cells.delete(owner);

    for (const [ref, address] of this.refBindings) {
      if (address.owner === owner) {
        this.refBindings.delete(ref);
      }
    }

    if (!owned) {
      return errors;
    }

    for (const cell of owned.values()) {
      try {
        cell.cleanup?.(cell.value);
      } catch (error) {
        errors.push(AuthorEvaluationError.fromThrown(owner, error, "cleanup"));
      }
    }
    return errors;
  }

  evictAll(): TesseraError[] {
    return this.owners().flatMap((owner) => this.evict(owner));
  }

  // ---------------------------------------------------------------------------
  // Evaluation transactions
  // ---------------------------------------------------------------------------

  /**
   * Start recording created cells so a failed evaluation can drop them.
   */
  begin(): void {
    this.created = [];
  }

  commit(): void {
    this.created = null;
  }

  /**
   * Remove cells created since `begin()` without running cleanups.
   */
  rollback(): number {
    const created = this.created ?? [];
    this.created = null;
    for (const address of created) {
      const owned = this.cells.get(address.owner);
      owned?.delete(address.slot);
      if (owned?.size === 0) {
        this.cells.delete(address.owner);
      }
    }
    return created.length;
  }
}
