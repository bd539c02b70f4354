import { AsyncLocalStorage } from "node:async_hooks";
import { EventEmitter } from "node:events";
import { randomUUID } from "node:crypto";
import { ContextError } from "tessera-shared";

/**
 * Phases of one tick, in the order they run.
 */
export type TickPhase = "idle" | "drain" | "evaluate" | "reconcile" | "apply" | "effects" | "unmount";

export interface TickEvent {
  type: string;
  payload: unknown;
  timestamp: number;
  root: string;
  tick: number;
}

export interface ContextMetadata extends Record<string, unknown> {}

/**
 * Base KernelContext interface with core properties.
 * One context is active while a root runs a tick; the logger reads it to
 * stamp every line with the root, tick and phase.
 *
 * @example
 * ```typescript
 * const ctx = Context.create({ root: 'hud', tick: 12 });
 * Context.run(ctx, () => log.info('inside tick 12'));
 * ```
 */
export interface KernelContext {
  /** Correlates every log line of one root */
  traceId: string;
  /** Name of the root running the tick */
  root: string;
  /** Tick counter of that root */
  tick: number;
  /** Current phase; updated in place as the tick advances */
  phase: TickPhase;
  metadata: ContextMetadata;
  /** Lifecycle bus of the root (commit, skip, effect failures) */
  events: EventEmitter;
}

const storage = new AsyncLocalStorage<KernelContext>();

export class Context {
  /**
   * Creates a new context object with defaults.
   */
  static create(overrides: Partial<KernelContext> = {}): KernelContext {
    return {
      traceId: overrides.traceId ?? randomUUID(),
      root: overrides.root ?? "root",
      tick: overrides.tick ?? 0,
      phase: overrides.phase ?? "idle",
      metadata: overrides.metadata ?? {},
      events: overrides.events ?? new EventEmitter(),
    };
  }

  /**
   * Runs a function within the given context.
   * Works for synchronous and asynchronous functions alike.
   */
  static run<T>(context: KernelContext, fn: () => T): T {
    return storage.run(context, fn);
  }

  /**
   * Creates a child context that inherits from the current context (or creates a new root).
   * The child is a shallow copy; `events` and `metadata` are shared with the parent.
   */
  static child(overrides: Partial<KernelContext> = {}): KernelContext {
    const parent = Context.tryGet();
    if (!parent) {
      return Context.create(overrides);
    }
    return {
      ...parent,
      ...overrides,
    };
  }

  /**
   * Creates a child context and runs a function within it.
   */
  static fork<T>(overrides: Partial<KernelContext>, fn: () => T): T {
    return Context.run(Context.child(overrides), fn);
  }

  /**
   * Gets the current context. Throws if not found.
   */
  static get(): KernelContext {
    const store = storage.getStore();
    if (!store) {
      throw ContextError.notFound();
    }
    return store;
  }

  /**
   * Gets the current context or returns undefined if not found.
   */
  static tryGet(): KernelContext | undefined {
    return storage.getStore();
  }

  /**
   * Moves the current context to another phase. No-op outside a context.
   */
  static setPhase(phase: TickPhase): void {
    const ctx = storage.getStore();
    if (ctx) {
      ctx.phase = phase;
    }
  }

  /**
   * Helper to emit an event on the current context.
   */
  static emit(type: string, payload: unknown): void {
    const ctx = Context.tryGet();
    if (ctx) {
      const event: TickEvent = {
        type,
        payload,
        timestamp: Date.now(),
        root: ctx.root,
        tick: ctx.tick,
      };

      ctx.events.emit(type, event);
      ctx.events.emit("*", event);
    }
  }
}
