/**
 * Tick schedulers decide when a root runs its next tick after an update
 * is queued. Whatever the trigger, a tick drains every update queued
 * before it, so updates from one burst coalesce into one evaluation.
 */
export interface TickScheduler {
  readonly name: string;
  /** Ask for `run` to be called at the scheduler's next opportunity */
  schedule(run: () => void): void;
  /** Forget a pending request */
  cancel(): void;
}

/**
 * The host drives ticks itself, typically once per frame. `schedule` only
 * records that a tick is wanted.
 */
export function manualScheduler(): TickScheduler & { readonly requested: boolean } {
  let requested = false;
  return {
    name: "manual",
    get requested() {
      return requested;
    },
    schedule() {
      requested = true;
    },
    cancel() {
      requested = false;
    },
  };
}

/**
 * Run a tick on the microtask queue after the first update of a burst.
 */
export function microtaskScheduler(): TickScheduler {
  let pending = false;
  let generation = 0;
  return {
    name: "microtask",
    schedule(run) {
      if (pending) return;
      pending = true;
      const scheduled = generation;
      queueMicrotask(() => {
        if (!pending || scheduled !== generation) return;
        pending = false;
        run();
      });
    },
    cancel() {
      pending = false;
      generation++;
    },
  };
}
