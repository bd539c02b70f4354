import type { EventEmitter } from "node:events";
import type { TickEvent } from "tessera-kernel";

/**
 * Wait for a specific event to be emitted
 */
export function waitForEvent(emitter: EventEmitter, eventName: string, timeoutMs: number = 1000): Promise<TickEvent> {
  return new Promise((resolve, reject) => {
    const timeout = setTimeout(() => {
      emitter.removeListener(eventName, handler);
      reject(new Error(`Timeout waiting for event '${eventName}' after ${timeoutMs}ms`));
    }, timeoutMs);

    const handler = (event: TickEvent) => {
      clearTimeout(timeout);
      resolve(event);
    };

    emitter.once(eventName, handler);
  });
}

/**
 * Let queued microtasks run.
 */
export async function flushMicrotasks(rounds: number = 3): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}
