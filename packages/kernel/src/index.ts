/**
 * # Tessera Kernel
 *
 * Runtime plumbing shared by every Tessera package:
 *
 * - **Context** - Tick-scoped state (root, tick, phase) propagated with AsyncLocalStorage
 * - **Logger** - Structured pino logging that stamps each line with the active tick
 *
 * ## Example
 *
 * ```typescript
 * import { Context, Logger } from 'tessera-kernel';
 *
 * const log = Logger.for('MyHost');
 * Context.run(Context.create({ root: 'hud', tick: 1 }), () => {
 *   log.info('spawned entity');
 * });
 * ```
 *
 * @module tessera-kernel
 */

export * from "./context";
export * from "./logger";
