/**
 * A typed handle to one state slot, for code that runs outside evaluation
 * (input handlers, host systems).
 *
 * A composable binds the ref with `scope.useStateRef(ref, initial)`; updates
 * sent through the ref reach whichever cell it is bound to when the queue
 * drains, and are dropped while it is unbound.
 *
 * @example
 * ```typescript
 * const score = createStateRef<number>("score");
 *
 * const Hud = defineComposable("Hud", (_props, scope) => {
 *   const value = scope.useStateRef(score, 0).value;
 *   return createElement("Text", { value: `score ${value}` });
 * });
 *
 * onEnemyKilled(() => root.requestUpdate(score, (n) => n + 10));
 * ```
 */
export class StateRef<T> {
  /** Type-only marker, never set at runtime */
  declare readonly valueType?: T;

  constructor(readonly name: string) {}

  toString(): string {
    return `StateRef(${this.name})`;
  }
}

export function createStateRef<T>(name: string): StateRef<T> {
  return new StateRef<T>(name);
}
