/**
 * Structural value equality used for props, memo deps and tree comparison.
 * Functions and class instances compare by reference; plain objects, arrays,
 * maps, sets and dates compare by value.
 */
export function valueEquals(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (typeof a !== "object" || typeof b !== "object" || a === null || b === null) {
    return false;
  }

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => valueEquals(item, b[i]));
  }

  if (a instanceof Date || b instanceof Date) {
    return a instanceof Date && b instanceof Date && a.getTime() === b.getTime();
  }

  if (a instanceof Map || b instanceof Map) {
    if (!(a instanceof Map) || !(b instanceof Map) || a.size !== b.size) return false;
    for (const [key, value] of a) {
      if (!b.has(key) || !valueEquals(value, b.get(key))) return false;
    }
    return true;
  }

  if (a instanceof Set || b instanceof Set) {
    if (!(a instanceof Set) || !(b instanceof Set) || a.size !== b.size) return false;
    for (const value of a) {
      if (!b.has(value)) return false;
    }
    return true;
  }

  if (!isPlainObject(a) || !isPlainObject(b)) return false;

  const aKeys = Object.keys(a);
  if (aKeys.length !== Object.keys(b).length) return false;
  return aKeys.every((key) => Object.prototype.hasOwnProperty.call(b, key) && valueEquals(a[key], b[key]));
}

/**
 * Compare two dependency lists element-wise with Object.is.
 */
export function depsEqual(prev: readonly unknown[] | undefined, next: readonly unknown[] | undefined): boolean {
  if (prev === undefined || next === undefined) return false;
  if (prev.length !== next.length) return false;
  return prev.every((dep, i) => Object.is(dep, next[i]));
}

/**
 * Check if a value is a plain object (object literal or null-prototype object)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Coarse runtime shape of a value, used to detect a state slot being reused
 * for an incompatible initializer.
 */
export function shapeOf(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (value instanceof Map) return "map";
  if (value instanceof Set) return "set";
  if (value instanceof Date) return "date";
  if (typeof value === "object") {
    // prototype chains without Object.prototype have no constructor
    const ctor: unknown = value.constructor;
    if (isPlainObject(value)) return "object";
    return typeof ctor === "function" && ctor.name !== "" ? `instance of ${ctor.name}` : "object";
  }
  return typeof value;
}
