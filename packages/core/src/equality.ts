/**
 * @module equality
 * Structural value equality used to decide whether a property write is a change.
 *
 * - primitives: SameValueZero (`NaN` equals `NaN`, `0` equals `-0`)
 * - dates: same time value
 * - arrays: same length, element-wise equal
 * - maps: same keys (by SameValueZero), values equal
 * - sets: same members (by SameValueZero)
 * - plain objects: same own enumerable keys, values equal
 * - anything else (observables, class instances, functions): identity
 */

/** True for `{}` literals and `Object.create(null)` objects. */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Structural equality; see module docs for the rules. */
export function valueEquals(a: unknown, b: unknown): boolean {
  return equalsWith(a, b, new Map());
}

function equalsWith(a: unknown, b: unknown, seen: Map<object, object>): boolean {
  if (a === b || (Number.isNaN(a) && Number.isNaN(b))) return true;
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) {
    return false;
  }

  // Cyclic containers: assume equal for a pair already under comparison.
  if (seen.get(a) === b) return true;
  seen.set(a, b);

  if (a instanceof Date && b instanceof Date) {
    return equalsWith(a.getTime(), b.getTime(), seen);
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => equalsWith(item, b[i], seen));
  }

  if (a instanceof Map && b instanceof Map) {
    if (a.size !== b.size) return false;
    for (const [key, value] of a) {
      if (!b.has(key) || !equalsWith(value, b.get(key), seen)) return false;
    }
    return true;
  }

  if (a instanceof Set && b instanceof Set) {
    if (a.size !== b.size) return false;
    for (const member of a) {
      if (!b.has(member)) return false;
    }
    return true;
  }

  if (isPlainObject(a) && isPlainObject(b)) {
    const keysA = Object.keys(a);
    const keysB = Object.keys(b);
    if (keysA.length !== keysB.length) return false;
    return keysA.every(
      (key) => Object.prototype.hasOwnProperty.call(b, key) && equalsWith(a[key], b[key], seen),
    );
  }

  return false;
}
