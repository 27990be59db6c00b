/**
 * Freeze an object and everything reachable from it, in place
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) {
    return value;
  }
  Object.freeze(value);
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    deepFreeze(child);
  }
  return value;
}
