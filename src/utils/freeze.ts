/** Recursively freezes objects and arrays in place and returns the same value. */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) return value;
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    deepFreeze(child);
  }
  return Object.freeze(value);
}
