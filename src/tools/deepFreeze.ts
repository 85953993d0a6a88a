const isObjectLike = (value: unknown): value is object =>
  (typeof value === "object" && value !== null) || typeof value === "function";

const isPlainObject = (value: object): value is Record<string, unknown> => {
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
};

const shouldFreezeRecursively = (value: object): boolean =>
  typeof value === "function" || Array.isArray(value) || isPlainObject(value);

/**
 * Recursively freezes an object graph. Handles cycles via WeakSet.
 * Below the root only functions, arrays and plain objects are frozen; class
 * instances reachable from the root are left alone.
 */
export function deepFreeze<T>(
  value: T,
  seen = new WeakSet<object>(),
  depth = 0,
): T {
  if (!isObjectLike(value)) {
    return value;
  }

  if (depth > 0 && !shouldFreezeRecursively(value)) {
    return value;
  }

  if (seen.has(value)) {
    return value;
  }
  seen.add(value);

  for (const key of Reflect.ownKeys(value)) {
    const descriptor = Object.getOwnPropertyDescriptor(value, key);
    if (!descriptor) {
      continue;
    }

    if ("value" in descriptor) {
      deepFreeze(descriptor.value, seen, depth + 1);
      continue;
    }

    if (descriptor.get) {
      deepFreeze(descriptor.get, seen, depth + 1);
    }
    if (descriptor.set) {
      deepFreeze(descriptor.set, seen, depth + 1);
    }
  }

  Object.freeze(value);
  return value;
}
