/**
 * Config Merge Helpers
 *
 * Untyped deep merge for raw JSON config objects, used while composing an
 * `extends` chain before the result is validated into a typed schema.
 *
 * @module config/merge
 */

export type RawConfigObject = Record<string, unknown>;

export function isPlainObject(value: unknown): value is RawConfigObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects. Child values override parent; arrays replace.
 */
export function deepMerge(parent: RawConfigObject, child: RawConfigObject): RawConfigObject {
  const result: RawConfigObject = { ...parent };

  for (const key of Object.keys(child)) {
    const childVal = child[key];
    const parentVal = parent[key];

    if (childVal === undefined) {
      continue;
    }

    if (isPlainObject(childVal) && isPlainObject(parentVal)) {
      result[key] = deepMerge(parentVal, childVal);
    } else {
      result[key] = childVal;
    }
  }

  return result;
}
