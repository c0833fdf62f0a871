// ============================================
// Component Value Copying
// ============================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function cloneUnknown(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(cloneUnknown);
  }
  if (isPlainObject(value)) {
    const copy: Record<string, unknown> = {};
    for (const [key, field] of Object.entries(value)) {
      copy[key] = cloneUnknown(field);
    }
    return copy;
  }
  // Primitives, functions and class instances are shared by reference
  return value;
}

/**
 * Deep-copy plain objects and arrays so stored components never alias caller data.
 * Functions and class instances inside the value are kept by reference.
 */
export function cloneData<T>(value: T): T {
  return cloneUnknown(value) as T;
}

/**
 * Convert a value into JSON-safe data.
 * Functions, symbols, bigints and cyclic references are dropped;
 * inside arrays they become null so indices stay stable.
 * Returns undefined when the value itself is not representable.
 */
export function toSerializable(value: unknown, seen: WeakSet<object> = new WeakSet()): JsonValue | undefined {
  if (value === null) return null;

  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return value;
    case 'object':
      break;
    default:
      return undefined;
  }

  if (seen.has(value)) return undefined;
  seen.add(value);

  let result: JsonValue;
  if (Array.isArray(value)) {
    result = value.map((item) => toSerializable(item, seen) ?? null);
  } else {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, field] of Object.entries(value)) {
      const serialized = toSerializable(field, seen);
      if (serialized !== undefined) {
        out[key] = serialized;
      }
    }
    result = out;
  }

  seen.delete(value);
  return result;
}
