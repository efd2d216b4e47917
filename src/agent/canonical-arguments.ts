/**
 * @fileoverview Canonical form of tool-call arguments.
 *
 * Two calls count as duplicates when their canonical arguments are equal
 * strings. Object keys are sorted at every depth and whitespace is dropped;
 * array order is kept.
 */

type Json = null | boolean | number | string | Json[] | { [key: string]: Json };

function sortKeys(value: unknown): Json {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: { [key: string]: Json } = {};
    for (const key of Object.keys(value).sort()) {
      // defineProperty keeps a `__proto__` key as an own property
      Object.defineProperty(sorted, key, {
        value: sortKeys(Reflect.get(value, key)),
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
    return sorted;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return null;
}

/**
 * Canonical serialization of a JSON arguments string. Input that does not
 * parse falls back to its trimmed text.
 */
export function canonicalizeArguments(argumentsJson: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(argumentsJson);
  } catch {
    return argumentsJson.trim();
  }
  return JSON.stringify(sortKeys(parsed));
}

/**
 * Key identifying a (tool, arguments) pair.
 */
export function toolCallKey(name: string, argumentsJson: string): string {
  return `${name}\u0000${canonicalizeArguments(argumentsJson)}`;
}
