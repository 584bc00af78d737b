/**
 * Utility functions used across the proptype engine
 */

import { inspect, isDeepStrictEqual } from "util";

/**
 * Collapse runs of whitespace, as in multi-line type text
 */
export function normalize(key: string): string {
  return key.replace(/\s+/g, " ").trim();
}

/**
 * Check if value is a plain object: an object literal or a null-prototype dictionary
 */
export function isPlainObject(value: unknown): value is Record<PropertyKey, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Own enumerable entries, symbol keys included
 */
export function ownEntries(value: Record<PropertyKey, unknown>): [string | symbol, unknown][] {
  return Reflect.ownKeys(value)
    .filter((key) => Object.prototype.propertyIsEnumerable.call(value, key))
    .map((key): [string | symbol, unknown] => [key, value[key]]);
}

/**
 * Convert a drawn key into the property key an object stores it under
 */
export function toPropertyKey(value: unknown): string | symbol {
  return typeof value === "symbol" ? value : String(value);
}

/**
 * The values a stored property key may stand for. Objects keep keys as
 * strings, so "5" also stands for 5 and "true" for true.
 */
export function propertyKeyCandidates(key: string | symbol): unknown[] {
  if (typeof key === "symbol") {
    return [key];
  }
  const candidates: unknown[] = [key];
  const numeric = Number(key);
  if (key.trim() !== "" && String(numeric) === key) {
    candidates.push(numeric);
  }
  if (key === "true") candidates.push(true);
  if (key === "false") candidates.push(false);
  if (key === "null") candidates.push(null);
  return candidates;
}

/**
 * Define entries one by one so keys such as "__proto__" stay own data properties
 */
export function buildObject(entries: readonly (readonly [unknown, unknown])[]): Record<PropertyKey, unknown> {
  const result: Record<PropertyKey, unknown> = {};
  for (const [key, value] of entries) {
    Object.defineProperty(result, toPropertyKey(key), {
      value,
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return result;
}

/**
 * True when no two entries would land on the same property key
 */
export function hasDistinctKeys(entries: readonly (readonly [unknown, unknown])[], reserved?: string): boolean {
  const seen = new Set<string | symbol>();
  for (const [key] of entries) {
    const propertyKey = toPropertyKey(key);
    if (propertyKey === reserved || seen.has(propertyKey)) {
      return false;
    }
    seen.add(propertyKey);
  }
  return true;
}

function withoutNegativeZero(value: unknown): unknown {
  if (typeof value === "number") {
    return Object.is(value, -0) ? 0 : value;
  }
  if (Array.isArray(value)) {
    return value.map(withoutNegativeZero);
  }
  if (isPlainObject(value)) {
    return buildObject(ownEntries(value).map(([key, entry]) => [key, withoutNegativeZero(entry)]));
  }
  if (value instanceof Map) {
    return new Map(Array.from(value, ([key, entry]) => [withoutNegativeZero(key), withoutNegativeZero(entry)]));
  }
  return value;
}

/**
 * Deep value equality where 0 and -0 are the same value
 */
export function valuesEqual(left: unknown, right: unknown): boolean {
  return isDeepStrictEqual(withoutNegativeZero(left), withoutNegativeZero(right));
}

/**
 * Stable JSON stringification for consistent output
 */
export function stableStringify(value: unknown, space?: number): string {
  return JSON.stringify(
    value,
    (_key, val: unknown) => {
      if (isPlainObject(val)) {
        const sorted: Record<string, unknown> = {};
        for (const k of Object.keys(val).sort()) {
          sorted[k] = val[k];
        }
        return sorted;
      }
      return val;
    },
    space
  );
}

/**
 * Render any runtime value on one line for failure messages
 */
export function formatValue(value: unknown): string {
  return inspect(value, { depth: 6, breakLength: Infinity, maxArrayLength: 20, maxStringLength: 200 });
}

/**
 * A 32-bit seed, the way fast-check seeds runs that have none
 */
export function freshSeed(): number {
  return (Date.now() ^ (Math.random() * 0x100000000)) | 0;
}
