/**
 * Value Coercion Helpers
 *
 * Turn commander's string option values into numbers, arrays and parsed JSON.
 * Keys are never renamed; the zod schema of the command validates the result.
 */

import { ValidationError } from '@stratlab/utils';

function isString(x: unknown): x is string {
  return typeof x === 'string';
}

/**
 * Parse a JSON option. Non-strings are returned as given.
 */
export function coerceJson(v: unknown, name: string): unknown {
  if (v === null || v === undefined) return undefined;
  if (!isString(v)) return v;
  try {
    return JSON.parse(v);
  } catch (e) {
    const preview = v.length > 80 ? `${v.substring(0, 80)}...` : v;
    throw new ValidationError(`Invalid JSON for ${name}`, {
      name,
      input: preview,
      error: e instanceof Error ? e.message : String(e),
    });
  }
}

/**
 * '123' -> 123; numbers pass through
 */
export function coerceNumber(v: unknown, name: string): number | undefined {
  if (v === null || v === undefined) return undefined;
  if (typeof v === 'number') return v;
  if (isString(v) && v.trim() !== '') {
    const n = Number(v);
    if (!Number.isFinite(n)) {
      throw new ValidationError(`Invalid number for ${name}`, { name, value: v });
    }
    return n;
  }
  throw new ValidationError(`Invalid number for ${name}`, { name, value: v });
}

function splitList(v: string): string[] {
  return v
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * "30,60", "[30,60]" or [30, 60] -> [30, 60]
 */
export function coerceNumberArray(v: unknown, name: string): number[] | undefined {
  if (v === null || v === undefined) return undefined;
  const items = isString(v) && v.trim().startsWith('[') ? coerceJson(v, name) : v;
  const list = isString(items) ? splitList(items) : items;
  if (!Array.isArray(list)) {
    throw new ValidationError(`Invalid number list for ${name}`, { name, value: v });
  }
  return list.map((x: unknown) => {
    const n = coerceNumber(x, name);
    if (n === undefined) {
      throw new ValidationError(`Invalid number in list for ${name}`, { name, value: x });
    }
    return n;
  });
}

/**
 * "a,b" or ["a", "b"] -> ["a", "b"]
 */
export function coerceStringArray(v: unknown, name: string): string[] | undefined {
  if (v === null || v === undefined) return undefined;
  if (isString(v)) return splitList(v);
  if (Array.isArray(v) && v.every(isString)) return v;
  throw new ValidationError(`Invalid string list for ${name}`, { name, value: v });
}
