/**
 * Value equality for bound data and kind props.
 *
 * Plain objects and arrays compare structurally; everything else by
 * Object.is (so NaN equals NaN). Functions and class instances compare by
 * identity.
 */

import type { ValueMap } from "./node.js";

function isPlainObject(v: unknown): v is Readonly<Record<string, unknown>> {
  if (typeof v !== "object" || v === null) return false;
  const proto = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

export function valueEquals(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!valueEquals(a[i], b[i])) return false;
    }
    return true;
  }
  if (isPlainObject(a) && isPlainObject(b)) {
    const aKeys = Object.keys(a);
    if (aKeys.length !== Object.keys(b).length) return false;
    for (const k of aKeys) {
      if (!Object.prototype.hasOwnProperty.call(b, k)) return false;
      if (!valueEquals(a[k], b[k])) return false;
    }
    return true;
  }
  return false;
}

export type ValueMapDelta = Readonly<{
  /** Keys added or changed, with their new values. */
  changed: ValueMap | undefined;
  removed: readonly string[] | undefined;
}>;

/** Key-wise delta from `prev` to `next`; both fields undefined when equal. */
export function diffValueMaps(prev: ValueMap, next: ValueMap, keys?: readonly string[]): ValueMapDelta {
  let changed: Record<string, unknown> | undefined;
  let removed: string[] | undefined;
  const has = (m: ValueMap, k: string): boolean => Object.prototype.hasOwnProperty.call(m, k);

  const nextKeys = keys ?? Object.keys(next);
  for (const k of nextKeys) {
    if (!has(next, k)) continue;
    if (has(prev, k) && valueEquals(prev[k], next[k])) continue;
    changed ??= {};
    changed[k] = next[k];
  }
  const prevKeys = keys ?? Object.keys(prev);
  for (const k of prevKeys) {
    if (has(prev, k) && !has(next, k)) {
      removed ??= [];
      removed.push(k);
    }
  }
  return { changed, removed };
}
