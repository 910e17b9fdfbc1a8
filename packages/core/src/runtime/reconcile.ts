/**
 * packages/core/src/runtime/reconcile.ts — Child-list matching.
 *
 * Why: Matches new children against previous children so the diff engine can
 * tell which nodes survive (and may move or update), which are new and which
 * are gone. The longest increasing run of surviving old indices is left in
 * place; everything else that survives is a move.
 *
 * Matching rules:
 *   - A new child that declares a key matches the first old child with that key
 *   - Otherwise it matches the first old child with the same id
 *   - Each old child matches at most once; later claimants are inserts
 *   - Duplicate keys are not fatal: first match wins
 */

import type { TemplateNode } from "../model/node.js";

/** Slot identifier: keyed ("k:mykey") or by node id ("id:abc"). */
export type SlotId = `k:${string}` | `id:${string}`;

export function slotIdForChild<V>(child: TemplateNode<V>): SlotId {
  const key = child.key;
  if (key !== undefined) return `k:${key}`;
  return `id:${child.id}`;
}

export type ChildMatch = Readonly<{
  /** For each new index, the matched old index or -1. */
  prevIndexOf: readonly number[];
  /** Old indices nobody matched, ascending. */
  unmatchedPrev: readonly number[];
  /** For each new index, true when the child keeps its relative position. */
  stable: readonly boolean[];
}>;

/**
 * Indices (into `seq`) of one longest strictly increasing subsequence.
 * Entries < 0 are ignored.
 */
export function longestIncreasingSubsequence(seq: readonly number[]): number[] {
  // tails[k] = index in seq of the smallest tail of an increasing run of length k+1
  const tails: number[] = [];
  const prev: number[] = new Array<number>(seq.length).fill(-1);

  for (let i = 0; i < seq.length; i++) {
    const v = seq[i];
    if (v === undefined || v < 0) continue;
    let lo = 0;
    let hi = tails.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const tailIndex = tails[mid];
      const tail = tailIndex === undefined ? undefined : seq[tailIndex];
      if (tail !== undefined && tail < v) lo = mid + 1;
      else hi = mid;
    }
    if (lo > 0) prev[i] = tails[lo - 1] ?? -1;
    tails[lo] = i;
  }

  const out: number[] = [];
  let cursor = tails.length > 0 ? (tails[tails.length - 1] ?? -1) : -1;
  while (cursor >= 0) {
    out.push(cursor);
    cursor = prev[cursor] ?? -1;
  }
  return out.reverse();
}

export function matchChildren<V>(
  prevChildren: readonly TemplateNode<V>[],
  nextChildren: readonly TemplateNode<V>[],
): ChildMatch {
  const prevByKey = new Map<string, number>();
  const prevById = new Map<string, number>();
  for (let i = 0; i < prevChildren.length; i++) {
    const child = prevChildren[i];
    if (child === undefined) continue;
    const key = child.key;
    if (key !== undefined && !prevByKey.has(key)) prevByKey.set(key, i);
    if (!prevById.has(child.id)) prevById.set(child.id, i);
  }

  const used = new Array<boolean>(prevChildren.length).fill(false);
  const prevIndexOf: number[] = [];
  for (const child of nextChildren) {
    const key = child.key;
    const candidate = key !== undefined ? prevByKey.get(key) : prevById.get(child.id);
    if (candidate === undefined || used[candidate] === true) {
      prevIndexOf.push(-1);
      continue;
    }
    used[candidate] = true;
    prevIndexOf.push(candidate);
  }

  const unmatchedPrev: number[] = [];
  for (let i = 0; i < used.length; i++) {
    if (used[i] !== true) unmatchedPrev.push(i);
  }

  const stable = new Array<boolean>(nextChildren.length).fill(false);
  for (const j of longestIncreasingSubsequence(prevIndexOf)) stable[j] = true;

  return { prevIndexOf, unmatchedPrev, stable };
}
