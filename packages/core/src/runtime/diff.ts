/**
 * packages/core/src/runtime/diff.ts — Tree diff producing an edit script.
 *
 * Why: Compares a previously rendered tree with a freshly bound one and
 * emits the ops that turn the first into the second, reusing every node that
 * can be matched so its view survives.
 *
 * Per matched pair:
 *   1. Different kind → one replace, no descent
 *   2. Style (full value), bindings (key-wise) or kind props differ → update
 *   3. Children: deletes first (ascending old index), then for each new
 *      index in order an insert or move, followed by that child's own ops
 *
 * Invariants:
 *   - A removed subtree is a single delete at its root
 *   - Insert/move indices are those of the live list when the op applies;
 *     each placed child lands right after its new predecessor
 *   - Parent ids in child ops name the parent as it is after its own update
 *   - Root ops are flagged; delete and replace also carry the live index
 */

import { diffedProps } from "../model/kinds.js";
import type { TemplateNode } from "../model/node.js";
import { styleEquals } from "../model/style.js";
import { diffValueMaps } from "../model/values.js";
import { perfMarkEnd, perfMarkStart } from "../perf/perf.js";
import {
  type EditOperation,
  type EditScript,
  type PropertyChanges,
  createEditScript,
} from "./editScript.js";
import { matchChildren } from "./reconcile.js";

/** Property-level changes between two nodes of the same kind, or undefined. */
export function diffProperties<V>(
  prev: TemplateNode<V>,
  next: TemplateNode<V>,
): PropertyChanges | undefined {
  const changes: {
    -readonly [K in keyof PropertyChanges]: PropertyChanges[K];
  } = {};
  let any = false;

  if (!styleEquals(prev.style, next.style)) {
    changes.styleChanges = next.style;
    any = true;
  }
  const bindings = diffValueMaps(prev.bindings, next.bindings);
  if (bindings.changed !== undefined) {
    changes.bindingChanges = bindings.changed;
    any = true;
  }
  if (bindings.removed !== undefined) {
    changes.removedBindings = bindings.removed;
    any = true;
  }
  const props = diffValueMaps(prev.props, next.props, diffedProps(next.kind));
  if (props.changed !== undefined) {
    changes.propChanges = props.changed;
    any = true;
  }
  if (props.removed !== undefined) {
    changes.removedProps = props.removed;
    any = true;
  }
  if (prev.id !== next.id) {
    changes.nextId = next.id;
    any = true;
  }
  return any ? Object.freeze(changes) : undefined;
}

/**
 * Live-list simulation token: old index i → i, new index j → -(j + 1).
 * Tokens never collide with each other.
 */
function tokenFor(prevIndexOf: readonly number[], j: number): number {
  const i = prevIndexOf[j] ?? -1;
  return i >= 0 ? i : -(j + 1);
}

function diffChildren<V>(
  prev: TemplateNode<V>,
  next: TemplateNode<V>,
  ops: EditOperation<V>[],
): void {
  const prevKids = prev.children;
  const nextKids = next.children;
  if (prevKids.length === 0 && nextKids.length === 0) return;

  const parentId = next.id;
  const { prevIndexOf, unmatchedPrev, stable } = matchChildren(prevKids, nextKids);

  let removed = 0;
  for (const i of unmatchedPrev) {
    const gone = prevKids[i];
    if (gone === undefined) continue;
    ops.push({ type: "delete", id: gone.id, parentId, index: i - removed });
    removed++;
  }

  const unmatched = new Set(unmatchedPrev);
  const live: number[] = [];
  for (let i = 0; i < prevKids.length; i++) {
    if (!unmatched.has(i)) live.push(i);
  }

  const slotAfterPredecessor = (j: number): number =>
    j === 0 ? 0 : live.indexOf(tokenFor(prevIndexOf, j - 1)) + 1;

  for (let j = 0; j < nextKids.length; j++) {
    const child = nextKids[j];
    if (child === undefined) continue;
    const i = prevIndexOf[j] ?? -1;

    if (i < 0) {
      const at = slotAfterPredecessor(j);
      live.splice(at, 0, -(j + 1));
      ops.push({ type: "insert", node: child, atIndex: at, parentId });
      continue;
    }

    const old = prevKids[i];
    if (old === undefined) continue;
    if (stable[j] !== true) {
      const from = live.indexOf(i);
      live.splice(from, 1);
      const to = slotAfterPredecessor(j);
      live.splice(to, 0, i);
      if (from !== to) {
        ops.push({ type: "move", id: old.id, fromIndex: from, toIndex: to, parentId });
      }
    }
    diffPair(old, child, { parentId, index: live.indexOf(i) }, ops);
  }
}

/** Where a matched pair sits: the tree root, or a slot in its parent's live list. */
type Place = "root" | Readonly<{ parentId: string; index: number }>;

function diffPair<V>(
  prev: TemplateNode<V>,
  next: TemplateNode<V>,
  place: Place,
  ops: EditOperation<V>[],
): void {
  if (prev.kind !== next.kind) {
    ops.push(
      place === "root"
        ? { type: "replace", id: prev.id, node: next, parentId: prev.id, root: true }
        : { type: "replace", id: prev.id, node: next, parentId: place.parentId, index: place.index },
    );
    return;
  }
  const changes = diffProperties(prev, next);
  if (changes !== undefined) ops.push({ type: "update", id: prev.id, changes });
  diffChildren(prev, next, ops);
}

/**
 * Edit script turning `prev` into `next`. Either side may be absent:
 * `diff(undefined, T)` inserts T at index 0 under its own id and
 * `diff(T, undefined)` deletes T from under its own id, both flagged `root`.
 */
export function diff<V>(
  prev: TemplateNode<V> | undefined,
  next: TemplateNode<V> | undefined,
): EditScript<V> {
  const token = perfMarkStart("diff");
  const ops: EditOperation<V>[] = [];
  if (prev === undefined && next !== undefined) {
    ops.push({ type: "insert", node: next, atIndex: 0, parentId: next.id, root: true });
  } else if (prev !== undefined && next === undefined) {
    ops.push({ type: "delete", id: prev.id, parentId: prev.id, root: true });
  } else if (prev !== undefined && next !== undefined) {
    diffPair(prev, next, "root", ops);
  }
  perfMarkEnd("diff", token);
  return createEditScript(ops);
}
