/**
 * packages/core/src/runtime/patch.ts — Apply an edit script to a live tree.
 *
 * Why: Mutates the previously rendered tree in place so matched nodes keep
 * their views. Structural ops (insert, delete, move, replace) are applied
 * against the parent's live child list, strictly in script order.
 *
 * Rules:
 *   - Ops that name an old node resolve through an index of the live tree
 *     taken before the first op; parents also resolve by their renamed id
 *   - Only ops flagged `root` touch the root; children are found at the op's
 *     live index first, since a renamed sibling may already share the id
 *   - Inserted and replacing subtrees are deep clones of the script's nodes,
 *     so the tree the script was computed from is never mutated
 *   - An op whose target cannot be found is skipped and logged, never thrown
 *   - After the ops, the tree is laid out again and views are refreshed
 */

import { applyLayoutFrames } from "../layout/applyFrames.js";
import type { LayoutEngine } from "../layout/engine/layoutEngine.js";
import type { ContainerSize } from "../layout/types.js";
import { type Logger, formatLogMessage } from "../logging.js";
import { diffedProps } from "../model/kinds.js";
import { type TemplateNode, type ValueMap, cloneTree, walkTree } from "../model/node.js";
import { perfMarkEnd, perfMarkStart } from "../perf/perf.js";
import type { DataBinder } from "../app/types.js";
import {
  type EditOperation,
  type EditScript,
  type PropertyChanges,
  describeOperation,
} from "./editScript.js";
import type { Materializer } from "./materialize.js";
import { assertUiTurn } from "./uiAffinity.js";

export type PatchContext<V> = Readonly<{
  layout: LayoutEngine;
  /** Without one, only the node tree is patched (no views). */
  materializer?: Materializer<V>;
  logger: Logger;
  devMode: boolean;
}>;

export type PatchResult<V> = Readonly<{
  applied: number;
  skipped: number;
  /** The live root after patching; differs from the input after a root replace/insert/delete. */
  root: TemplateNode<V> | undefined;
}>;

/** Copy the diffed props (kind fields and `key`) named in `changes` onto `node`. */
export function copyKindFields<V>(node: TemplateNode<V>, changes: PropertyChanges): void {
  if (changes.propChanges === undefined && changes.removedProps === undefined) return;
  const owned = diffedProps(node.kind);
  const next: Record<string, unknown> = { ...node.props };
  const incoming: ValueMap = changes.propChanges ?? {};
  for (const field of owned) {
    if (Object.prototype.hasOwnProperty.call(incoming, field)) next[field] = incoming[field];
  }
  for (const field of changes.removedProps ?? []) {
    if (owned.includes(field)) delete next[field];
  }
  node.setProps(next);
}

function applyChanges<V>(node: TemplateNode<V>, changes: PropertyChanges): void {
  if (changes.styleChanges !== undefined) node.style = changes.styleChanges;
  if (changes.bindingChanges !== undefined || changes.removedBindings !== undefined) {
    node.patchBindings(changes.bindingChanges, changes.removedBindings);
  }
  copyKindFields(node, changes);
  if (changes.nextId !== undefined) node.id = changes.nextId;
}

function indexTree<V>(root: TemplateNode<V> | undefined): Map<string, TemplateNode<V>> {
  const index = new Map<string, TemplateNode<V>>();
  if (root === undefined) return index;
  walkTree(root, (n) => {
    if (!index.has(n.id)) index.set(n.id, n);
    return true;
  });
  return index;
}

export function releaseLayoutHandles<V>(layout: LayoutEngine, node: TemplateNode<V>): void {
  walkTree(node, (n) => {
    const slot = n.layoutNodeHandle;
    if (slot === undefined) return true;
    n.layoutNodeHandle = undefined;
    if (layout.pool.isLive(slot)) layout.pool.release(slot);
    return true;
  });
}

/** Lay out `root` and write frames onto it; refresh views when mounted. */
export function relayout<V>(
  ctx: PatchContext<V>,
  root: TemplateNode<V>,
  containerSize: ContainerSize,
  forceContent: boolean,
): void {
  applyLayoutFrames(root, ctx.layout.computeLayout(root, containerSize));
  if (ctx.materializer !== undefined && root.viewHandle !== undefined) {
    ctx.materializer.refreshViews(root, forceContent);
  }
}

export function applyEditScript<V>(
  ctx: PatchContext<V>,
  script: EditScript<V>,
  liveRoot: TemplateNode<V> | undefined,
  containerSize?: ContainerSize,
): PatchResult<V> {
  const token = perfMarkStart("patch");
  const mat = ctx.materializer;
  /** Set only when the live tree already has views to keep in step. */
  const views = mat !== undefined && liveRoot?.viewHandle !== undefined ? mat : undefined;
  if (views !== undefined) assertUiTurn("applyEditScript", ctx.devMode);

  const oldIndex = indexTree(liveRoot);
  const parentIndex = new Map(oldIndex);
  let root = liveRoot;
  let applied = 0;
  let skipped = 0;

  const skip = (op: EditOperation<V>, why: string): void => {
    skipped++;
    ctx.logger.warn(formatLogMessage("patch", `skipped "${describeOperation(op)}": ${why}`));
  };

  const drop = (node: TemplateNode<V>): void => {
    views?.unmountSubtree(node);
    releaseLayoutHandles(ctx.layout, node);
  };

  const childIndex = (parent: TemplateNode<V>, id: string, hint: number | undefined): number =>
    hint !== undefined && parent.children[hint]?.id === id ? hint : parent.indexOfChildId(id);

  for (const op of script.operations) {
    switch (op.type) {
      case "insert": {
        const copy = cloneTree(op.node);
        if (op.root === true) {
          if (root !== undefined) {
            skip(op, "tree already has a root");
            break;
          }
          root = copy;
          mat?.mountTree(copy);
          applied++;
          break;
        }
        const parent = parentIndex.get(op.parentId);
        if (parent === undefined) {
          skip(op, "parent not found");
          break;
        }
        parent.insertChild(copy, op.atIndex);
        views?.mountSubtree(copy);
        applied++;
        break;
      }

      case "delete": {
        if (op.root === true) {
          if (root === undefined || root.id !== op.id) {
            skip(op, "root not found");
            break;
          }
          drop(root);
          root = undefined;
          applied++;
          break;
        }
        const parent = parentIndex.get(op.parentId);
        const at = parent === undefined ? -1 : childIndex(parent, op.id, op.index);
        const child = parent?.children[at];
        if (parent === undefined || child === undefined) {
          skip(op, "node not found under parent");
          break;
        }
        drop(child);
        parent.removeChildAt(at);
        applied++;
        break;
      }

      case "update": {
        const node = oldIndex.get(op.id);
        if (node === undefined) {
          skip(op, "node not found");
          break;
        }
        const wasFlat = node.viewHandle === undefined;
        applyChanges(node, op.changes);
        if (op.changes.nextId !== undefined) {
          parentIndex.set(op.changes.nextId, node);
          // The host may key its view by node id.
          if (node.viewHandle !== undefined) node.forceApply = true;
        }
        if (views !== undefined && node !== root && wasFlat !== node.flattenable) {
          views.remount(node);
        }
        applied++;
        break;
      }

      case "move": {
        const parent = parentIndex.get(op.parentId);
        if (parent === undefined) {
          skip(op, "parent not found");
          break;
        }
        const from = childIndex(parent, op.id, op.fromIndex);
        const child = parent.children[from];
        if (child === undefined) {
          skip(op, "node not found under parent");
          break;
        }
        parent.moveChild(from, op.toIndex);
        views?.reattach(child);
        applied++;
        break;
      }

      case "replace": {
        const copy = cloneTree(op.node);
        if (op.root === true) {
          if (root === undefined || root.id !== op.id) {
            skip(op, "root not found");
            break;
          }
          drop(root);
          root = copy;
          views?.mountTree(copy);
          applied++;
          break;
        }
        const parent = parentIndex.get(op.parentId);
        const at = parent === undefined ? -1 : childIndex(parent, op.id, op.index);
        const prev = parent?.children[at];
        if (parent === undefined || prev === undefined) {
          skip(op, "node not found under parent");
          break;
        }
        drop(prev);
        parent.replaceChildAt(at, copy);
        views?.mountSubtree(copy);
        applied++;
        break;
      }
    }
  }

  if (root !== undefined && containerSize !== undefined) {
    relayout(ctx, root, containerSize, false);
  }
  perfMarkEnd("patch", token);
  return { applied, skipped, root };
}

/**
 * Shape-preserving fast path: re-bind in place, lay out, refresh every view.
 * The caller guarantees the shape did not change; nothing here checks it.
 */
export function quickUpdate<V>(
  ctx: PatchContext<V>,
  liveRoot: TemplateNode<V>,
  binder: DataBinder,
  data: ValueMap,
  containerSize: ContainerSize,
): void {
  const token = perfMarkStart("bind");
  binder.bind(data, liveRoot);
  perfMarkEnd("bind", token);
  relayout(ctx, liveRoot, containerSize, true);
}
