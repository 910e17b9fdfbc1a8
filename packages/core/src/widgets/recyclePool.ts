/**
 * packages/core/src/widgets/recyclePool.ts — Per-kind view recycling.
 *
 * Rules:
 *   - At most `maxPerKind` views are kept per kind and `maxTotal` overall;
 *     extra views are handed to `onDiscard`
 *   - Placeholder views are never kept
 *   - dequeue() is LIFO so the most recently used view is reused first
 */

import { NODE_KINDS, type NodeKind } from "../model/kinds.js";
import { type TemplateNode, walkTree } from "../model/node.js";
import type { RecyclePool } from "./types.js";

export type ViewRecyclePoolOptions<V> = Readonly<{
  maxPerKind?: number;
  maxTotal?: number;
  onDiscard?: (view: V, kind: NodeKind) => void;
}>;

export type ViewRecyclePool<V> = RecyclePool<V> &
  Readonly<{
    size: () => number;
    sizeOf: (kind: NodeKind) => number;
    clear: () => void;
  }>;

export function createViewRecyclePool<V>(opts: ViewRecyclePoolOptions<V> = {}): ViewRecyclePool<V> {
  const maxPerKind = opts.maxPerKind ?? 20;
  const maxTotal = opts.maxTotal ?? 100;
  const onDiscard = opts.onDiscard;

  const byKind = new Map<NodeKind, V[]>();
  for (const k of NODE_KINDS) byKind.set(k, []);
  let total = 0;

  function keep(kind: NodeKind, view: V): void {
    const bucket = byKind.get(kind);
    if (kind === "unknown" || bucket === undefined || bucket.length >= maxPerKind || total >= maxTotal) {
      onDiscard?.(view, kind);
      return;
    }
    bucket.push(view);
    total++;
  }

  return Object.freeze({
    dequeue(kind: NodeKind): V | undefined {
      const view = byKind.get(kind)?.pop();
      if (view !== undefined) total--;
      return view;
    },

    recycle(tree: TemplateNode<V>): void {
      walkTree(tree, (node) => {
        const view = node.viewHandle;
        if (view === undefined) return true;
        node.viewHandle = undefined;
        if (node.placeholder) onDiscard?.(view, node.kind);
        else keep(node.kind, view);
        return true;
      });
    },

    size: () => total,
    sizeOf: (kind: NodeKind) => byKind.get(kind)?.length ?? 0,
    clear(): void {
      for (const [kind, bucket] of byKind) {
        for (const view of bucket) onDiscard?.(view, kind);
        bucket.length = 0;
      }
      total = 0;
    },
  });
}
