/**
 * packages/core/src/widgets/types.ts — Host widget seams.
 *
 * Why: The core never knows what a view handle is. A host supplies one
 * factory per node kind plus the few view-tree calls the materializer needs.
 * The table is a mapped type over NodeKind, so a host that misses a kind
 * fails to compile.
 *
 * Widget kinds:
 *   - container/view: plain boxes (flattened away when they draw nothing)
 *   - text, image, button, input: leaves with kind-owned props
 *   - scroll, list: containers with their own view semantics
 *   - unknown: never created through the table; see createPlaceholder
 */

import type { Frame } from "../layout/types.js";
import type { NodeKind } from "../model/kinds.js";
import type { TemplateNode } from "../model/node.js";

export type WidgetFactory<V> = Readonly<{
  create: (node: TemplateNode<V>) => V;
  /** Apply style and kind-owned content. Called on the UI turn only. */
  update: (view: V, node: TemplateNode<V>) => void;
}>;

export type WidgetTable<V> = Readonly<{ [K in NodeKind]: WidgetFactory<V> }>;

export type ViewTreeOps<V> = Readonly<{
  insertChild: (parent: V, child: V, index: number) => void;
  removeFromParent: (view: V) => void;
  setFrame: (view: V, frame: Frame) => void;
}>;

/**
 * View shown for a node that cannot be rendered (unknown kind or bad
 * attributes). In development it should be visible and labelled; in
 * production an empty hidden view.
 */
export type PlaceholderFactory<V> = (
  node: TemplateNode<V>,
  reason: string,
  devMode: boolean,
) => V;

export type ViewHost<V> = Readonly<{
  widgets: WidgetTable<V>;
  tree: ViewTreeOps<V>;
  createPlaceholder: PlaceholderFactory<V>;
}>;

export type RecyclePool<V> = Readonly<{
  dequeue: (kind: NodeKind) => V | undefined;
  /** Takes the view handles of a detached subtree; nodes are left without views. */
  recycle: (tree: TemplateNode<V>) => void;
}>;
