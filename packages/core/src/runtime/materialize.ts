/**
 * packages/core/src/runtime/materialize.ts — View creation and attachment.
 *
 * Why: Turns a laid-out tree into host views and keeps the host view tree in
 * step with later structural patches. Flattened nodes own no view; their
 * view-owning descendants attach to the nearest view-owning ancestor (the
 * "host") in document order.
 *
 * Rules:
 *   - Every call that touches a view handle asserts the UI turn
 *   - Each host keeps a mirror of the views attached to it, so an attach can
 *     be placed right after its nearest attached predecessor
 *   - The update-view pass skips setFrame when the frame is unchanged, and the
 *     widget update when style and revision are unchanged, unless forceApply
 *     is set (recycled view) or content refresh is forced
 */

import { TrellisError } from "../errors.js";
import { frameEquals } from "../layout/types.js";
import { type Logger, formatLogMessage } from "../logging.js";
import { type TemplateNode, walkTree } from "../model/node.js";
import { styleEquals } from "../model/style.js";
import { perfMarkEnd, perfMarkStart } from "../perf/perf.js";
import type { RecyclePool, ViewHost } from "../widgets/types.js";
import { assertUiTurn } from "./uiAffinity.js";

export type MountStepTag = "root" | "create" | "attach" | "refresh";

/** One deferred UI-side step of mounting a tree. */
export type MountStep<V> = Readonly<{
  tag: MountStepTag;
  nodeId: string;
  run: () => V | undefined;
}>;

export type RefreshStats = Readonly<{ frames: number; updates: number }>;

export type Materializer<V> = Readonly<{
  /** Steps in run order: creates (root first), then attaches, then one refresh. */
  planMount: (root: TemplateNode<V>) => MountStep<V>[];
  mountTree: (root: TemplateNode<V>) => V;
  /** Create and attach views for a subtree already attached to a mounted tree. */
  mountSubtree: (node: TemplateNode<V>) => void;
  /** Detach and recycle every view in a subtree. Call before removing it. */
  unmountSubtree: (node: TemplateNode<V>) => void;
  /** Re-place a subtree's views after the node moved within its parent. */
  reattach: (node: TemplateNode<V>) => void;
  remount: (node: TemplateNode<V>) => void;
  refreshViews: (root: TemplateNode<V>, forceContent: boolean) => RefreshStats;
}>;

export type MaterializerOptions<V> = Readonly<{
  host: ViewHost<V>;
  recyclePool?: RecyclePool<V>;
  devMode: boolean;
  logger: Logger;
}>;

function placeholderReason<V>(node: TemplateNode<V>): string | undefined {
  if (node.kind === "unknown") return `unknown component type "${node.declaredKind}"`;
  if (node.parseIssues.length > 0) return `invalid attributes: ${node.parseIssues.join("; ")}`;
  return undefined;
}

export function createMaterializer<V>(opts: MaterializerOptions<V>): Materializer<V> {
  const { host, recyclePool, devMode, logger } = opts;

  /** Host node → view-owning nodes attached to its view, in order. */
  const hosted = new WeakMap<TemplateNode<V>, TemplateNode<V>[]>();
  /** View-owning node → host it is attached to. */
  const hostOfView = new WeakMap<TemplateNode<V>, TemplateNode<V>>();

  function obtainView(node: TemplateNode<V>): V {
    assertUiTurn("materialize", devMode);
    const reason = placeholderReason(node);
    if (reason !== undefined) {
      node.placeholder = true;
      if (devMode) logger.warn(formatLogMessage("render", `placeholder for #${node.id}: ${reason}`));
      return host.createPlaceholder(node, reason, devMode);
    }
    node.placeholder = false;
    const pooled = recyclePool?.dequeue(node.kind);
    if (pooled !== undefined) {
      node.forceApply = true;
      return pooled;
    }
    return host.widgets[node.kind].create(node);
  }

  function hostOf(node: TemplateNode<V>): TemplateNode<V> | undefined {
    let p = node.parent;
    while (p !== undefined && p.viewHandle === undefined) p = p.parent;
    return p;
  }

  function collectTopViews(node: TemplateNode<V>, out: TemplateNode<V>[]): void {
    if (node.viewHandle !== undefined) {
      out.push(node);
      return;
    }
    for (const child of node.children) collectTopViews(child, out);
  }

  function topViews(node: TemplateNode<V>): TemplateNode<V>[] {
    const out: TemplateNode<V>[] = [];
    collectTopViews(node, out);
    return out;
  }

  function desiredHosted(hostNode: TemplateNode<V>): TemplateNode<V>[] {
    const out: TemplateNode<V>[] = [];
    for (const child of hostNode.children) collectTopViews(child, out);
    return out;
  }

  function mirrorOf(hostNode: TemplateNode<V>): TemplateNode<V>[] {
    let list = hosted.get(hostNode);
    if (list === undefined) {
      list = [];
      hosted.set(hostNode, list);
    }
    return list;
  }

  function insertView(hostNode: TemplateNode<V>, vn: TemplateNode<V>, index: number): void {
    const hostView = hostNode.viewHandle;
    const view = vn.viewHandle;
    if (hostView === undefined || view === undefined) return;
    mirrorOf(hostNode).splice(index, 0, vn);
    hostOfView.set(vn, hostNode);
    host.tree.insertChild(hostView, view, index);
  }

  function attachView(vn: TemplateNode<V>): void {
    const hostNode = hostOf(vn);
    if (hostNode === undefined) return;
    const list = mirrorOf(hostNode);
    const desired = desiredHosted(hostNode);
    let index = 0;
    for (let k = desired.indexOf(vn) - 1; k >= 0; k--) {
      const pred = desired[k];
      const at = pred === undefined ? -1 : list.indexOf(pred);
      if (at >= 0) {
        index = at + 1;
        break;
      }
    }
    insertView(hostNode, vn, index);
  }

  function detachView(vn: TemplateNode<V>): void {
    const hostNode = hostOfView.get(vn);
    if (hostNode === undefined) return;
    hostOfView.delete(vn);
    const list = hosted.get(hostNode);
    const at = list === undefined ? -1 : list.indexOf(vn);
    if (list !== undefined && at >= 0) list.splice(at, 1);
    const view = vn.viewHandle;
    if (view !== undefined) host.tree.removeFromParent(view);
  }

  /** Append every view-owning node's hosted children, pre-order. */
  function attachWithin(node: TemplateNode<V>): void {
    walkTree(node, (n) => {
      if (n.viewHandle === undefined) return true;
      for (const vn of desiredHosted(n)) insertView(n, vn, mirrorOf(n).length);
      return true;
    });
  }

  function createViews(node: TemplateNode<V>): void {
    walkTree(node, (n) => {
      if (!n.flattenable) n.viewHandle = obtainView(n);
      return true;
    });
  }

  function refreshViews(root: TemplateNode<V>, forceContent: boolean): RefreshStats {
    assertUiTurn("refreshViews", devMode);
    let frames = 0;
    let updates = 0;
    walkTree(root, (node) => {
      const view = node.viewHandle;
      if (view === undefined) return true;
      const frame = node.layoutResult;
      if (node.forceApply || !frameEquals(node.lastAppliedFrame, frame)) {
        host.tree.setFrame(view, frame);
        node.lastAppliedFrame = frame;
        frames++;
      }
      const stale =
        forceContent ||
        node.forceApply ||
        node.lastAppliedStyle === undefined ||
        !styleEquals(node.lastAppliedStyle, node.style) ||
        node.lastAppliedRevision !== node.revision;
      if (!node.placeholder && stale) {
        host.widgets[node.kind].update(view, node);
        updates++;
      }
      node.lastAppliedStyle = node.style;
      node.lastAppliedRevision = node.revision;
      node.forceApply = false;
      return true;
    });
    return { frames, updates };
  }

  function unmountSubtree(node: TemplateNode<V>): void {
    assertUiTurn("unmount", devMode);
    walkTree(node, (n) => {
      if (n.viewHandle !== undefined) detachView(n);
      hosted.delete(n);
      n.lastAppliedFrame = undefined;
      n.lastAppliedStyle = undefined;
      n.lastAppliedRevision = -1;
      return true;
    });
    if (recyclePool !== undefined) recyclePool.recycle(node);
    walkTree(node, (n) => {
      n.viewHandle = undefined;
      n.placeholder = false;
      return true;
    });
  }

  function mountSubtree(node: TemplateNode<V>): void {
    const token = perfMarkStart("materialize");
    createViews(node);
    for (const vn of topViews(node)) attachView(vn);
    attachWithin(node);
    perfMarkEnd("materialize", token);
  }

  function planMount(root: TemplateNode<V>): MountStep<V>[] {
    const creates: MountStep<V>[] = [];
    const attaches: MountStep<V>[] = [];
    walkTree(root, (n) => {
      if (n !== root && n.flattenable) return true;
      const isRoot = n === root;
      creates.push({
        tag: isRoot ? "root" : "create",
        nodeId: n.id,
        run: () => {
          n.viewHandle = obtainView(n);
          return isRoot ? n.viewHandle : undefined;
        },
      });
      attaches.push({
        tag: "attach",
        nodeId: n.id,
        run: () => {
          for (const vn of desiredHosted(n)) insertView(n, vn, mirrorOf(n).length);
          return undefined;
        },
      });
      return true;
    });
    const refresh: MountStep<V> = {
      tag: "refresh",
      nodeId: root.id,
      run: () => {
        refreshViews(root, false);
        return undefined;
      },
    };
    return [...creates, ...attaches, refresh];
  }

  function mountTree(root: TemplateNode<V>): V {
    const token = perfMarkStart("materialize");
    for (const step of planMount(root)) step.run();
    perfMarkEnd("materialize", token);
    const view = root.viewHandle;
    if (view === undefined) {
      throw new TrellisError("TRELLIS_UNKNOWN_VIEW", `root #${root.id} produced no view`);
    }
    return view;
  }

  function reattach(node: TemplateNode<V>): void {
    assertUiTurn("reattach", devMode);
    const views = topViews(node);
    for (const vn of views) detachView(vn);
    for (const vn of views) attachView(vn);
  }

  function remount(node: TemplateNode<V>): void {
    unmountSubtree(node);
    mountSubtree(node);
  }

  return Object.freeze({
    planMount,
    mountTree,
    mountSubtree,
    unmountSubtree,
    reattach,
    remount,
    refreshViews,
  });
}
