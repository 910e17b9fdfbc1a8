/**
 * packages/core/src/layout/engine/layoutEngine.ts — Component tree layout.
 *
 * Why: Lays out a component tree with yoga. A parallel tree of pooled yoga
 * nodes is built for each pass, solved, read back into a flat id → Frame map
 * and returned to the pool. The map is the only thing that outlives the call.
 *
 * Layout rules:
 *   - Every style field with layout meaning is copied onto the yoga node
 *   - Measurable leaves (text, button, input) get a measure callback
 *   - NaN container dimensions are solved as "auto" (content decides)
 *
 * Invariants:
 *   - Every slot acquired during a pass is released before returning,
 *     including when the pass fails
 *   - A malformed tree (node reached twice, duplicate id under one parent)
 *     yields an empty map and a log entry, never a throw
 */

import { Direction, MeasureMode, type Node as YogaNode } from "yoga-layout";
import { TrellisError, describeThrown } from "../../errors.js";
import { type Logger, SILENT_LOGGER, formatLogMessage } from "../../logging.js";
import { KIND_TABLE } from "../../model/kinds.js";
import type { TemplateNode } from "../../model/node.js";
import { perfMarkEnd, perfMarkStart } from "../../perf/perf.js";
import { type TextMeasurer, createMonospaceMeasurer } from "../textMeasure.js";
import type { ContainerSize, Frame, FrameMap, LayoutSlot, MeasureConstraints } from "../types.js";
import { applyStyleToYogaNode } from "./applyStyle.js";
import { type LayoutNodePool, createLayoutNodePool } from "./pool.js";

export type LayoutEngineOptions = Readonly<{
  pool?: LayoutNodePool;
  measurer?: TextMeasurer;
  logger?: Logger;
  /** Called with TRELLIS_LAYOUT_FAILURE when a pass throws; the pass still returns an empty map. */
  onFailure?: (error: TrellisError) => void;
}>;

export type LayoutEngine = Readonly<{
  computeLayout: <V>(root: TemplateNode<V> | undefined, containerSize: ContainerSize) => FrameMap;
  pool: LayoutNodePool;
}>;

const EMPTY_FRAMES: FrameMap = new Map<string, Frame>();

function measureModeName(mode: MeasureMode): MeasureConstraints["widthMode"] {
  if (mode === MeasureMode.Exactly) return "exactly";
  if (mode === MeasureMode.AtMost) return "at-most";
  return "undefined";
}

function contentText<V>(node: TemplateNode<V>, field: string): string {
  const v = node.resolved(field);
  if (typeof v === "string") return v;
  if (typeof v === "number" || typeof v === "boolean") return String(v);
  return "";
}

/** Returns a reason string when the tree cannot be laid out. */
export function findMalformation<V>(root: TemplateNode<V>): string | undefined {
  const seen = new Set<TemplateNode<V>>();
  const stack: TemplateNode<V>[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;
    if (seen.has(node)) return `node "${node.id}" is reachable twice`;
    seen.add(node);
    const ids = new Set<string>();
    for (const child of node.children) {
      if (ids.has(child.id)) return `duplicate child id "${child.id}" under "${node.id}"`;
      ids.add(child.id);
      stack.push(child);
    }
  }
  return undefined;
}

export function createLayoutEngine(opts: LayoutEngineOptions = {}): LayoutEngine {
  const pool = opts.pool ?? createLayoutNodePool();
  const measurer = opts.measurer ?? createMonospaceMeasurer();
  const logger = opts.logger ?? SILENT_LOGGER;

  function attachMeasure<V>(yogaNode: YogaNode, node: TemplateNode<V>): void {
    const spec = KIND_TABLE[node.kind];
    if (!spec.measurable || spec.contentField === undefined || node.children.length > 0) return;
    const field = spec.contentField;
    yogaNode.setMeasureFunc((width, widthMode, height, heightMode) =>
      measurer.measure(
        { kind: node.kind, text: contentText(node, field), style: node.style },
        {
          width,
          widthMode: measureModeName(widthMode),
          height,
          heightMode: measureModeName(heightMode),
        },
      ),
    );
  }

  /** Builds the yoga tree; every acquired slot is pushed to `acquired` in pre-order. */
  function build<V>(root: TemplateNode<V>, acquired: TemplateNode<V>[]): YogaNode {
    const rootSlot = pool.acquire(root.id);
    root.layoutNodeHandle = rootSlot;
    acquired.push(root);
    const rootYoga = pool.get(rootSlot);
    applyStyleToYogaNode(rootYoga, root.style);
    attachMeasure(rootYoga, root);

    const stack: Array<{ node: TemplateNode<V>; yoga: YogaNode }> = [{ node: root, yoga: rootYoga }];
    while (stack.length > 0) {
      const top = stack.pop();
      if (top === undefined) break;
      const kids = top.node.children;
      for (let i = 0; i < kids.length; i++) {
        const child = kids[i];
        if (child === undefined) continue;
        const slot = pool.acquire(child.id);
        child.layoutNodeHandle = slot;
        acquired.push(child);
        const yoga = pool.get(slot);
        applyStyleToYogaNode(yoga, child.style);
        attachMeasure(yoga, child);
        top.yoga.insertChild(yoga, i);
        stack.push({ node: child, yoga });
      }
    }
    return rootYoga;
  }

  function readFrames<V>(nodes: readonly TemplateNode<V>[]): Map<string, Frame> {
    const frames = new Map<string, Frame>();
    for (const node of nodes) {
      const slot: LayoutSlot | undefined = node.layoutNodeHandle;
      if (slot === undefined) continue;
      const l = pool.get(slot).getComputedLayout();
      frames.set(node.id, Object.freeze({ x: l.left, y: l.top, width: l.width, height: l.height }));
    }
    return frames;
  }

  function releaseAll<V>(nodes: readonly TemplateNode<V>[]): void {
    // Pre-order: a parent detaches its children before they are reset.
    for (const node of nodes) {
      const slot = node.layoutNodeHandle;
      if (slot === undefined) continue;
      node.layoutNodeHandle = undefined;
      pool.release(slot);
    }
  }

  function computeLayout<V>(root: TemplateNode<V> | undefined, containerSize: ContainerSize): FrameMap {
    if (root === undefined) {
      logger.warn(formatLogMessage("layout", "computeLayout called without a tree"));
      return EMPTY_FRAMES;
    }
    const problem = findMalformation(root);
    if (problem !== undefined) {
      logger.error(formatLogMessage("layout", `malformed tree: ${problem}`));
      return EMPTY_FRAMES;
    }

    const token = perfMarkStart("layout");
    const acquired: TemplateNode<V>[] = [];
    try {
      const rootYoga = build(root, acquired);
      const w = Number.isNaN(containerSize.width) ? "auto" : containerSize.width;
      const h = Number.isNaN(containerSize.height) ? "auto" : containerSize.height;
      rootYoga.calculateLayout(w, h, Direction.LTR);
      return readFrames(acquired);
    } catch (e: unknown) {
      const failure = new TrellisError(
        "TRELLIS_LAYOUT_FAILURE",
        `layout of "${root.id}" failed: ${describeThrown(e)}`,
        { cause: e },
      );
      logger.error(formatLogMessage("layout", describeThrown(failure)));
      opts.onFailure?.(failure);
      return EMPTY_FRAMES;
    } finally {
      releaseAll(acquired);
      perfMarkEnd("layout", token);
    }
  }

  return Object.freeze({ computeLayout, pool });
}
