/**
 * packages/core/src/layout/applyFrames.ts — Write solved frames onto nodes.
 *
 * A flattened node keeps the engine's coordinates in `layoutResult`; its
 * origin is folded into the frames of its descendants so each view is placed
 * relative to the nearest ancestor that owns a view. Nodes missing from the
 * map (failed layout) get a zero frame.
 */

import type { TemplateNode } from "../model/node.js";
import { type Frame, type FrameMap, ZERO_FRAME } from "./types.js";

export function applyLayoutFrames<V>(root: TemplateNode<V>, frames: FrameMap): void {
  const stack: Array<{ node: TemplateNode<V>; dx: number; dy: number }> = [
    { node: root, dx: 0, dy: 0 },
  ];
  while (stack.length > 0) {
    const top = stack.pop();
    if (top === undefined) break;
    const { node, dx, dy } = top;
    const raw: Frame = frames.get(node.id) ?? ZERO_FRAME;

    let childDx = 0;
    let childDy = 0;
    if (node.flattenable) {
      node.layoutResult = raw;
      childDx = dx + raw.x;
      childDy = dy + raw.y;
    } else if (dx === 0 && dy === 0) {
      node.layoutResult = raw;
    } else {
      node.layoutResult = Object.freeze({
        x: raw.x + dx,
        y: raw.y + dy,
        width: raw.width,
        height: raw.height,
      });
    }

    const kids = node.children;
    for (let i = kids.length - 1; i >= 0; i--) {
      const child = kids[i];
      if (child !== undefined) stack.push({ node: child, dx: childDx, dy: childDy });
    }
  }
}
