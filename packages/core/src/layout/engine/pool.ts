/* ========== Layout Node Pooling ========== */
// Reusable yoga nodes to avoid allocation churn across layout passes.
// Nodes live in a flat arena and are handed out as generation-checked slots:
// a slot is invalidated on release, so a stale read throws instead of
// touching a node that now belongs to another tree.

import Yoga, { type Node as YogaNode } from "yoga-layout";
import { TrellisError } from "../../errors.js";
import type { LayoutSlot } from "../types.js";

export const DEFAULT_MAX_IDLE = 256;

export type LayoutPoolStats = Readonly<{
  /** Total acquire() calls. */
  acquired: number;
  /** Acquires served from the idle list. */
  reused: number;
  /** Nodes created by the engine. */
  created: number;
  /** Nodes freed because the idle list was full. */
  freed: number;
  idle: number;
  outstanding: number;
}>;

export type LayoutNodePool = Readonly<{
  acquire: (ownerId: string) => LayoutSlot;
  /** Detaches the node's children, drops its measure func and invalidates the slot. */
  release: (slot: LayoutSlot) => void;
  /** Throws TRELLIS_STALE_LAYOUT_HANDLE for a released or unknown slot. */
  get: (slot: LayoutSlot) => YogaNode;
  ownerOf: (slot: LayoutSlot) => string | undefined;
  isLive: (slot: LayoutSlot) => boolean;
  warmUp: (count: number) => void;
  stats: () => LayoutPoolStats;
  /** Frees every idle node. Outstanding slots stay valid. */
  dispose: () => void;
}>;

export type LayoutNodePoolOptions = Readonly<{
  maxIdle?: number;
  createNode?: () => YogaNode;
}>;

type Entry = {
  node: YogaNode | undefined;
  generation: number;
  owner: string | undefined;
  inUse: boolean;
};

function staleSlot(slot: LayoutSlot, why: string): never {
  throw new TrellisError(
    "TRELLIS_STALE_LAYOUT_HANDLE",
    `layout slot ${slot.index}@${slot.generation}: ${why}`,
  );
}

// No node.reset(): a reset node that later gets a measure func again traps
// inside calculateLayout. The next owner rewrites every style field instead.
function clearNode(node: YogaNode): void {
  while (node.getChildCount() > 0) {
    node.removeChild(node.getChild(0));
  }
  node.unsetMeasureFunc();
}

export function createLayoutNodePool(opts: LayoutNodePoolOptions = {}): LayoutNodePool {
  const maxIdle = opts.maxIdle ?? DEFAULT_MAX_IDLE;
  const createNode = opts.createNode ?? (() => Yoga.Node.create());

  const entries: Entry[] = [];
  /** Entries holding a cleared node, ready to hand out. */
  const idle: number[] = [];
  /** Entries whose node was freed; their index is reused on the next create. */
  const vacant: number[] = [];

  let acquired = 0;
  let reused = 0;
  let created = 0;
  let freed = 0;
  let outstanding = 0;

  function entryFor(slot: LayoutSlot): Entry {
    const entry = entries[slot.index];
    if (entry === undefined) staleSlot(slot, "unknown index");
    if (!entry.inUse || entry.generation !== slot.generation || entry.node === undefined) {
      staleSlot(slot, "released");
    }
    return entry;
  }

  function takeEntry(): number {
    const fromIdle = idle.pop();
    if (fromIdle !== undefined) {
      reused++;
      return fromIdle;
    }
    created++;
    const node = createNode();
    const fromVacant = vacant.pop();
    if (fromVacant !== undefined) {
      const entry = entries[fromVacant];
      if (entry !== undefined) {
        entry.node = node;
        return fromVacant;
      }
    }
    entries.push({ node, generation: 0, owner: undefined, inUse: false });
    return entries.length - 1;
  }

  return Object.freeze({
    acquire(ownerId: string): LayoutSlot {
      acquired++;
      const index = takeEntry();
      const entry = entries[index];
      if (entry === undefined) staleSlot({ index, generation: -1 }, "arena corrupted");
      entry.inUse = true;
      entry.owner = ownerId;
      outstanding++;
      return Object.freeze({ index, generation: entry.generation });
    },

    release(slot: LayoutSlot): void {
      const entry = entryFor(slot);
      const node = entry.node;
      entry.inUse = false;
      entry.owner = undefined;
      entry.generation++;
      outstanding--;
      if (node === undefined) return;
      const owner = node.getParent();
      if (owner !== null) owner.removeChild(node);
      clearNode(node);
      if (idle.length < maxIdle) {
        idle.push(slot.index);
      } else {
        node.free();
        entry.node = undefined;
        vacant.push(slot.index);
        freed++;
      }
    },

    get(slot: LayoutSlot): YogaNode {
      const node = entryFor(slot).node;
      if (node === undefined) staleSlot(slot, "freed");
      return node;
    },

    ownerOf(slot: LayoutSlot): string | undefined {
      const entry = entries[slot.index];
      if (entry === undefined || entry.generation !== slot.generation) return undefined;
      return entry.owner;
    },

    isLive(slot: LayoutSlot): boolean {
      const entry = entries[slot.index];
      return entry !== undefined && entry.inUse && entry.generation === slot.generation;
    },

    warmUp(count: number): void {
      while (idle.length < Math.min(count, maxIdle)) {
        created++;
        const node = createNode();
        const fromVacant = vacant.pop();
        const entry = fromVacant === undefined ? undefined : entries[fromVacant];
        if (fromVacant !== undefined && entry !== undefined) {
          entry.node = node;
          idle.push(fromVacant);
        } else {
          entries.push({ node, generation: 0, owner: undefined, inUse: false });
          idle.push(entries.length - 1);
        }
      }
    },

    stats(): LayoutPoolStats {
      return Object.freeze({
        acquired,
        reused,
        created,
        freed,
        idle: idle.length,
        outstanding,
      });
    },

    dispose(): void {
      for (const index of idle) {
        const entry = entries[index];
        if (entry?.node === undefined) continue;
        entry.node.free();
        entry.node = undefined;
        vacant.push(index);
        freed++;
      }
      idle.length = 0;
    },
  });
}
