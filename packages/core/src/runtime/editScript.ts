/**
 * packages/core/src/runtime/editScript.ts — Edit script operation types.
 *
 * Indices in insert/move ops refer to the parent's live child list at the
 * moment the op is applied, so a script is applied strictly in order.
 */

import type { TemplateNode, ValueMap } from "../model/node.js";
import type { Style } from "../model/style.js";

export type PropertyChanges = Readonly<{
  /** The whole new style; present when any style field differs. */
  styleChanges?: Style;
  /** Added or changed bindings only. */
  bindingChanges?: ValueMap;
  removedBindings?: readonly string[];
  /** Kind-owned props that differ. */
  propChanges?: ValueMap;
  removedProps?: readonly string[];
  /** New id for a node matched by key whose id changed. */
  nextId?: string;
}>;

/*
 * Ops on the tree root carry `root: true`; their parentId is the root's own
 * id. Ids are unique only within one snapshot, so a child may share an id
 * with a renamed root and parentId alone cannot mark a root op.
 */

export type InsertOp<V> = Readonly<{
  type: "insert";
  node: TemplateNode<V>;
  atIndex: number;
  parentId: string;
  root?: true;
}>;

export type DeleteOp = Readonly<{
  type: "delete";
  id: string;
  parentId: string;
  /** Live index when the op applies; the patch falls back to an id search. */
  index?: number;
  root?: true;
}>;

export type UpdateOp = Readonly<{ type: "update"; id: string; changes: PropertyChanges }>;

export type MoveOp = Readonly<{
  type: "move";
  id: string;
  fromIndex: number;
  toIndex: number;
  parentId: string;
}>;

export type ReplaceOp<V> = Readonly<{
  type: "replace";
  id: string;
  node: TemplateNode<V>;
  parentId: string;
  index?: number;
  root?: true;
}>;

export type EditOperation<V = unknown> = InsertOp<V> | DeleteOp | UpdateOp | MoveOp | ReplaceOp<V>;

export type EditStats = Readonly<{
  inserts: number;
  deletes: number;
  updates: number;
  moves: number;
  replaces: number;
}>;

export type EditScript<V = unknown> = Readonly<{
  operations: readonly EditOperation<V>[];
  stats: EditStats;
  hasDiff: boolean;
}>;

export function createEditScript<V>(operations: readonly EditOperation<V>[]): EditScript<V> {
  let inserts = 0;
  let deletes = 0;
  let updates = 0;
  let moves = 0;
  let replaces = 0;
  for (const op of operations) {
    switch (op.type) {
      case "insert":
        inserts++;
        break;
      case "delete":
        deletes++;
        break;
      case "update":
        updates++;
        break;
      case "move":
        moves++;
        break;
      case "replace":
        replaces++;
        break;
    }
  }
  return Object.freeze({
    operations: Object.freeze([...operations]),
    stats: Object.freeze({ inserts, deletes, updates, moves, replaces }),
    hasDiff: operations.length > 0,
  });
}

function describeChanges(c: PropertyChanges): string {
  const parts: string[] = [];
  if (c.styleChanges !== undefined) parts.push("style");
  if (c.bindingChanges !== undefined) parts.push(`bindings[${Object.keys(c.bindingChanges).join(",")}]`);
  if (c.removedBindings !== undefined) parts.push(`-bindings[${c.removedBindings.join(",")}]`);
  if (c.propChanges !== undefined) parts.push(`props[${Object.keys(c.propChanges).join(",")}]`);
  if (c.removedProps !== undefined) parts.push(`-props[${c.removedProps.join(",")}]`);
  if (c.nextId !== undefined) parts.push(`id→${c.nextId}`);
  return parts.join(" ");
}

export function describeOperation<V>(op: EditOperation<V>): string {
  switch (op.type) {
    case "insert":
      return `insert #${op.node.id} @${op.atIndex} in #${op.parentId}`;
    case "delete":
      return `delete #${op.id} from #${op.parentId}`;
    case "update":
      return `update #${op.id} ${describeChanges(op.changes)}`;
    case "move":
      return `move #${op.id} ${op.fromIndex}→${op.toIndex} in #${op.parentId}`;
    case "replace":
      return `replace #${op.id} with ${op.node.kind}#${op.node.id}`;
  }
}

/** One line per op, for logs and test failure messages. */
export function describeEditScript<V>(script: EditScript<V>): string {
  return script.operations.map(describeOperation).join("\n");
}
