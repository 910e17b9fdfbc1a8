/**
 * packages/core/src/model/node.ts — Component tree node.
 *
 * Why: One mutable node type serves as both the freshly bound tree handed to
 * the diff engine and the live tree the patch applier mutates. Structural
 * edits go through the node API so parent links never drift from children.
 *
 * Invariants:
 *   - `parent` is set on attach and cleared on detach; it never owns.
 *   - `kind` is resolved once, at construction.
 *   - `events` and `parseIssues` are frozen for the node's lifetime.
 *   - `revision` advances on every props/bindings mutation.
 */

import type { Frame, LayoutSlot } from "../layout/types.js";
import { ZERO_FRAME } from "../layout/types.js";
import { KIND_TABLE, NODE_KINDS, type NodeKind, resolveKind } from "./kinds.js";
import { DEFAULT_STYLE, type Style, hasVisualEffect } from "./style.js";

export type ValueMap = Readonly<Record<string, unknown>>;

export type NodeInit<V = unknown> = Readonly<{
  id: string;
  /** Declared type tag; unrecognized tags resolve to "unknown". */
  kind: string;
  style?: Style;
  props?: ValueMap;
  bindings?: ValueMap;
  events?: ValueMap;
  parseIssues?: readonly string[];
  children?: readonly TemplateNode<V>[];
}>;

function isNodeKind(tag: string): tag is NodeKind {
  return NODE_KINDS.some((k) => k === tag);
}

const EMPTY_MAP: ValueMap = Object.freeze({});

export class TemplateNode<V = unknown> {
  id: string;
  readonly kind: NodeKind;
  /** The tag as written in the template. */
  readonly declaredKind: string;
  style: Style;
  readonly events: ValueMap;
  readonly parseIssues: readonly string[];

  viewHandle: V | undefined = undefined;
  layoutResult: Frame = ZERO_FRAME;
  layoutNodeHandle: LayoutSlot | undefined = undefined;

  lastAppliedStyle: Style | undefined = undefined;
  lastAppliedFrame: Frame | undefined = undefined;
  lastAppliedRevision = -1;
  /** Set when the view handle came from a recycle pool. */
  forceApply = false;
  /** The view handle is a placeholder, not a widget of this kind. */
  placeholder = false;

  private _props: ValueMap;
  private _bindings: ValueMap;
  private _revision = 0;
  private _parent: TemplateNode<V> | undefined = undefined;
  private readonly _children: TemplateNode<V>[] = [];

  constructor(init: NodeInit<V>) {
    this.id = init.id;
    this.declaredKind = init.kind;
    this.kind = isNodeKind(init.kind) ? init.kind : resolveKind(init.kind);
    this.style = init.style ?? DEFAULT_STYLE;
    this._props = init.props ? Object.freeze({ ...init.props }) : EMPTY_MAP;
    this._bindings = init.bindings ? Object.freeze({ ...init.bindings }) : EMPTY_MAP;
    this.events = init.events ? Object.freeze({ ...init.events }) : EMPTY_MAP;
    this.parseIssues = Object.freeze([...(init.parseIssues ?? [])]);
    if (init.children) {
      for (const child of init.children) this.appendChild(child);
    }
  }

  get parent(): TemplateNode<V> | undefined {
    return this._parent;
  }

  get children(): readonly TemplateNode<V>[] {
    return this._children;
  }

  get props(): ValueMap {
    return this._props;
  }

  get bindings(): ValueMap {
    return this._bindings;
  }

  get revision(): number {
    return this._revision;
  }

  /** Child-list key: the `key` binding, falling back to a static `key` prop. */
  get key(): string | undefined {
    const raw = this._bindings["key"] ?? this._props["key"];
    if (typeof raw === "string") return raw;
    if (typeof raw === "number" && Number.isFinite(raw)) return String(raw);
    return undefined;
  }

  /**
   * Pure layout container with nothing of its own to draw or handle.
   * Roots always own a view.
   */
  get flattenable(): boolean {
    if (this._parent === undefined) return false;
    if (!KIND_TABLE[this.kind].layoutOnly) return false;
    if (this.parseIssues.length > 0) return false;
    if (Object.keys(this.events).length > 0) return false;
    const s = this.style;
    return !hasVisualEffect(s) && s.visibility === "visible" && s.display === "flex";
  }

  setProps(next: ValueMap): void {
    this._props = Object.freeze({ ...next });
    this._revision++;
  }

  setBindings(next: ValueMap): void {
    this._bindings = Object.freeze({ ...next });
    this._revision++;
  }

  /** Merge changed keys and drop removed ones in a single revision step. */
  patchBindings(changes: ValueMap | undefined, removed?: readonly string[]): void {
    const next: Record<string, unknown> = { ...this._bindings };
    if (changes) {
      for (const k of Object.keys(changes)) next[k] = changes[k];
    }
    if (removed) {
      for (const k of removed) delete next[k];
    }
    this.setBindings(next);
  }

  setBinding(name: string, value: unknown): void {
    this.patchBindings({ [name]: value });
  }

  /** Value a widget shows for `field`: the bound value wins over the static prop. */
  resolved(field: string): unknown {
    if (Object.prototype.hasOwnProperty.call(this._bindings, field)) return this._bindings[field];
    return this._props[field];
  }

  // ---------------------------------------------------------------------------
  // Structure
  // ---------------------------------------------------------------------------

  appendChild(child: TemplateNode<V>): void {
    this.insertChild(child, this._children.length);
  }

  /** Attach a detached node at `index` (clamped to the child count). */
  insertChild(child: TemplateNode<V>, index: number): void {
    if (child._parent !== undefined) child._parent.removeChild(child);
    const at = Math.max(0, Math.min(index, this._children.length));
    this._children.splice(at, 0, child);
    child._parent = this;
  }

  removeChild(child: TemplateNode<V>): boolean {
    const i = this._children.indexOf(child);
    if (i < 0) return false;
    this.removeChildAt(i);
    return true;
  }

  removeChildAt(index: number): TemplateNode<V> | undefined {
    const [removed] = this._children.splice(index, 1);
    if (removed !== undefined) removed._parent = undefined;
    return removed;
  }

  replaceChildAt(index: number, next: TemplateNode<V>): TemplateNode<V> | undefined {
    const prev = this._children[index];
    if (prev === undefined) return undefined;
    if (next._parent !== undefined) next._parent.removeChild(next);
    this._children[index] = next;
    prev._parent = undefined;
    next._parent = this;
    return prev;
  }

  moveChild(from: number, to: number): boolean {
    const [moved] = this._children.splice(from, 1);
    if (moved === undefined) return false;
    const at = Math.max(0, Math.min(to, this._children.length));
    this._children.splice(at, 0, moved);
    return true;
  }

  indexOfChildId(id: string): number {
    return this._children.findIndex((c) => c.id === id);
  }

  /**
   * Value copy of style, props, bindings and events. Children are not copied
   * and the clone is detached; see cloneTree().
   */
  clone(): TemplateNode<V> {
    return new TemplateNode<V>({
      id: this.id,
      kind: this.declaredKind,
      style: this.style,
      props: this._props,
      bindings: this._bindings,
      events: this.events,
      parseIssues: this.parseIssues,
    });
  }
}

/** Deep clone with parent links rebuilt. Transient fields are not copied. */
export function cloneTree<V>(node: TemplateNode<V>): TemplateNode<V> {
  const copy = node.clone();
  for (const child of node.children) copy.appendChild(cloneTree(child));
  return copy;
}

/** Pre-order walk; return false from `visit` to skip a subtree. */
export function walkTree<V>(
  root: TemplateNode<V>,
  visit: (node: TemplateNode<V>, depth: number) => boolean | void,
): void {
  const stack: Array<{ node: TemplateNode<V>; depth: number }> = [{ node: root, depth: 0 }];
  while (stack.length > 0) {
    const top = stack.pop();
    if (top === undefined) break;
    if (visit(top.node, top.depth) === false) continue;
    const kids = top.node.children;
    for (let i = kids.length - 1; i >= 0; i--) {
      const child = kids[i];
      if (child !== undefined) stack.push({ node: child, depth: top.depth + 1 });
    }
  }
}

export function findById<V>(root: TemplateNode<V>, id: string): TemplateNode<V> | undefined {
  let found: TemplateNode<V> | undefined;
  walkTree(root, (n) => {
    if (found !== undefined) return false;
    if (n.id === id) {
      found = n;
      return false;
    }
    return true;
  });
  return found;
}

export function countNodes<V>(root: TemplateNode<V>): number {
  let n = 0;
  walkTree(root, () => {
    n++;
  });
  return n;
}
