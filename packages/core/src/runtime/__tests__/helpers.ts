import type { Rng } from "@trellis-ui/testkit";
import { TemplateNode } from "../../model/node.js";
import { createStyle } from "../../model/style.js";

export type ShapeKind = "view" | "container" | "text" | "image";

/** Plain description of a keyed tree; built into fresh nodes for each use. */
export type Shape = Readonly<{
  id: string;
  key: string;
  kind: ShapeKind;
  content: string;
  painted: boolean;
  children: readonly Shape[];
}>;

const BRANCH_KINDS: readonly ShapeKind[] = ["view", "container"];
const LEAF_KINDS: readonly ShapeKind[] = ["text", "image"];
const MAX_DEPTH = 3;

export function buildTree<V>(shape: Shape): TemplateNode<V> {
  const props: Record<string, unknown> = { key: shape.key };
  if (shape.kind === "text") props["text"] = shape.content;
  if (shape.kind === "image") props["src"] = shape.content;
  return new TemplateNode<V>({
    id: shape.id,
    kind: shape.kind,
    props,
    style: shape.painted ? createStyle({ backgroundColor: "#eee" }) : undefined,
    children: shape.children.map((c) => buildTree<V>(c)),
  });
}

export type TreeSummary = Readonly<{
  id: string;
  kind: string;
  key: unknown;
  text: unknown;
  src: unknown;
  background: unknown;
  children: readonly TreeSummary[];
}>;

/** What a node tree looks like to the diff, for deep equality. */
export function summarize<V>(node: TemplateNode<V>): TreeSummary {
  return {
    id: node.id,
    kind: node.kind,
    key: node.props["key"],
    text: node.resolved("text"),
    src: node.resolved("src"),
    background: node.style.backgroundColor,
    children: node.children.map((c) => summarize(c)),
  };
}

export type ShapeFactory = Readonly<{
  /** A new random subtree; ids and keys never repeat within one factory. */
  fresh: (depth?: number) => Shape;
  /** Content edits, kind swaps, paint toggles, shuffles, removals and inserts. */
  mutate: (shape: Shape) => Shape;
  /** Same tree with its ids permuted among its nodes. */
  permuteIds: (shape: Shape) => Shape;
}>;

export function createShapeFactory(rng: Rng): ShapeFactory {
  let serial = 0;

  function fresh(depth = 0): Shape {
    serial++;
    const id = `n${serial}`;
    const key = `k${serial}`;
    const branch = depth === 0 || (depth < MAX_DEPTH && rng.next() < 0.45);
    if (!branch) {
      return {
        id,
        key,
        kind: rng.pick(LEAF_KINDS),
        content: `c${rng.int(0, 3)}`,
        painted: false,
        children: [],
      };
    }
    const kind = depth === 0 ? "view" : rng.pick(BRANCH_KINDS);
    const painted = depth > 0 && rng.next() < 0.3;
    const children: Shape[] = [];
    const count = rng.int(0, 4);
    for (let i = 0; i < count; i++) children.push(fresh(depth + 1));
    return { id, key, kind, content: "", painted, children };
  }

  function mutateAt(shape: Shape, depth: number): Shape {
    if (shape.kind === "text" || shape.kind === "image") {
      const roll = rng.next();
      if (roll < 0.1) return { ...shape, kind: shape.kind === "text" ? "image" : "text" };
      if (roll < 0.4) return { ...shape, content: `c${rng.int(0, 3)}` };
      return shape;
    }
    let kids = shape.children.map((c) => mutateAt(c, depth + 1));
    if (rng.next() < 0.3) kids = rng.shuffle(kids);
    if (kids.length > 0 && rng.next() < 0.3) kids.splice(rng.int(0, kids.length - 1), 1);
    if (depth < MAX_DEPTH && rng.next() < 0.4) kids.splice(rng.int(0, kids.length), 0, fresh(depth + 1));
    const painted = depth > 0 && rng.next() < 0.2 ? !shape.painted : shape.painted;
    const swapKind = depth > 0 && rng.next() < 0.05;
    const kind: ShapeKind = swapKind ? (shape.kind === "view" ? "container" : "view") : shape.kind;
    return { ...shape, kind, painted, children: kids };
  }

  function permuteIds(shape: Shape): Shape {
    const ids: string[] = [];
    const collect = (s: Shape): void => {
      ids.push(s.id);
      for (const c of s.children) collect(c);
    };
    collect(shape);
    const shuffled = rng.shuffle(ids);
    let k = 0;
    const assign = (s: Shape): Shape => {
      const id = shuffled[k] ?? s.id;
      k++;
      return { ...s, id, children: s.children.map(assign) };
    };
    return assign(shape);
  }

  return Object.freeze({ fresh, mutate: (shape: Shape) => mutateAt(shape, 0), permuteIds });
}
