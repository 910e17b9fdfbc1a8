/**
 * packages/core/src/model/kinds.ts — Closed node-kind table.
 *
 * Why: Kind tags are resolved once, when a node is built, into the NodeKind
 * union. Every table keyed by kind is a mapped type over that union, so adding
 * a kind fails to compile until each table covers it.
 */

export type NodeKind =
  | "container"
  | "view"
  | "text"
  | "image"
  | "button"
  | "input"
  | "scroll"
  | "list"
  | "unknown";

export const NODE_KINDS: readonly NodeKind[] = Object.freeze([
  "container",
  "view",
  "text",
  "image",
  "button",
  "input",
  "scroll",
  "list",
  "unknown",
]);

export type KindSpec = Readonly<{
  /** Kind-specific props that take part in diffing and are copied on update. */
  fields: readonly string[];
  /** Leaf whose intrinsic size comes from the text measurer. */
  measurable: boolean;
  /** Pure layout kinds may be flattened away. */
  layoutOnly: boolean;
  /** Field holding the measured content, when measurable. */
  contentField?: string;
}>;

export const KIND_TABLE: Readonly<{ [K in NodeKind]: KindSpec }> = Object.freeze({
  container: { fields: [], measurable: false, layoutOnly: true },
  view: { fields: [], measurable: false, layoutOnly: true },
  text: { fields: ["text"], measurable: true, layoutOnly: false, contentField: "text" },
  image: {
    fields: ["src", "placeholder", "contentMode"],
    measurable: false,
    layoutOnly: false,
  },
  button: {
    fields: ["title", "disabled", "selected"],
    measurable: true,
    layoutOnly: false,
    contentField: "title",
  },
  input: {
    fields: ["text", "placeholder", "disabled", "secure", "maxLength"],
    measurable: true,
    layoutOnly: false,
    contentField: "text",
  },
  scroll: { fields: ["horizontal", "showsIndicator"], measurable: false, layoutOnly: false },
  list: {
    fields: ["itemTemplate", "items", "columns", "itemSpacing"],
    measurable: false,
    layoutOnly: false,
  },
  unknown: { fields: [], measurable: false, layoutOnly: false },
});

/** Props the diff compares and the patch copies: the kind's fields plus the child-list `key`. */
export function diffedProps(kind: NodeKind): readonly string[] {
  return DIFFED_PROPS[kind];
}

const DIFFED_PROPS: Readonly<{ [K in NodeKind]: readonly string[] }> = Object.freeze({
  container: [...KIND_TABLE.container.fields, "key"],
  view: [...KIND_TABLE.view.fields, "key"],
  text: [...KIND_TABLE.text.fields, "key"],
  image: [...KIND_TABLE.image.fields, "key"],
  button: [...KIND_TABLE.button.fields, "key"],
  input: [...KIND_TABLE.input.fields, "key"],
  scroll: [...KIND_TABLE.scroll.fields, "key"],
  list: [...KIND_TABLE.list.fields, "key"],
  unknown: [...KIND_TABLE.unknown.fields, "key"],
});

const KIND_ALIASES: Readonly<Record<string, NodeKind>> = Object.freeze({
  container: "container",
  flex: "container",
  flexbox: "container",
  view: "view",
  text: "text",
  label: "text",
  image: "image",
  img: "image",
  button: "button",
  input: "input",
  textfield: "input",
  scroll: "scroll",
  scrollview: "scroll",
  list: "list",
  grid: "list",
});

/** Resolve a declared type tag; unrecognized tags become "unknown". */
export function resolveKind(tag: string): NodeKind {
  return KIND_ALIASES[tag.toLowerCase()] ?? "unknown";
}
