/**
 * packages/core/src/testing/jsonTemplate.ts — JSON template parser.
 *
 * Why: The core consumes templates through TemplateParser. This is the small
 * JSON form the test suite and embedders can use without a template
 * compiler:
 *
 *   { "type": "text", "id": "title", "style": {...}, "text": "${name}",
 *     "events": {...}, "children": [...] }
 *
 * Keys other than type/id/style/events/children become props. A document may
 * wrap its tree as `{ "root": {...} }`. Nodes without an id get their path
 * ("root/0/2"), so ids are stable across parses of the same template.
 * A list's `itemTemplate` object is read back as a template of its own.
 */

import type { TemplateParser } from "../app/types.js";
import { TemplateNode, type ValueMap } from "../model/node.js";
import { parseStyle } from "../model/styleParser.js";

export type JsonTemplate = Readonly<Record<string, unknown>>;

const RESERVED = new Set(["type", "id", "style", "events", "children"]);

function isRecord(v: unknown): v is Readonly<Record<string, unknown>> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function parseNode<V>(json: unknown, fallbackId: string): TemplateNode<V> | undefined {
  if (!isRecord(json)) return undefined;
  const type = json["type"];
  if (typeof type !== "string" || type.length === 0) return undefined;
  const rawId = json["id"];
  const id = typeof rawId === "string" && rawId.length > 0 ? rawId : fallbackId;

  const issues: string[] = [];
  const rawStyle = json["style"];
  let styleSource: Readonly<Record<string, unknown>> | undefined;
  if (isRecord(rawStyle)) styleSource = rawStyle;
  else if (rawStyle !== undefined) issues.push("style: expected an object");
  const parsed = parseStyle(styleSource);
  for (const issue of parsed.issues) issues.push(`${issue.key}: ${issue.detail}`);

  const props: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(json)) {
    if (!RESERVED.has(k)) props[k] = v;
  }
  const events: ValueMap = isRecord(json["events"]) ? json["events"] : {};

  const children: TemplateNode<V>[] = [];
  const rawChildren = json["children"];
  if (Array.isArray(rawChildren)) {
    rawChildren.forEach((c: unknown, i: number) => {
      const child = parseNode<V>(c, `${id}/${i}`);
      if (child !== undefined) children.push(child);
    });
  }

  return new TemplateNode<V>({
    id,
    kind: type,
    style: parsed.style,
    props,
    events,
    parseIssues: issues,
    children,
  });
}

export function createJsonTemplateParser(): TemplateParser<JsonTemplate> {
  return Object.freeze({
    parse<V>(raw: JsonTemplate): TemplateNode<V> | undefined {
      const root = isRecord(raw["root"]) ? raw["root"] : raw;
      return parseNode<V>(root, "root");
    },
    readTemplate: (value: unknown): JsonTemplate | undefined => (isRecord(value) ? value : undefined),
  });
}
