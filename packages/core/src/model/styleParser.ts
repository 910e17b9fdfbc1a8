/**
 * packages/core/src/model/styleParser.ts — Raw attribute dictionary → Style.
 *
 * Single pass over the raw keys. Shorthands (`marginHorizontal`, `color`, ...)
 * are merged after the pass so their result does not depend on key order.
 * Unknown keys are ignored; a known key with an unusable value is reported as
 * a StyleIssue and leaves the default in place.
 */

import {
  AUTO,
  type AlignContent,
  type AlignItems,
  type AlignSelf,
  DEFAULT_STYLE,
  type Dimension,
  type Display,
  type EdgeInsets,
  type FlexDirection,
  type FlexWrap,
  type JustifyContent,
  type Overflow,
  type PositionType,
  type Style,
  type TextAlign,
  type Visibility,
  percent,
  point,
} from "./style.js";

export type StyleIssue = Readonly<{ key: string; detail: string }>;

export type StyleParseResult = Readonly<{ style: Style; issues: readonly StyleIssue[] }>;

type MutableStyle = { -readonly [K in keyof Style]: Style[K] };
type MutableInsets = { -readonly [K in keyof EdgeInsets]: EdgeInsets[K] };

const FLEX_DIRECTIONS: readonly FlexDirection[] = ["row", "row-reverse", "column", "column-reverse"];
const FLEX_WRAPS: readonly FlexWrap[] = ["nowrap", "wrap", "wrap-reverse"];
const JUSTIFY: readonly JustifyContent[] = [
  "flex-start",
  "flex-end",
  "center",
  "space-between",
  "space-around",
  "space-evenly",
];
const ALIGN_ITEMS: readonly AlignItems[] = ["flex-start", "flex-end", "center", "stretch", "baseline"];
const ALIGN_SELF: readonly AlignSelf[] = ["auto", ...ALIGN_ITEMS];
const ALIGN_CONTENT: readonly AlignContent[] = [
  "flex-start",
  "flex-end",
  "center",
  "stretch",
  "space-between",
  "space-around",
];
const POSITION_TYPES: readonly PositionType[] = ["relative", "absolute"];
const OVERFLOWS: readonly Overflow[] = ["visible", "hidden", "scroll"];
const DISPLAYS: readonly Display[] = ["flex", "none"];
const VISIBILITIES: readonly Visibility[] = ["visible", "hidden"];
const TEXT_ALIGNS: readonly TextAlign[] = ["left", "center", "right", "justified", "start", "end"];

function pickEnum<T extends string>(values: readonly T[], v: unknown): T | undefined {
  if (typeof v !== "string") return undefined;
  for (const candidate of values) {
    if (candidate === v) return candidate;
  }
  return undefined;
}

function toNumber(v: unknown): number | undefined {
  if (typeof v === "number") return Number.isFinite(v) ? v : undefined;
  if (typeof v === "string" && v.trim().length > 0) {
    const n = Number(v);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

export function parseDimension(v: unknown): Dimension | undefined {
  if (typeof v === "number") return Number.isFinite(v) ? point(v) : undefined;
  if (typeof v !== "string") return undefined;
  const s = v.trim().toLowerCase();
  if (s === "auto") return AUTO;
  if (s.endsWith("%")) {
    const n = toNumber(s.slice(0, -1));
    return n === undefined ? undefined : percent(n);
  }
  const n = toNumber(s);
  return n === undefined ? undefined : point(n);
}

/** Accepts `n`, `[n]`, `[vertical, horizontal]` or `[top, right, bottom, left]`. */
export function parseInsets(v: unknown): EdgeInsets | undefined {
  const single = toNumber(v);
  if (single !== undefined) return { top: single, right: single, bottom: single, left: single };
  if (!Array.isArray(v)) return undefined;
  const nums: number[] = [];
  for (const item of v) {
    const n = toNumber(item);
    if (n === undefined) return undefined;
    nums.push(n);
  }
  const [a, b, c, d] = nums;
  if (nums.length === 1 && a !== undefined) return { top: a, right: a, bottom: a, left: a };
  if (nums.length === 2 && a !== undefined && b !== undefined) {
    return { top: a, right: b, bottom: a, left: b };
  }
  if (nums.length === 4 && a !== undefined && b !== undefined && c !== undefined && d !== undefined) {
    return { top: a, right: b, bottom: c, left: d };
  }
  return undefined;
}

function parseColor(v: unknown): string | undefined {
  return typeof v === "string" && v.length > 0 ? v : undefined;
}

export function parseStyle(raw: Readonly<Record<string, unknown>> | undefined): StyleParseResult {
  if (!raw) return { style: DEFAULT_STYLE, issues: [] };

  const style: MutableStyle = { ...DEFAULT_STYLE };
  const margin: MutableInsets = { ...DEFAULT_STYLE.margin };
  const padding: MutableInsets = { ...DEFAULT_STYLE.padding };
  const position: { top?: number; right?: number; bottom?: number; left?: number } = {};
  const issues: StyleIssue[] = [];

  let marginH: number | undefined;
  let marginV: number | undefined;
  let paddingH: number | undefined;
  let paddingV: number | undefined;
  let colorFallback: string | undefined;

  const bad = (key: string, value: unknown): void => {
    issues.push({ key, detail: `unsupported value ${JSON.stringify(value) ?? String(value)}` });
  };
  const num = (key: string, value: unknown, set: (n: number) => void): void => {
    const n = toNumber(value);
    if (n === undefined) bad(key, value);
    else set(n);
  };
  const dim = (key: string, value: unknown, set: (d: Dimension) => void): void => {
    const d = parseDimension(value);
    if (d === undefined) bad(key, value);
    else set(d);
  };
  const pick = <T extends string>(
    key: string,
    values: readonly T[],
    value: unknown,
    set: (v: T) => void,
  ): void => {
    const e = pickEnum(values, value);
    if (e === undefined) bad(key, value);
    else set(e);
  };
  const color = (key: string, value: unknown, set: (c: string) => void): void => {
    const c = parseColor(value);
    if (c === undefined) bad(key, value);
    else set(c);
  };
  const box = (key: string, value: unknown, target: MutableInsets): void => {
    const parsed = parseInsets(value);
    if (parsed === undefined) {
      bad(key, value);
      return;
    }
    target.top = parsed.top;
    target.right = parsed.right;
    target.bottom = parsed.bottom;
    target.left = parsed.left;
  };

  for (const key of Object.keys(raw)) {
    const value = raw[key];
    switch (key) {
      case "width":
        dim(key, value, (d) => (style.width = d));
        break;
      case "height":
        dim(key, value, (d) => (style.height = d));
        break;
      case "minWidth":
        num(key, value, (n) => (style.minWidth = n));
        break;
      case "minHeight":
        num(key, value, (n) => (style.minHeight = n));
        break;
      case "maxWidth":
        num(key, value, (n) => (style.maxWidth = n));
        break;
      case "maxHeight":
        num(key, value, (n) => (style.maxHeight = n));
        break;

      case "margin":
        box(key, value, margin);
        break;
      case "padding":
        box(key, value, padding);
        break;
      case "marginTop":
        num(key, value, (n) => (margin.top = n));
        break;
      case "marginRight":
        num(key, value, (n) => (margin.right = n));
        break;
      case "marginBottom":
        num(key, value, (n) => (margin.bottom = n));
        break;
      case "marginLeft":
        num(key, value, (n) => (margin.left = n));
        break;
      case "marginHorizontal":
        num(key, value, (n) => (marginH = n));
        break;
      case "marginVertical":
        num(key, value, (n) => (marginV = n));
        break;
      case "paddingTop":
        num(key, value, (n) => (padding.top = n));
        break;
      case "paddingRight":
        num(key, value, (n) => (padding.right = n));
        break;
      case "paddingBottom":
        num(key, value, (n) => (padding.bottom = n));
        break;
      case "paddingLeft":
        num(key, value, (n) => (padding.left = n));
        break;
      case "paddingHorizontal":
        num(key, value, (n) => (paddingH = n));
        break;
      case "paddingVertical":
        num(key, value, (n) => (paddingV = n));
        break;

      case "flexGrow":
        num(key, value, (n) => (style.flexGrow = n));
        break;
      case "flexShrink":
        num(key, value, (n) => (style.flexShrink = n));
        break;
      case "flexBasis":
        dim(key, value, (d) => (style.flexBasis = d));
        break;
      case "flexDirection":
        pick(key, FLEX_DIRECTIONS, value, (v) => (style.flexDirection = v));
        break;
      case "flexWrap":
        pick(key, FLEX_WRAPS, value, (v) => (style.flexWrap = v));
        break;
      case "justifyContent":
        pick(key, JUSTIFY, value, (v) => (style.justifyContent = v));
        break;
      case "alignItems":
        pick(key, ALIGN_ITEMS, value, (v) => (style.alignItems = v));
        break;
      case "alignSelf":
        pick(key, ALIGN_SELF, value, (v) => (style.alignSelf = v));
        break;
      case "alignContent":
        pick(key, ALIGN_CONTENT, value, (v) => (style.alignContent = v));
        break;

      // "position" is accepted as an alias of positionType.
      case "position":
      case "positionType":
        pick(key, POSITION_TYPES, value, (v) => (style.positionType = v));
        break;
      case "top":
        num(key, value, (n) => (position.top = n));
        break;
      case "right":
        num(key, value, (n) => (position.right = n));
        break;
      case "bottom":
        num(key, value, (n) => (position.bottom = n));
        break;
      case "left":
        num(key, value, (n) => (position.left = n));
        break;

      case "aspectRatio":
        num(key, value, (n) => (style.aspectRatio = n > 0 ? n : undefined));
        break;
      case "overflow":
        pick(key, OVERFLOWS, value, (v) => (style.overflow = v));
        break;
      case "display":
        pick(key, DISPLAYS, value, (v) => (style.display = v));
        break;
      case "visibility":
        pick(key, VISIBILITIES, value, (v) => (style.visibility = v));
        break;

      case "backgroundColor":
        color(key, value, (c) => (style.backgroundColor = c));
        break;
      case "cornerRadius":
      case "borderRadius":
        num(key, value, (n) => (style.cornerRadius = n));
        break;
      case "borderWidth":
        num(key, value, (n) => (style.borderWidth = n));
        break;
      case "borderColor":
        color(key, value, (c) => (style.borderColor = c));
        break;
      case "shadowColor":
        color(key, value, (c) => (style.shadowColor = c));
        break;
      case "shadowOffset": {
        const xy = Array.isArray(value) && value.length >= 2 ? value : undefined;
        const x = xy ? toNumber(xy[0]) : undefined;
        const y = xy ? toNumber(xy[1]) : undefined;
        if (x === undefined || y === undefined) bad(key, value);
        else style.shadowOffset = { width: x, height: y };
        break;
      }
      case "shadowRadius":
        num(key, value, (n) => (style.shadowRadius = n));
        break;
      case "shadowOpacity":
        num(key, value, (n) => (style.shadowOpacity = n));
        break;
      case "opacity":
        num(key, value, (n) => (style.opacity = n));
        break;
      case "clipsToBounds":
        if (typeof value === "boolean") style.clipsToBounds = value;
        else bad(key, value);
        break;

      case "fontSize":
        num(key, value, (n) => (style.fontSize = n));
        break;
      case "fontWeight":
        if (typeof value === "string" || typeof value === "number") style.fontWeight = String(value);
        else bad(key, value);
        break;
      case "textColor":
        color(key, value, (c) => (style.textColor = c));
        break;
      case "color":
        color(key, value, (c) => (colorFallback = c));
        break;
      case "textAlign":
        pick(key, TEXT_ALIGNS, value, (v) => (style.textAlign = v));
        break;
      case "lineHeight":
        num(key, value, (n) => (style.lineHeight = n));
        break;
      case "letterSpacing":
        num(key, value, (n) => (style.letterSpacing = n));
        break;
      case "numberOfLines":
      case "lines":
        num(key, value, (n) => (style.numberOfLines = Math.max(0, Math.trunc(n))));
        break;
      default:
        break;
    }
  }

  if (marginH !== undefined) {
    margin.left = marginH;
    margin.right = marginH;
  }
  if (marginV !== undefined) {
    margin.top = marginV;
    margin.bottom = marginV;
  }
  if (paddingH !== undefined) {
    padding.left = paddingH;
    padding.right = paddingH;
  }
  if (paddingV !== undefined) {
    padding.top = paddingV;
    padding.bottom = paddingV;
  }
  // textColor wins over color
  if (style.textColor === undefined && colorFallback !== undefined) {
    style.textColor = colorFallback;
  }

  style.margin = Object.freeze(margin);
  style.padding = Object.freeze(padding);
  style.position = Object.freeze(position);
  return { style: Object.freeze(style), issues };
}
