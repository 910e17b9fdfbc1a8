/**
 * packages/core/src/model/style.ts — Flexbox style model.
 *
 * Why: A Style is a plain frozen value. Nodes replace it wholesale and the
 * diff engine compares it by full value equality, so there is no field-level
 * dirty tracking to keep in sync.
 *
 * Rules:
 *   - Unset optional fields are `undefined`, never NaN.
 *   - maxWidth/maxHeight use +Infinity for "no limit".
 *   - styleEquals() compares every field, including decoration.
 */

export type Dimension =
  | Readonly<{ unit: "auto" }>
  | Readonly<{ unit: "point"; value: number }>
  | Readonly<{ unit: "percent"; value: number }>;

export const AUTO: Dimension = Object.freeze({ unit: "auto" });

export function point(value: number): Dimension {
  return Object.freeze({ unit: "point", value });
}

export function percent(value: number): Dimension {
  return Object.freeze({ unit: "percent", value });
}

export type EdgeInsets = Readonly<{ top: number; right: number; bottom: number; left: number }>;

/** Absolute offsets; an unset edge does not constrain the node. */
export type PositionInsets = Readonly<{
  top?: number;
  right?: number;
  bottom?: number;
  left?: number;
}>;

export const ZERO_INSETS: EdgeInsets = Object.freeze({ top: 0, right: 0, bottom: 0, left: 0 });

export function insets(all: number): EdgeInsets;
export function insets(vertical: number, horizontal: number): EdgeInsets;
export function insets(top: number, right: number, bottom: number, left: number): EdgeInsets;
export function insets(a: number, b?: number, c?: number, d?: number): EdgeInsets {
  if (b === undefined) return Object.freeze({ top: a, right: a, bottom: a, left: a });
  if (c === undefined || d === undefined) {
    return Object.freeze({ top: a, right: b, bottom: a, left: b });
  }
  return Object.freeze({ top: a, right: b, bottom: c, left: d });
}

export type FlexDirection = "row" | "row-reverse" | "column" | "column-reverse";
export type FlexWrap = "nowrap" | "wrap" | "wrap-reverse";
export type JustifyContent =
  | "flex-start"
  | "flex-end"
  | "center"
  | "space-between"
  | "space-around"
  | "space-evenly";
export type AlignItems = "flex-start" | "flex-end" | "center" | "stretch" | "baseline";
export type AlignSelf = "auto" | AlignItems;
export type AlignContent =
  | "flex-start"
  | "flex-end"
  | "center"
  | "stretch"
  | "space-between"
  | "space-around";
export type PositionType = "relative" | "absolute";
export type Overflow = "visible" | "hidden" | "scroll";
export type Display = "flex" | "none";
export type Visibility = "visible" | "hidden";
export type TextAlign = "left" | "center" | "right" | "justified" | "start" | "end";

/** Colors are carried as opaque strings and interpreted by the widget layer. */
export type Color = string;

export type Size = Readonly<{ width: number; height: number }>;

export type Style = Readonly<{
  width: Dimension;
  height: Dimension;
  minWidth: number;
  minHeight: number;
  maxWidth: number;
  maxHeight: number;

  margin: EdgeInsets;
  padding: EdgeInsets;
  position: PositionInsets;

  flexGrow: number;
  flexShrink: number;
  flexBasis: Dimension;
  flexDirection: FlexDirection;
  flexWrap: FlexWrap;
  justifyContent: JustifyContent;
  alignItems: AlignItems;
  alignSelf: AlignSelf;
  alignContent: AlignContent;
  positionType: PositionType;
  aspectRatio: number | undefined;
  overflow: Overflow;
  display: Display;
  visibility: Visibility;

  backgroundColor: Color | undefined;
  cornerRadius: number;
  borderWidth: number;
  borderColor: Color | undefined;
  shadowColor: Color | undefined;
  shadowOffset: Size;
  shadowRadius: number;
  shadowOpacity: number;
  opacity: number;
  clipsToBounds: boolean;

  fontSize: number | undefined;
  fontWeight: string | undefined;
  textColor: Color | undefined;
  textAlign: TextAlign | undefined;
  lineHeight: number | undefined;
  letterSpacing: number | undefined;
  /** 0 = unlimited */
  numberOfLines: number;
}>;

export const DEFAULT_STYLE: Style = Object.freeze({
  width: AUTO,
  height: AUTO,
  minWidth: 0,
  minHeight: 0,
  maxWidth: Number.POSITIVE_INFINITY,
  maxHeight: Number.POSITIVE_INFINITY,

  margin: ZERO_INSETS,
  padding: ZERO_INSETS,
  position: Object.freeze({}),

  flexGrow: 0,
  flexShrink: 1,
  flexBasis: AUTO,
  flexDirection: "column",
  flexWrap: "nowrap",
  justifyContent: "flex-start",
  alignItems: "stretch",
  alignSelf: "auto",
  alignContent: "flex-start",
  positionType: "relative",
  aspectRatio: undefined,
  overflow: "visible",
  display: "flex",
  visibility: "visible",

  backgroundColor: undefined,
  cornerRadius: 0,
  borderWidth: 0,
  borderColor: undefined,
  shadowColor: undefined,
  shadowOffset: Object.freeze({ width: 0, height: 0 }),
  shadowRadius: 0,
  shadowOpacity: 0,
  opacity: 1,
  clipsToBounds: false,

  fontSize: undefined,
  fontWeight: undefined,
  textColor: undefined,
  textAlign: undefined,
  lineHeight: undefined,
  letterSpacing: undefined,
  numberOfLines: 0,
});

/** Build a frozen style from defaults plus overrides. */
export function createStyle(overrides?: Partial<Style>): Style {
  if (!overrides) return DEFAULT_STYLE;
  return Object.freeze({ ...DEFAULT_STYLE, ...overrides });
}

/** Copy-with-changes; the source is left untouched. */
export function withStyle(base: Style, changes: Partial<Style>): Style {
  return Object.freeze({ ...base, ...changes });
}

export function dimensionEquals(a: Dimension, b: Dimension): boolean {
  if (a.unit !== b.unit) return false;
  if (a.unit === "auto" || b.unit === "auto") return true;
  return a.value === b.value;
}

function insetsEqual(a: EdgeInsets, b: EdgeInsets): boolean {
  return a.top === b.top && a.right === b.right && a.bottom === b.bottom && a.left === b.left;
}

function positionEqual(a: PositionInsets, b: PositionInsets): boolean {
  return a.top === b.top && a.right === b.right && a.bottom === b.bottom && a.left === b.left;
}

/** Full value equality across every style field. */
export function styleEquals(a: Style, b: Style): boolean {
  if (a === b) return true;
  return (
    dimensionEquals(a.width, b.width) &&
    dimensionEquals(a.height, b.height) &&
    a.minWidth === b.minWidth &&
    a.minHeight === b.minHeight &&
    a.maxWidth === b.maxWidth &&
    a.maxHeight === b.maxHeight &&
    insetsEqual(a.margin, b.margin) &&
    insetsEqual(a.padding, b.padding) &&
    positionEqual(a.position, b.position) &&
    a.flexGrow === b.flexGrow &&
    a.flexShrink === b.flexShrink &&
    dimensionEquals(a.flexBasis, b.flexBasis) &&
    a.flexDirection === b.flexDirection &&
    a.flexWrap === b.flexWrap &&
    a.justifyContent === b.justifyContent &&
    a.alignItems === b.alignItems &&
    a.alignSelf === b.alignSelf &&
    a.alignContent === b.alignContent &&
    a.positionType === b.positionType &&
    a.aspectRatio === b.aspectRatio &&
    a.overflow === b.overflow &&
    a.display === b.display &&
    a.visibility === b.visibility &&
    a.backgroundColor === b.backgroundColor &&
    a.cornerRadius === b.cornerRadius &&
    a.borderWidth === b.borderWidth &&
    a.borderColor === b.borderColor &&
    a.shadowColor === b.shadowColor &&
    a.shadowOffset.width === b.shadowOffset.width &&
    a.shadowOffset.height === b.shadowOffset.height &&
    a.shadowRadius === b.shadowRadius &&
    a.shadowOpacity === b.shadowOpacity &&
    a.opacity === b.opacity &&
    a.clipsToBounds === b.clipsToBounds &&
    a.fontSize === b.fontSize &&
    a.fontWeight === b.fontWeight &&
    a.textColor === b.textColor &&
    a.textAlign === b.textAlign &&
    a.lineHeight === b.lineHeight &&
    a.letterSpacing === b.letterSpacing &&
    a.numberOfLines === b.numberOfLines
  );
}

/** True when the style paints something of its own. */
export function hasVisualEffect(style: Style): boolean {
  return (
    style.backgroundColor !== undefined ||
    style.borderWidth > 0 ||
    style.cornerRadius > 0 ||
    (style.shadowColor !== undefined && style.shadowOpacity > 0) ||
    style.opacity !== 1 ||
    style.clipsToBounds ||
    style.overflow !== "visible"
  );
}
