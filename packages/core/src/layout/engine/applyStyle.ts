/**
 * packages/core/src/layout/engine/applyStyle.ts — Style → yoga node setters.
 *
 * Every style field with layout meaning is written, defaults included. Pooled
 * nodes are not reset between owners, so this is what clears the previous
 * owner's values.
 */

import {
  Align,
  Display,
  Edge,
  FlexDirection,
  Justify,
  Overflow,
  PositionType,
  Wrap,
  type Node as YogaNode,
} from "yoga-layout";
import type {
  AlignContent,
  AlignItems,
  AlignSelf,
  Dimension,
  FlexDirection as StyleFlexDirection,
  FlexWrap,
  JustifyContent,
  Overflow as StyleOverflow,
  Style,
} from "../../model/style.js";

type YogaLength = number | "auto" | `${number}%` | undefined;

function toLength(d: Dimension): YogaLength {
  switch (d.unit) {
    case "auto":
      return "auto";
    case "point":
      return d.value;
    case "percent":
      return `${d.value}%`;
  }
}

const FLEX_DIRECTION: Readonly<Record<StyleFlexDirection, FlexDirection>> = {
  row: FlexDirection.Row,
  "row-reverse": FlexDirection.RowReverse,
  column: FlexDirection.Column,
  "column-reverse": FlexDirection.ColumnReverse,
};

const WRAP: Readonly<Record<FlexWrap, Wrap>> = {
  nowrap: Wrap.NoWrap,
  wrap: Wrap.Wrap,
  "wrap-reverse": Wrap.WrapReverse,
};

const JUSTIFY: Readonly<Record<JustifyContent, Justify>> = {
  "flex-start": Justify.FlexStart,
  "flex-end": Justify.FlexEnd,
  center: Justify.Center,
  "space-between": Justify.SpaceBetween,
  "space-around": Justify.SpaceAround,
  "space-evenly": Justify.SpaceEvenly,
};

const ALIGN: Readonly<Record<AlignSelf | AlignContent | AlignItems, Align>> = {
  auto: Align.Auto,
  "flex-start": Align.FlexStart,
  "flex-end": Align.FlexEnd,
  center: Align.Center,
  stretch: Align.Stretch,
  baseline: Align.Baseline,
  "space-between": Align.SpaceBetween,
  "space-around": Align.SpaceAround,
};

const OVERFLOW: Readonly<Record<StyleOverflow, Overflow>> = {
  visible: Overflow.Visible,
  hidden: Overflow.Hidden,
  scroll: Overflow.Scroll,
};

function finiteOrUndefined(n: number): number | undefined {
  return Number.isFinite(n) ? n : undefined;
}

export function applyStyleToYogaNode(node: YogaNode, style: Style): void {
  node.setWidth(toLength(style.width));
  node.setHeight(toLength(style.height));
  node.setMinWidth(style.minWidth > 0 ? style.minWidth : undefined);
  node.setMinHeight(style.minHeight > 0 ? style.minHeight : undefined);
  node.setMaxWidth(finiteOrUndefined(style.maxWidth));
  node.setMaxHeight(finiteOrUndefined(style.maxHeight));

  node.setMargin(Edge.Top, style.margin.top);
  node.setMargin(Edge.Right, style.margin.right);
  node.setMargin(Edge.Bottom, style.margin.bottom);
  node.setMargin(Edge.Left, style.margin.left);
  node.setPadding(Edge.Top, style.padding.top);
  node.setPadding(Edge.Right, style.padding.right);
  node.setPadding(Edge.Bottom, style.padding.bottom);
  node.setPadding(Edge.Left, style.padding.left);
  node.setPosition(Edge.Top, style.position.top);
  node.setPosition(Edge.Right, style.position.right);
  node.setPosition(Edge.Bottom, style.position.bottom);
  node.setPosition(Edge.Left, style.position.left);

  node.setFlexGrow(style.flexGrow);
  node.setFlexShrink(style.flexShrink);
  node.setFlexBasis(toLength(style.flexBasis));
  node.setFlexDirection(FLEX_DIRECTION[style.flexDirection]);
  node.setFlexWrap(WRAP[style.flexWrap]);
  node.setJustifyContent(JUSTIFY[style.justifyContent]);
  node.setAlignItems(ALIGN[style.alignItems]);
  node.setAlignSelf(ALIGN[style.alignSelf]);
  node.setAlignContent(ALIGN[style.alignContent]);

  node.setPositionType(
    style.positionType === "absolute" ? PositionType.Absolute : PositionType.Relative,
  );
  node.setAspectRatio(style.aspectRatio);
  node.setOverflow(OVERFLOW[style.overflow]);
  // visibility: hidden keeps its box; only display: none removes it from flow
  node.setDisplay(style.display === "none" ? Display.None : Display.Flex);
}
