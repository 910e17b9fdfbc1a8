/**
 * packages/core/src/layout/types.ts — Layout primitive type definitions.
 *
 * Why: Defines the geometric types shared by the layout adapter, the patch
 * applier and the materializer. Coordinates are host points.
 */

/** Box with origin relative to the parent (or to the view host when flattened). */
export type Frame = Readonly<{ x: number; y: number; width: number; height: number }>;

export const ZERO_FRAME: Frame = Object.freeze({ x: 0, y: 0, width: 0, height: 0 });

/**
 * Container size handed to computeLayout. NaN in either dimension lets the
 * content decide that dimension.
 */
export type ContainerSize = Readonly<{ width: number; height: number }>;

/** Proposed size for a measurable leaf. NaN = unconstrained. */
export type MeasureConstraints = Readonly<{
  width: number;
  widthMode: "undefined" | "exactly" | "at-most";
  height: number;
  heightMode: "undefined" | "exactly" | "at-most";
}>;

export type MeasuredSize = Readonly<{ width: number; height: number }>;

/** Generation-checked address of a pooled layout node. */
export type LayoutSlot = Readonly<{ index: number; generation: number }>;

export type FrameMap = ReadonlyMap<string, Frame>;

export function frameEquals(a: Frame | undefined, b: Frame | undefined): boolean {
  if (a === b) return true;
  if (a === undefined || b === undefined) return false;
  return a.x === b.x && a.y === b.y && a.width === b.width && a.height === b.height;
}
