/**
 * packages/core/src/layout/textMeasure.ts — Text measurement seam.
 *
 * Why: Yoga cannot size text on its own. Measurable leaves get a measure
 * callback that forwards to an injected TextMeasurer. Hosts with a real font
 * stack supply their own; the monospace measurer here is deterministic and
 * is what tests and headless height calculation use.
 *
 * Width rules (monospace):
 *   - Every code point advances by `fontSize * advanceRatio`
 *   - Lines wrap greedily at spaces; a word longer than a line is split
 *   - `numberOfLines > 0` caps the line count
 */

import type { NodeKind } from "../model/kinds.js";
import type { Style } from "../model/style.js";
import type { MeasureConstraints, MeasuredSize } from "./types.js";

export type MeasureContent = Readonly<{
  kind: NodeKind;
  text: string;
  style: Style;
}>;

/** Must be reentrant: yoga may call it several times per pass. */
export type TextMeasurer = Readonly<{
  measure: (content: MeasureContent, constraints: MeasureConstraints) => MeasuredSize;
}>;

export const DEFAULT_FONT_SIZE = 16;

export type MonospaceMeasurerOptions = Readonly<{
  /** Advance per code point as a fraction of fontSize. Default 0.5. */
  advanceRatio?: number;
  /** Line height as a fraction of fontSize when the style sets none. Default 1.25. */
  lineHeightRatio?: number;
  /** Extra width and height added around button/input content. */
  controlPadding?: number;
}>;

function splitLongWord(word: string[], perLine: number): string[][] {
  const out: string[][] = [];
  for (let i = 0; i < word.length; i += perLine) out.push(word.slice(i, i + perLine));
  return out;
}

/** Greedy wrap; returns the code-point length of each line. */
export function wrapMonospace(text: string, perLine: number): number[] {
  const lines: number[] = [];
  for (const paragraph of text.split("\n")) {
    if (!Number.isFinite(perLine)) {
      lines.push(Array.from(paragraph).length);
      continue;
    }
    let current = 0;
    const words = paragraph.split(" ");
    for (let w = 0; w < words.length; w++) {
      const chars = Array.from(words[w] ?? "");
      const pieces = chars.length > perLine ? splitLongWord(chars, perLine) : [chars];
      for (const piece of pieces) {
        const needed = current === 0 ? piece.length : current + 1 + piece.length;
        if (needed <= perLine) {
          current = needed;
        } else {
          lines.push(current);
          current = piece.length;
        }
      }
    }
    lines.push(current);
  }
  return lines;
}

export function createMonospaceMeasurer(opts: MonospaceMeasurerOptions = {}): TextMeasurer {
  const advanceRatio = opts.advanceRatio ?? 0.5;
  const lineHeightRatio = opts.lineHeightRatio ?? 1.25;
  const controlPadding = opts.controlPadding ?? 0;

  return Object.freeze({
    measure(content: MeasureContent, c: MeasureConstraints): MeasuredSize {
      const fontSize = content.style.fontSize ?? DEFAULT_FONT_SIZE;
      const advance = fontSize * advanceRatio;
      const lineHeight = content.style.lineHeight ?? fontSize * lineHeightRatio;
      const inset = content.kind === "text" ? 0 : controlPadding;

      if (content.text.length === 0) {
        return { width: c.widthMode === "exactly" ? c.width : 0, height: 0 };
      }

      const available =
        c.widthMode === "undefined" || !Number.isFinite(c.width)
          ? Number.POSITIVE_INFINITY
          : Math.max(0, c.width - inset * 2);
      const perLine = Number.isFinite(available)
        ? Math.max(1, Math.floor(available / advance))
        : Number.POSITIVE_INFINITY;

      let lines = wrapMonospace(content.text, perLine);
      const cap = content.style.numberOfLines;
      if (cap > 0 && lines.length > cap) lines = lines.slice(0, cap);

      let widest = 0;
      for (const len of lines) widest = Math.max(widest, len);
      const width = widest * advance + inset * 2;
      const height = lines.length * lineHeight + inset * 2;

      return {
        width: clampToMode(width, c.width, c.widthMode),
        height: clampToMode(height, c.height, c.heightMode),
      };
    },
  });
}

function clampToMode(
  natural: number,
  limit: number,
  mode: MeasureConstraints["widthMode"],
): number {
  if (mode === "exactly") return limit;
  if (mode === "at-most") return Math.min(natural, limit);
  return natural;
}
