/**
 * packages/core/src/widgets/text.ts — Static text.
 *
 * Why: The simplest content widget and the usual leaf in layout tests. Text
 * is split on "\n"; each line is either wrapped at the offered width or
 * clipped to it. One code point is one cell.
 *
 * Sizes:
 *   - fixed: natural width (longest line) and one row per line
 *   - flow:  offered width, as many rows as wrapping produces
 *   - box:   offered width and height; extra rows cut, missing rows blank
 */

import { Canvas } from "../canvas/canvas.js";
import type { TextStyle } from "../canvas/style.js";
import type { InputEvent } from "../events.js";
import { type RenderBox, type RenderSize, renderBox, sizeCols } from "../layout/types.js";
import type { InputContext } from "../runtime/clickTargets.js";
import type { FocusSelector } from "../runtime/focus.js";
import type { Widget } from "./types.js";

/** "any" breaks lines at any code point; "clip" cuts them at the width. */
export type TextWrap = "any" | "clip";

export type TextOptions = Readonly<{
  wrap?: TextWrap;
  style?: TextStyle;
}>;

function splitLine(line: string, cols: number, wrap: TextWrap): string[] {
  const chars = Array.from(line);
  if (chars.length <= cols) return [line];
  if (wrap === "clip" || cols === 0) return [chars.slice(0, cols).join("")];
  const out: string[] = [];
  for (let i = 0; i < chars.length; i += cols) out.push(chars.slice(i, i + cols).join(""));
  return out;
}

export class Text implements Widget {
  private content: string;
  private readonly wrapMode: TextWrap;
  private readonly style: TextStyle | undefined;

  constructor(content: string, opts: TextOptions = {}) {
    this.content = content;
    this.wrapMode = opts.wrap ?? "any";
    this.style = opts.style;
  }

  getContent(): string {
    return this.content;
  }

  setContent(content: string): void {
    this.content = content;
  }

  /** Lines as laid out for `size`. */
  lines(size: RenderSize): string[] {
    const raw = this.content.split("\n");
    const cols = sizeCols(size);
    if (cols === null) return raw;
    return raw.flatMap((line) => splitLine(line, cols, this.wrapMode));
  }

  computeSize(size: RenderSize, _focus: FocusSelector): RenderBox {
    switch (size.kind) {
      case "box":
        return renderBox(size.cols, size.rows);
      case "flow":
        return renderBox(size.cols, this.lines(size).length);
      case "fixed": {
        const lines = this.lines(size);
        let widest = 0;
        for (const line of lines) widest = Math.max(widest, Array.from(line).length);
        return renderBox(widest, lines.length);
      }
    }
  }

  render(size: RenderSize, _focus: FocusSelector): Canvas {
    return Canvas.fromLines(this.lines(size), this.style).ensureSize(size);
  }

  selectable(): boolean {
    return false;
  }

  handleInput(_ev: InputEvent, _size: RenderSize, _focus: FocusSelector, _ctx: InputContext): boolean {
    return false;
  }
}
