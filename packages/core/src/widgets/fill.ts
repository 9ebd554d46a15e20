/**
 * packages/core/src/widgets/fill.ts — Solid block of one character.
 *
 * Why: Spacers, separators and backgrounds. A Fill has no natural size; it
 * covers whatever box it is given, or one row of a flow width.
 */

import { Canvas } from "../canvas/canvas.js";
import type { TextStyle } from "../canvas/style.js";
import { throwCode } from "../errors.js";
import type { InputEvent } from "../events.js";
import { type RenderBox, type RenderSize, renderBox } from "../layout/types.js";
import type { InputContext } from "../runtime/clickTargets.js";
import type { FocusSelector } from "../runtime/focus.js";
import type { Widget } from "./types.js";

export class Fill implements Widget {
  readonly ch: string;
  readonly style: TextStyle | undefined;

  constructor(ch = " ", style?: TextStyle) {
    this.ch = ch;
    this.style = style;
  }

  computeSize(size: RenderSize, _focus: FocusSelector): RenderBox {
    switch (size.kind) {
      case "box":
        return renderBox(size.cols, size.rows);
      case "flow":
        return renderBox(size.cols, 1);
      case "fixed":
        return throwCode("LOOM_SIZE_REQUIRED", "Fill has no natural size; give it a flow or box size");
    }
  }

  render(size: RenderSize, focus: FocusSelector): Canvas {
    const { cols, rows } = this.computeSize(size, focus);
    return Canvas.fill(this.ch, cols, rows, this.style);
  }

  selectable(): boolean {
    return false;
  }

  handleInput(_ev: InputEvent, _size: RenderSize, _focus: FocusSelector, _ctx: InputContext): boolean {
    return false;
  }
}
