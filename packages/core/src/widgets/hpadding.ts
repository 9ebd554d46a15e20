/**
 * packages/core/src/widgets/hpadding.ts — Horizontal alignment of one child.
 *
 * Why: Places a child narrower than its slot at the left, middle or right
 * and fills the rest with blank columns. The child's width comes from its
 * own dimension, resolved against the slot the padding was offered.
 */

import type { Canvas } from "../canvas/canvas.js";
import { throwCode } from "../errors.js";
import { type InputEvent, translateMouse } from "../events.js";
import { type Dimension, baseOf, describeDimension } from "../layout/dimension.js";
import { horizontalSubSize } from "../layout/subSize.js";
import { type RenderBox, type RenderSize, describeSize, fixedSize, renderBox, sizeCols } from "../layout/types.js";
import type { InputContext } from "../runtime/clickTargets.js";
import type { FocusSelector } from "../runtime/focus.js";
import type { PreferredPosition, Widget } from "./types.js";

export type HAlign = "left" | "middle" | "right";

/** Where the child sits inside the padded slot. */
export type HPlacement = Readonly<{
  /** Blank columns left of the child. */
  left: number;
  /** Width the child is rendered at. */
  cols: number;
  /** Blank columns right of the child. */
  right: number;
  sub: RenderSize;
}>;

export class HPadding implements Widget {
  readonly inner: Widget;
  readonly align: HAlign;
  readonly width: Dimension;

  constructor(inner: Widget, align: HAlign, width: Dimension) {
    this.inner = inner;
    this.align = align;
    this.width = width;
  }

  get preferredPosition(): PreferredPosition | undefined {
    return this.inner.preferredPosition;
  }

  placement(size: RenderSize, focus: FocusSelector): HPlacement {
    const total = sizeCols(size);
    const d = baseOf(this.width);
    let cols: number;
    switch (d.kind) {
      case "units":
        cols = d.units;
        break;
      case "box":
      case "flowWith":
        cols = d.cols;
        break;
      case "fixed":
        cols = this.inner.computeSize(fixedSize(), focus).cols;
        break;
      case "ratio":
      case "relative":
      case "weight":
      case "flow":
        if (total === null) {
          return throwCode(
            "LOOM_SIZE_REQUIRED",
            `HPadding with ${describeDimension(d)} needs a width but got ${describeSize(size)}`,
          );
        }
        cols =
          d.kind === "ratio"
            ? Math.floor(d.ratio * total + 0.5)
            : d.kind === "relative"
              ? Math.floor(d.fraction * total)
              : total;
        break;
    }
    if (total !== null) cols = Math.min(cols, total);
    cols = Math.max(0, cols);

    const slack = total === null ? 0 : total - cols;
    let right: number;
    switch (this.align) {
      case "left":
        right = slack;
        break;
      case "right":
        right = 0;
        break;
      case "middle":
        right = Math.floor(slack / 2);
        break;
    }
    const sub = d.kind === "fixed" ? fixedSize() : horizontalSubSize(size, d, cols);
    return { left: slack - right, cols, right, sub };
  }

  render(size: RenderSize, focus: FocusSelector): Canvas {
    const p = this.placement(size, focus);
    const c = this.inner.render(p.sub, focus);
    if (c.cols > p.cols) c.trimRight(p.cols);
    else c.extendRight(p.cols - c.cols);
    return c.extendLeft(p.left).extendRight(p.right).ensureSize(size);
  }

  computeSize(size: RenderSize, focus: FocusSelector): RenderBox {
    const p = this.placement(size, focus);
    const inner = this.inner.computeSize(p.sub, focus);
    const rows = size.kind === "box" ? size.rows : inner.rows;
    return renderBox(p.left + p.cols + p.right, rows);
  }

  selectable(): boolean {
    return this.inner.selectable();
  }

  handleInput(ev: InputEvent, size: RenderSize, focus: FocusSelector, ctx: InputContext): boolean {
    const p = this.placement(size, focus);
    if (ev.kind === "mouse" && (ev.x < p.left || ev.x >= p.left + p.cols)) return false;
    return this.inner.handleInput(translateMouse(ev, -p.left, 0), p.sub, focus, ctx);
  }
}
