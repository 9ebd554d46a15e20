/**
 * packages/core/src/widgets/columns.ts — Horizontal container.
 *
 * Why: Lays children out left to right. Widths are negotiated from each
 * child's dimension and the width the Columns itself was offered; every
 * child is then rendered at its width, shorter canvases are padded with
 * blank rows to the tallest, and the row is padded on the right to the
 * offered width.
 *
 * Width negotiation:
 *   1. fixed, box, flowWith, units and ratio children, in order, each
 *      clipped so the running total never passes the offered width
 *   2. relative children, from what step 1 left
 *   3. weight children share the rest (see distributeWeighted)
 *   4. max children take their width from their inner dimension and the
 *      height of the tallest other child
 *
 * Input: mouse events go to the child under the pointer; other events go
 * to the focused child. Left/right keys nobody consumed move focus.
 */

import { Canvas } from "../canvas/canvas.js";
import { throwCode } from "../errors.js";
import {
  type InputEvent,
  isButtonPress,
  isButtonRelease,
  translateMouse,
} from "../events.js";
import { navigationIntent } from "../keybindings/navigation.js";
import { baseOf, countWeights, dim } from "../layout/dimension.js";
import { distributeWeighted } from "../layout/engine/distributeWeighted.js";
import { horizontalSubSize } from "../layout/subSize.js";
import {
  type RenderBox,
  type RenderSize,
  boxSize,
  describeSize,
  fixedSize,
  renderBox,
  sizeCols,
} from "../layout/types.js";
import { type InputContext, anyButtonDown } from "../runtime/clickTargets.js";
import { warnDev } from "../runtime/devWarnings.js";
import type { FocusSelector } from "../runtime/focus.js";
import { type ChildInput, type ContainerOptions, LinearContainer } from "./container.js";
import { type Widget, inputIfSelectable } from "./types.js";

export type ColumnsOptions = ContainerOptions &
  Readonly<{
    /** Initial focus. Defaults to the first selectable child. */
    startColumn?: number;
  }>;

/** Per-child geometry for one size. */
export type ColumnsLayout = Readonly<{
  widths: readonly number[];
  subSizes: readonly RenderSize[];
}>;

export class Columns extends LinearContainer {
  /** Bare widgets default to weight 1. */
  constructor(children: readonly ChildInput[], opts: ColumnsOptions = {}) {
    super(children, dim.weight(1), opts.startColumn, opts);
  }

  /** Columns whose children all size themselves. */
  static fixed(widgets: readonly Widget[], opts: ColumnsOptions = {}): Columns {
    return new Columns(
      widgets.map((widget) => ({ widget, dim: dim.fixed() })),
      opts,
    );
  }

  /** Resolved width of every child when offered `size`. */
  widths(size: RenderSize, focus: FocusSelector): number[] {
    const children = this.children;
    const total = sizeCols(size);
    const out = new Array<number>(children.length).fill(0);

    if (total === null && countWeights(children.map((c) => c.dim)) > 1) {
      throwCode(
        "LOOM_MULTIPLE_WEIGHTS",
        `Columns rendered ${describeSize(size)} cannot contain more than one weight child`,
      );
    }

    let used = 0;
    const clip = (x: number): number => {
      const v = Math.max(0, x);
      return total === null ? v : Math.min(v, Math.max(0, total - used));
    };

    const relative: number[] = [];
    const weighted: number[] = [];
    for (let i = 0; i < children.length; i++) {
      const child = children[i];
      if (child === undefined) continue;
      const d = baseOf(child.dim);
      let x: number;
      switch (d.kind) {
        case "fixed":
          x = child.widget.computeSize(fixedSize(), this.childFocus(focus, i)).cols;
          break;
        case "box":
        case "flowWith":
          x = d.cols;
          break;
        case "units":
          x = d.units;
          break;
        case "ratio":
          if (total === null) {
            return throwCode("LOOM_SIZE_REQUIRED", `ratio child needs a width but Columns got ${describeSize(size)}`);
          }
          x = Math.floor(d.ratio * total + 0.5);
          break;
        case "relative":
          if (total === null) {
            return throwCode(
              "LOOM_SIZE_REQUIRED",
              `relative child needs a width but Columns got ${describeSize(size)}`,
            );
          }
          relative.push(i);
          continue;
        case "weight":
          if (total === null) {
            // Unconstrained: the single weighted child sizes itself.
            x = child.widget.computeSize(fixedSize(), this.childFocus(focus, i)).cols;
            break;
          }
          weighted.push(i);
          continue;
        case "flow":
          return throwCode(
            "LOOM_INVALID_DIMENSION",
            `flow child ${String(i)} has no width inside Columns; use flowWith, units or weight`,
          );
      }
      x = clip(x);
      out[i] = x;
      used += x;
    }

    if (total === null) return out;

    const available = Math.max(0, total - used);
    for (const i of relative) {
      const d = baseOf(children[i]?.dim ?? dim.fixed());
      const x = clip(d.kind === "relative" ? Math.floor(d.fraction * available) : 0);
      out[i] = x;
      used += x;
    }

    if (weighted.length > 0) {
      const slots = weighted.map((i) => {
        const d = baseOf(children[i]?.dim ?? dim.fixed());
        return d.kind === "weight" ? { weight: d.weight, maxUnits: d.maxUnits } : { weight: 0 };
      });
      const { shares, leftover } = distributeWeighted(total - used, slots);
      weighted.forEach((childIndex, slot) => {
        out[childIndex] = shares[slot] ?? 0;
      });
      if (leftover > 0) {
        warnDev(
          "layout",
          `columns-capped:${String(total)}:${String(leftover)}`,
          `Columns: every weighted child hit its max; ${String(leftover)} of ${String(total)} columns left blank`,
        );
      }
    }

    return out;
  }

  /** Widths plus the size each child is rendered at. */
  layout(size: RenderSize, focus: FocusSelector): ColumnsLayout {
    const widths = this.widths(size, focus);
    const subSizes: RenderSize[] = [];
    const maxIndices: number[] = [];
    let tallest = -1;

    for (let i = 0; i < this.children.length; i++) {
      const child = this.children[i];
      if (child === undefined) continue;
      const w = widths[i] ?? 0;
      if (child.dim.kind === "max") {
        maxIndices.push(i);
        subSizes.push(boxSize(w, 0));
        continue;
      }
      subSizes.push(horizontalSubSize(size, child.dim, w));
    }

    if (maxIndices.length > 0) {
      for (let i = 0; i < this.children.length; i++) {
        const child = this.children[i];
        const sub = subSizes[i];
        if (child === undefined || sub === undefined || child.dim.kind === "max") continue;
        tallest = Math.max(tallest, child.widget.computeSize(sub, this.childFocus(focus, i)).rows);
      }
      if (tallest === -1) {
        throwCode("LOOM_ALL_CHILDREN_MAX", "Columns: all children are max, no reference height");
      }
      for (const i of maxIndices) subSizes[i] = boxSize(widths[i] ?? 0, tallest);
    }

    return { widths, subSizes };
  }

  render(size: RenderSize, focus: FocusSelector): Canvas {
    const { widths, subSizes } = this.layout(size, focus);
    const out = Canvas.empty();
    for (let i = 0; i < this.children.length; i++) {
      const child = this.children[i];
      const sub = subSizes[i];
      if (child === undefined || sub === undefined) continue;
      const c = child.widget.render(sub, this.childFocus(focus, i));
      const w = widths[i] ?? 0;
      if (c.cols > w) c.trimRight(w);
      else c.extendRight(w - c.cols);
      out.appendRight(c);
    }
    return out.ensureSize(size);
  }

  computeSize(size: RenderSize, focus: FocusSelector): RenderBox {
    const { widths, subSizes } = this.layout(size, focus);
    let cols = 0;
    let rows = 0;
    for (let i = 0; i < this.children.length; i++) {
      const child = this.children[i];
      const sub = subSizes[i];
      if (child === undefined || sub === undefined) continue;
      cols += widths[i] ?? 0;
      const h =
        child.dim.kind === "max" && sub.kind === "box"
          ? sub.rows
          : child.widget.computeSize(sub, this.childFocus(focus, i)).rows;
      rows = Math.max(rows, h);
    }
    if (size.kind !== "fixed") cols = size.cols;
    if (size.kind === "box") rows = size.rows;
    return renderBox(cols, rows);
  }

  /** Index of the child covering column `x`, or -1. */
  childAtColumn(x: number, widths: readonly number[]): number {
    let start = 0;
    for (let i = 0; i < widths.length; i++) {
      const w = widths[i] ?? 0;
      if (x >= start && x < start + w) return i;
      start += w;
    }
    return -1;
  }

  handleInput(ev: InputEvent, size: RenderSize, focus: FocusSelector, ctx: InputContext): boolean {
    const focusIndex = this.getFocus();
    if (focusIndex === -1) return false;

    const { widths, subSizes } = this.layout(size, focus);
    let forChild = false;
    let clicked = false;

    if (ev.kind === "mouse") {
      const hit = this.childAtColumn(ev.x, widths);
      const child = this.children[hit];
      const sub = subSizes[hit];
      if (child !== undefined && sub !== undefined) {
        let start = 0;
        for (let i = 0; i < hit; i++) start += widths[i] ?? 0;
        forChild = child.widget.handleInput(
          translateMouse(ev, -start, 0),
          sub,
          this.childFocus(focus, hit),
          ctx,
        );
        if (isButtonPress(ev)) {
          ctx.setClickTarget(ev.buttons, this);
        } else if (
          isButtonRelease(ev) &&
          anyButtonDown(ctx.lastMouseState()) &&
          child.widget.selectable() &&
          ctx.isClickTarget(this)
        ) {
          clicked = hit !== this.getFocus();
          this.setFocus(hit);
        }
      }
    } else {
      const child = this.children[focusIndex];
      const sub = subSizes[focusIndex];
      if (child !== undefined && sub !== undefined) {
        forChild = inputIfSelectable(child.widget, ev, sub, this.childFocus(focus, focusIndex), ctx);
      }
    }

    if (forChild || clicked) return true;
    if (ev.kind !== "key") return false;

    switch (navigationIntent(ev, this.keys)) {
      case "right":
        return this.moveFocus(1);
      case "left":
        return this.moveFocus(-1);
      default:
        return false;
    }
  }
}
