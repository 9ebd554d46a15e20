/**
 * packages/core/src/widgets/pile.ts — Vertical container.
 *
 * Why: Stacks children top to bottom. Row counts are negotiated from each
 * child's dimension and the size the Pile was offered, children are
 * rendered at their negotiated sizes, stacked, cut at the offered height
 * and padded with blank rows up to it.
 *
 * Height negotiation:
 *   1. fixed, box and flowWith children are measured first; the widest of
 *      them is the width flow children wrap to when the Pile is unconstrained
 *   2. units, flow and ratio children
 *   3. relative children, from the rows steps 1-2 left
 *   4. weight children share the rest of a box; outside a box the single
 *      weight child gets the Pile's own size
 *   5. max children keep their rows and widen to the widest other child
 *
 * In a box each child is cut to the rows its predecessors left.
 *
 * Input: the mouse wheel goes to the focused child first so a focused
 * scrollable child can use it; other mouse events go to the child under
 * the pointer. Up/down keys and wheel events nobody consumed move focus.
 */

import { Canvas } from "../canvas/canvas.js";
import { throwCode } from "../errors.js";
import {
  type InputEvent,
  isButtonPress,
  isButtonRelease,
  translateMouse,
  wheelDirection,
} from "../events.js";
import { navigationIntent } from "../keybindings/navigation.js";
import { type BaseDimension, baseOf, countWeights, dim } from "../layout/dimension.js";
import { distributeWeighted } from "../layout/engine/distributeWeighted.js";
import { verticalSubSize } from "../layout/subSize.js";
import {
  type RenderBox,
  type RenderSize,
  boxSize,
  describeSize,
  renderBox,
} from "../layout/types.js";
import { type InputContext, anyButtonDown } from "../runtime/clickTargets.js";
import { warnDev } from "../runtime/devWarnings.js";
import type { FocusSelector } from "../runtime/focus.js";
import { type ChildInput, type ContainerOptions, LinearContainer } from "./container.js";
import { type Widget, inputIfSelectable } from "./types.js";

export type PileOptions = ContainerOptions &
  Readonly<{
    /** Initial focus. Defaults to the first selectable child. */
    startRow?: number;
  }>;

/** Per-child geometry for one size. */
export type PileLayout = Readonly<{
  heights: readonly number[];
  subSizes: readonly RenderSize[];
}>;

type Phase = 1 | 2 | 3 | 4;

function phaseOf(d: BaseDimension): Phase {
  switch (d.kind) {
    case "fixed":
    case "box":
    case "flowWith":
      return 1;
    case "units":
    case "flow":
    case "ratio":
      return 2;
    case "relative":
      return 3;
    case "weight":
      return 4;
  }
}

export class Pile extends LinearContainer {
  /** Bare widgets default to flow. */
  constructor(children: readonly ChildInput[], opts: PileOptions = {}) {
    super(children, dim.flow(), opts.startRow, opts);
  }

  /** Pile whose children all size themselves. */
  static fixed(widgets: readonly Widget[], opts: PileOptions = {}): Pile {
    return new Pile(
      widgets.map((widget) => ({ widget, dim: dim.fixed() })),
      opts,
    );
  }

  /** Row count and render size of every child when offered `size`. */
  layout(size: RenderSize, focus: FocusSelector): PileLayout {
    const children = this.children;
    const n = children.length;

    if (size.kind !== "box" && countWeights(children.map((c) => c.dim)) > 1) {
      throwCode(
        "LOOM_MULTIPLE_WEIGHTS",
        `Pile rendered ${describeSize(size)} cannot contain more than one weight child`,
      );
    }

    const heights = new Array<number>(n).fill(0);
    const widths = new Array<number>(n).fill(0);
    const subSizes: RenderSize[] = new Array<RenderSize>(n).fill(boxSize(0, 0));
    let maxCol = -1;
    let rowsUsed = 0;

    const measure = (i: number, sub: RenderSize): void => {
      const child = children[i];
      if (child === undefined) return;
      const box = child.widget.computeSize(sub, this.childFocus(focus, i));
      let rows = box.rows;
      let clipped = sub;
      if (size.kind === "box") {
        const left = Math.max(0, size.rows - rowsUsed);
        if (rows > left) {
          rows = left;
          if (sub.kind === "box") clipped = boxSize(sub.cols, left);
        }
      }
      subSizes[i] = clipped;
      heights[i] = rows;
      widths[i] = box.cols;
      rowsUsed += rows;
    };

    const indicesIn = (phase: Phase): number[] => {
      const out: number[] = [];
      for (let i = 0; i < n; i++) {
        const child = children[i];
        if (child !== undefined && phaseOf(baseOf(child.dim)) === phase) out.push(i);
      }
      return out;
    };

    for (const i of indicesIn(1)) {
      const child = children[i];
      if (child === undefined) continue;
      measure(i, verticalSubSize(size, baseOf(child.dim), { maxCol: -1, rows: 0 }));
      if (child.dim.kind !== "max") maxCol = Math.max(maxCol, widths[i] ?? 0);
    }

    for (const i of indicesIn(2)) {
      const d = baseOf(children[i]?.dim ?? dim.fixed());
      const rows = d.kind === "ratio" && size.kind === "box" ? Math.floor(d.ratio * size.rows + 0.5) : 0;
      measure(i, verticalSubSize(size, d, { maxCol, rows }));
    }

    const available = size.kind === "box" ? Math.max(0, size.rows - rowsUsed) : 0;
    for (const i of indicesIn(3)) {
      const d = baseOf(children[i]?.dim ?? dim.fixed());
      const rows = d.kind === "relative" ? Math.floor(d.fraction * available) : 0;
      measure(i, verticalSubSize(size, d, { maxCol, rows }));
    }

    const weighted = indicesIn(4);
    if (size.kind === "box" && weighted.length > 0) {
      const slots = weighted.map((i) => {
        const d = baseOf(children[i]?.dim ?? dim.fixed());
        return d.kind === "weight" ? { weight: d.weight, maxUnits: d.maxUnits } : { weight: 0 };
      });
      const { shares, leftover } = distributeWeighted(size.rows - rowsUsed, slots);
      weighted.forEach((childIndex, slot) => {
        measure(childIndex, boxSize(size.cols, shares[slot] ?? 0));
      });
      if (leftover > 0) {
        warnDev(
          "layout",
          `pile-capped:${String(size.rows)}:${String(leftover)}`,
          `Pile: every weighted child hit its max; ${String(leftover)} of ${String(size.rows)} rows left blank`,
        );
      }
    } else {
      for (const i of weighted) {
        const d = baseOf(children[i]?.dim ?? dim.fixed());
        measure(i, verticalSubSize(size, d, { maxCol, rows: 0 }));
      }
    }

    this.widenMaxChildren(heights, widths, subSizes);
    return { heights, subSizes };
  }

  /** Max children render at the widest non-max sibling's width. */
  private widenMaxChildren(
    heights: readonly number[],
    widths: readonly number[],
    subSizes: RenderSize[],
  ): void {
    const children = this.children;
    let anyMax = false;
    let widest = -1;
    for (let i = 0; i < children.length; i++) {
      if (children[i]?.dim.kind === "max") anyMax = true;
      else widest = Math.max(widest, widths[i] ?? 0);
    }
    if (!anyMax) return;
    if (widest === -1) {
      throwCode("LOOM_ALL_CHILDREN_MAX", "Pile: all children are max, no reference width");
    }
    for (let i = 0; i < children.length; i++) {
      if (children[i]?.dim.kind !== "max") continue;
      subSizes[i] = boxSize(widest, heights[i] ?? 0);
    }
  }

  render(size: RenderSize, focus: FocusSelector): Canvas {
    const { heights, subSizes } = this.layout(size, focus);
    const out = Canvas.empty();
    const limit = size.kind === "box" ? size.rows : Number.POSITIVE_INFINITY;
    for (let i = 0; i < this.children.length; i++) {
      if (out.rows >= limit) break;
      const child = this.children[i];
      const sub = subSizes[i];
      if (child === undefined || sub === undefined) continue;
      const c = child.widget.render(sub, this.childFocus(focus, i));
      const h = heights[i] ?? 0;
      if (c.rows > h) c.truncate(0, c.rows - h);
      else c.appendBlankLines(h - c.rows);
      out.appendBelow(c);
    }
    return out.ensureSize(size);
  }

  computeSize(size: RenderSize, focus: FocusSelector): RenderBox {
    const { heights, subSizes } = this.layout(size, focus);
    let cols = 0;
    let rows = 0;
    for (let i = 0; i < this.children.length; i++) {
      const child = this.children[i];
      const sub = subSizes[i];
      if (child === undefined || sub === undefined) continue;
      rows += heights[i] ?? 0;
      cols = Math.max(
        cols,
        sub.kind === "fixed" ? child.widget.computeSize(sub, this.childFocus(focus, i)).cols : sub.cols,
      );
    }
    if (size.kind !== "fixed") cols = size.cols;
    if (size.kind === "box") rows = Math.min(rows, size.rows);
    return renderBox(cols, rows);
  }

  /** First row of child `index`. */
  rowOffset(index: number, heights: readonly number[]): number {
    let y = 0;
    for (let i = 0; i < index; i++) y += heights[i] ?? 0;
    return y;
  }

  /** Index of the child covering row `y`, or -1. */
  childAtRow(y: number, heights: readonly number[]): number {
    let start = 0;
    for (let i = 0; i < heights.length; i++) {
      const h = heights[i] ?? 0;
      if (y >= start && y < start + h) return i;
      start += h;
    }
    return -1;
  }

  handleInput(ev: InputEvent, size: RenderSize, focus: FocusSelector, ctx: InputContext): boolean {
    const focusIndex = this.getFocus();
    if (focusIndex === -1) return false;

    const { heights, subSizes } = this.layout(size, focus);
    const wheel = ev.kind === "mouse" ? wheelDirection(ev) : null;
    let forChild = false;
    let clicked = false;

    if (wheel === "up" || wheel === "down") {
      const child = this.children[focusIndex];
      const sub = subSizes[focusIndex];
      if (child !== undefined && sub !== undefined) {
        forChild = child.widget.handleInput(
          translateMouse(ev, 0, -this.rowOffset(focusIndex, heights)),
          sub,
          this.childFocus(focus, focusIndex),
          ctx,
        );
      }
    } else if (ev.kind === "mouse") {
      const hit = this.childAtRow(ev.y, heights);
      const child = this.children[hit];
      const sub = subSizes[hit];
      if (child !== undefined && sub !== undefined) {
        forChild = child.widget.handleInput(
          translateMouse(ev, 0, -this.rowOffset(hit, heights)),
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

    if (ev.kind === "key") {
      switch (navigationIntent(ev, this.keys)) {
        case "up":
          return this.moveFocus(-1);
        case "down":
          return this.moveFocus(1);
        default:
          return false;
      }
    }
    if (wheel === "up") return this.moveFocus(-1);
    if (wheel === "down") return this.moveFocus(1);
    return false;
  }
}
