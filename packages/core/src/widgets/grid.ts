/**
 * packages/core/src/widgets/grid.ts — Fixed-width items laid out in rows.
 *
 * Why: Item pickers and button panels. Every item gets the same width; as
 * many items as fit go in each row, rows are separated by `vSep` blank rows
 * and each row is aligned inside the grid's width. The layout is rebuilt as
 * a Pile of padded Columns on every call, so it always follows the width
 * the grid was offered.
 *
 * Geometry for width W, item width w and separator h:
 *   perRow   = max(0, floor((W - h) / (w + h)))
 *   rowWidth = perRow * w + (perRow - 1) * h
 *   item i sits in row floor(i / perRow), column i % perRow
 *
 * Navigation:
 *   - left/right keys step through items in order, crossing rows
 *   - up/down keys and the vertical wheel jump a whole row
 *   - the horizontal wheel moves only within the current row
 */

import { Canvas } from "../canvas/canvas.js";
import { throwCode } from "../errors.js";
import {
  type InputEvent,
  type MouseEvent,
  isButtonPress,
  isButtonRelease,
  translateMouse,
  wheelDirection,
} from "../events.js";
import { navigationIntent } from "../keybindings/navigation.js";
import { dim } from "../layout/dimension.js";
import {
  type RenderBox,
  type RenderSize,
  describeSize,
  flowSize,
  renderBox,
  sizeCols,
} from "../layout/types.js";
import { type InputContext, anyButtonDown } from "../runtime/clickTargets.js";
import { warnDev } from "../runtime/devWarnings.js";
import { type FocusSelector, selectIf } from "../runtime/focus.js";
import { Columns } from "./columns.js";
import { type ContainerOptions, FocusContainer, type Slot } from "./container.js";
import { Fill } from "./fill.js";
import { type HAlign, HPadding } from "./hpadding.js";
import { Pile } from "./pile.js";
import type { Child, Widget } from "./types.js";

export type GridOptions = ContainerOptions &
  Readonly<{
    /** Width of every item. Must be at least 1. */
    itemWidth: number;
    /** Blank columns between items in a row. Default 1. */
    hSep?: number;
    /** Blank rows between rows. Default 0. */
    vSep?: number;
    /** Alignment of each row inside the grid's width. Default "left". */
    align?: HAlign;
    /** Initial focus. Defaults to the first selectable item. */
    startIndex?: number;
  }>;

/** Row/column position of an item. */
export type GridCell = Readonly<{ row: number; col: number }>;

/** The generated layout for one width. */
export type GridLayout = Readonly<{
  pile: Pile;
  rows: readonly HPadding[];
  perRow: number;
}>;

type ItemHit = Readonly<{ index: number; dx: number; dy: number }>;

function nonNegativeInt(value: number | undefined, fallback: number, what: string): number {
  const v = value ?? fallback;
  if (!Number.isInteger(v) || v < 0) {
    throwCode("LOOM_INVALID_DIMENSION", `Grid ${what} must be a non-negative integer, got ${String(v)}`);
  }
  return v;
}

/** Items per row for width `cols`. */
export function itemsPerRow(cols: number, itemWidth: number, hSep: number): number {
  return Math.max(0, Math.floor((cols - hSep) / (itemWidth + hSep)));
}

/** Position of item `index` in a grid with `perRow` items per row. */
export function gridCell(index: number, perRow: number): GridCell {
  return { row: Math.floor(index / perRow), col: index % perRow };
}

/** Inverse of gridCell. */
export function gridIndex(cell: GridCell, perRow: number): number {
  return cell.row * perRow + cell.col;
}

export class Grid extends FocusContainer<Slot> {
  readonly itemWidth: number;
  readonly hSep: number;
  readonly vSep: number;
  readonly align: HAlign;

  constructor(items: readonly Widget[], opts: GridOptions) {
    super(
      items.map((widget) => ({ widget })),
      opts.startIndex,
      opts,
    );
    if (!Number.isInteger(opts.itemWidth) || opts.itemWidth < 1) {
      throwCode("LOOM_INVALID_DIMENSION", `Grid itemWidth must be a positive integer, got ${String(opts.itemWidth)}`);
    }
    this.itemWidth = opts.itemWidth;
    this.hSep = nonNegativeInt(opts.hSep, 1, "hSep");
    this.vSep = nonNegativeInt(opts.vSep, 0, "vSep");
    this.align = opts.align ?? "left";
  }

  items(): readonly Widget[] {
    return this.widgets();
  }

  setItems(items: readonly Widget[]): void {
    this.replaceChildren(items.map((widget) => ({ widget })));
  }

  private widthOf(size: RenderSize): number {
    const cols = sizeCols(size);
    if (cols === null) {
      return throwCode("LOOM_SIZE_REQUIRED", `Grid needs a width but got ${describeSize(size)}`);
    }
    return cols;
  }

  private perRowFor(cols: number): number {
    const perRow = itemsPerRow(cols, this.itemWidth, this.hSep);
    if (perRow === 0) {
      warnDev(
        "grid",
        `grid-too-narrow:${String(cols)}:${String(this.itemWidth)}`,
        `Grid: width ${String(cols)} fits no item of width ${String(this.itemWidth)}; rendering blank`,
      );
    }
    return perRow;
  }

  /**
   * Build the Pile of rows for `size`. Returns null when not a single item
   * fits the width.
   */
  generate(size: RenderSize): GridLayout | null {
    const perRow = this.perRowFor(this.widthOf(size));
    if (perRow === 0) return null;

    const n = this.children.length;
    const focusIndex = this.getFocus();
    const focused = focusIndex === -1 ? null : gridCell(focusIndex, perRow);
    const rowWidth = perRow * this.itemWidth + (perRow - 1) * this.hSep;
    const containerOpts = { doNotSetSelected: this.doNotSetSelected };

    const rows: HPadding[] = [];
    const pileChildren: Child[] = [];
    for (let start = 0, row = 0; start < n; start += perRow, row++) {
      const cells: Child[] = [];
      for (let col = 0; col < perRow; col++) {
        if (col > 0) cells.push({ widget: new Fill(" "), dim: dim.units(this.hSep) });
        const item = this.children[start + col]?.widget ?? new Fill(" ");
        cells.push({ widget: item, dim: dim.units(this.itemWidth) });
      }
      const startColumn = focused !== null && focused.row === row ? 2 * focused.col : undefined;
      const padded = new HPadding(
        new Columns(cells, { ...containerOpts, ...(startColumn !== undefined ? { startColumn } : {}) }),
        this.align,
        dim.units(rowWidth),
      );
      if (row > 0) pileChildren.push({ widget: new Fill(" "), dim: dim.units(this.vSep) });
      rows.push(padded);
      pileChildren.push({ widget: padded, dim: dim.flow() });
    }

    const startRow = focused === null ? undefined : 2 * focused.row;
    const pile = new Pile(pileChildren, { ...containerOpts, ...(startRow !== undefined ? { startRow } : {}) });
    return { pile, rows, perRow };
  }

  render(size: RenderSize, focus: FocusSelector): Canvas {
    const layout = this.generate(size);
    if (layout === null) return Canvas.empty().ensureSize(size);
    return layout.pile.render(size, focus);
  }

  computeSize(size: RenderSize, focus: FocusSelector): RenderBox {
    const layout = this.generate(size);
    if (layout === null) return renderBox(this.widthOf(size), size.kind === "box" ? size.rows : 0);
    return layout.pile.computeSize(size, focus);
  }

  /** Item under (x, y) and its origin, or null for separators and padding. */
  private itemAt(ev: MouseEvent, size: RenderSize, focus: FocusSelector, layout: GridLayout): ItemHit | null {
    const { heights } = layout.pile.layout(size, focus);
    const rowChild = layout.pile.childAtRow(ev.y, heights);
    if (rowChild === -1 || rowChild % 2 === 1) return null;
    const row = rowChild / 2;
    const padding = layout.rows[row];
    if (padding === undefined) return null;

    const { left } = padding.placement(flowSize(this.widthOf(size)), focus);
    const x = ev.x - left;
    const stride = this.itemWidth + this.hSep;
    if (x < 0) return null;
    const col = Math.floor(x / stride);
    if (col >= layout.perRow || x % stride >= this.itemWidth) return null;
    const index = gridIndex({ row, col }, layout.perRow);
    if (index >= this.children.length) return null;
    return { index, dx: left + col * stride, dy: layout.pile.rowOffset(rowChild, heights) };
  }

  /** First selectable item at from + step, from + 2*step, ... within [lo, hi]. */
  private scan(from: number, step: number, lo: number, hi: number): number | null {
    for (let i = from + step; i >= lo && i <= hi; i += step) {
      if (this.children[i]?.widget.selectable() === true) return i;
    }
    return null;
  }

  private moveTo(next: number | null): boolean {
    if (next === null) return false;
    this.setFocus(next);
    return true;
  }

  handleInput(ev: InputEvent, size: RenderSize, focus: FocusSelector, ctx: InputContext): boolean {
    const layout = this.generate(size);
    if (layout === null) return false;
    const f = this.getFocus();
    if (f === -1) return false;

    const itemSize = flowSize(this.itemWidth);
    const itemFocus = selectIf(focus, !this.doNotSetSelected && focus.selected);
    const wheel = ev.kind === "mouse" ? wheelDirection(ev) : null;

    if (ev.kind === "mouse" && wheel === null) {
      const hit = this.itemAt(ev, size, focus, layout);
      if (hit === null) return false;
      const item = this.children[hit.index]?.widget;
      if (item === undefined) return false;
      const forChild = item.handleInput(
        translateMouse(ev, -hit.dx, -hit.dy),
        itemSize,
        hit.index === f ? itemFocus : selectIf(focus, false),
        ctx,
      );
      if (isButtonPress(ev)) {
        ctx.setClickTarget(ev.buttons, this);
      } else if (
        isButtonRelease(ev) &&
        anyButtonDown(ctx.lastMouseState()) &&
        item.selectable() &&
        ctx.isClickTarget(this)
      ) {
        const changed = hit.index !== f;
        this.setFocus(hit.index);
        return forChild || changed;
      }
      return forChild;
    }

    const focusedItem = this.children[f]?.widget;
    if (focus.focus && focusedItem !== undefined && focusedItem.selectable()) {
      if (focusedItem.handleInput(ev, itemSize, itemFocus, ctx)) return true;
    }

    const k = layout.perRow;
    const last = this.children.length - 1;
    if (ev.kind === "key") {
      switch (navigationIntent(ev, this.keys)) {
        case "up":
          return this.moveTo(this.scan(f, -k, 0, last));
        case "down":
          return this.moveTo(this.scan(f, k, 0, last));
        case "left":
          return this.moveTo(this.findNextSelectable(-1, this.wrapFocus));
        case "right":
          return this.moveTo(this.findNextSelectable(1, this.wrapFocus));
        default:
          return false;
      }
    }

    const rowStart = f - (f % k);
    const rowEnd = Math.min(rowStart + k - 1, last);
    switch (wheel) {
      case "up":
        return this.moveTo(this.scan(f, -k, 0, last));
      case "down":
        return this.moveTo(this.scan(f, k, 0, last));
      case "left":
        return this.moveTo(this.scan(f, -1, rowStart, rowEnd));
      case "right":
        return this.moveTo(this.scan(f, 1, rowStart, rowEnd));
      default:
        return false;
    }
  }
}
