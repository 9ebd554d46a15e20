/**
 * packages/core/src/layout/types.ts — Render size primitives.
 *
 * Why: Every render and input call carries the size the caller offers. A
 * widget is either free to pick its own extent (fixed), bound to a width
 * but free in height (flow), or bound in both directions (box). All
 * values are in terminal cells.
 */

/** Size a parent offers to a child for one render or input call. */
export type RenderSize =
  | Readonly<{ kind: "fixed" }>
  | Readonly<{ kind: "flow"; cols: number }>
  | Readonly<{ kind: "box"; cols: number; rows: number }>;

/** Resolved extent of a rendered widget. */
export type RenderBox = Readonly<{ cols: number; rows: number }>;

const FIXED: RenderSize = Object.freeze({ kind: "fixed" });

function cells(n: number): number {
  return Number.isFinite(n) ? Math.max(0, Math.floor(n)) : 0;
}

export function fixedSize(): RenderSize {
  return FIXED;
}

export function flowSize(cols: number): RenderSize {
  return Object.freeze({ kind: "flow", cols: cells(cols) });
}

export function boxSize(cols: number, rows: number): RenderSize {
  return Object.freeze({ kind: "box", cols: cells(cols), rows: cells(rows) });
}

export function renderBox(cols: number, rows: number): RenderBox {
  return Object.freeze({ cols: cells(cols), rows: cells(rows) });
}

/** Columns the size binds, or null when the width is free. */
export function sizeCols(size: RenderSize): number | null {
  return size.kind === "fixed" ? null : size.cols;
}

/** Rows the size binds, or null when the height is free. */
export function sizeRows(size: RenderSize): number | null {
  return size.kind === "box" ? size.rows : null;
}

export function describeSize(size: RenderSize): string {
  switch (size.kind) {
    case "fixed":
      return "fixed";
    case "flow":
      return `flow(${String(size.cols)})`;
    case "box":
      return `box(${String(size.cols)}x${String(size.rows)})`;
  }
}
