/**
 * packages/core/src/layout/subSize.ts — Map a child's dimension to the size it renders at.
 *
 * Why: Once a container has resolved a child's extent along its primary
 * axis, the child still has to be told what kind of size it is getting.
 * A Units child inside a box-sized Columns becomes a box; the same child
 * inside a fixed Columns becomes a flow of its width. These tables are the
 * single source for that mapping so measuring and rendering agree.
 */

import { throwCode } from "../errors.js";
import type { BaseDimension } from "./dimension.js";
import { describeDimension } from "./dimension.js";
import { type RenderSize, boxSize, describeSize, fixedSize, flowSize } from "./types.js";

/**
 * Size for a child of a horizontal container.
 *
 * @param cols resolved width of the child's column
 */
export function horizontalSubSize(size: RenderSize, d: BaseDimension, cols: number): RenderSize {
  switch (size.kind) {
    case "fixed":
      switch (d.kind) {
        case "fixed":
        case "weight":
          return fixedSize();
        case "box":
          return boxSize(cols, d.rows);
        case "flowWith":
        case "units":
          return flowSize(cols);
        case "flow":
          return throwCode(
            "LOOM_INVALID_DIMENSION",
            `flow child cannot be placed in a horizontal container rendered ${describeSize(size)}`,
          );
        case "ratio":
        case "relative":
          return throwCode(
            "LOOM_SIZE_REQUIRED",
            `${describeDimension(d)} needs a container width but got ${describeSize(size)}`,
          );
      }
    case "box":
      switch (d.kind) {
        case "fixed":
          return fixedSize();
        case "flow":
          return flowSize(cols);
        case "box":
          return boxSize(cols, d.rows);
        default:
          return boxSize(cols, size.rows);
      }
    case "flow":
      switch (d.kind) {
        case "fixed":
          return fixedSize();
        case "box":
          return boxSize(cols, d.rows);
        default:
          return flowSize(cols);
      }
  }
}

export type VerticalContext = Readonly<{
  /** Widest fixed-width sibling, or -1 when none has been measured. */
  maxCol: number;
  /** Rows resolved for ratio, relative and weight children. */
  rows: number;
}>;

/** Size for a child of a vertical container. */
export function verticalSubSize(size: RenderSize, d: BaseDimension, ctx: VerticalContext): RenderSize {
  switch (size.kind) {
    case "fixed":
      switch (d.kind) {
        case "fixed":
        case "weight":
          return fixedSize();
        case "box":
          return boxSize(d.cols, d.rows);
        case "flowWith":
          return flowSize(d.cols);
        case "flow":
          if (ctx.maxCol < 0) {
            return throwCode(
              "LOOM_INVALID_DIMENSION",
              "flow child in a fixed vertical container needs a fixed-width sibling to wrap to",
            );
          }
          return flowSize(ctx.maxCol);
        case "units":
          return ctx.maxCol >= 0 ? boxSize(ctx.maxCol, d.units) : fixedSize();
        case "ratio":
        case "relative":
          return throwCode(
            "LOOM_SIZE_REQUIRED",
            `${describeDimension(d)} needs a container height but got ${describeSize(size)}`,
          );
      }
    case "box":
      switch (d.kind) {
        case "fixed":
          return fixedSize();
        case "flow":
          return flowSize(size.cols);
        case "flowWith":
          return flowSize(Math.min(d.cols, size.cols));
        case "box":
          return boxSize(Math.min(d.cols, size.cols), d.rows);
        case "units":
          return boxSize(size.cols, d.units);
        case "ratio":
        case "relative":
        case "weight":
          return boxSize(size.cols, ctx.rows);
      }
    case "flow":
      switch (d.kind) {
        case "fixed":
          return fixedSize();
        case "flow":
        case "weight":
          return flowSize(size.cols);
        case "flowWith":
          return flowSize(Math.min(d.cols, size.cols));
        case "box":
          return boxSize(Math.min(d.cols, size.cols), d.rows);
        case "units":
          return boxSize(size.cols, d.units);
        case "ratio":
        case "relative":
          return throwCode(
            "LOOM_SIZE_REQUIRED",
            `${describeDimension(d)} needs a container height but got ${describeSize(size)}`,
          );
      }
  }
}
