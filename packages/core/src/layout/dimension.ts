/**
 * packages/core/src/layout/dimension.ts — Per-child sizing policies.
 *
 * Why: A container does not know what its children are; it only knows how
 * each one wants to be sized along the container's primary axis. The set of
 * policies is closed so containers can switch on `kind` exhaustively.
 *
 *   fixed      child decides its own extent
 *   flow       child wraps to the container's cross extent
 *   flowWith   child wraps to `cols`
 *   box        child is exactly cols x rows
 *   units      exactly `n` cells along the primary axis
 *   weight     share of what is left, proportional to `weight`, capped by `maxUnits`
 *   ratio      `floor(ratio * total + 0.5)` of the container's total
 *   relative   `floor(fraction * available)` of what self-sized siblings left
 *   max        primary extent from `inner`, cross extent from the largest sibling
 */

/** A dimension that is not a Max wrapper. */
export type BaseDimension =
  | Readonly<{ kind: "fixed" }>
  | Readonly<{ kind: "flow" }>
  | Readonly<{ kind: "flowWith"; cols: number }>
  | Readonly<{ kind: "box"; cols: number; rows: number }>
  | Readonly<{ kind: "units"; units: number }>
  | Readonly<{ kind: "weight"; weight: number; maxUnits?: number | undefined }>
  | Readonly<{ kind: "ratio"; ratio: number }>
  | Readonly<{ kind: "relative"; fraction: number }>;

export type Dimension = BaseDimension | Readonly<{ kind: "max"; inner: BaseDimension }>;

export type DimensionKind = Dimension["kind"];

function nonNegInt(n: number): number {
  return Number.isFinite(n) ? Math.max(0, Math.floor(n)) : 0;
}

function nonNegFinite(n: number): number {
  return Number.isFinite(n) && n > 0 ? n : 0;
}

const FIXED: BaseDimension = Object.freeze({ kind: "fixed" });
const FLOW: BaseDimension = Object.freeze({ kind: "flow" });

/** Dimension constructors. */
export const dim = Object.freeze({
  fixed(): BaseDimension {
    return FIXED;
  },
  flow(): BaseDimension {
    return FLOW;
  },
  flowWith(cols: number): BaseDimension {
    return Object.freeze({ kind: "flowWith", cols: nonNegInt(cols) });
  },
  box(cols: number, rows: number): BaseDimension {
    return Object.freeze({ kind: "box", cols: nonNegInt(cols), rows: nonNegInt(rows) });
  },
  units(n: number): BaseDimension {
    return Object.freeze({ kind: "units", units: nonNegInt(n) });
  },
  weight(weight: number, maxUnits?: number): BaseDimension {
    return Object.freeze({
      kind: "weight",
      weight: nonNegFinite(weight),
      maxUnits: maxUnits === undefined ? undefined : nonNegInt(maxUnits),
    });
  },
  ratio(ratio: number): BaseDimension {
    return Object.freeze({ kind: "ratio", ratio: nonNegFinite(ratio) });
  },
  relative(fraction: number): BaseDimension {
    return Object.freeze({ kind: "relative", fraction: nonNegFinite(fraction) });
  },
  max(inner: BaseDimension = FIXED): Dimension {
    return Object.freeze({ kind: "max", inner });
  },
});

/** Strip a Max wrapper. */
export function baseOf(d: Dimension): BaseDimension {
  return d.kind === "max" ? d.inner : d;
}

export function isMax(d: Dimension): boolean {
  return d.kind === "max";
}

/** Count children whose primary-axis extent comes from weighted division. */
export function countWeights(dims: readonly Dimension[]): number {
  let n = 0;
  for (const d of dims) if (baseOf(d).kind === "weight") n++;
  return n;
}

export function describeDimension(d: Dimension): string {
  switch (d.kind) {
    case "fixed":
    case "flow":
      return d.kind;
    case "flowWith":
      return `flowWith(${String(d.cols)})`;
    case "box":
      return `box(${String(d.cols)}x${String(d.rows)})`;
    case "units":
      return `units(${String(d.units)})`;
    case "weight":
      return d.maxUnits === undefined
        ? `weight(${String(d.weight)})`
        : `weight(${String(d.weight)}, max ${String(d.maxUnits)})`;
    case "ratio":
      return `ratio(${String(d.ratio)})`;
    case "relative":
      return `relative(${String(d.fraction)})`;
    case "max":
      return `max(${describeDimension(d.inner)})`;
  }
}
