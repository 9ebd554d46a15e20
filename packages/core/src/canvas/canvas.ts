/**
 * packages/core/src/canvas/canvas.ts — Mutable grid of styled cells.
 *
 * Why: Containers assemble their output from child renderings. A canvas is
 * created by one render call, appended/padded/trimmed by its parent, and
 * handed upward. It is never shared between renders.
 *
 * Invariants:
 *   - every line has exactly `cols` cells
 *   - a blank cell has `ch === ""` and prints as a space
 *   - the cursor mark, when present, lies inside the grid
 */

import type { RenderSize } from "../layout/types.js";
import { type TextStyle, mergeStyles } from "./style.js";

export type Cell = Readonly<{ ch: string; style?: TextStyle | undefined }>;

export const BLANK_CELL: Cell = Object.freeze({ ch: "" });

/** Position of the terminal cursor, in canvas coordinates. */
export type CursorMark = Readonly<{ x: number; y: number }>;

function blankLine(n: number): Cell[] {
  const out = new Array<Cell>(Math.max(0, n));
  out.fill(BLANK_CELL);
  return out;
}

function clampCount(n: number): number {
  return Number.isFinite(n) ? Math.max(0, Math.floor(n)) : 0;
}

export class Canvas {
  private readonly lines: Cell[][];
  private width: number;
  private cursorMark: CursorMark | null = null;

  private constructor(lines: Cell[][], width: number) {
    this.lines = lines;
    this.width = width;
  }

  static empty(): Canvas {
    return new Canvas([], 0);
  }

  static blank(cols: number, rows: number): Canvas {
    const w = clampCount(cols);
    const h = clampCount(rows);
    const lines: Cell[][] = [];
    for (let y = 0; y < h; y++) lines.push(blankLine(w));
    return new Canvas(lines, w);
  }

  static fill(ch: string, cols: number, rows: number, style?: TextStyle): Canvas {
    const w = clampCount(cols);
    const h = clampCount(rows);
    const cell: Cell = Object.freeze({ ch, style });
    const lines: Cell[][] = [];
    for (let y = 0; y < h; y++) {
      const line = new Array<Cell>(w);
      line.fill(cell);
      lines.push(line);
    }
    return new Canvas(lines, w);
  }

  /** One line per string, one cell per code point, padded to the widest line. */
  static fromLines(text: readonly string[], style?: TextStyle): Canvas {
    let width = 0;
    const lines: Cell[][] = [];
    for (const s of text) {
      const line: Cell[] = [];
      for (const ch of s) line.push({ ch, style });
      if (line.length > width) width = line.length;
      lines.push(line);
    }
    for (const line of lines) {
      while (line.length < width) line.push(BLANK_CELL);
    }
    return new Canvas(lines, width);
  }

  get cols(): number {
    return this.width;
  }

  get rows(): number {
    return this.lines.length;
  }

  get cursor(): CursorMark | null {
    return this.cursorMark;
  }

  setCursor(mark: CursorMark | null): void {
    if (mark === null) {
      this.cursorMark = null;
      return;
    }
    if (mark.x < 0 || mark.y < 0 || mark.x >= this.width || mark.y >= this.lines.length) {
      this.cursorMark = null;
      return;
    }
    this.cursorMark = Object.freeze({ x: mark.x, y: mark.y });
  }

  cellAt(x: number, y: number): Cell | undefined {
    return this.lines[y]?.[x];
  }

  setCell(x: number, y: number, cell: Cell): void {
    const line = this.lines[y];
    if (line === undefined || x < 0 || x >= this.width) return;
    line[x] = cell;
  }

  line(y: number): readonly Cell[] {
    return this.lines[y] ?? [];
  }

  clone(): Canvas {
    const copy = new Canvas(
      this.lines.map((l) => l.slice()),
      this.width,
    );
    copy.cursorMark = this.cursorMark;
    return copy;
  }

  /** Add `n` blank rows at the bottom. */
  appendBlankLines(n: number): this {
    const count = clampCount(n);
    for (let i = 0; i < count; i++) this.lines.push(blankLine(this.width));
    return this;
  }

  /** Add `n` blank columns on the right. */
  extendRight(n: number): this {
    const count = clampCount(n);
    if (count === 0) return this;
    for (const line of this.lines) {
      for (let i = 0; i < count; i++) line.push(BLANK_CELL);
    }
    this.width += count;
    return this;
  }

  /** Add `n` blank columns on the left. */
  extendLeft(n: number): this {
    const count = clampCount(n);
    if (count === 0) return this;
    for (const line of this.lines) line.unshift(...blankLine(count));
    this.width += count;
    if (this.cursorMark !== null) {
      this.cursorMark = Object.freeze({ x: this.cursorMark.x + count, y: this.cursorMark.y });
    }
    return this;
  }

  /**
   * Stack `other` below this canvas. The narrower of the two is widened with
   * blank cells. `other` is copied, not aliased.
   */
  appendBelow(other: Canvas): this {
    if (other.width > this.width) this.extendRight(other.width - this.width);
    const top = this.lines.length;
    for (const line of other.lines) {
      const copy = line.slice();
      while (copy.length < this.width) copy.push(BLANK_CELL);
      this.lines.push(copy);
    }
    if (this.cursorMark === null && other.cursorMark !== null) {
      this.cursorMark = Object.freeze({ x: other.cursorMark.x, y: other.cursorMark.y + top });
    }
    return this;
  }

  /**
   * Place `other` to the right of this canvas. The shorter of the two gets
   * blank rows at the bottom first, so the result is as tall as the taller.
   */
  appendRight(other: Canvas): this {
    const diff = this.lines.length - other.lines.length;
    const right = diff > 0 ? other.clone().appendBlankLines(diff) : other;
    if (diff < 0) this.appendBlankLines(-diff);
    const left = this.width;
    for (let y = 0; y < this.lines.length; y++) {
      const line = this.lines[y];
      const add = right.lines[y];
      if (line === undefined || add === undefined) continue;
      line.push(...add);
    }
    this.width += right.width;
    if (this.cursorMark === null && right.cursorMark !== null) {
      this.cursorMark = Object.freeze({ x: right.cursorMark.x + left, y: right.cursorMark.y });
    }
    return this;
  }

  /** Remove `above` rows from the top and `below` rows from the bottom. */
  truncate(above: number, below: number): this {
    const top = Math.min(clampCount(above), this.lines.length);
    this.lines.splice(0, top);
    const bottom = Math.min(clampCount(below), this.lines.length);
    this.lines.splice(this.lines.length - bottom, bottom);
    if (this.cursorMark !== null) {
      const y = this.cursorMark.y - top;
      this.cursorMark =
        y >= 0 && y < this.lines.length ? Object.freeze({ x: this.cursorMark.x, y }) : null;
    }
    return this;
  }

  /** Keep at most `cols` columns, dropping from the right. */
  trimRight(cols: number): this {
    const keep = clampCount(cols);
    if (keep >= this.width) return this;
    for (const line of this.lines) line.length = keep;
    this.width = keep;
    if (this.cursorMark !== null && this.cursorMark.x >= keep) this.cursorMark = null;
    return this;
  }

  /** Keep at most `cols` columns, dropping from the left. */
  trimLeft(cols: number): this {
    const keep = clampCount(cols);
    if (keep >= this.width) return this;
    const drop = this.width - keep;
    for (const line of this.lines) line.splice(0, drop);
    this.width = keep;
    if (this.cursorMark !== null) {
      const x = this.cursorMark.x - drop;
      this.cursorMark = x >= 0 ? Object.freeze({ x, y: this.cursorMark.y }) : null;
    }
    return this;
  }

  /**
   * Overlay `other` with its top-left corner at (left, top). Blank cells of
   * `other` keep the character underneath but contribute their style.
   * Cells falling outside this canvas are dropped.
   */
  mergeUnder(other: Canvas, left: number, top: number): this {
    for (let y = 0; y < other.lines.length; y++) {
      const dst = this.lines[y + top];
      const src = other.lines[y];
      if (dst === undefined || src === undefined) continue;
      for (let x = 0; x < src.length; x++) {
        const dx = x + left;
        if (dx < 0 || dx >= this.width) continue;
        const cell = src[x];
        const under = dst[dx];
        if (cell === undefined || under === undefined) continue;
        if (cell.ch === "") {
          if (cell.style !== undefined) {
            dst[dx] = { ch: under.ch, style: mergeStyles(under.style, cell.style) };
          }
          continue;
        }
        dst[dx] = cell;
      }
    }
    return this;
  }

  /** Trim or pad so the canvas matches what `size` binds. */
  ensureSize(size: RenderSize): this {
    if (size.kind === "fixed") return this;
    if (this.width > size.cols) this.trimRight(size.cols);
    else this.extendRight(size.cols - this.width);
    if (size.kind === "box") {
      if (this.lines.length > size.rows) this.truncate(0, this.lines.length - size.rows);
      else this.appendBlankLines(size.rows - this.lines.length);
    }
    return this;
  }

  toString(): string {
    return this.lines.map((line) => line.map((c) => (c.ch === "" ? " " : c.ch)).join("")).join("\n");
  }
}
