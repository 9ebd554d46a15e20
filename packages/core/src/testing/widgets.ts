/**
 * packages/core/src/testing/widgets.ts — Probe widgets for container tests.
 */

import { Canvas } from "../canvas/canvas.js";
import type { InputEvent } from "../events.js";
import { type RenderBox, type RenderSize, renderBox } from "../layout/types.js";
import type { InputContext } from "../runtime/clickTargets.js";
import type { FocusSelector } from "../runtime/focus.js";
import type { Widget } from "../widgets/types.js";

export type FocusProbeOptions = Readonly<{
  /** Whether the probe can take focus. Default true. */
  selectable?: boolean;
  /** Whether handleInput reports events as consumed. Default false. */
  consume?: boolean;
}>;

/**
 * One-line widget that renders its label, followed by "*" when it was
 * rendered focused, and records every event offered to it.
 */
export class FocusProbe implements Widget {
  readonly label: string;
  readonly received: InputEvent[] = [];
  readonly sizes: RenderSize[] = [];
  canSelect: boolean;
  consume: boolean;

  constructor(label: string, opts: FocusProbeOptions = {}) {
    this.label = label;
    this.canSelect = opts.selectable ?? true;
    this.consume = opts.consume ?? false;
  }

  private text(focus: FocusSelector): string {
    return focus.focus ? `${this.label}*` : this.label;
  }

  computeSize(size: RenderSize, focus: FocusSelector): RenderBox {
    const natural = Array.from(this.text(focus)).length;
    switch (size.kind) {
      case "fixed":
        return renderBox(natural, 1);
      case "flow":
        return renderBox(size.cols, 1);
      case "box":
        return renderBox(size.cols, size.rows);
    }
  }

  render(size: RenderSize, focus: FocusSelector): Canvas {
    this.sizes.push(size);
    return Canvas.fromLines([this.text(focus)]).ensureSize(size);
  }

  selectable(): boolean {
    return this.canSelect;
  }

  handleInput(ev: InputEvent, _size: RenderSize, _focus: FocusSelector, _ctx: InputContext): boolean {
    this.received.push(ev);
    return this.consume;
  }
}
