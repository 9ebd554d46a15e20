/**
 * packages/core/src/widgets/selectable.ts — Make any widget focusable.
 */

import type { Canvas } from "../canvas/canvas.js";
import type { InputEvent } from "../events.js";
import type { RenderBox, RenderSize } from "../layout/types.js";
import type { InputContext } from "../runtime/clickTargets.js";
import type { FocusSelector } from "../runtime/focus.js";
import type { PreferredPosition, Widget } from "./types.js";

/** Delegates everything to `inner` but always reports itself selectable. */
export class Selectable implements Widget {
  readonly inner: Widget;

  constructor(inner: Widget) {
    this.inner = inner;
  }

  get preferredPosition(): PreferredPosition | undefined {
    return this.inner.preferredPosition;
  }

  render(size: RenderSize, focus: FocusSelector): Canvas {
    return this.inner.render(size, focus);
  }

  computeSize(size: RenderSize, focus: FocusSelector): RenderBox {
    return this.inner.computeSize(size, focus);
  }

  selectable(): boolean {
    return true;
  }

  handleInput(ev: InputEvent, size: RenderSize, focus: FocusSelector, ctx: InputContext): boolean {
    return this.inner.handleInput(ev, size, focus, ctx);
  }
}
