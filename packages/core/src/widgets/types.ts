/**
 * packages/core/src/widgets/types.ts — Widget capability interface.
 *
 * Why: Containers never know what their children are. They render them,
 * measure them, ask whether they can take focus and offer them input,
 * all through this interface.
 *
 * Contract:
 *   - render/computeSize/handleInput complete synchronously
 *   - render returns a fresh canvas the caller owns
 *   - computeSize agrees with the extent render would produce
 *   - handleInput returns true only if the event was consumed
 */

import type { Canvas } from "../canvas/canvas.js";
import type { InputEvent } from "../events.js";
import type { Dimension } from "../layout/dimension.js";
import type { RenderBox, RenderSize } from "../layout/types.js";
import type { InputContext } from "../runtime/clickTargets.js";
import type { FocusSelector } from "../runtime/focus.js";

/**
 * Remembered column or row a widget last occupied, so focus entering from a
 * neighbour can land in the same place.
 */
export interface PreferredPosition {
  /** Preferred index if one was recorded, else the focused index, else null. */
  get(): number | null;
  /** Focus the selectable child nearest to `position` and remember it. */
  set(position: number): void;
}

export interface Widget {
  render(size: RenderSize, focus: FocusSelector): Canvas;
  computeSize(size: RenderSize, focus: FocusSelector): RenderBox;
  selectable(): boolean;
  handleInput(ev: InputEvent, size: RenderSize, focus: FocusSelector, ctx: InputContext): boolean;
  /** Present only on widgets that support preferred-position hand-off. */
  readonly preferredPosition?: PreferredPosition | undefined;
}

/** A child of a container: the widget and how it is sized along the primary axis. */
export type Child = Readonly<{
  widget: Widget;
  dim: Dimension;
}>;

/** Read a widget's preferred position, or null when it has none. */
export function preferredPositionOf(w: Widget): number | null {
  return w.preferredPosition?.get() ?? null;
}

/** Hand a preferred position to a widget that supports it; others ignore it. */
export function applyPreferredPosition(w: Widget, position: number | null): void {
  if (position === null) return;
  w.preferredPosition?.set(position);
}

/** Offer input to `w` only if it can take focus. */
export function inputIfSelectable(
  w: Widget,
  ev: InputEvent,
  size: RenderSize,
  focus: FocusSelector,
  ctx: InputContext,
): boolean {
  if (!w.selectable()) return false;
  return w.handleInput(ev, size, focus, ctx);
}
