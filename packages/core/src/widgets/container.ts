/**
 * packages/core/src/widgets/container.ts — Shared state of multi-child containers.
 *
 * Why: Columns, Pile and Grid all own an ordered list of children, a focus
 * index, a remembered preferred position, a wrap flag and navigation keys,
 * and all notify observers when focus or children change. That state
 * machine lives in FocusContainer. LinearContainer adds the per-child
 * dimensions Columns and Pile negotiate with.
 *
 * State:
 *   - focusIndex ∈ {-1} ∪ [0, n); -1 when there is nothing to focus
 *   - preferred  ∈ {-1} ∪ [0, n); -1 when unset; advisory only
 *
 * Transitions:
 *   - construction: explicit start index clamped into range, else the first
 *     selectable child
 *   - setFocus(i): clamp, clear preferred, notify iff the index changed
 *   - setChildren: replace, re-clamp focus (or -1 if nothing selectable),
 *     notify children observers
 *   - moveFocus(dir): next selectable in `dir`, carrying the outgoing
 *     child's preferred position to the incoming child
 */

import { type LoomResult, assertPosition, invalidPosition } from "../errors.js";
import type { NavigationKeys, NavigationKeysInput } from "../keybindings/types.js";
import { resolveNavigationKeys } from "../keybindings/navigation.js";
import type { Dimension } from "../layout/dimension.js";
import { type FocusSelector, findNextSelectable, nearestSelectable, selectIf } from "../runtime/focus.js";
import { ObserverList } from "../runtime/observers.js";
import {
  type Child,
  type PreferredPosition,
  type Widget,
  applyPreferredPosition,
  preferredPositionOf,
} from "./types.js";
import type { Canvas } from "../canvas/canvas.js";
import type { InputEvent } from "../events.js";
import type { RenderBox, RenderSize } from "../layout/types.js";
import type { InputContext } from "../runtime/clickTargets.js";

/** A child given either with its dimension or bare (takes the container default). */
export type ChildInput = Child | Widget;

export type ContainerOptions = Readonly<{
  /** Wrap around at either end when navigating. Default false. */
  wrap?: boolean;
  /** Never mark children as selected; only focus is passed down. Default false. */
  doNotSetSelected?: boolean;
  /** Override navigation keys per direction. */
  keys?: NavigationKeysInput;
}>;

/** Anything a container holds per child; at least the widget. */
export type Slot = Readonly<{ widget: Widget }>;

export type FocusChange = Readonly<{ previous: number; current: number }>;
export type DimensionChange = Readonly<{ index: number; previous: Dimension; current: Dimension }>;

export function toChild(input: ChildInput, defaultDim: Dimension): Child {
  if ("widget" in input) return input;
  return Object.freeze({ widget: input, dim: defaultDim });
}

function clampIndex(i: number, n: number): number {
  if (n === 0) return -1;
  return Math.min(Math.max(0, i), n - 1);
}

export abstract class FocusContainer<C extends Slot> implements Widget {
  protected children: readonly C[];
  private focusIndex: number;
  private preferred = -1;
  protected readonly wrapFocus: boolean;
  protected readonly doNotSetSelected: boolean;
  protected readonly keys: NavigationKeys;

  private readonly focusListeners = new ObserverList<FocusChange>("focus");
  private readonly childrenListeners = new ObserverList<readonly C[]>("children");

  readonly preferredPosition: PreferredPosition = {
    get: () => this.getPreferredPosition(),
    set: (position: number) => this.setPreferredPosition(position),
  };

  protected constructor(children: readonly C[], start: number | undefined, opts: ContainerOptions) {
    this.children = Object.freeze(children.slice());
    this.wrapFocus = opts.wrap ?? false;
    this.doNotSetSelected = opts.doNotSetSelected ?? false;
    this.keys = resolveNavigationKeys(opts.keys);

    if (start !== undefined && start >= 0) {
      assertPosition(start, "start index");
      this.focusIndex = clampIndex(start, this.children.length);
    } else {
      this.focusIndex = findNextSelectable(this.widgets(), -1, 1, this.wrapFocus) ?? -1;
    }
  }

  abstract render(size: RenderSize, focus: FocusSelector): Canvas;
  abstract computeSize(size: RenderSize, focus: FocusSelector): RenderBox;
  abstract handleInput(
    ev: InputEvent,
    size: RenderSize,
    focus: FocusSelector,
    ctx: InputContext,
  ): boolean;

  // ---------------------------------------------------------------------------
  // Children
  // ---------------------------------------------------------------------------

  getChildren(): readonly C[] {
    return this.children;
  }

  get length(): number {
    return this.children.length;
  }

  protected widgets(): readonly Widget[] {
    return this.children.map((c) => c.widget);
  }

  childAt(index: number): LoomResult<C> {
    const child = Number.isInteger(index) ? this.children[index] : undefined;
    if (child === undefined) {
      return invalidPosition(`child index ${String(index)} out of range [0, ${String(this.children.length)})`);
    }
    return { ok: true, value: child };
  }

  /** Replace all children. Focus is kept where possible. */
  protected replaceChildren(children: readonly C[]): void {
    const old = this.focusIndex;
    this.children = Object.freeze(children.slice());
    const anySelectable = this.children.some((c) => c.widget.selectable());
    this.applyFocus(anySelectable ? clampIndex(old, this.children.length) : -1);
    this.childrenListeners.emit(this.children);
  }

  // ---------------------------------------------------------------------------
  // Focus
  // ---------------------------------------------------------------------------

  getFocus(): number {
    return this.focusIndex;
  }

  /** Focus child `index`, clamped into range. Clears the preferred position. */
  setFocus(index: number): void {
    assertPosition(index, "setFocus");
    this.applyFocus(clampIndex(index, this.children.length));
  }

  private applyFocus(next: number): void {
    const previous = this.focusIndex;
    this.preferred = -1;
    if (next === previous) return;
    this.focusIndex = next;
    this.focusListeners.emit({ previous, current: next });
  }

  wrap(): boolean {
    return this.wrapFocus;
  }

  selectable(): boolean {
    for (const c of this.children) if (c.widget.selectable()) return true;
    return false;
  }

  findNextSelectable(dir: number, wrap: boolean): number | null {
    return findNextSelectable(this.widgets(), this.focusIndex, dir, wrap);
  }

  getPreferredPosition(): number | null {
    if (this.preferred !== -1) return this.preferred;
    return this.focusIndex === -1 ? null : this.focusIndex;
  }

  /**
   * Focus the selectable child nearest to `position` (the one before it
   * wins a tie) and remember `position`, clamped into range.
   */
  setPreferredPosition(position: number): void {
    assertPosition(position, "setPreferredPosition");
    const target = clampIndex(position, this.children.length);
    if (target === -1) return;
    const nearest = nearestSelectable(this.widgets(), target);
    if (nearest !== null) this.setFocus(nearest);
    this.preferred = target;
  }

  onFocusChanged(fn: (change: FocusChange) => void): () => void {
    return this.focusListeners.add(fn);
  }

  onChildrenChanged(fn: (children: readonly C[]) => void): () => void {
    return this.childrenListeners.add(fn);
  }

  // ---------------------------------------------------------------------------
  // Helpers for subclasses
  // ---------------------------------------------------------------------------

  protected selectChild(focus: FocusSelector): boolean {
    return !this.doNotSetSelected && focus.selected;
  }

  /** Focus selector handed to child `index`. */
  protected childFocus(focus: FocusSelector, index: number): FocusSelector {
    return selectIf(focus, this.selectChild(focus) && index === this.focusIndex);
  }

  /**
   * Move to the next selectable child in `dir`, carrying the outgoing
   * child's preferred position over. Returns false if there is none.
   */
  protected moveFocus(dir: 1 | -1): boolean {
    const next = this.findNextSelectable(dir, this.wrapFocus);
    if (next === null) return false;
    const outgoing = this.children[this.focusIndex]?.widget;
    const carried = outgoing === undefined ? null : preferredPositionOf(outgoing);
    this.setFocus(next);
    const incoming = this.children[next]?.widget;
    if (incoming !== undefined) applyPreferredPosition(incoming, carried);
    return true;
  }
}

/**
 * Container whose children carry a Dimension along the primary axis
 * (Columns, Pile).
 */
export abstract class LinearContainer extends FocusContainer<Child> {
  private readonly defaultDim: Dimension;
  private readonly dimensionListeners = new ObserverList<DimensionChange>("dimensions");

  protected constructor(
    children: readonly ChildInput[],
    defaultDim: Dimension,
    start: number | undefined,
    opts: ContainerOptions,
  ) {
    super(
      children.map((c) => toChild(c, defaultDim)),
      start,
      opts,
    );
    this.defaultDim = defaultDim;
  }

  /** Replace all children; bare widgets take the container's default dimension. */
  setChildren(children: readonly ChildInput[]): void {
    this.replaceChildren(children.map((c) => toChild(c, this.defaultDim)));
  }

  dimensions(): readonly Dimension[] {
    return this.children.map((c) => c.dim);
  }

  /** Change one child's dimension. Returns the previous dimension. */
  setDimension(index: number, d: Dimension): LoomResult<Dimension> {
    const child = Number.isInteger(index) ? this.children[index] : undefined;
    if (child === undefined) {
      return invalidPosition(`child index ${String(index)} out of range [0, ${String(this.children.length)})`);
    }
    const next = this.children.slice();
    next[index] = Object.freeze({ widget: child.widget, dim: d });
    this.children = Object.freeze(next);
    this.dimensionListeners.emit({ index, previous: child.dim, current: d });
    return { ok: true, value: child.dim };
  }

  onDimensionsChanged(fn: (change: DimensionChange) => void): () => void {
    return this.dimensionListeners.add(fn);
  }
}
