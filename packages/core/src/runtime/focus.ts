/**
 * packages/core/src/runtime/focus.ts — Focus selectors and selectable search.
 *
 * Why: A container tracks one focused child by index. Rendering needs to
 * tell each child whether it is on the focused branch; navigation needs to
 * find the next child that can take focus, in a direction, optionally
 * wrapping. Both are pure functions over the child list.
 *
 * Focus rules:
 *   - `focus` is true only along the single focused path from the root
 *   - `selected` marks the child a container would focus, even when the
 *     container itself is not focused
 *   - non-selectable children are skipped by every search
 */

/** What a parent tells a child about focus for one render or input call. */
export type FocusSelector = Readonly<{
  focus: boolean;
  selected: boolean;
}>;

export const FOCUSED: FocusSelector = Object.freeze({ focus: true, selected: true });
export const NOT_FOCUSED: FocusSelector = Object.freeze({ focus: false, selected: false });
export const SELECTED_NOT_FOCUSED: FocusSelector = Object.freeze({ focus: false, selected: true });

/** Narrow `sel` to a child: focused only if `sel` was and `cond` holds. */
export function selectIf(sel: FocusSelector, cond: boolean): FocusSelector {
  const focus = sel.focus && cond;
  if (focus) return FOCUSED;
  return cond ? SELECTED_NOT_FOCUSED : NOT_FOCUSED;
}

export type SelectableLike = Readonly<{ selectable(): boolean }>;

/**
 * Index of the next selectable item stepping from `from` by `dir`, or null.
 *
 * - `from = -1` with `dir <= 0` starts the search from the end
 * - at either edge the search wraps when `wrap` is set, otherwise stops
 * - a full lap ends back at `from`, which is returned only if selectable
 */
export function findNextSelectable(
  items: readonly SelectableLike[],
  from: number,
  dir: number,
  wrap: boolean,
): number | null {
  const n = items.length;
  if (n === 0 || dir === 0) return null;
  const step = dir > 0 ? 1 : -1;

  let pos = from;
  if (pos === -1 && step < 0) pos = n;
  const start = pos;

  for (;;) {
    pos += step;
    if (pos < 0 || pos >= n) {
      if (!wrap) return null;
      pos = step > 0 ? -1 : n;
      if (pos === start) return null;
      continue;
    }
    if (items[pos]?.selectable() === true) return pos;
    if (pos === start) return null;
  }
}

/**
 * Selectable item nearest to `target`, searching outward. The target is
 * tried first, then the item before it, then the one after, and so on, so
 * the earlier item (left or above) wins a tie. `target` is clamped into
 * range first.
 */
export function nearestSelectable(items: readonly SelectableLike[], target: number): number | null {
  const n = items.length;
  if (n === 0) return null;
  const center = Math.min(Math.max(0, target), n - 1);

  let after = center;
  let before = center - 1;
  while (before >= 0 || after < n) {
    if (after < n && items[after]?.selectable() === true) return after;
    after++;
    if (before >= 0 && items[before]?.selectable() === true) return before;
    before--;
  }
  return null;
}
