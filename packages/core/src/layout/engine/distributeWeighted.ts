/**
 * Divide an integer extent among weighted slots, honoring per-slot caps.
 *
 * - Each pass computes `floor(w / Σw × remaining + 0.5)` over the slots
 *   that are not yet pinned.
 * - A slot whose running total would pass its cap is cut to the cap and
 *   pinned; later passes redivide what is left among the others.
 * - Shares never exceed what is still left.
 * - The loop ends when nothing is left or a pass hands out nothing.
 * - Any leftover goes to the last slot that grew and is not pinned, then
 *   to the other unpinned slots from the end, never past a cap.
 */

export type WeightSlot = Readonly<{ weight: number; maxUnits?: number | undefined }>;

export type WeightedDivision = Readonly<{
  shares: readonly number[];
  /** Cells nobody could take because every growing slot hit its cap. */
  leftover: number;
}>;

/** Slots eligible for the rounding leftover, most preferred first. */
function leftoverOrder(pinned: readonly boolean[], shares: readonly number[], lastGrown: number): number[] {
  const order: number[] = [];
  if (lastGrown >= 0 && !pinned[lastGrown]) order.push(lastGrown);
  for (let i = pinned.length - 1; i >= 0; i--) {
    if (!pinned[i] && i !== lastGrown && (shares[i] ?? 0) > 0) order.push(i);
  }
  for (let i = pinned.length - 1; i >= 0; i--) {
    if (!pinned[i] && i !== lastGrown && (shares[i] ?? 0) === 0) order.push(i);
  }
  return order;
}

export function distributeWeighted(available: number, slots: readonly WeightSlot[]): WeightedDivision {
  const slotCount = slots.length;
  const shares = new Array<number>(slotCount).fill(0);
  const pinned = new Array<boolean>(slotCount).fill(false);

  let left = Number.isFinite(available) ? Math.max(0, Math.floor(available)) : 0;
  if (slotCount === 0) return { shares, leftover: left };

  for (let i = 0; i < slotCount; i++) {
    const s = slots[i];
    if (s === undefined || !(s.weight > 0) || s.maxUnits === 0) pinned[i] = true;
  }

  let lastGrown = -1;
  while (left > 0) {
    let totalWeight = 0;
    for (let i = 0; i < slotCount; i++) {
      if (!pinned[i]) totalWeight += slots[i]?.weight ?? 0;
    }
    if (totalWeight <= 0) break;

    const toDivide = left;
    let grew = false;
    for (let i = 0; i < slotCount; i++) {
      const slot = slots[i];
      if (slot === undefined || pinned[i]) continue;
      const current = shares[i] ?? 0;
      let n = Math.floor((slot.weight / totalWeight) * toDivide + 0.5);
      if (slot.maxUnits !== undefined && current + n >= slot.maxUnits) {
        n = slot.maxUnits - current;
        pinned[i] = true;
      }
      if (n > left) n = left;
      if (n > 0) {
        shares[i] = current + n;
        left -= n;
        grew = true;
        lastGrown = i;
      }
    }
    if (!grew) break;
  }

  for (const i of leftoverOrder(pinned, shares, lastGrown)) {
    if (left === 0) break;
    const current = shares[i] ?? 0;
    const cap = slots[i]?.maxUnits;
    const give = cap === undefined ? left : Math.min(left, Math.max(0, cap - current));
    shares[i] = current + give;
    left -= give;
  }

  return { shares, leftover: left };
}
