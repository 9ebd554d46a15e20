/**
 * packages/core/src/runtime/observers.ts — Ordered listener list owned by one container.
 *
 * Why: Containers notify interested parties when focus, children or
 * dimensions change. Each container owns its own lists; there is no
 * ambient callback registry. Listeners run synchronously in registration
 * order over a snapshot, so a listener that unsubscribes (or subscribes)
 * during delivery affects only the next emit.
 */

import { LoomError, describeThrown } from "../errors.js";

type ListenerSlot<T> = Readonly<{
  fn: (value: T) => void;
  active: { value: boolean };
}>;

export class ObserverList<T> {
  private slots: ListenerSlot<T>[] = [];
  private readonly label: string;

  constructor(label: string) {
    this.label = label;
  }

  /** Register a listener. Returns an unsubscribe function. */
  add(fn: (value: T) => void): () => void {
    const active = { value: true };
    this.slots.push({ fn, active });
    return () => {
      if (!active.value) return;
      active.value = false;
      this.slots = this.slots.filter((s) => s.active.value);
    };
  }

  get size(): number {
    return this.slots.length;
  }

  /**
   * Deliver `value` to every listener active when the emit started. If a
   * listener throws, the remaining listeners still run and the first error
   * is rethrown as LOOM_LISTENER_THREW.
   */
  emit(value: T): void {
    const snapshot = this.slots.slice();
    let firstError: unknown;
    let failed = false;
    for (const slot of snapshot) {
      if (!slot.active.value) continue;
      try {
        slot.fn(value);
      } catch (e: unknown) {
        if (!failed) {
          failed = true;
          firstError = e;
        }
      }
    }
    if (failed) {
      throw new LoomError(
        "LOOM_LISTENER_THREW",
        `${this.label} listener threw: ${describeThrown(firstError)}`,
      );
    }
  }
}
