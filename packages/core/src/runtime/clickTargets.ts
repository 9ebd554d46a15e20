/**
 * packages/core/src/runtime/clickTargets.ts — Click bookkeeping across press and release.
 *
 * Why: A click moves focus only when the button is released over the same
 * container it was pressed in. That needs state that outlives one input
 * call: which containers saw the press, and which buttons were down before
 * the current event. The application driver owns this; ClickTracker is the
 * implementation tests and simple drivers use.
 */

import {
  type InputEvent,
  MOUSE_BUTTON_LEFT,
  MOUSE_BUTTON_MIDDLE,
  MOUSE_BUTTON_RIGHT,
  MOUSE_KIND_DOWN,
  MOUSE_KIND_UP,
} from "../events.js";

export type MouseState = Readonly<{
  left: boolean;
  middle: boolean;
  right: boolean;
}>;

const NO_BUTTONS: MouseState = Object.freeze({ left: false, middle: false, right: false });

export function anyButtonDown(state: MouseState): boolean {
  return state.left || state.middle || state.right;
}

/** What containers may ask of the driver while handling input. */
export interface InputContext {
  /** Record that `target` saw a press of `button`. */
  setClickTarget(button: number, target: object): void;
  /** True if `target` saw a press of any button still being tracked. */
  isClickTarget(target: object): boolean;
  /** Buttons that were down before the event being handled. */
  lastMouseState(): MouseState;
}

function withButtons(state: MouseState, bits: number, down: boolean): MouseState {
  return Object.freeze({
    left: (bits & MOUSE_BUTTON_LEFT) !== 0 ? down : state.left,
    middle: (bits & MOUSE_BUTTON_MIDDLE) !== 0 ? down : state.middle,
    right: (bits & MOUSE_BUTTON_RIGHT) !== 0 ? down : state.right,
  });
}

const ALL_BUTTONS = MOUSE_BUTTON_LEFT | MOUSE_BUTTON_MIDDLE | MOUSE_BUTTON_RIGHT;

export class ClickTracker implements InputContext {
  private readonly targets = new Map<number, object[]>();
  private current: MouseState = NO_BUTTONS;
  private last: MouseState = NO_BUTTONS;

  setClickTarget(button: number, target: object): void {
    const list = this.targets.get(button);
    if (list === undefined) {
      this.targets.set(button, [target]);
      return;
    }
    if (!list.includes(target)) list.push(target);
  }

  isClickTarget(target: object): boolean {
    for (const list of this.targets.values()) {
      if (list.includes(target)) return true;
    }
    return false;
  }

  lastMouseState(): MouseState {
    return this.last;
  }

  mouseState(): MouseState {
    return this.current;
  }

  /** Update button state before `ev` is dispatched into the tree. */
  beginEvent(ev: InputEvent): void {
    if (ev.kind !== "mouse") return;
    this.last = this.current;
    if (ev.mouseKind === MOUSE_KIND_DOWN) {
      this.current = withButtons(this.current, ev.buttons, true);
    } else if (ev.mouseKind === MOUSE_KIND_UP) {
      this.current = withButtons(this.current, ev.buttons === 0 ? ALL_BUTTONS : ev.buttons, false);
    }
  }

  /** Forget click targets for buttons released by `ev`, after dispatch. */
  endEvent(ev: InputEvent): void {
    if (ev.kind !== "mouse" || ev.mouseKind !== MOUSE_KIND_UP) return;
    const released = ev.buttons === 0 ? ALL_BUTTONS : ev.buttons;
    for (const button of [...this.targets.keys()]) {
      if ((button & released) !== 0) this.targets.delete(button);
    }
  }

  /** Run one dispatch with state updated around it. */
  dispatch(ev: InputEvent, handle: (ev: InputEvent, ctx: InputContext) => boolean): boolean {
    this.beginEvent(ev);
    try {
      return handle(ev, this);
    } finally {
      this.endEvent(ev);
    }
  }
}
