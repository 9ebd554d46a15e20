/**
 * packages/core/src/events.ts — Input events routed through the widget tree.
 *
 * Why: Containers hit-test mouse events by coordinate and translate them
 * into each child's local space, and interpret unconsumed key events as
 * navigation. Both are plain readonly records so translation is a copy
 * with new coordinates, never a mutation.
 *
 * Mouse kinds: 1 = move, 2 = drag, 3 = down, 4 = up, 5 = wheel.
 * Wheel deltas: wheelY -1 up / +1 down, wheelX -1 left / +1 right.
 */

export type KeyAction = "down" | "up" | "repeat";

export type MouseKind = 1 | 2 | 3 | 4 | 5;

export const MOUSE_KIND_MOVE: MouseKind = 1;
export const MOUSE_KIND_DRAG: MouseKind = 2;
export const MOUSE_KIND_DOWN: MouseKind = 3;
export const MOUSE_KIND_UP: MouseKind = 4;
export const MOUSE_KIND_WHEEL: MouseKind = 5;

/** Button bits carried in `MouseEvent.buttons`. */
export const MOUSE_BUTTON_LEFT = 1 << 0;
export const MOUSE_BUTTON_MIDDLE = 1 << 1;
export const MOUSE_BUTTON_RIGHT = 1 << 2;

/** Modifier bits carried in `mods`. */
export const MOD_SHIFT = 1 << 0;
export const MOD_CTRL = 1 << 1;
export const MOD_ALT = 1 << 2;
export const MOD_META = 1 << 3;

export type KeyEvent = Readonly<{
  kind: "key";
  /** Key code; letters are upper-case ASCII, named keys per keyCodes.ts. */
  key: number;
  mods: number;
  action: KeyAction;
}>;

export type MouseEvent = Readonly<{
  kind: "mouse";
  x: number;
  y: number;
  mouseKind: MouseKind;
  mods: number;
  buttons: number;
  wheelX: number;
  wheelY: number;
}>;

export type InputEvent = KeyEvent | MouseEvent;

export type WheelDirection = "up" | "down" | "left" | "right";

/** Shift a mouse event into a child's coordinate space; key events pass through. */
export function translateMouse(ev: InputEvent, dx: number, dy: number): InputEvent {
  if (ev.kind !== "mouse" || (dx === 0 && dy === 0)) return ev;
  return { ...ev, x: ev.x + dx, y: ev.y + dy };
}

export function isWheel(ev: InputEvent): ev is MouseEvent {
  return ev.kind === "mouse" && ev.mouseKind === MOUSE_KIND_WHEEL;
}

export function wheelDirection(ev: MouseEvent): WheelDirection | null {
  if (ev.mouseKind !== MOUSE_KIND_WHEEL) return null;
  if (ev.wheelY < 0) return "up";
  if (ev.wheelY > 0) return "down";
  if (ev.wheelX < 0) return "left";
  if (ev.wheelX > 0) return "right";
  return null;
}

/** True for a button press (mouse down with at least one button). */
export function isButtonPress(ev: MouseEvent): boolean {
  return ev.mouseKind === MOUSE_KIND_DOWN && ev.buttons !== 0;
}

/** True for a button release. */
export function isButtonRelease(ev: MouseEvent): boolean {
  return ev.mouseKind === MOUSE_KIND_UP;
}
