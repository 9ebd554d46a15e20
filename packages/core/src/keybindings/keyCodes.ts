/**
 * packages/core/src/keybindings/keyCodes.ts — Numeric key codes and name tables.
 *
 * Named keys occupy the low range; printable characters use their ASCII
 * code, with letters normalized to upper case (A-Z = 65-90).
 */

import type { Modifiers } from "./types.js";

export const KEY_ESCAPE = 1;
export const KEY_ENTER = 2;
export const KEY_TAB = 3;
export const KEY_BACKSPACE = 4;
export const KEY_INSERT = 10;
export const KEY_DELETE = 11;
export const KEY_HOME = 12;
export const KEY_END = 13;
export const KEY_PAGE_UP = 14;
export const KEY_PAGE_DOWN = 15;
export const KEY_UP = 20;
export const KEY_DOWN = 21;
export const KEY_LEFT = 22;
export const KEY_RIGHT = 23;
export const KEY_SPACE = 32;

/** F1 is 100, F12 is 111. */
export const KEY_F1 = 100;

export const EMPTY_MODS: Modifiers = Object.freeze({
  shift: false,
  ctrl: false,
  alt: false,
  meta: false,
});

export const MODIFIER_NAMES: ReadonlySet<string> = new Set([
  "shift",
  "ctrl",
  "control",
  "alt",
  "meta",
  "cmd",
  "command",
  "win",
  "super",
]);

function buildNameTable(): ReadonlyMap<string, number> {
  const table = new Map<string, number>([
    ["escape", KEY_ESCAPE],
    ["esc", KEY_ESCAPE],
    ["enter", KEY_ENTER],
    ["return", KEY_ENTER],
    ["tab", KEY_TAB],
    ["backspace", KEY_BACKSPACE],
    ["insert", KEY_INSERT],
    ["delete", KEY_DELETE],
    ["home", KEY_HOME],
    ["end", KEY_END],
    ["pageup", KEY_PAGE_UP],
    ["pagedown", KEY_PAGE_DOWN],
    ["up", KEY_UP],
    ["down", KEY_DOWN],
    ["left", KEY_LEFT],
    ["right", KEY_RIGHT],
    ["space", KEY_SPACE],
  ]);
  for (let i = 1; i <= 12; i++) table.set(`f${String(i)}`, KEY_F1 + i - 1);
  return table;
}

export const KEY_NAME_TO_CODE: ReadonlyMap<string, number> = buildNameTable();

/**
 * Key code for a single printable character, or null.
 * Lower-case letters map to their upper-case code.
 */
export function charToKeyCode(ch: string): number | null {
  if (ch.length !== 1) return null;
  const code = ch.charCodeAt(0);
  if (code >= 97 && code <= 122) return code - 32;
  if (code >= 33 && code <= 126) return code;
  return null;
}
