/**
 * packages/core/src/keybindings/parser.ts — Parse key binding strings.
 *
 * Why: Navigation keys are configured with readable strings ("ctrl+n",
 * "j", "pagedown") rather than numeric codes. This turns them into
 * ParsedKey values that can be compared against key events.
 *
 * Format:
 *   - Single key: "a", "escape", "f1"
 *   - With modifiers: "ctrl+n", "shift+tab", "ctrl+alt+x"
 *   - Chords (space-separated): "g g"
 */

import { MOD_ALT, MOD_CTRL, MOD_META, MOD_SHIFT } from "../events.js";
import type { KeyEvent } from "../events.js";
import { KEY_NAME_TO_CODE, MODIFIER_NAMES, charToKeyCode } from "./keyCodes.js";
import type { KeyParseError, KeySequence, Modifiers, ParseKeyResult, ParsedKey } from "./types.js";

type ModifierName = keyof Modifiers;

const MODIFIER_ALIASES: ReadonlyMap<string, ModifierName> = new Map<string, ModifierName>([
  ["shift", "shift"],
  ["ctrl", "ctrl"],
  ["control", "ctrl"],
  ["alt", "alt"],
  ["meta", "meta"],
  ["cmd", "meta"],
  ["command", "meta"],
  ["win", "meta"],
  ["super", "meta"],
]);

function fail(code: KeyParseError["code"], detail: string): { ok: false; error: KeyParseError } {
  return { ok: false, error: { code, detail } };
}

/** Parse one "mod+mod+key" part. */
function parseKeyPart(
  part: string,
): { ok: true; value: ParsedKey } | { ok: false; error: KeyParseError } {
  if (part.length === 0) return fail("EMPTY_SEQUENCE", "empty key part");

  const pieces = part.toLowerCase().split("+");
  const mods: { [K in ModifierName]: boolean } = {
    shift: false,
    ctrl: false,
    alt: false,
    meta: false,
  };

  for (let i = 0; i < pieces.length - 1; i++) {
    const piece = pieces[i] ?? "";
    if (piece.length === 0) return fail("INVALID_KEY", `empty component in "${part}"`);
    const modifier = MODIFIER_ALIASES.get(piece);
    if (modifier === undefined) {
      return fail("INVALID_MODIFIER", `"${piece}" is not a valid modifier in "${part}"`);
    }
    if (mods[modifier]) return fail("INVALID_MODIFIER", `duplicate modifier "${piece}" in "${part}"`);
    mods[modifier] = true;
  }

  const keyName = pieces[pieces.length - 1] ?? "";
  if (keyName.length === 0) return fail("INVALID_KEY", `empty component in "${part}"`);
  if (MODIFIER_NAMES.has(keyName)) {
    return fail("INVALID_KEY", `modifier "${keyName}" cannot be the final key in "${part}"`);
  }

  const keyCode = KEY_NAME_TO_CODE.get(keyName) ?? charToKeyCode(keyName);
  if (keyCode === null) return fail("INVALID_KEY", `unknown key "${keyName}" in "${part}"`);

  return { ok: true, value: Object.freeze({ key: keyCode, mods: Object.freeze(mods) }) };
}

/**
 * Parse a keybinding string into a KeySequence.
 *
 * @example
 * ```ts
 * parseKeySequence("ctrl+n") // single key with modifier
 * parseKeySequence("g g")    // two-key chord
 * ```
 */
export function parseKeySequence(input: string): ParseKeyResult {
  const trimmed = input.trim();
  if (trimmed.length === 0) return fail("EMPTY_SEQUENCE", "keybinding string is empty");

  const keys: ParsedKey[] = [];
  for (const part of trimmed.split(/\s+/)) {
    const result = parseKeyPart(part);
    if (!result.ok) return result;
    keys.push(result.value);
  }

  const value: KeySequence = Object.freeze({ keys: Object.freeze(keys) });
  return { ok: true, value };
}

export function keysEqual(a: ParsedKey, b: ParsedKey): boolean {
  return (
    a.key === b.key &&
    a.mods.shift === b.mods.shift &&
    a.mods.ctrl === b.mods.ctrl &&
    a.mods.alt === b.mods.alt &&
    a.mods.meta === b.mods.meta
  );
}

/** Decode the modifier bitmask of an event. */
export function modsFromBits(bits: number): Modifiers {
  return {
    shift: (bits & MOD_SHIFT) !== 0,
    ctrl: (bits & MOD_CTRL) !== 0,
    alt: (bits & MOD_ALT) !== 0,
    meta: (bits & MOD_META) !== 0,
  };
}

/** True when a key-down/repeat event is exactly `key` (code and modifiers). */
export function matchesKey(ev: KeyEvent, key: ParsedKey): boolean {
  if (ev.action === "up") return false;
  return keysEqual({ key: ev.key, mods: modsFromBits(ev.mods) }, key);
}

/** Readable form, e.g. "ctrl+n" or "down". */
export function keyToString(key: ParsedKey): string {
  const parts: string[] = [];
  if (key.mods.ctrl) parts.push("ctrl");
  if (key.mods.alt) parts.push("alt");
  if (key.mods.shift) parts.push("shift");
  if (key.mods.meta) parts.push("meta");

  let keyName: string | undefined;
  for (const [name, code] of KEY_NAME_TO_CODE) {
    if (code === key.key) {
      keyName = name;
      break;
    }
  }
  if (keyName === undefined) {
    keyName =
      key.key >= 33 && key.key <= 126
        ? String.fromCharCode(key.key).toLowerCase()
        : `key${String(key.key)}`;
  }

  parts.push(keyName);
  return parts.join("+");
}
