/**
 * packages/core/src/keybindings/navigation.ts — Directional key sets for containers.
 *
 * Why: Which keys move focus between siblings is configuration, passed to
 * each container when it is built. The named tables below are plain
 * frozen values; nothing here is mutable global state.
 */

import type { KeyEvent } from "../events.js";
import { warnDev } from "../runtime/devWarnings.js";
import { matchesKey, parseKeySequence } from "./parser.js";
import type { KeySpec, NavigationKeys, NavigationKeysInput, ParsedKey } from "./types.js";

export type NavigationIntent = keyof NavigationKeys;

const DIRECTIONS: readonly NavigationIntent[] = Object.freeze(["up", "down", "left", "right"]);

/** Parse a single-key binding string; chords and invalid strings yield null. */
export function parseSingleKey(spec: string): ParsedKey | null {
  const parsed = parseKeySequence(spec);
  if (!parsed.ok || parsed.value.keys.length !== 1) return null;
  return parsed.value.keys[0] ?? null;
}

function table(specs: Readonly<Record<NavigationIntent, readonly string[]>>): NavigationKeys {
  const out: Record<NavigationIntent, readonly ParsedKey[]> = { up: [], down: [], left: [], right: [] };
  for (const dir of DIRECTIONS) {
    const keys: ParsedKey[] = [];
    for (const spec of specs[dir]) {
      const key = parseSingleKey(spec);
      if (key !== null) keys.push(key);
    }
    out[dir] = Object.freeze(keys);
  }
  return Object.freeze(out);
}

export const ARROW_KEYS: NavigationKeys = table({
  up: ["up"],
  down: ["down"],
  left: ["left"],
  right: ["right"],
});

export const EMACS_KEYS: NavigationKeys = table({
  up: ["ctrl+p"],
  down: ["ctrl+n"],
  left: ["ctrl+b"],
  right: ["ctrl+f"],
});

export const VI_KEYS: NavigationKeys = table({
  up: ["k"],
  down: ["j"],
  left: ["h"],
  right: ["l"],
});

/** Union of several key tables, in order. */
export function mergeNavigationKeys(...tables: readonly NavigationKeys[]): NavigationKeys {
  const out: Record<NavigationIntent, readonly ParsedKey[]> = { up: [], down: [], left: [], right: [] };
  for (const dir of DIRECTIONS) {
    out[dir] = Object.freeze(tables.flatMap((t) => t[dir]));
  }
  return Object.freeze(out);
}

/** Arrows, then Emacs, then vi. */
export const DEFAULT_NAVIGATION_KEYS: NavigationKeys = mergeNavigationKeys(
  ARROW_KEYS,
  EMACS_KEYS,
  VI_KEYS,
);

function resolveSpecs(dir: NavigationIntent, specs: readonly KeySpec[]): readonly ParsedKey[] {
  const keys: ParsedKey[] = [];
  for (const spec of specs) {
    if (typeof spec !== "string") {
      keys.push(spec);
      continue;
    }
    const key = parseSingleKey(spec);
    if (key === null) {
      warnDev("keys", `${dir}:${spec}`, `ignoring ${dir} key binding "${spec}": not a single key`);
      continue;
    }
    keys.push(key);
  }
  return Object.freeze(keys);
}

/**
 * Apply per-direction overrides on top of `base`. A direction that is
 * given replaces the base set for that direction entirely.
 */
export function resolveNavigationKeys(
  input: NavigationKeysInput | undefined,
  base: NavigationKeys = DEFAULT_NAVIGATION_KEYS,
): NavigationKeys {
  if (input === undefined) return base;
  return Object.freeze({
    up: input.up === undefined ? base.up : resolveSpecs("up", input.up),
    down: input.down === undefined ? base.down : resolveSpecs("down", input.down),
    left: input.left === undefined ? base.left : resolveSpecs("left", input.left),
    right: input.right === undefined ? base.right : resolveSpecs("right", input.right),
  });
}

export function keyInSet(ev: KeyEvent, keys: readonly ParsedKey[]): boolean {
  for (const k of keys) if (matchesKey(ev, k)) return true;
  return false;
}

/** First direction whose key set contains the event, checked up, down, left, right. */
export function navigationIntent(ev: KeyEvent, keys: NavigationKeys): NavigationIntent | null {
  for (const dir of DIRECTIONS) {
    if (keyInSet(ev, keys[dir])) return dir;
  }
  return null;
}
