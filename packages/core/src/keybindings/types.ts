/**
 * packages/core/src/keybindings/types.ts — Key binding type definitions.
 *
 * Why: Containers decide what an unconsumed key means (move focus up,
 * down, left, right) by comparing it against configured key sets. These
 * types are the contract between the string parser and that matching.
 */

/** Modifier flags, decoded from the `mods` bitmask of a key event. */
export type Modifiers = Readonly<{
  shift: boolean;
  ctrl: boolean;
  alt: boolean;
  meta: boolean;
}>;

/** One key: numeric code (keyCodes.ts) plus the exact modifiers required. */
export type ParsedKey = Readonly<{
  key: number;
  mods: Modifiers;
}>;

/** Parsed binding string. Navigation only accepts sequences of length 1. */
export type KeySequence = Readonly<{
  keys: readonly ParsedKey[];
}>;

export type KeyParseError = Readonly<{
  code: "INVALID_KEY" | "EMPTY_SEQUENCE" | "INVALID_MODIFIER";
  detail: string;
}>;

export type ParseKeyResult =
  | Readonly<{ ok: true; value: KeySequence }>
  | Readonly<{ ok: false; error: KeyParseError }>;

/** One entry of a navigation key set: a parsed key or a binding string like "ctrl+n". */
export type KeySpec = ParsedKey | string;

/**
 * Keys that a container treats as directional navigation when no child
 * consumed them.
 */
export type NavigationKeys = Readonly<{
  up: readonly ParsedKey[];
  down: readonly ParsedKey[];
  left: readonly ParsedKey[];
  right: readonly ParsedKey[];
}>;

/** Per-direction overrides accepted by container options. */
export type NavigationKeysInput = Readonly<{
  up?: readonly KeySpec[];
  down?: readonly KeySpec[];
  left?: readonly KeySpec[];
  right?: readonly KeySpec[];
}>;
