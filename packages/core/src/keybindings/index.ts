/**
 * packages/core/src/keybindings/index.ts — Public exports for key parsing and navigation keys.
 */

export type {
  KeyParseError,
  KeySequence,
  KeySpec,
  Modifiers,
  NavigationKeys,
  NavigationKeysInput,
  ParsedKey,
  ParseKeyResult,
} from "./types.js";

export {
  KEY_BACKSPACE,
  KEY_DELETE,
  KEY_DOWN,
  KEY_END,
  KEY_ENTER,
  KEY_ESCAPE,
  KEY_F1,
  KEY_HOME,
  KEY_INSERT,
  KEY_LEFT,
  KEY_NAME_TO_CODE,
  KEY_PAGE_DOWN,
  KEY_PAGE_UP,
  KEY_RIGHT,
  KEY_SPACE,
  KEY_TAB,
  KEY_UP,
  charToKeyCode,
} from "./keyCodes.js";

export { keyToString, keysEqual, matchesKey, modsFromBits, parseKeySequence } from "./parser.js";

export {
  ARROW_KEYS,
  DEFAULT_NAVIGATION_KEYS,
  EMACS_KEYS,
  VI_KEYS,
  keyInSet,
  mergeNavigationKeys,
  navigationIntent,
  parseSingleKey,
  resolveNavigationKeys,
  type NavigationIntent,
} from "./navigation.js";
