import { assert, describe, test } from "@loomtui/testkit";
import { MOD_CTRL, MOD_SHIFT } from "../../events.js";
import * as keyCodes from "../keyCodes.js";
import { keyToString, keysEqual, matchesKey, parseKeySequence } from "../parser.js";

const NO_MODS: { shift: boolean; ctrl: boolean; alt: boolean; meta: boolean } = Object.freeze({
  shift: false,
  ctrl: false,
  alt: false,
  meta: false,
});

function mods(overrides: Partial<typeof NO_MODS>) {
  return Object.freeze({ ...NO_MODS, ...overrides });
}

function expectSingle(input: string, key: number, expectedMods: typeof NO_MODS = NO_MODS): void {
  const result = parseKeySequence(input);
  assert.equal(result.ok, true, `expected "${input}" to parse`);
  if (!result.ok) return;
  assert.deepEqual(result.value.keys, [{ key, mods: expectedMods }]);
}

function expectError(
  input: string,
  expectedCode?: "INVALID_KEY" | "EMPTY_SEQUENCE" | "INVALID_MODIFIER",
): void {
  const result = parseKeySequence(input);
  assert.equal(result.ok, false, `expected "${input}" to be invalid`);
  if (result.ok) return;
  if (expectedCode !== undefined) {
    assert.equal(result.error.code, expectedCode);
  }
}

describe("parseKeySequence", () => {
  describe("modifiers", () => {
    test("parses ctrl+n", () => {
      expectSingle("ctrl+n", 78, mods({ ctrl: true }));
    });

    test("parses ctrl+shift+alt+meta+a", () => {
      expectSingle(
        "ctrl+shift+alt+meta+a",
        65,
        mods({ ctrl: true, shift: true, alt: true, meta: true }),
      );
    });

    test("modifier order does not change the result", () => {
      const a = parseKeySequence("meta+alt+ctrl+shift+z");
      const b = parseKeySequence("shift+ctrl+alt+meta+z");
      assert.equal(a.ok, true);
      assert.equal(b.ok, true);
      if (!a.ok || !b.ok) return;
      assert.deepEqual(a.value, b.value);
    });

    test("meta aliases parse to the same result", () => {
      for (const alias of ["cmd", "command", "win", "super"]) {
        expectSingle(`${alias}+q`, 81, mods({ meta: true }));
      }
    });

    test("control is an alias of ctrl", () => {
      expectSingle("control+c", 67, mods({ ctrl: true }));
    });

    test("upper-case letters fold to the same key", () => {
      expectSingle("ctrl+A", 65, mods({ ctrl: true }));
    });
  });

  describe("named keys", () => {
    const cases: ReadonlyArray<readonly [string, number]> = [
      ["up", keyCodes.KEY_UP],
      ["down", keyCodes.KEY_DOWN],
      ["left", keyCodes.KEY_LEFT],
      ["right", keyCodes.KEY_RIGHT],
      ["esc", keyCodes.KEY_ESCAPE],
      ["return", keyCodes.KEY_ENTER],
      ["pagedown", keyCodes.KEY_PAGE_DOWN],
      ["space", keyCodes.KEY_SPACE],
      ["f1", keyCodes.KEY_F1],
      ["f12", keyCodes.KEY_F1 + 11],
    ];
    for (const [name, code] of cases) {
      test(`parses ${name}`, () => {
        expectSingle(name, code);
      });
    }
  });

  test("splits chords on whitespace", () => {
    const result = parseKeySequence("g  g");
    assert.equal(result.ok, true);
    if (!result.ok) return;
    assert.equal(result.value.keys.length, 2);
    assert.deepEqual(result.value.keys[1], { key: 71, mods: NO_MODS });
  });

  describe("errors", () => {
    test("empty input", () => {
      expectError("   ", "EMPTY_SEQUENCE");
    });

    test("unknown modifier", () => {
      expectError("hyper+a", "INVALID_MODIFIER");
    });

    test("duplicate modifier", () => {
      expectError("ctrl+ctrl+a", "INVALID_MODIFIER");
    });

    test("modifier as the final key", () => {
      expectError("ctrl+shift", "INVALID_KEY");
    });

    test("empty component", () => {
      expectError("ctrl++a", "INVALID_KEY");
    });

    test("unknown key name", () => {
      expectError("banana", "INVALID_KEY");
    });
  });
});

describe("matching and printing", () => {
  test("matchesKey compares code and modifier bits", () => {
    const parsed = parseKeySequence("ctrl+shift+x");
    assert.equal(parsed.ok, true);
    if (!parsed.ok) return;
    const key = parsed.value.keys[0];
    if (key === undefined) return;

    assert.equal(matchesKey({ kind: "key", key: 88, mods: MOD_CTRL | MOD_SHIFT, action: "down" }, key), true);
    assert.equal(matchesKey({ kind: "key", key: 88, mods: MOD_CTRL, action: "down" }, key), false);
    assert.equal(matchesKey({ kind: "key", key: 88, mods: MOD_CTRL | MOD_SHIFT, action: "up" }, key), false);
  });

  test("keysEqual ignores object identity", () => {
    assert.equal(keysEqual({ key: 65, mods: mods({}) }, { key: 65, mods: { ...NO_MODS } }), true);
    assert.equal(keysEqual({ key: 65, mods: mods({}) }, { key: 65, mods: mods({ alt: true }) }), false);
  });

  test("keyToString orders modifiers ctrl, alt, shift, meta", () => {
    assert.equal(keyToString({ key: keyCodes.KEY_DOWN, mods: mods({ shift: true, ctrl: true }) }), "ctrl+shift+down");
    assert.equal(keyToString({ key: 74, mods: NO_MODS }), "j");
  });
});
