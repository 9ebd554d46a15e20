import { assert, describe, test } from "@loomtui/testkit";
import type { InputEvent } from "../../events.js";
import { MOD_CTRL, MOUSE_KIND_DOWN, MOUSE_KIND_UP, MOUSE_KIND_WHEEL } from "../../events.js";
import { TestEventBuilder, dispatchAll, keyEvent } from "../events.js";

describe("TestEventBuilder", () => {
  test("builds readable fluent event sequences", () => {
    const events = new TestEventBuilder()
      .pressKey("Enter")
      .pressKey("x", { mods: MOD_CTRL })
      .keyUp("Right")
      .click(10, 5)
      .scroll(1, 2, "down")
      .build();

    assert.equal(events.length, 6);
    assert.deepEqual(events[0], { kind: "key", key: 2, mods: 0, action: "down" });
    assert.deepEqual(events[1], { kind: "key", key: 88, mods: MOD_CTRL, action: "down" });
    assert.deepEqual(events[2], { kind: "key", key: 23, mods: 0, action: "up" });
    assert.deepEqual(events[3], {
      kind: "mouse",
      x: 10,
      y: 5,
      mouseKind: MOUSE_KIND_DOWN,
      mods: 0,
      buttons: 1,
      wheelX: 0,
      wheelY: 0,
    });
    assert.deepEqual(events[4], {
      kind: "mouse",
      x: 10,
      y: 5,
      mouseKind: MOUSE_KIND_UP,
      mods: 0,
      buttons: 0,
      wheelX: 0,
      wheelY: 0,
    });
    assert.deepEqual(events[5], {
      kind: "mouse",
      x: 1,
      y: 2,
      mouseKind: MOUSE_KIND_WHEEL,
      mods: 0,
      buttons: 0,
      wheelX: 0,
      wheelY: 1,
    });
  });

  test("rejects unknown key names", () => {
    assert.throws(() => keyEvent("hyper"), /unsupported key "hyper"/);
    assert.throws(() => keyEvent("  "), /must not be empty/);
  });

  test("dispatchAll tracks the press state across a click", () => {
    const states: boolean[] = [];
    const consumed = dispatchAll(new TestEventBuilder().click(0, 0).build(), (_ev: InputEvent, ctx) => {
      states.push(ctx.lastMouseState().left);
      return true;
    });
    assert.deepEqual(consumed, [true, true]);
    assert.deepEqual(states, [false, true]);
  });
});
