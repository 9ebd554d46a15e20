import { assert, describe, test } from "../index.js";
import { createRng } from "../rng.js";

describe("createRng", () => {
  test("same seed replays the same sequence", () => {
    const a = createRng(42);
    const b = createRng(42);
    for (let i = 0; i < 16; i++) assert.equal(a.u32(), b.u32());
  });

  test("zero seed still produces non-zero values", () => {
    const rng = createRng(0);
    assert.notEqual(rng.u32(), 0);
  });

  test("int stays within bounds", () => {
    const rng = createRng(7);
    for (let i = 0; i < 200; i++) {
      const v = rng.int(3, 9);
      assert.ok(v >= 3 && v <= 9, `out of range: ${String(v)}`);
    }
  });
});
