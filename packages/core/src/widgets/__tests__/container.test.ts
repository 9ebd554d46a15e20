import { assert, describe, test } from "@loomtui/testkit";
import { LoomError } from "../../errors.js";
import { dim } from "../../layout/dimension.js";
import { FocusProbe } from "../../testing/widgets.js";
import type { FocusChange } from "../container.js";
import { Pile } from "../pile.js";

function probes(pattern: string): FocusProbe[] {
  return Array.from(pattern, (ch, i) => new FocusProbe(String(i), { selectable: ch === "s" }));
}

function throwsCode(fn: () => unknown, code: string): void {
  assert.throws(fn, (e: unknown) => e instanceof LoomError && e.code === code);
}

describe("container focus state", () => {
  test("starts on the first selectable child", () => {
    assert.equal(new Pile(probes(".ss")).getFocus(), 1);
    assert.equal(new Pile(probes("...")).getFocus(), -1);
    assert.equal(new Pile([]).getFocus(), -1);
  });

  test("an explicit start index is clamped", () => {
    assert.equal(new Pile(probes("sss"), { startRow: 9 }).getFocus(), 2);
    assert.equal(new Pile(probes(".ss"), { startRow: -1 }).getFocus(), 1);
    throwsCode(() => new Pile(probes("ss"), { startRow: 0.5 }), "LOOM_INVALID_POSITION");
  });

  test("setFocus clamps and notifies only on change", () => {
    const pile = new Pile(probes("sss"));
    const seen: FocusChange[] = [];
    pile.onFocusChanged((c) => seen.push(c));
    pile.setFocus(10);
    pile.setFocus(2);
    pile.setFocus(-4);
    assert.deepEqual(seen, [
      { previous: 0, current: 2 },
      { previous: 2, current: 0 },
    ]);
    throwsCode(() => pile.setFocus(1.5), "LOOM_INVALID_POSITION");
  });

  test("unsubscribed listeners are not called", () => {
    const pile = new Pile(probes("ss"));
    let calls = 0;
    const off = pile.onFocusChanged(() => calls++);
    pile.setFocus(1);
    off();
    pile.setFocus(0);
    assert.equal(calls, 1);
  });

  test("a throwing listener does not stop the others", () => {
    const pile = new Pile(probes("ss"));
    let reached = false;
    pile.onFocusChanged(() => {
      throw new Error("boom");
    });
    pile.onFocusChanged(() => {
      reached = true;
    });
    throwsCode(() => pile.setFocus(1), "LOOM_LISTENER_THREW");
    assert.equal(reached, true);
    assert.equal(pile.getFocus(), 1);
  });
});

describe("container children", () => {
  test("setChildren keeps focus in range", () => {
    const pile = new Pile(probes("sss"), { startRow: 2 });
    const lengths: number[] = [];
    pile.onChildrenChanged((c) => lengths.push(c.length));
    pile.setChildren(probes("ss"));
    assert.equal(pile.getFocus(), 1);
    assert.deepEqual(lengths, [2]);
  });

  test("setChildren with nothing selectable clears focus", () => {
    const pile = new Pile(probes("ss"), { startRow: 1 });
    const seen: FocusChange[] = [];
    pile.onFocusChanged((c) => seen.push(c));
    pile.setChildren(probes(".."));
    assert.equal(pile.getFocus(), -1);
    assert.deepEqual(seen, [{ previous: 1, current: -1 }]);
  });

  test("bare widgets take the container default dimension", () => {
    const pile = new Pile([new FocusProbe("a"), { widget: new FocusProbe("b"), dim: dim.units(2) }]);
    assert.deepEqual(
      pile.dimensions().map((d) => d.kind),
      ["flow", "units"],
    );
  });

  test("childAt reports out-of-range indexes", () => {
    const items = probes("ss");
    const pile = new Pile(items);
    const hit = pile.childAt(1);
    assert.equal(hit.ok && hit.value.widget === items[1], true);
    const miss = pile.childAt(2);
    assert.equal(miss.ok, false);
    if (!miss.ok) assert.equal(miss.error.code, "LOOM_INVALID_POSITION");
  });

  test("setDimension returns the previous dimension and notifies", () => {
    const pile = new Pile(probes("ss"));
    const changed: number[] = [];
    pile.onDimensionsChanged((c) => changed.push(c.index));
    const res = pile.setDimension(1, dim.units(3));
    assert.equal(res.ok && res.value.kind, "flow");
    assert.deepEqual(pile.dimensions()[1], { kind: "units", units: 3 });
    assert.deepEqual(changed, [1]);

    const bad = pile.setDimension(5, dim.units(1));
    assert.equal(bad.ok, false);
    assert.deepEqual(changed, [1]);
  });
});

describe("preferred position", () => {
  test("focuses the nearest selectable child and remembers the target", () => {
    const pile = new Pile(probes("s..s"));
    pile.setPreferredPosition(1);
    assert.equal(pile.getFocus(), 0);
    assert.equal(pile.getPreferredPosition(), 1);

    pile.setPreferredPosition(2);
    assert.equal(pile.getFocus(), 3);
    assert.equal(pile.getPreferredPosition(), 2);
  });

  test("the earlier neighbour wins a tie", () => {
    const pile = new Pile(probes("s.s"), { startRow: 2 });
    pile.setPreferredPosition(1);
    assert.equal(pile.getFocus(), 0);
    assert.equal(pile.getPreferredPosition(), 1);
  });

  test("setFocus forgets the preferred position", () => {
    const pile = new Pile(probes("s..s"));
    pile.setPreferredPosition(1);
    pile.setFocus(3);
    assert.equal(pile.getPreferredPosition(), 3);
  });

  test("an empty container has no preferred position", () => {
    const pile = new Pile([]);
    pile.setPreferredPosition(4);
    assert.equal(pile.getPreferredPosition(), null);
  });

  test("the preferredPosition handle drives the same state", () => {
    const pile = new Pile(probes("s..s"));
    pile.preferredPosition.set(2);
    assert.equal(pile.getFocus(), 3);
    assert.equal(pile.preferredPosition.get(), 2);
  });
});
