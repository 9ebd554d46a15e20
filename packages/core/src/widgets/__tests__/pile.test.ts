import { assert, describe, test } from "@loomtui/testkit";
import { LoomError } from "../../errors.js";
import type { InputEvent } from "../../events.js";
import { dim } from "../../layout/dimension.js";
import { boxSize, fixedSize, flowSize } from "../../layout/types.js";
import { ClickTracker } from "../../runtime/clickTargets.js";
import { FOCUSED } from "../../runtime/focus.js";
import { keyEvent, mouseDownEvent, mouseUpEvent, wheelEvent } from "../../testing/events.js";
import { FocusProbe } from "../../testing/widgets.js";
import { Columns } from "../columns.js";
import { Fill } from "../fill.js";
import { Pile } from "../pile.js";
import { Text } from "../text.js";

function throwsCode(fn: () => unknown, code: string): void {
  assert.throws(fn, (e: unknown) => e instanceof LoomError && e.code === code);
}

function column(ch: string, rows: number): string {
  return Array.from({ length: rows }, () => ch).join("\n");
}

describe("Pile layout", () => {
  test("units children in a box", () => {
    const pile = new Pile([
      { widget: new Fill("x"), dim: dim.units(2) },
      { widget: new Fill("y"), dim: dim.units(2) },
    ]);
    assert.equal(pile.render(boxSize(3, 4), FOCUSED).toString(), "xxx\nxxx\nyyy\nyyy");
  });

  test("units children in a flow", () => {
    const pile = new Pile([
      { widget: new Fill("x"), dim: dim.units(1) },
      { widget: new Fill("y"), dim: dim.units(2) },
    ]);
    assert.equal(pile.render(flowSize(3), FOCUSED).toString(), "xxx\nyyy\nyyy");
  });

  test("ratios round half up and the box is padded", () => {
    const pile = new Pile([
      { widget: new Fill("x"), dim: dim.ratio(0.25) },
      { widget: new Fill("y"), dim: dim.ratio(0.5) },
    ]);
    assert.equal(pile.render(boxSize(3, 3), FOCUSED).toString(), "xxx\nyyy\nyyy");
    assert.equal(pile.render(boxSize(3, 4), FOCUSED).toString(), "xxx\nyyy\nyyy\n   ");
  });

  test("bare widgets flow at the pile's width", () => {
    const pile = new Pile([{ widget: new Fill("x"), dim: dim.units(2) }, new Text("y")]);
    assert.equal(pile.render(flowSize(3), FOCUSED).toString(), "xxx\nxxx\ny  ");
  });

  test("a single weight in a flow behaves like flow", () => {
    const pile = new Pile([
      { widget: new Fill("x"), dim: dim.units(2) },
      { widget: new Text("y"), dim: dim.weight(1) },
    ]);
    assert.equal(pile.render(flowSize(3), FOCUSED).toString(), "xxx\nxxx\ny  ");
  });

  test("weights share the rows of a box", () => {
    const pile = new Pile([
      { widget: new Fill("x"), dim: dim.weight(1) },
      { widget: new Fill("y"), dim: dim.weight(1) },
    ]);
    assert.equal(pile.render(boxSize(1, 12), FOCUSED).toString(), `${column("x", 6)}\n${column("y", 6)}`);
  });

  test("three equal weights and a capped one", () => {
    const even = new Pile([
      { widget: new Fill("x"), dim: dim.weight(1) },
      { widget: new Fill("y"), dim: dim.weight(1) },
      { widget: new Fill("z"), dim: dim.weight(1) },
    ]);
    assert.deepEqual(even.layout(boxSize(1, 12), FOCUSED).heights, [4, 4, 4]);

    const capped = new Pile([
      { widget: new Fill("x"), dim: dim.weight(1) },
      { widget: new Fill("y"), dim: dim.weight(1) },
      { widget: new Fill("z"), dim: dim.weight(1, 2) },
    ]);
    assert.equal(
      capped.render(boxSize(1, 12), FOCUSED).toString(),
      `${column("x", 5)}\n${column("y", 5)}\n${column("z", 2)}`,
    );
  });

  test("a weight between fixed children takes the remaining rows", () => {
    const pile = new Pile([
      { widget: new Text("foo"), dim: dim.fixed() },
      { widget: new Text("bar"), dim: dim.weight(1) },
      { widget: new Text("baz"), dim: dim.fixed() },
    ]);
    assert.equal(pile.render(boxSize(3, 5), FOCUSED).toString(), "foo\nbar\n   \n   \nbaz");
  });

  test("relative takes a fraction of the rows left", () => {
    const pile = new Pile([
      { widget: new Fill("x"), dim: dim.units(2) },
      { widget: new Fill("y"), dim: dim.relative(0.5) },
    ]);
    assert.deepEqual(pile.layout(boxSize(1, 8), FOCUSED).heights, [2, 3]);
  });

  test("flow children wrap to the widest fixed sibling when unconstrained", () => {
    const pile = new Pile([
      { widget: new Text("abcd"), dim: dim.fixed() },
      { widget: new Text("xxxxxx"), dim: dim.flow() },
    ]);
    assert.equal(pile.render(fixedSize(), FOCUSED).toString(), "abcd\nxxxx\nxx  ");
    assert.deepEqual(pile.computeSize(fixedSize(), FOCUSED), { cols: 4, rows: 3 });
  });

  test("max children widen to the widest sibling", () => {
    const pile = new Pile([
      { widget: new Text("abc"), dim: dim.fixed() },
      { widget: new Fill("-"), dim: dim.max(dim.units(1)) },
    ]);
    assert.equal(pile.render(fixedSize(), FOCUSED).toString(), "abc\n---");
  });

  test("max children keep the widest sibling's width inside a wider pile", () => {
    const pile = new Pile([
      { widget: new Text("abc"), dim: dim.fixed() },
      { widget: new Fill("-"), dim: dim.max(dim.units(1)) },
    ]);
    assert.equal(pile.render(flowSize(5), FOCUSED).toString(), "abc  \n---  ");
    assert.equal(pile.render(boxSize(5, 3), FOCUSED).toString(), "abc  \n---  \n     ");
  });

  test("a ratio child is rendered at the rows left, not its full share", () => {
    const inner = new Pile([
      { widget: new Text("a"), dim: dim.weight(1) },
      { widget: new Text("b"), dim: dim.weight(1) },
    ]);
    const pile = new Pile([
      { widget: new Fill("x"), dim: dim.units(3) },
      { widget: inner, dim: dim.ratio(0.8) },
    ]);
    const { heights, subSizes } = pile.layout(boxSize(1, 5), FOCUSED);
    assert.deepEqual(heights, [3, 2]);
    assert.deepEqual(subSizes[1], { kind: "box", cols: 1, rows: 2 });
    assert.equal(pile.render(boxSize(1, 5), FOCUSED).toString(), "x\nx\nx\na\nb");
  });

  test("heights never add up to more than the box", () => {
    const pile = new Pile([
      { widget: new Text("1\n2\n3"), dim: dim.fixed() },
      { widget: new Fill("y"), dim: dim.units(2) },
      { widget: new Fill("z"), dim: dim.units(2) },
    ]);
    assert.deepEqual(pile.layout(boxSize(1, 4), FOCUSED).heights, [3, 1, 0]);
    assert.equal(pile.render(boxSize(1, 4), FOCUSED).toString(), "1\n2\n3\ny");
  });

  test("output is cut at the box height", () => {
    const pile = new Pile([
      { widget: new Fill("x"), dim: dim.units(2) },
      { widget: new Fill("y"), dim: dim.units(2) },
      { widget: new Fill("z"), dim: dim.units(2) },
    ]);
    assert.equal(pile.render(boxSize(2, 3), FOCUSED).toString(), "xx\nxx\nyy");
    assert.deepEqual(pile.computeSize(boxSize(2, 3), FOCUSED), { cols: 2, rows: 3 });
  });
});

describe("Pile errors", () => {
  test("two weights without a height", () => {
    const pile = new Pile([
      { widget: new Fill("x"), dim: dim.weight(1) },
      { widget: new Fill("y"), dim: dim.weight(1) },
    ]);
    throwsCode(() => pile.render(flowSize(3), FOCUSED), "LOOM_MULTIPLE_WEIGHTS");
  });

  test("ratio needs a height", () => {
    const pile = new Pile([{ widget: new Fill("x"), dim: dim.ratio(0.5) }]);
    throwsCode(() => pile.render(flowSize(3), FOCUSED), "LOOM_SIZE_REQUIRED");
  });

  test("all children max", () => {
    const pile = new Pile([{ widget: new Fill("x"), dim: dim.max(dim.units(1)) }]);
    throwsCode(() => pile.render(flowSize(3), FOCUSED), "LOOM_ALL_CHILDREN_MAX");
  });
});

describe("Pile focus and input", () => {
  function send(pile: Pile, ev: InputEvent): boolean {
    return pile.handleInput(ev, fixedSize(), FOCUSED, new ClickTracker());
  }

  test("the wheel moves focus and stops at the ends", () => {
    const pile = Pile.fixed([new FocusProbe("a"), new FocusProbe("b"), new FocusProbe("c")]);
    let changes = 0;
    pile.onFocusChanged(() => {
      changes++;
    });
    assert.equal(send(pile, wheelEvent(0, 0, "down")), true);
    assert.equal(pile.getFocus(), 1);
    assert.equal(send(pile, wheelEvent(0, 0, "down")), true);
    assert.equal(pile.getFocus(), 2);
    assert.equal(send(pile, wheelEvent(0, 0, "down")), false);
    assert.equal(pile.getFocus(), 2);
    assert.equal(send(pile, wheelEvent(0, 0, "up")), true);
    assert.equal(pile.getFocus(), 1);
    assert.equal(changes, 3);
  });

  test("the focused child sees the wheel first", () => {
    const first = new FocusProbe("a", { consume: true });
    const pile = Pile.fixed([first, new FocusProbe("b")]);
    assert.equal(send(pile, wheelEvent(0, 5, "down")), true);
    assert.equal(pile.getFocus(), 0);
    assert.equal(first.received.length, 1);
  });

  test("up and down keys navigate", () => {
    const pile = Pile.fixed([new FocusProbe("a"), new Text("-"), new FocusProbe("c")]);
    assert.equal(send(pile, keyEvent("down")), true);
    assert.equal(pile.getFocus(), 2);
    assert.equal(send(pile, keyEvent("k")), true);
    assert.equal(pile.getFocus(), 0);
    assert.equal(send(pile, keyEvent("right")), false);
  });

  test("click focuses the row under the pointer", () => {
    const second = new FocusProbe("b");
    const pile = Pile.fixed([new FocusProbe("a"), second]);
    const tracker = new ClickTracker();
    const handle = (ev: InputEvent): boolean =>
      tracker.dispatch(ev, (e, ctx) => pile.handleInput(e, fixedSize(), FOCUSED, ctx));
    handle(mouseDownEvent(0, 1));
    assert.equal(handle(mouseUpEvent(0, 1)), true);
    assert.equal(pile.getFocus(), 1);
    assert.deepEqual(
      second.received.map((e) => (e.kind === "mouse" ? e.y : -1)),
      [0, 0],
    );
  });

  test("moving between rows carries the column over", () => {
    const row = (): Columns =>
      Columns.fixed([new FocusProbe("a"), new FocusProbe("b"), new FocusProbe("c")]);
    const top = row();
    const bottom = row();
    const pile = new Pile([top, bottom]);
    top.setFocus(2);
    const consumed = pile.handleInput(keyEvent("down"), flowSize(12), FOCUSED, new ClickTracker());
    assert.equal(consumed, true);
    assert.equal(pile.getFocus(), 1);
    assert.equal(bottom.getFocus(), 2);
    assert.equal(bottom.getPreferredPosition(), 2);
  });
});
