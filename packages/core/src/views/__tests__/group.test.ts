import { assert, describe, test } from "@tvcore/testkit";
import { CM_COMMAND_SET_CHANGED, CM_OK } from "../../commands/commands.js";
import {
  MB_LEFT,
  NOTHING,
  broadcastEvent,
  commandEvent,
  keyEvent,
  mouseEvent,
  slotOf,
} from "../../events/event.js";
import { rect } from "../../geometry/rect.js";
import { KB_SHIFT_TAB, KB_TAB } from "../../input/keyCodes.js";
import { Color, attr } from "../../terminal/palette.js";
import { Renderer } from "../../terminal/renderer.js";
import { ProbeView } from "../../testing/probeView.js";
import { Group, NO_FOCUS } from "../group.js";
import { SF_FOCUSED, hasState } from "../view.js";

function focusable(x: number): ProbeView {
  return new ProbeView(rect(x, 0, x + 2, 1), { focusable: true });
}

function focusedCount(views: readonly ProbeView[]): number {
  return views.filter((v) => hasState(v, SF_FOCUSED)).length;
}

function nullSink(): { write: (chunk: string) => void } {
  return { write: () => {} };
}

describe("Group insertion", () => {
  test("converts child bounds to absolute coordinates", () => {
    const g = new Group(rect(5, 2, 25, 12));
    const child = new ProbeView(rect(1, 1, 4, 2));
    assert.equal(g.add(child), 0);
    assert.deepEqual(child.bounds(), rect(6, 3, 9, 4));
  });

  test("moving the group moves its children by the same delta", () => {
    const g = new Group(rect(5, 2, 25, 12));
    const child = new ProbeView(rect(1, 1, 4, 2));
    g.add(child);
    g.setBounds(rect(6, 4, 26, 14));
    assert.deepEqual(child.bounds(), rect(7, 5, 10, 6));
  });

  test("remove keeps the focus index on the same child", () => {
    const g = new Group(rect(0, 0, 10, 1));
    const a = focusable(0);
    const b = focusable(2);
    const c = focusable(4);
    g.add(a);
    g.add(b);
    g.add(c);
    g.setFocusTo(2);
    assert.equal(g.remove(a), true);
    assert.equal(g.focusedIndex(), 1);
    assert.equal(g.focusedChild(), c);
    g.remove(c);
    assert.equal(g.focusedIndex(), NO_FOCUS);
    assert.equal(hasState(c, SF_FOCUSED), false);
  });
});

describe("Group focus traversal", () => {
  test("Tab cycles through focusable children and wraps", () => {
    const g = new Group(rect(0, 0, 10, 1));
    const views = [focusable(0), focusable(2), focusable(4)];
    for (const v of views) g.add(v);
    g.setInitialFocus();
    assert.equal(g.focusedIndex(), 0);

    g.handleEvent(slotOf(keyEvent(KB_TAB)));
    g.handleEvent(slotOf(keyEvent(KB_TAB)));
    assert.equal(g.focusedIndex(), 2);
    assert.equal(focusedCount(views), 1);
    assert.equal(hasState(views[2] ?? g, SF_FOCUSED), true);

    g.handleEvent(slotOf(keyEvent(KB_TAB)));
    assert.equal(g.focusedIndex(), 0);
    assert.equal(focusedCount(views), 1);
  });

  test("Shift-Tab moves backwards and wraps", () => {
    const g = new Group(rect(0, 0, 10, 1));
    for (const v of [focusable(0), focusable(2), focusable(4)]) g.add(v);
    g.setInitialFocus();
    g.handleEvent(slotOf(keyEvent(KB_SHIFT_TAB)));
    assert.equal(g.focusedIndex(), 2);
  });

  test("skips children that cannot take focus", () => {
    const g = new Group(rect(0, 0, 10, 1));
    g.add(focusable(0));
    g.add(new ProbeView(rect(2, 0, 4, 1)));
    g.add(focusable(4));
    g.setInitialFocus();
    g.handleEvent(slotOf(keyEvent(KB_TAB)));
    assert.equal(g.focusedIndex(), 2);
  });

  test("Tab with no focusable children is a consumed no-op", () => {
    const g = new Group(rect(0, 0, 10, 1));
    g.add(new ProbeView(rect(0, 0, 2, 1)));
    g.add(new ProbeView(rect(2, 0, 4, 1)));
    const slot = slotOf(keyEvent(KB_TAB));
    g.handleEvent(slot);
    assert.equal(g.focusedIndex(), NO_FOCUS);
    assert.equal(slot.event.kind, "nothing");
  });

  test("Tab with a single focusable child keeps its focus", () => {
    const g = new Group(rect(0, 0, 10, 1));
    const only = focusable(0);
    g.add(only);
    g.add(new ProbeView(rect(2, 0, 4, 1)));
    g.setInitialFocus();
    g.handleEvent(slotOf(keyEvent(KB_TAB)));
    assert.equal(g.focusedIndex(), 0);
    assert.equal(hasState(only, SF_FOCUSED), true);
  });

  test("Tab from no focus selects the first focusable child", () => {
    const g = new Group(rect(0, 0, 10, 1));
    g.add(new ProbeView(rect(0, 0, 2, 1)));
    g.add(focusable(2));
    g.handleEvent(slotOf(keyEvent(KB_TAB)));
    assert.equal(g.focusedIndex(), 1);
  });
});

describe("Group event routing", () => {
  test("keyboard and command events reach only the focused child", () => {
    const g = new Group(rect(0, 0, 10, 1));
    const a = focusable(0);
    const b = focusable(2);
    g.add(a);
    g.add(b);
    g.setFocusTo(1);
    g.handleEvent(slotOf(keyEvent(0x61)));
    g.handleEvent(slotOf(commandEvent(CM_OK)));
    assert.deepEqual(a.received, []);
    assert.deepEqual(b.kinds(), ["keyboard", "command"]);
  });

  test("broadcasts reach every descendant with a private slot", () => {
    const outer = new Group(rect(0, 0, 20, 5));
    const swallower = new ProbeView(rect(0, 0, 2, 1), { respond: () => NOTHING });
    const inner = new Group(rect(5, 0, 15, 5));
    const nested = new ProbeView(rect(0, 0, 2, 1));
    const last = new ProbeView(rect(18, 0, 20, 1));
    inner.add(nested);
    outer.add(swallower);
    outer.add(inner);
    outer.add(last);

    const slot = slotOf(broadcastEvent(CM_COMMAND_SET_CHANGED));
    outer.handleEvent(slot);
    for (const v of [swallower, nested, last]) {
      assert.deepEqual(v.received, [broadcastEvent(CM_COMMAND_SET_CHANGED)]);
    }
    assert.equal(slot.event.kind, "broadcast");
  });

  test("mouse-down focuses the child under the pointer", () => {
    const g = new Group(rect(0, 0, 10, 1));
    const a = focusable(0);
    const b = focusable(2);
    g.add(a);
    g.add(b);
    g.setFocusTo(0);
    g.handleEvent(slotOf(mouseEvent("mouseDown", { x: 3, y: 0 }, MB_LEFT)));
    assert.equal(g.focusedIndex(), 1);
    assert.deepEqual(b.kinds(), ["mouseDown"]);
    assert.deepEqual(a.received, []);
  });

  test("mouse events hitting no child fall through to the focused child", () => {
    const g = new Group(rect(0, 0, 10, 1));
    const a = focusable(0);
    g.add(a);
    g.setFocusTo(0);
    g.handleEvent(slotOf(mouseEvent("mouseUp", { x: 8, y: 0 }, 0)));
    assert.deepEqual(a.kinds(), ["mouseUp"]);
  });

  test("clicking a label focuses the linked sibling", () => {
    const g = new Group(rect(0, 0, 20, 1));
    const label = new ProbeView(rect(0, 0, 6, 1), { labelFor: 1 });
    const input = new ProbeView(rect(7, 0, 15, 1), { focusable: true });
    g.add(label);
    g.add(input);
    const slot = slotOf(mouseEvent("mouseDown", { x: 2, y: 0 }, MB_LEFT));
    g.handleEvent(slot);
    assert.equal(g.focusedIndex(), 1);
    assert.equal(slot.event.kind, "nothing");
  });

  test("a label link out of range is inert", () => {
    const g = new Group(rect(0, 0, 20, 1));
    g.add(new ProbeView(rect(0, 0, 6, 1), { labelFor: 9 }));
    g.handleEvent(slotOf(mouseEvent("mouseDown", { x: 2, y: 0 }, MB_LEFT)));
    assert.equal(g.focusedIndex(), NO_FOCUS);
  });
});

describe("Group drawing", () => {
  test("children are clipped to the group's bounds", () => {
    const r = new Renderer(6, 4, nullSink());
    const g = new Group(rect(1, 1, 4, 3));
    const big = new ProbeView(rect(-1, -1, 5, 4), { fill: { ch: "#", attr: attr(Color.White, Color.Red) } });
    const far = new ProbeView(rect(10, 10, 12, 12));
    g.add(big);
    g.add(far);
    g.draw(r);
    assert.deepEqual(
      [0, 1, 2, 3].map((y) => r.rowText(y)),
      ["      ", " ###  ", " ###  ", "      "],
    );
    assert.equal(big.draws, 1);
    assert.equal(far.draws, 0);
    assert.equal(r.clipDepth(), 0);
  });

  test("fills its background before drawing children", () => {
    const r = new Renderer(4, 2, nullSink());
    const bg = attr(Color.Black, Color.Cyan);
    const g = new Group(rect(0, 0, 3, 1), { background: bg, fillChar: "." });
    g.draw(r);
    assert.equal(r.rowText(0), "... ");
    assert.deepEqual(r.cellAt({ x: 0, y: 0 }), { ch: ".", attr: bg });
  });

  test("updateCursor hides the cursor unless the focused child shows it", () => {
    const r = new Renderer(4, 2, nullSink());
    r.showCursor({ x: 1, y: 1 });
    const g = new Group(rect(0, 0, 4, 2));
    g.add(focusable(0));
    g.setInitialFocus();
    g.updateCursor(r);
    assert.equal(r.cursor(), null);
  });
});
