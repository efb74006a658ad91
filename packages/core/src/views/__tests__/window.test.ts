import { assert, describe, test } from "@tvcore/testkit";
import { CM_CLOSE } from "../../commands/commands.js";
import { MB_LEFT, commandEvent, keyEvent, mouseEvent, slotOf } from "../../events/event.js";
import { rect } from "../../geometry/rect.js";
import { Color, DEFAULT_ATTR, attr } from "../../terminal/palette.js";
import { Renderer } from "../../terminal/renderer.js";
import { ProbeView } from "../../testing/probeView.js";
import { SF_DRAGGING, SF_SHADOW, hasState } from "../view.js";
import { Window } from "../window.js";

function renderer(): Renderer {
  return new Renderer(30, 14, { write: () => {} });
}

describe("Window", () => {
  test("children are placed relative to the interior", () => {
    const w = new Window(rect(2, 1, 22, 11), "Demo");
    const child = new ProbeView(rect(1, 1, 5, 2));
    w.add(child);
    assert.deepEqual(child.bounds(), rect(4, 3, 8, 4));
    assert.deepEqual(w.clientBounds(), rect(3, 2, 21, 10));
  });

  test("casts a shadow by default", () => {
    const w = new Window(rect(2, 1, 22, 11), "Demo");
    assert.equal(hasState(w, SF_SHADOW), true);
    assert.deepEqual(w.shadowBounds(), rect(2, 1, 23, 12));
    const flat = new Window(rect(2, 1, 22, 11), "Flat", { shadow: false });
    assert.deepEqual(flat.shadowBounds(), rect(2, 1, 22, 11));
  });

  test("draws a double frame with title and close control while focused", () => {
    const r = renderer();
    const w = new Window(rect(2, 1, 22, 11), "Demo");
    w.setFocus(true);
    w.draw(r);
    assert.equal(r.rowText(1), "  ╔═[■]══ Demo ══════╗        ");
    assert.equal(r.rowText(10), "  ╚══════════════════╝        ");
    assert.equal(r.cellAt({ x: 2, y: 5 })?.ch, "║");
  });

  test("draws a single frame without close control when not focused", () => {
    const r = renderer();
    const w = new Window(rect(2, 1, 22, 11), "Demo");
    w.draw(r);
    assert.equal(r.rowText(1), "  ┌────── Demo ──────┐        ");
  });

  test("darkens the cells right of and below the window", () => {
    const r = renderer();
    const w = new Window(rect(2, 1, 22, 11), "Demo");
    w.draw(r);
    const shade = attr(Color.DarkGray, Color.Black);
    assert.deepEqual(r.cellAt({ x: 22, y: 2 })?.attr, shade);
    assert.deepEqual(r.cellAt({ x: 22, y: 11 })?.attr, shade);
    assert.deepEqual(r.cellAt({ x: 3, y: 11 })?.attr, shade);
    assert.deepEqual(r.cellAt({ x: 22, y: 1 })?.attr, DEFAULT_ATTR);
    assert.deepEqual(r.cellAt({ x: 2, y: 11 })?.attr, DEFAULT_ATTR);
  });

  test("mouse-down on the close control becomes CM_CLOSE", () => {
    const w = new Window(rect(2, 1, 22, 11), "Demo");
    w.setFocus(true);
    w.draw(renderer());
    const slot = slotOf(mouseEvent("mouseDown", { x: 5, y: 1 }, MB_LEFT));
    w.handleEvent(slot);
    assert.deepEqual(slot.event, commandEvent(CM_CLOSE));
  });

  test("dragging the title row moves the window and its children", () => {
    const w = new Window(rect(2, 1, 22, 11), "Demo");
    const child = new ProbeView(rect(0, 0, 2, 1));
    w.add(child);
    w.handleEvent(slotOf(mouseEvent("mouseDown", { x: 12, y: 1 }, MB_LEFT)));
    assert.equal(hasState(w, SF_DRAGGING), true);

    w.handleEvent(slotOf(mouseEvent("mouseMove", { x: 15, y: 3 }, MB_LEFT)));
    assert.deepEqual(w.bounds(), rect(5, 3, 25, 13));
    assert.deepEqual(child.bounds(), rect(6, 4, 8, 5));

    w.handleEvent(slotOf(mouseEvent("mouseUp", { x: 15, y: 3 }, 0)));
    assert.equal(hasState(w, SF_DRAGGING), false);
    assert.deepEqual(child.received, []);
  });

  test("refocusing restores the interior's previous focus", () => {
    const w = new Window(rect(0, 0, 20, 6), "Form");
    w.add(new ProbeView(rect(0, 0, 2, 1), { focusable: true }));
    w.add(new ProbeView(rect(3, 0, 5, 1), { focusable: true }));
    w.setFocus(true);
    assert.equal(w.focusedIndex(), 0);
    w.setFocusTo(1);
    w.setFocus(false);
    assert.equal(w.focusedIndex(), -1);
    w.setFocus(true);
    assert.equal(w.focusedIndex(), 1);
  });

  test("keyboard events reach the focused interior child", () => {
    const w = new Window(rect(0, 0, 20, 6), "Form");
    const field = new ProbeView(rect(0, 0, 2, 1), { focusable: true });
    w.add(field);
    w.setFocus(true);
    w.handleEvent(slotOf(keyEvent(0x62)));
    assert.deepEqual(field.received, [keyEvent(0x62)]);
  });
});
