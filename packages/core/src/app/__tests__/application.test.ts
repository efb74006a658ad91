import { assert, describe, test } from "@tvcore/testkit";
import { CM_QUIT } from "../../commands/commands.js";
import { createCommandSet } from "../../commands/commandSet.js";
import { createMemoryTrace } from "../../debug/trace.js";
import { TvError } from "../../errors.js";
import { MB_LEFT, commandEvent, keyEvent, mouseEvent } from "../../events/event.js";
import { rect } from "../../geometry/rect.js";
import { KB_CTRL_C, KB_ESC } from "../../input/keyCodes.js";
import { type ScriptedInput, createTestBackend } from "../../testing/backend.js";
import { ProbeView } from "../../testing/probeView.js";
import { Dialog } from "../../views/dialog.js";
import { Window } from "../../views/window.js";
import { Application, type ApplicationOptions } from "../application.js";

function setup(inputs: readonly ScriptedInput[], opts: Partial<ApplicationOptions> = {}) {
  const backend = createTestBackend({ cols: 40, rows: 12, inputs });
  const trace = createMemoryTrace();
  const app = new Application({
    commandSet: createCommandSet(),
    trace: trace.sink,
    ...opts,
    backend,
  });
  return { app, backend, trace };
}

function isTvErrorWith(code: string): (err: unknown) => boolean {
  return (err: unknown) => err instanceof TvError && err.code === code;
}

describe("Application.run", () => {
  test("broadcasts each command-set change once", async () => {
    const commands = createCommandSet();
    commands.disable(5);
    const handled: number[] = [];
    const { app, trace } = setup(["e", "\u0003"], {
      commandSet: commands,
      onCommand: (command) => {
        handled.push(command);
        if (command === 200) commands.enable(5);
      },
    });
    const probe = new ProbeView(rect(1, 1, 6, 2), {
      focusable: true,
      command: 5,
      commandSet: commands,
      respond: (ev) => (ev.kind === "keyboard" && ev.code === 0x65 ? commandEvent(200) : undefined),
    });
    const win = new Window(rect(0, 0, 30, 8), "Editor");
    win.add(probe);
    app.desktop.add(win);

    await app.run();
    assert.deepEqual(probe.enablement, [false, true]);
    assert.deepEqual(handled, [200]);
    assert.deepEqual(trace.events("commands"), ["commands.broadcast", "commands.broadcast"]);
    assert.equal(commands.isDirty(), false);
  });

  test("an unclaimed quit key stops the loop", async () => {
    const handled: number[] = [];
    const { app, backend, trace } = setup(["\u0003", "never read"], {
      onCommand: (command) => {
        handled.push(command);
      },
    });
    await app.run();
    assert.equal(app.isRunning(), false);
    assert.equal(backend.remaining(), 1);
    assert.deepEqual(handled, []);
    assert.deepEqual(backend.calls(), ["start", "stop"]);
    assert.deepEqual(trace.events("app"), ["app.start", "app.stop"]);
  });

  test("F10 and Alt+X are quit keys by default", async () => {
    for (const input of ["\u001b[21~", "\u001bx"]) {
      const { app, backend } = setup([input, "never read"]);
      await app.run();
      assert.equal(backend.remaining(), 1);
    }
  });

  test("quit keys are configurable by name", async () => {
    const { app, backend } = setup(["\u0003", "\u0011", "never read"], {
      config: { quitKeys: ["ctrl+q"] },
    });
    await app.run();
    assert.equal(backend.remaining(), 1);
  });

  test("a quit key claimed by a view does not quit", async () => {
    const menuBar = new ProbeView(rect(0, 0, 40, 1), {
      respond: (ev) => (ev.kind === "keyboard" && ev.code === KB_CTRL_C ? commandEvent(300) : undefined),
    });
    const handled: number[] = [];
    const { app } = setup(["\u0003", "\u001bx"], {
      menuBar,
      onCommand: (command) => {
        handled.push(command);
      },
    });
    await app.run();
    assert.deepEqual(handled, [300]);
  });

  test("CM_QUIT from the menu bar stops the loop", async () => {
    const menuBar = new ProbeView(rect(0, 0, 40, 1), {
      respond: (ev) => (ev.kind === "keyboard" ? commandEvent(CM_QUIT) : undefined),
    });
    const { app, backend } = setup(["q", "never read"], { menuBar });
    await app.run();
    assert.equal(backend.remaining(), 1);
  });

  test("a lone ESC is delivered after a poll timeout", async () => {
    const menuBar = new ProbeView(rect(0, 0, 40, 1));
    const { app, backend } = setup(["\u001b", null, "\u0003"], {
      menuBar,
      config: { pollTimeoutMs: 20 },
    });
    await app.run();
    assert.deepEqual(menuBar.received, [keyEvent(KB_ESC), keyEvent(KB_CTRL_C)]);
    assert.deepEqual(backend.pollTimeouts(), [20, 20, 20]);
  });

  test("stops the backend when polling fails", async () => {
    const { app, backend } = setup([]);
    await assert.rejects(app.run(), isTvErrorWith("TV_INVALID_STATE"));
    assert.deepEqual(backend.calls(), ["start", "stop"]);
    assert.equal(app.isRunning(), false);
  });

  test("stops the backend when a command handler throws", async () => {
    const menuBar = new ProbeView(rect(0, 0, 40, 1), {
      respond: (ev) => (ev.kind === "keyboard" ? commandEvent(300) : undefined),
    });
    const { app, backend } = setup(["x"], {
      menuBar,
      onCommand: () => {
        throw new Error("handler failed");
      },
    });
    await assert.rejects(app.run(), /handler failed/);
    assert.deepEqual(backend.calls(), ["start", "stop"]);
  });

  test("rejects a second run while running", async () => {
    const { app } = setup([null, "\u0003"]);
    const running = app.run();
    await assert.rejects(app.run(), isTvErrorWith("TV_REENTRANT_CALL"));
    await running;
    assert.equal(app.isRunning(), false);
  });

  test("quit() ends the loop after the current iteration", async () => {
    const { app, backend } = setup(["a", "never read"]);
    const menuBar = new ProbeView(rect(0, 0, 40, 1), {
      respond: () => {
        app.quit();
        return undefined;
      },
    });
    app.setMenuBar(menuBar);
    await app.run();
    assert.equal(backend.remaining(), 1);
  });
});

describe("Application.dispatch", () => {
  test("a dialog opened from a mouse-down does not leave the window capturing the mouse", async () => {
    const { app } = setup(["\u001b\u001b"], {
      onCommand: async (command, host) => {
        if (command === 300) await new Dialog(rect(5, 2, 35, 10), "Opened").execute(host);
      },
    });
    // Desktop origin is (0,1): the back window's interior spans (1,2)-(19,8),
    // the front window's (23,2)-(39,8).
    const back = new Window(rect(0, 0, 20, 8), "Back");
    back.add(
      new ProbeView(rect(0, 0, 18, 6), {
        respond: (ev) => (ev.kind === "mouseDown" ? commandEvent(300) : undefined),
      }),
    );
    const front = new Window(rect(22, 0, 40, 8), "Front");
    const frontProbe = new ProbeView(rect(0, 0, 16, 6));
    front.add(frontProbe);
    app.desktop.add(back);
    app.desktop.add(front);

    await app.dispatch(mouseEvent("mouseDown", { x: 5, y: 4 }, MB_LEFT));
    await app.dispatch(mouseEvent("mouseMove", { x: 30, y: 4 }, 0));
    assert.deepEqual(frontProbe.received, [mouseEvent("mouseMove", { x: 30, y: 4 }, 0)]);
  });
});

describe("Application layout", () => {
  test("the desktop leaves the menu and status rows free", () => {
    const { app } = setup([]);
    assert.deepEqual(app.desktop.bounds(), rect(0, 1, 40, 11));
    const bare = setup([], { config: { reserveMenuRow: false, reserveStatusRow: false } });
    assert.deepEqual(bare.app.desktop.bounds(), rect(0, 0, 40, 12));
  });

  test("a backend resize re-bounds the screen and its views", async () => {
    const statusLine = new ProbeView(rect(0, 11, 40, 12));
    const { app, trace } = setup([{ kind: "resize", cols: 50, rows: 20 }, "\u0003"], { statusLine });
    await app.run();
    assert.equal(app.renderer.cols, 50);
    assert.equal(app.renderer.rows, 20);
    assert.deepEqual(app.desktop.bounds(), rect(0, 1, 50, 19));
    assert.deepEqual(statusLine.bounds(), rect(0, 19, 50, 20));
    assert.deepEqual(trace.events("app"), ["app.start", "app.resize", "app.stop"]);
  });

  test("records the topmost window's shadow bounds as the active viewport", async () => {
    const { app } = setup(["\u0003"]);
    app.desktop.add(new Window(rect(2, 0, 20, 6), "Top"));
    await app.run();
    assert.deepEqual(app.activeViewBounds(), rect(2, 1, 21, 8));
  });

  test("the first frame paints the desktop and status row", async () => {
    const { app, backend } = setup(["\u0003"]);
    await app.run();
    assert.equal(app.renderer.rowText(0), " ".repeat(40));
    assert.equal(app.renderer.rowText(1), "░".repeat(40));
    assert.equal(app.renderer.rowText(11), " ".repeat(40));
    assert.ok(backend.output().startsWith("\u001b[1;1H"));
  });

  test("resume repaints every cell", async () => {
    const { app, backend } = setup([]);
    app.renderer.flush();
    const first = backend.output();
    backend.clearOutput();
    app.renderer.flush();
    assert.equal(backend.output(), "");

    await app.suspend();
    await app.resume();
    app.renderer.flush();
    assert.equal(backend.output(), first);
    assert.deepEqual(backend.calls(), ["suspend", "resume"]);
  });
});
