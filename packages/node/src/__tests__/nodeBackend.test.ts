import assert from "node:assert/strict";
import { PassThrough, Writable } from "node:stream";
import test from "node:test";
import { NOOP_TRACE, TvError } from "@tvcore/core";
import { createNodeApp, createNodeBackend } from "../index.js";

const ENTER = "\x1b[?1049h\x1b[?25l\x1b[?1000h\x1b[?1002h\x1b[?1006h\x1b[2J";
const LEAVE = "\x1b[?1006l\x1b[?1002l\x1b[?1000l\x1b[0m\x1b[?25h\x1b[?1049l";

class FakeOutput extends Writable {
  columns = 20;
  rows = 6;
  readonly chunks: string[] = [];

  override _write(chunk: Buffer | string, _enc: BufferEncoding, done: (err?: Error | null) => void): void {
    this.chunks.push(typeof chunk === "string" ? chunk : chunk.toString("utf8"));
    done();
  }

  text(): string {
    return this.chunks.join("");
  }

  clear(): void {
    this.chunks.length = 0;
  }
}

class FakeTtyInput extends PassThrough {
  readonly isTTY = true;
  isRaw = false;
  readonly rawCalls: boolean[] = [];

  setRawMode(mode: boolean): this {
    this.rawCalls.push(mode);
    this.isRaw = mode;
    return this;
  }
}

function streams(): { stdin: FakeTtyInput; stdout: FakeOutput } {
  return { stdin: new FakeTtyInput(), stdout: new FakeOutput() };
}

test("start enters raw mode, alternate screen, hidden cursor and mouse reporting", async () => {
  const { stdin, stdout } = streams();
  const backend = createNodeBackend({ stdin, stdout });
  await backend.start();
  assert.equal(stdout.text(), ENTER);
  assert.deepEqual(stdin.rawCalls, [true]);
  assert.equal(backend.isStarted(), true);
  await backend.stop();
});

test("stop restores the terminal once", async () => {
  const { stdin, stdout } = streams();
  const backend = createNodeBackend({ stdin, stdout });
  await backend.start();
  stdout.clear();
  await backend.stop();
  await backend.stop();
  assert.equal(stdout.text(), LEAVE);
  assert.deepEqual(stdin.rawCalls, [true, false]);
  assert.equal(backend.isStarted(), false);
});

test("mouse reporting and the alternate screen can be turned off", async () => {
  const { stdin, stdout } = streams();
  const backend = createNodeBackend({ stdin, stdout, mouse: false, altScreen: false });
  await backend.start();
  await backend.stop();
  assert.equal(stdout.text(), "\x1b[?25l\x1b[2J\x1b[0m\x1b[?25h");
});

test("start rejects when already started", async () => {
  const { stdin, stdout } = streams();
  const backend = createNodeBackend({ stdin, stdout });
  await backend.start();
  await assert.rejects(
    backend.start(),
    (err: unknown) => err instanceof TvError && err.code === "TV_INVALID_STATE",
  );
  await backend.stop();
});

test("installs an exit hook only while started", async () => {
  const { stdin, stdout } = streams();
  const before = process.listenerCount("exit");
  const backend = createNodeBackend({ stdin, stdout });
  await backend.start();
  assert.equal(process.listenerCount("exit"), before + 1);
  await backend.stop();
  assert.equal(process.listenerCount("exit"), before);
});

test("poll delivers input data", async () => {
  const { stdin, stdout } = streams();
  const backend = createNodeBackend({ stdin, stdout });
  await backend.start();
  stdin.write("ab");
  assert.deepEqual(await backend.poll(1000), { kind: "data", data: "ab" });
  await backend.stop();
});

test("poll resolves null after the timeout", async () => {
  const { stdin, stdout } = streams();
  const backend = createNodeBackend({ stdin, stdout });
  await backend.start();
  assert.equal(await backend.poll(5), null);
  await backend.stop();
});

test("stop releases a pending poll", async () => {
  const { stdin, stdout } = streams();
  const backend = createNodeBackend({ stdin, stdout });
  await backend.start();
  const pending = backend.poll(60_000);
  await backend.stop();
  assert.equal(await pending, null);
});

test("output resize becomes a resize input", async () => {
  const { stdin, stdout } = streams();
  const backend = createNodeBackend({ stdin, stdout });
  await backend.start();
  stdout.columns = 100;
  stdout.rows = 30;
  stdout.emit("resize");
  assert.deepEqual(await backend.poll(1000), { kind: "resize", cols: 100, rows: 30 });
  assert.deepEqual(backend.size(), { cols: 100, rows: 30 });
  await backend.stop();
});

test("stream errors surface as TV_IO_ERROR", async () => {
  const { stdin, stdout } = streams();
  const backend = createNodeBackend({ stdin, stdout });
  await backend.start();
  stdout.clear();
  const pending = backend.poll(60_000);
  stdout.emit("error", new Error("pipe closed"));

  const isIoError = (err: unknown) =>
    err instanceof TvError && err.code === "TV_IO_ERROR" && err.message.includes("pipe closed");
  await assert.rejects(pending, isIoError);
  assert.throws(() => backend.write("x"), isIoError);
  await backend.stop();
  assert.equal(stdout.text(), "");
});

test("suspend and resume leave and re-enter terminal modes", async () => {
  const { stdin, stdout } = streams();
  const backend = createNodeBackend({ stdin, stdout });
  await backend.start();
  stdout.clear();

  await backend.suspend();
  await backend.suspend();
  assert.equal(stdout.text(), LEAVE);
  assert.equal(backend.isSuspended(), true);

  stdout.clear();
  await backend.resume();
  assert.equal(stdout.text(), ENTER);
  assert.deepEqual(stdin.rawCalls, [true, false, true]);

  stdout.clear();
  await backend.suspend();
  await backend.stop();
  assert.equal(stdout.text(), LEAVE);
});

test("createNodeApp runs until a quit key and restores the terminal", async () => {
  const { stdin, stdout } = streams();
  const { app, backend } = createNodeApp({ backend: { stdin, stdout }, trace: NOOP_TRACE });
  assert.equal(app.renderer.cols, 20);
  assert.equal(app.renderer.rows, 6);

  stdin.write("\x03");
  await app.run();

  const out = stdout.text();
  assert.ok(out.startsWith(ENTER));
  assert.ok(out.endsWith(LEAVE));
  assert.equal(backend.isStarted(), false);
  assert.equal(app.renderer.rowText(1), "░".repeat(20));
});
