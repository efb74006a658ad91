import { createNodeApp } from "@tvcore/node";
import { createDemoState, createStatusLine, handleDemoCommand, openNotesWindow } from "./demo.js";

const state = createDemoState();
const { app } = createNodeApp({
  onCommand: (command, app) => handleDemoCommand(command, app, state),
});
app.setStatusLine(createStatusLine(app.renderer.cols, app.renderer.rows));
openNotesWindow(app, state);

await app.run();
