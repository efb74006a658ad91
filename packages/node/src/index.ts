/**
 * @tvcore/node
 *
 * Node.js entry point: a terminal backend over stdin/stdout, an NDJSON trace
 * sink, and createNodeApp() wiring both into a core Application.
 */

import { Application, type ApplicationOptions, type TraceSink } from "@tvcore/core";
import { type NodeBackend, type NodeBackendConfig, createNodeBackend } from "./backend/nodeBackend.js";
import { traceSinkFromEnv } from "./trace.js";

export type { NodeBackend, NodeBackendConfig };
export type { NodeInputStream, NodeOutputStream } from "./backend/nodeBackend.js";
export { createNodeBackend, readTerminalSize } from "./backend/nodeBackend.js";
export {
  DEFAULT_TRACE_FILE,
  type TraceEnv,
  createFileTraceSink,
  traceFileFromEnv,
  traceSinkFromEnv,
} from "./trace.js";

export type CreateNodeAppOptions = Readonly<
  Omit<ApplicationOptions, "backend" | "trace"> & {
    backend?: NodeBackendConfig | undefined;
    /** Defaults to the sink selected by TVCORE_TRACE / TVCORE_TRACE_LOG. */
    trace?: TraceSink | undefined;
  }
>;

export type NodeApp = Readonly<{
  app: Application;
  backend: NodeBackend;
}>;

/**
 * Create an Application drawing to the process terminal.
 *
 * @example
 * ```ts
 * const { app } = createNodeApp({ onCommand: handleCommand });
 * app.desktop.add(new Window(rect(2, 1, 40, 12), "Notes"));
 * await app.run();
 * ```
 */
export function createNodeApp(opts: CreateNodeAppOptions = {}): NodeApp {
  const { backend: backendConfig, trace, ...rest } = opts;
  const backend = createNodeBackend(backendConfig);
  const app = new Application({
    ...rest,
    backend,
    trace: trace ?? traceSinkFromEnv(),
  });
  return Object.freeze({ app, backend });
}
