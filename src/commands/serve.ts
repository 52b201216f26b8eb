import type { Server } from "node:http";
import { createApp } from "../api/app.js";
import { closeServer, listen } from "../api/server.js";
import { createLogger } from "../core/logger.js";
import type { FleetRuntime, RuntimeOverrides } from "../runtime.js";
import { openRuntime, type ConfigOpts } from "./context.js";

export type Serving = {
  server: Server;
  runtime: FleetRuntime;
  shutdown(): Promise<void>;
};

export async function serve(opts: ConfigOpts & { port?: number; host?: string }, overrides?: RuntimeOverrides): Promise<Serving> {
  const runtime = await openRuntime(opts, overrides, "exclusive", "serve");
  const logger = createLogger("api");
  const app = createApp({
    ledger: runtime.ledger,
    dispatcher: runtime.dispatcher,
    backup: runtime.backupEnabled ? runtime.backup : null,
    throttle: runtime.throttle,
    registry: runtime.registry,
    operators: runtime.operators,
    logger,
  });

  let server: Server;
  try {
    server = await listen(app, opts.host ?? runtime.config.server.host, opts.port ?? runtime.config.server.port, logger);
  } catch (e) {
    await runtime.close();
    throw e;
  }
  runtime.start();

  let closing: Promise<void> | null = null;
  return {
    server,
    runtime,
    shutdown() {
      closing ??= closeServer(server).finally(() => runtime.close());
      return closing;
    },
  };
}
