/**
 * @testcast/service
 *
 * Ingestion service for recording agents.
 * Holds live sessions in memory, accepts envelopes over WebSocket and
 * HTTP, and generates test code from recorded sessions.
 */

import {
  installTimestampLogging,
  loadConfig,
  setLogLevel,
  type Config,
} from "@testcast/core";
import { createServiceContext } from "./context.js";
import type { SessionSnapshotStore } from "./registry.js";
import { createServer, startServer } from "./server.js";

export { createServer, startServer } from "./server.js";
export { createServiceContext } from "./context.js";
export type { ServiceContext, ServiceContextOptions } from "./context.js";
export { SessionRegistry, InMemorySnapshotStore } from "./registry.js";
export type {
  SessionSnapshotStore,
  SessionRegistryOptions,
  NewSessionInit,
} from "./registry.js";
export { IngestionService } from "./ingestion.js";
export type { IngestResult, AgentStatusReport } from "./ingestion.js";
export { RecorderChannel } from "./channel.js";
export { GenerationCache, requestHash } from "./codegen-cache.js";

export interface ServiceHandle {
  shutdown: () => Promise<void>;
}

export interface StartServiceOptions {
  config?: Config;
  store?: SessionSnapshotStore;
}

/**
 * Start the service with configuration from the environment.
 * Used by the CLI and for direct execution.
 */
export async function startService(
  options: StartServiceOptions = {}
): Promise<ServiceHandle> {
  installTimestampLogging();
  const config = options.config ?? loadConfig();
  setLogLevel(config.logLevel);

  console.log("Starting testcast service...");
  console.log(`Admission cap: ${config.maxEventCount} events per session`);
  console.log(`Code generation cache: ${config.codegenCacheSize} entries`);

  const context = createServiceContext(config, { store: options.store });
  const restored = await context.registry.hydrate();
  if (restored > 0) {
    console.log(`Restored ${restored} stored session(s)`);
  }

  const app = await createServer(context);
  await startServer(app, config);

  const shutdown = async () => {
    console.log("\nShutting down...");
    await app.close();
  };

  const onSignal = () => {
    shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error("Failed to shut down cleanly:", error);
        process.exit(1);
      });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  return { shutdown };
}

// Run if executed directly
const isMainModule = import.meta.url === `file://${process.argv[1]}`;
if (isMainModule) {
  startService().catch((error: unknown) => {
    console.error("Failed to start service:", error);
    process.exit(1);
  });
}
