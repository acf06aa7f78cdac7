/**
 * Fastify server factory.
 * Creates and configures the ingestion service.
 */

import Fastify, { type FastifyInstance } from "fastify";
import type { Config } from "@testcast/core";
import type { ServiceContext } from "./context.js";
import { registerCodegenRoutes } from "./routes/codegen.js";
import { registerEventsRoutes } from "./routes/events.js";
import { registerHealthRoutes } from "./routes/health.js";
import { registerSessionsRoutes } from "./routes/sessions.js";

/**
 * Create a configured Fastify server instance with the recorder channel
 * attached to its HTTP server.
 */
export async function createServer(
  context: ServiceContext
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: context.config.httpLogger,
  });

  // Register routes
  await registerHealthRoutes(app, context);
  await registerSessionsRoutes(app, context);
  await registerEventsRoutes(app, context);
  await registerCodegenRoutes(app, context);

  context.channel.attach(app.server);
  app.addHook("preClose", async () => {
    context.channel.close();
  });

  return app;
}

/**
 * Start the server on the configured interface (localhost by default).
 */
export async function startServer(
  app: FastifyInstance,
  config: Pick<Config, "host" | "listenPort">
): Promise<void> {
  await app.listen({
    port: config.listenPort,
    host: config.host,
  });
  console.log(
    `testcast service listening on http://${config.host}:${config.listenPort}`
  );
}
