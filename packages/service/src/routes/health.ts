/**
 * Health check endpoint with service diagnostics.
 */

import type { FastifyInstance } from "fastify";
import type { ServiceContext } from "../context.js";

export async function registerHealthRoutes(
  app: FastifyInstance,
  context: ServiceContext
): Promise<void> {
  app.get("/api/health", async () => {
    return {
      status: "ok",
      pid: process.pid,
      uptime: process.uptime(),
      sessions: context.registry.size,
      connectedAgents: context.channel.connectedCount,
      codegenCache: context.codegen.stats(),
    };
  });
}
