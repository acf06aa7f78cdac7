/**
 * HTTP fallback endpoint for agents that cannot hold a WebSocket.
 * Takes the same envelopes as the channel; the session key comes in the
 * X-Session-Key header.
 */

import type { FastifyInstance } from "fastify";
import type { ServiceContext } from "../context.js";

export async function registerEventsRoutes(
  app: FastifyInstance,
  context: ServiceContext
): Promise<void> {
  const { registry, ingestion } = context;

  app.post<{ Params: { sessionId: string } }>(
    "/api/recorder/events/:sessionId",
    async (request, reply) => {
      const { sessionId } = request.params;
      const session = registry.get(sessionId);
      if (!session) {
        return reply.code(404).send({ error: "Session not found" });
      }
      if (request.headers["x-session-key"] !== session.sessionKey) {
        return reply.code(401).send({ error: "Invalid session key" });
      }

      try {
        const result = await ingestion.handleEnvelope(sessionId, request.body, "http");
        switch (result.status) {
          case "accepted":
            return reply.code(202).send({
              accepted: true,
              eventId: result.eventId,
              duplicate: result.duplicate,
            });
          case "refused":
            return reply.code(409).send({
              accepted: false,
              eventId: result.eventId,
              error: result.reason,
            });
          case "control":
            return reply.code(202).send({ accepted: true, type: result.type });
          case "invalid":
            return reply
              .code(400)
              .send({ error: "Invalid envelope", issues: result.errors });
          case "unknown-session":
            return reply.code(404).send({ error: "Session not found" });
        }
      } catch (error) {
        console.error("Failed to ingest envelope:", error);
        // 5xx tells the agent to queue and retry
        return reply.code(500).send({ error: "Failed to ingest envelope" });
      }
    }
  );
}
