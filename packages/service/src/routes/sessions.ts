/**
 * Recording session endpoints.
 */

import type { FastifyInstance } from "fastify";
import {
  formatIssues,
  type RecorderAction,
  type RecordingSession,
} from "@testcast/core";
import type { ServiceContext } from "../context.js";
import {
  commandBodySchema,
  createSessionBodySchema,
  sessionListQuerySchema,
} from "../schemas.js";

interface Transition {
  apply(session: RecordingSession): boolean;

  /** Command pushed to a connected agent once the transition succeeds */
  command: RecorderAction;
}

const TRANSITIONS: Record<"pause" | "resume" | "stop" | "fail", Transition> = {
  pause: { apply: (session) => session.pause(), command: "PAUSE" },
  resume: { apply: (session) => session.resume(), command: "RESUME" },
  stop: { apply: (session) => session.complete(), command: "STOP" },
  fail: { apply: (session) => session.error(), command: "STOP" },
};

type SessionParams = { Params: { id: string } };

export async function registerSessionsRoutes(
  app: FastifyInstance,
  context: ServiceContext
): Promise<void> {
  const { registry, ingestion, channel } = context;

  // Create a new session; the key is only ever returned here
  app.post("/api/recorder/sessions", async (request, reply) => {
    const parsed = createSessionBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({
        error: "Invalid session request",
        issues: formatIssues(parsed.error),
      });
    }
    try {
      const session = registry.create(parsed.data);
      return reply
        .code(201)
        .send({ ...session.view(), sessionKey: session.sessionKey });
    } catch (error) {
      console.error("Failed to create session:", error);
      return reply.code(500).send({ error: "Failed to create session" });
    }
  });

  // List sessions
  app.get("/api/recorder/sessions", async (request, reply) => {
    const parsed = sessionListQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.code(400).send({
        error: "Invalid query",
        issues: formatIssues(parsed.error),
      });
    }
    return registry.list(parsed.data.status);
  });

  // Get session by ID
  app.get<SessionParams>("/api/recorder/sessions/:id", async (request, reply) => {
    const session = registry.get(request.params.id);
    if (!session) {
      return reply.code(404).send({ error: "Session not found" });
    }
    return session.view();
  });

  app.get<SessionParams>(
    "/api/recorder/sessions/:id/events",
    async (request, reply) => {
      const session = registry.get(request.params.id);
      if (!session) {
        return reply.code(404).send({ error: "Session not found" });
      }
      return session.view().events;
    }
  );

  for (const [name, transition] of Object.entries(TRANSITIONS)) {
    app.post<SessionParams>(
      `/api/recorder/sessions/:id/${name}`,
      async (request, reply) => {
        const { id } = request.params;
        try {
          const changed = await registry.mutate(id, transition.apply);
          const session = registry.get(id);
          if (changed === undefined || !session) {
            return reply.code(404).send({ error: "Session not found" });
          }
          if (!changed) {
            return reply
              .code(409)
              .send({ error: `Cannot ${name} a ${session.status} session` });
          }
          const agentNotified = channel.sendCommand(id, transition.command);
          return { ...session.view(), agentNotified };
        } catch (error) {
          console.error(`Failed to ${name} session:`, error);
          return reply.code(500).send({ error: `Failed to ${name} session` });
        }
      }
    );
  }

  // Push a command to the session's agent
  app.post<SessionParams>(
    "/api/recorder/sessions/:id/commands",
    async (request, reply) => {
      const { id } = request.params;
      if (!registry.get(id)) {
        return reply.code(404).send({ error: "Session not found" });
      }
      const parsed = commandBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.code(400).send({
          error: "Invalid command",
          issues: formatIssues(parsed.error),
        });
      }
      if (!channel.sendCommand(id, parsed.data.action)) {
        return reply.code(409).send({ error: "No agent connected" });
      }
      return reply.code(202).send({ delivered: true, action: parsed.data.action });
    }
  );

  // Live status: session state plus what the agent last reported
  app.get<SessionParams>("/api/recorder/status/:id", async (request, reply) => {
    const { id } = request.params;
    const session = registry.get(id);
    if (!session) {
      return reply.code(404).send({ error: "Session not found" });
    }
    const view = session.view();
    return {
      sessionId: id,
      status: session.status,
      eventCount: session.eventCount(),
      durationMillis: session.durationMillis(),
      agentConnected: channel.isConnected(id),
      agent: view.agent,
      agentErrors: view.agentErrors.length,
      lastStatus: ingestion.lastStatus(id) ?? null,
    };
  });
}
