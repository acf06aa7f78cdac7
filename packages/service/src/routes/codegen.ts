/**
 * Code generation endpoints: from a posted step list, or from a session's
 * recorded events.
 */

import type { FastifyInstance } from "fastify";
import { resolveOptions } from "@testcast/codegen";
import { formatIssues } from "@testcast/core";
import type { ServiceContext } from "../context.js";
import { generateBodySchema, sessionGenerateBodySchema } from "../schemas.js";

export async function registerCodegenRoutes(
  app: FastifyInstance,
  context: ServiceContext
): Promise<void> {
  const { config, registry, codegen } = context;
  const defaults = {
    language: config.defaultLanguage,
    framework: config.defaultFramework,
  };

  app.post("/api/codegen/generate", async (request, reply) => {
    const parsed = generateBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({
        error: "Invalid generation request",
        issues: formatIssues(parsed.error),
      });
    }
    try {
      const { steps, variables, options } = parsed.data;
      const { result, cached } = codegen.generate({
        steps,
        variables,
        options: resolveOptions(options, defaults),
      });
      return { ...result, cached };
    } catch (error) {
      console.error("Failed to generate code:", error);
      return reply.code(500).send({ error: "Failed to generate code" });
    }
  });

  app.post<{ Params: { id: string } }>(
    "/api/recorder/sessions/:id/generate",
    async (request, reply) => {
      const session = registry.get(request.params.id);
      if (!session) {
        return reply.code(404).send({ error: "Session not found" });
      }
      const parsed = sessionGenerateBodySchema.safeParse(request.body ?? {});
      if (!parsed.success) {
        return reply.code(400).send({
          error: "Invalid generation request",
          issues: formatIssues(parsed.error),
        });
      }
      try {
        const { variables, options } = parsed.data;
        const { result, cached } = codegen.generate({
          steps: session.view().events,
          variables,
          options: resolveOptions(options, defaults),
        });
        return { ...result, cached, sessionId: session.id };
      } catch (error) {
        console.error("Failed to generate session code:", error);
        return reply.code(500).send({ error: "Failed to generate code" });
      }
    }
  );
}
