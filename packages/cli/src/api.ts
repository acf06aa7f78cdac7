/**
 * HTTP client for a running testcast service.
 */

import { z } from "zod";
import { formatIssues, type Config } from "@testcast/core";

export class ServiceRequestError extends Error {
  constructor(
    message: string,
    readonly status: number | null
  ) {
    super(message);
    this.name = "ServiceRequestError";
  }
}

export function serviceUrl(config: Pick<Config, "host" | "listenPort">): string {
  return `http://${config.host}:${config.listenPort}`;
}

const errorBodySchema = z.object({ error: z.string() });

/**
 * Request `url` and validate the JSON reply against `schema`.
 * Non-2xx replies throw with the service's `error` text when it sent one.
 */
export async function fetchJson<T>(
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  init: RequestInit = {}
): Promise<T> {
  const response = await fetch(url, {
    ...init,
    signal: AbortSignal.timeout(5000),
  });
  const body: unknown = await response.json().catch(() => null);

  if (!response.ok) {
    const parsedError = errorBodySchema.safeParse(body);
    const detail = parsedError.success ? parsedError.data.error : `HTTP ${response.status}`;
    throw new ServiceRequestError(detail, response.status);
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ServiceRequestError(
      `Unexpected response: ${formatIssues(parsed.error).join("; ")}`,
      response.status
    );
  }
  return parsed.data;
}

/** POST a JSON body */
export function postJson<T>(
  url: string,
  body: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  return fetchJson(url, schema, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  });
}

export const sessionSummarySchema = z.object({
  id: z.string(),
  name: z.string(),
  projectId: z.string().nullable(),
  status: z.enum(["ACTIVE", "PAUSED", "COMPLETED", "FAILED"]),
  startTime: z.string(),
  endTime: z.string().nullable(),
  eventCount: z.number(),
});

export const generationResponseSchema = z.object({
  code: z.string(),
  fileExtension: z.string(),
  language: z.string(),
  framework: z.string(),
  cached: z.boolean().optional(),
  sessionId: z.string().optional(),
});

export type GenerationResponse = z.infer<typeof generationResponseSchema>;
