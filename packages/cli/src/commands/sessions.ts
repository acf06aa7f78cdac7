/**
 * Sessions commands - list and show sessions on a running service.
 */

import { z } from "zod";
import {
  agentInfoSchema,
  describeEvent,
  loadConfig,
  recordedEventSchema,
  type SessionStatus,
} from "@testcast/core";
import { fetchJson, serviceUrl, sessionSummarySchema } from "../api.js";
import { formatSessionTable } from "../format.js";

const STATUSES: readonly SessionStatus[] = ["ACTIVE", "PAUSED", "COMPLETED", "FAILED"];

const sessionViewSchema = z.object({
  id: z.string(),
  name: z.string(),
  status: z.enum(["ACTIVE", "PAUSED", "COMPLETED", "FAILED"]),
  baseUrl: z.string().nullable(),
  framework: z.string().nullable(),
  startTime: z.string(),
  endTime: z.string().nullable(),
  admission: z.object({ maxEventCount: z.number() }),
  agent: agentInfoSchema.nullable(),
  agentErrors: z.array(z.object({ message: z.string() })),
  events: z.array(recordedEventSchema),
});

/** Accepts any casing of a status name */
export function parseStatus(value: string): SessionStatus | undefined {
  const upper = value.toUpperCase();
  return STATUSES.find((status) => status === upper);
}

export async function sessionsListCommand(options: {
  status?: string;
}): Promise<void> {
  const baseUrl = serviceUrl(loadConfig());

  let url = `${baseUrl}/api/recorder/sessions`;
  if (options.status) {
    const status = parseStatus(options.status);
    if (!status) {
      console.error(
        `Invalid status: ${options.status} (expected ${STATUSES.join("|").toLowerCase()})`
      );
      process.exit(1);
    }
    url += `?status=${status}`;
  }

  try {
    const sessions = await fetchJson(url, z.array(sessionSummarySchema));
    for (const line of formatSessionTable(sessions)) {
      console.log(line);
    }
  } catch (error) {
    console.error("Failed to fetch sessions. Is the service running?", error);
    process.exit(1);
  }
}

export async function sessionsShowCommand(id: string): Promise<void> {
  const baseUrl = serviceUrl(loadConfig());

  try {
    const session = await fetchJson(
      `${baseUrl}/api/recorder/sessions/${encodeURIComponent(id)}`,
      sessionViewSchema
    );

    console.log("Session Details");
    console.log("===============");
    console.log(`ID:        ${session.id}`);
    console.log(`Name:      ${session.name}`);
    console.log(`Status:    ${session.status}`);
    console.log(`Base URL:  ${session.baseUrl ?? "N/A"}`);
    console.log(`Started:   ${session.startTime}`);
    console.log(`Ended:     ${session.endTime ?? "N/A"}`);
    console.log(`Events:    ${session.events.length} / ${session.admission.maxEventCount}`);
    if (session.agent) {
      console.log(`Agent:     ${session.agent.userAgent} (${session.agent.transport})`);
    }
    if (session.agentErrors.length > 0) {
      console.log(`Errors:    ${session.agentErrors.length} reported by the agent`);
    }

    if (session.events.length > 0) {
      console.log("");
      session.events.forEach((event, index) => {
        console.log(`${String(index + 1).padStart(4)}  ${describeEvent(event)}`);
      });
    }
  } catch (error) {
    console.error(`Failed to fetch session ${id}:`, error);
    process.exit(1);
  }
}
