/**
 * Envelope ingestion, shared by the WebSocket channel and the HTTP
 * fallback endpoint. Every envelope resolves to an IngestResult; nothing
 * here throws for bad input.
 */

import {
  controlPayloadSchema,
  createLogger,
  decodeEnvelope,
  decodeEventPayload,
  errorPayloadSchema,
  formatIssues,
  initPayloadSchema,
  isControlType,
  isEventKind,
  redactForLog,
  statusPayloadSchema,
  type ControlType,
  type Envelope,
  type RecordingSession,
  type StatusPayload,
  type TransportKind,
} from "@testcast/core";
import type { SessionRegistry } from "./registry.js";

const logger = createLogger("ingest");

export type IngestResult =
  | { status: "accepted"; eventId: string; duplicate: boolean }
  | { status: "refused"; eventId: string; reason: string }
  | { status: "control"; type: ControlType }
  | { status: "invalid"; errors: string[] }
  | { status: "unknown-session" };

/** Last STATUS report from an agent, with the time it arrived */
export interface AgentStatusReport extends StatusPayload {
  receivedAt: string;
}

export interface IngestionOptions {
  registry: SessionRegistry;
  redactKeys: string[];
  now?: () => number;
}

function refusalReason(session: RecordingSession): string {
  switch (session.status) {
    case "PAUSED":
      return "Session is paused";
    case "COMPLETED":
      return "Session is completed";
    case "FAILED":
      return "Session has failed";
    case "ACTIVE":
      return "Session is at capacity";
  }
}

export class IngestionService {
  private readonly statuses = new Map<string, AgentStatusReport>();
  private readonly now: () => number;

  constructor(private readonly options: IngestionOptions) {
    this.now = options.now ?? Date.now;
  }

  lastStatus(sessionId: string): AgentStatusReport | undefined {
    return this.statuses.get(sessionId);
  }

  /**
   * Decode and apply one envelope addressed to `sessionId`. Event ids the
   * session already holds are acknowledged as duplicates and not appended.
   */
  async handleEnvelope(
    sessionId: string,
    input: unknown,
    transport: TransportKind
  ): Promise<IngestResult> {
    const decoded = decodeEnvelope(input);
    if (!decoded.ok) {
      return { status: "invalid", errors: decoded.errors };
    }
    const envelope = decoded.value;
    if (envelope.sessionId !== sessionId) {
      return {
        status: "invalid",
        errors: [`sessionId: expected ${sessionId}, got ${envelope.sessionId}`],
      };
    }
    if (!this.options.registry.get(sessionId)) {
      return { status: "unknown-session" };
    }

    if (isEventKind(envelope.type)) {
      return this.ingestEvent(sessionId, envelope);
    }
    if (isControlType(envelope.type)) {
      return this.ingestControl(sessionId, envelope.type, envelope, transport);
    }
    return { status: "invalid", errors: [`Unknown envelope type: ${envelope.type}`] };
  }

  private async ingestEvent(sessionId: string, envelope: Envelope): Promise<IngestResult> {
    const event = decodeEventPayload(envelope);
    if (!event.ok) {
      return { status: "invalid", errors: event.errors };
    }
    const eventId = event.value.id;
    const result = await this.options.registry.mutate(
      sessionId,
      (session): IngestResult => {
        if (session.hasEvent(eventId)) {
          return { status: "accepted", eventId, duplicate: true };
        }
        if (session.addEvent(event.value)) {
          return { status: "accepted", eventId, duplicate: false };
        }
        return { status: "refused", eventId, reason: refusalReason(session) };
      }
    );
    if (result?.status === "refused") {
      logger.debug(`Event ${eventId} refused for ${sessionId}: ${result.reason}`);
    }
    return result ?? { status: "unknown-session" };
  }

  private async ingestControl(
    sessionId: string,
    type: ControlType,
    envelope: Envelope,
    transport: TransportKind
  ): Promise<IngestResult> {
    const { registry } = this.options;
    const control: IngestResult = { status: "control", type };

    switch (type) {
      case "INIT": {
        const parsed = initPayloadSchema.safeParse(envelope.payload);
        if (!parsed.success) {
          return { status: "invalid", errors: formatIssues(parsed.error) };
        }
        const init = parsed.data;
        await registry.mutate(sessionId, (session) =>
          session.recordAgentInfo({
            userAgent: init.userAgent,
            platform: init.platform,
            language: init.language,
            viewport: init.viewport,
            initialUrl: init.url,
            transport: init.usingHttpFallback ? "http" : transport,
            connectedAt: new Date(this.now()).toISOString(),
          })
        );
        logger.info(`Agent connected to ${sessionId} over ${transport}`);
        return control;
      }

      case "RECORDER_CONTROL": {
        const parsed = controlPayloadSchema.safeParse(envelope.payload);
        if (!parsed.success) {
          return { status: "invalid", errors: formatIssues(parsed.error) };
        }
        const { action } = parsed.data;
        await registry.mutate(sessionId, (session) => {
          if (action === "PAUSE") return session.pause();
          if (action === "RESUME") return session.resume();
          return session.complete();
        });
        logger.info(`Agent ${action} for ${sessionId}`);
        return control;
      }

      case "STATUS": {
        const parsed = statusPayloadSchema.safeParse(envelope.payload);
        if (!parsed.success) {
          return { status: "invalid", errors: formatIssues(parsed.error) };
        }
        this.statuses.set(sessionId, {
          ...parsed.data,
          receivedAt: new Date(this.now()).toISOString(),
        });
        return control;
      }

      case "ERROR": {
        const parsed = errorPayloadSchema.safeParse(envelope.payload);
        if (!parsed.success) {
          return { status: "invalid", errors: formatIssues(parsed.error) };
        }
        const report = parsed.data;
        await registry.mutate(sessionId, (session) =>
          session.recordAgentError({
            message: report.message,
            context: report.context,
            timestamp: envelope.timestamp,
          })
        );
        logger.warn(
          `Agent error for ${sessionId}:`,
          redactForLog(envelope.payload, this.options.redactKeys, 1024)
        );
        return control;
      }

      case "SCREENSHOT_REQUEST":
        logger.info(
          `Screenshot requested for ${sessionId}:`,
          redactForLog(envelope.payload, this.options.redactKeys, 512)
        );
        return control;

      case "UNLOAD":
        logger.debug(`Agent page unloading for ${sessionId}`);
        return control;

      case "HEARTBEAT":
      case "PONG":
        return control;
    }
  }
}
