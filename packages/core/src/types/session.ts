/**
 * Session types for testcast.
 * A session is one recording of one page, fed by a single agent.
 */

import type { RecordedEvent } from "./events.js";

/** Status of a recording session */
export type SessionStatus = "ACTIVE" | "PAUSED" | "COMPLETED" | "FAILED";

/** Admission limits applied by addEvent */
export interface AdmissionConfig {
  maxEventCount: number;
}

export type TransportKind = "websocket" | "http";

export interface Viewport {
  width: number;
  height: number;
}

/** What the agent reported about its page when it connected */
export interface AgentInfo {
  userAgent: string;
  platform?: string;
  language?: string;
  viewport?: Viewport;
  initialUrl?: string;
  transport: TransportKind;
  connectedAt: string;
}

/** Error reported by the agent (message only, no page content) */
export interface AgentErrorReport {
  message: string;
  context?: string;
  timestamp: number;
}

/**
 * Full state of a session, handed to the snapshot store and used to
 * restore a session later.
 */
export interface SessionSnapshot {
  /** Unique session ID (UUID) */
  id: string;

  name: string;
  projectId: string | null;
  description: string | null;
  browser: string | null;
  framework: string | null;
  baseUrl: string | null;

  status: SessionStatus;

  /** When the session started (ISO 8601) */
  startTime: string;

  /** When the session ended (ISO 8601, null until COMPLETED or FAILED) */
  endTime: string | null;

  /** Shared secret the agent presents on every connection */
  sessionKey: string;

  admission: AdmissionConfig;
  agent: AgentInfo | null;
  agentErrors: AgentErrorReport[];
  events: RecordedEvent[];
}

/** Snapshot without the session key, safe to return from read endpoints */
export type SessionView = Omit<SessionSnapshot, "sessionKey">;

/** Row shape for session listings */
export interface SessionSummary {
  id: string;
  name: string;
  projectId: string | null;
  status: SessionStatus;
  startTime: string;
  endTime: string | null;
  eventCount: number;
}
