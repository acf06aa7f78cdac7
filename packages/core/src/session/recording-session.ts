/**
 * Recording session: admission control and lifecycle for one recording.
 *
 * Admission failures are reported as `false`, never thrown. COMPLETED and
 * FAILED are terminal; the first terminal transition fixes the end time.
 */

import { randomUUID } from "node:crypto";
import type {
  AdmissionConfig,
  AgentErrorReport,
  AgentInfo,
  RecordedEvent,
  SessionSnapshot,
  SessionStatus,
  SessionSummary,
  SessionView,
} from "../types/index.js";

/** Agent error reports kept per session; older ones are dropped */
export const MAX_AGENT_ERRORS = 50;

export interface RecordingSessionInit {
  name: string;
  admission: AdmissionConfig;
  id?: string;
  projectId?: string | null;
  description?: string | null;
  browser?: string | null;
  framework?: string | null;
  baseUrl?: string | null;

  /** Clock override, epoch milliseconds */
  now?: () => number;
}

export interface RecordingSession {
  readonly id: string;
  readonly sessionKey: string;
  readonly status: SessionStatus;
  readonly name: string;

  /** Append a top-level event; false when not ACTIVE or at capacity */
  addEvent(event: RecordedEvent): boolean;

  pause(): boolean;
  resume(): boolean;
  complete(): boolean;
  error(): boolean;

  /** Elapsed time until the end time, or until now while running */
  durationMillis(): number;

  isTerminal(): boolean;
  eventCount(): number;
  lastEvent(): RecordedEvent | undefined;
  hasEvent(eventId: string): boolean;

  recordAgentInfo(info: AgentInfo): void;
  recordAgentError(report: AgentErrorReport): void;

  snapshot(): SessionSnapshot;
  view(): SessionView;
  summary(): SessionSummary;
}

/** Random hex key the agent presents to authenticate */
export function generateSessionKey(): string {
  return randomUUID().replace(/-/g, "");
}

function isTerminalStatus(status: SessionStatus): boolean {
  return status === "COMPLETED" || status === "FAILED";
}

function buildSession(
  initial: SessionSnapshot,
  now: () => number
): RecordingSession {
  const state: SessionSnapshot = structuredClone(initial);
  const seenIds = new Set(state.events.map((event) => event.id));

  function finish(status: SessionStatus): boolean {
    if (isTerminalStatus(state.status)) {
      return false;
    }
    state.status = status;
    state.endTime = new Date(now()).toISOString();
    return true;
  }

  function view(): SessionView {
    const { sessionKey: _key, ...rest } = structuredClone(state);
    return rest;
  }

  return {
    get id() {
      return state.id;
    },
    get sessionKey() {
      return state.sessionKey;
    },
    get status() {
      return state.status;
    },
    get name() {
      return state.name;
    },

    addEvent(event) {
      if (state.status !== "ACTIVE") {
        return false;
      }
      if (state.events.length >= state.admission.maxEventCount) {
        return false;
      }
      if (seenIds.has(event.id)) {
        return false;
      }
      state.events.push(structuredClone(event));
      seenIds.add(event.id);
      return true;
    },

    pause() {
      if (isTerminalStatus(state.status)) {
        return false;
      }
      state.status = "PAUSED";
      return true;
    },

    resume() {
      if (isTerminalStatus(state.status)) {
        return false;
      }
      state.status = "ACTIVE";
      return true;
    },

    complete() {
      return finish("COMPLETED");
    },

    error() {
      return finish("FAILED");
    },

    durationMillis() {
      const end = state.endTime ? Date.parse(state.endTime) : now();
      return end - Date.parse(state.startTime);
    },

    isTerminal() {
      return isTerminalStatus(state.status);
    },

    eventCount() {
      return state.events.length;
    },

    lastEvent() {
      const last = state.events[state.events.length - 1];
      return last ? structuredClone(last) : undefined;
    },

    hasEvent(eventId) {
      return seenIds.has(eventId);
    },

    recordAgentInfo(info) {
      state.agent = { ...info };
    },

    recordAgentError(report) {
      state.agentErrors.push({ ...report });
      if (state.agentErrors.length > MAX_AGENT_ERRORS) {
        state.agentErrors.splice(0, state.agentErrors.length - MAX_AGENT_ERRORS);
      }
    },

    snapshot() {
      return structuredClone(state);
    },

    view,

    summary() {
      return {
        id: state.id,
        name: state.name,
        projectId: state.projectId,
        status: state.status,
        startTime: state.startTime,
        endTime: state.endTime,
        eventCount: state.events.length,
      };
    },
  };
}

/**
 * Start a new ACTIVE session with a fresh key.
 */
export function createRecordingSession(
  init: RecordingSessionInit
): RecordingSession {
  const now = init.now ?? Date.now;
  return buildSession(
    {
      id: init.id ?? randomUUID(),
      name: init.name,
      projectId: init.projectId ?? null,
      description: init.description ?? null,
      browser: init.browser ?? null,
      framework: init.framework ?? null,
      baseUrl: init.baseUrl ?? null,
      status: "ACTIVE",
      startTime: new Date(now()).toISOString(),
      endTime: null,
      sessionKey: generateSessionKey(),
      admission: { ...init.admission },
      agent: null,
      agentErrors: [],
      events: [],
    },
    now
  );
}

/**
 * Rebuild a session from a stored snapshot, status and key included.
 */
export function restoreRecordingSession(
  snapshot: SessionSnapshot,
  now: () => number = Date.now
): RecordingSession {
  return buildSession(snapshot, now);
}
