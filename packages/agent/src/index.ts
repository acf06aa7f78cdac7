/**
 * @testcast/agent
 *
 * In-page capture and transport agent.
 */

export { RecorderAgent, browserSocketFactory } from "./agent.js";
export {
  installRecorderAgent,
  resumeRecorderAgent,
  readStoredSession,
  clearStoredSession,
  SESSION_STORAGE_KEY,
} from "./guard.js";
export type { StoredSession } from "./guard.js";
export {
  ConnectionManager,
  backoffDelay,
  MAX_CONSECUTIVE_FAILURES,
  CONNECT_TIMEOUT_MS,
  HEARTBEAT_INTERVAL_MS,
} from "./connection.js";
export type { ConnectionCallbacks, ConnectionOptions } from "./connection.js";
export { HttpFallbackTransport, QUEUE_CAPACITY } from "./http-fallback.js";
export type { HttpFallbackOptions } from "./http-fallback.js";
export { installCaptureListeners, PASSWORD_MASK } from "./capture.js";
export type { CaptureSink } from "./capture.js";
export { NavigationWatcher } from "./navigation.js";
export { cssSelector, xpath, elementInfo } from "./element-info.js";
export { createAgentLogger } from "./logger.js";
export type * from "./types.js";
