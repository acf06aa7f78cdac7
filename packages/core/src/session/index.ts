export {
  MAX_AGENT_ERRORS,
  createRecordingSession,
  restoreRecordingSession,
  generateSessionKey,
} from "./recording-session.js";
export type {
  RecordingSession,
  RecordingSessionInit,
} from "./recording-session.js";
