export {
  locatorSchema,
  elementInfoSchema,
  conditionSchema,
  recordedEventSchema,
  variableSchema,
  generationOptionsSchema,
  generationRequestSchema,
  agentInfoSchema,
  sessionSnapshotSchema,
  formatIssues,
} from "./schemas.js";
export {
  CONTROL_TYPES,
  RECORDER_ACTIONS,
  envelopeSchema,
  initPayloadSchema,
  errorPayloadSchema,
  controlPayloadSchema,
  statusPayloadSchema,
  inboundMessageSchema,
  isEventKind,
  isControlType,
  encodeEventEnvelope,
  encodeControlEnvelope,
  decodeEnvelope,
  decodeEventPayload,
  decodeEventEnvelope,
  decodeInboundMessage,
} from "./envelope.js";
export type {
  ControlType,
  RecorderAction,
  Envelope,
  EventEnvelope,
  OutboundEnvelope,
  InitPayload,
  StatusPayload,
  InboundMessage,
  DecodeResult,
} from "./envelope.js";
export {
  CLOSE_NORMAL,
  CLOSE_SUPERSEDED,
  CLOSE_UNAUTHORIZED,
  CLOSE_UNKNOWN_SESSION,
  classifyTransportFailure,
} from "../utils/failure-category.js";
export type {
  FailureCategory,
  TransportFailure,
} from "../utils/failure-category.js";
