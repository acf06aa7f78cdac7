/**
 * Wire envelopes shared by the agent and the service.
 *
 * Outbound (agent → service), same shape over WebSocket and HTTP:
 *   { type, sessionId, timestamp, payload }
 * Event envelopes carry a RecordedEvent whose `type` matches the envelope.
 * Inbound (service → agent) messages are flat objects keyed by `type`.
 */

import { z } from "zod";
import type { EventKind, RecordedEvent } from "../types/index.js";
import { EVENT_KINDS } from "../types/index.js";
import { formatIssues, recordedEventSchema } from "./schemas.js";

export const CONTROL_TYPES = [
  "INIT",
  "HEARTBEAT",
  "RECORDER_CONTROL",
  "STATUS",
  "ERROR",
  "SCREENSHOT_REQUEST",
  "UNLOAD",
  "PONG",
] as const;

export type ControlType = (typeof CONTROL_TYPES)[number];

export const RECORDER_ACTIONS = [
  "PAUSE",
  "RESUME",
  "STOP",
  "STATUS",
  "CAPTURE_SCREENSHOT",
] as const;

export type RecorderAction = (typeof RECORDER_ACTIONS)[number];

export interface Envelope {
  type: string;
  sessionId: string;

  /** Epoch milliseconds at send time */
  timestamp: number;

  payload: Record<string, unknown>;
}

export interface EventEnvelope {
  type: EventKind;
  sessionId: string;
  timestamp: number;
  payload: RecordedEvent;
}

/** Anything the agent sends */
export type OutboundEnvelope = Envelope | EventEnvelope;

export const envelopeSchema = z.object({
  type: z.string().min(1),
  sessionId: z.string().min(1),
  timestamp: z.number(),
  payload: z.record(z.unknown()),
});

export const initPayloadSchema = z.object({
  userAgent: z.string(),
  platform: z.string().optional(),
  language: z.string().optional(),
  url: z.string().optional(),
  title: z.string().optional(),
  viewport: z.object({ width: z.number(), height: z.number() }).optional(),
  usingHttpFallback: z.boolean().optional(),
});

export type InitPayload = z.infer<typeof initPayloadSchema>;

export const errorPayloadSchema = z.object({
  message: z.string(),
  context: z.string().optional(),
});

export const controlPayloadSchema = z.object({
  action: z.enum(["PAUSE", "RESUME", "STOP"]),
});

export const statusPayloadSchema = z.object({
  recording: z.enum(["recording", "paused", "stopped"]),
  connection: z.string(),
  url: z.string(),
  queued: z.number().int().nonnegative(),
});

export type StatusPayload = z.infer<typeof statusPayloadSchema>;

export const inboundMessageSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("COMMAND"),
    action: z.enum(RECORDER_ACTIONS),
  }),
  z.object({ type: z.literal("PING"), timestamp: z.number().optional() }),
  z.object({
    type: z.literal("HEARTBEAT_RESPONSE"),
    timestamp: z.number(),
  }),
  z.object({
    type: z.literal("ACK"),
    eventId: z.string(),
    accepted: z.boolean(),
    duplicate: z.boolean().optional(),
    reason: z.string().optional(),
  }),
]);

export type InboundMessage = z.infer<typeof inboundMessageSchema>;

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; errors: string[] };

export function isEventKind(type: string): type is EventKind {
  return EVENT_KINDS.some((kind) => kind === type);
}

export function isControlType(type: string): type is ControlType {
  return CONTROL_TYPES.some((control) => control === type);
}

export function encodeEventEnvelope(
  sessionId: string,
  event: RecordedEvent,
  timestamp: number
): EventEnvelope {
  return { type: event.type, sessionId, timestamp, payload: event };
}

export function encodeControlEnvelope(
  sessionId: string,
  type: ControlType,
  payload: Record<string, unknown>,
  timestamp: number
): Envelope {
  return { type, sessionId, timestamp, payload };
}

function parseJson(input: unknown): DecodeResult<unknown> {
  if (typeof input !== "string") {
    return { ok: true, value: input };
  }
  try {
    return { ok: true, value: JSON.parse(input) };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, errors: [`Malformed JSON: ${message}`] };
  }
}

/**
 * Decode any outbound envelope from a raw string or parsed object.
 */
export function decodeEnvelope(input: unknown): DecodeResult<Envelope> {
  const json = parseJson(input);
  if (!json.ok) {
    return json;
  }
  const parsed = envelopeSchema.safeParse(json.value);
  if (!parsed.success) {
    return { ok: false, errors: formatIssues(parsed.error) };
  }
  return { ok: true, value: parsed.data };
}

/**
 * Decode the payload of an event envelope into the IR.
 */
export function decodeEventPayload(
  envelope: Envelope
): DecodeResult<RecordedEvent> {
  if (!isEventKind(envelope.type)) {
    return { ok: false, errors: [`Not an event type: ${envelope.type}`] };
  }
  const parsed = recordedEventSchema.safeParse(envelope.payload);
  if (!parsed.success) {
    return { ok: false, errors: formatIssues(parsed.error) };
  }
  if (parsed.data.type !== envelope.type) {
    return {
      ok: false,
      errors: [
        `Envelope type ${envelope.type} does not match payload type ${parsed.data.type}`,
      ],
    };
  }
  return { ok: true, value: parsed.data };
}

export function decodeEventEnvelope(
  input: unknown
): DecodeResult<EventEnvelope> {
  const envelope = decodeEnvelope(input);
  if (!envelope.ok) {
    return envelope;
  }
  const event = decodeEventPayload(envelope.value);
  if (!event.ok) {
    return event;
  }
  return {
    ok: true,
    value: {
      type: event.value.type,
      sessionId: envelope.value.sessionId,
      timestamp: envelope.value.timestamp,
      payload: event.value,
    },
  };
}

export function decodeInboundMessage(
  input: unknown
): DecodeResult<InboundMessage> {
  const json = parseJson(input);
  if (!json.ok) {
    return json;
  }
  const parsed = inboundMessageSchema.safeParse(json.value);
  if (!parsed.success) {
    return { ok: false, errors: formatIssues(parsed.error) };
  }
  return { ok: true, value: parsed.data };
}
