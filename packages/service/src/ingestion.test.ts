import { describe, it, expect, beforeEach } from "vitest";
import {
  encodeControlEnvelope,
  encodeEventEnvelope,
  type ClickEvent,
  type RecordingSession,
} from "@testcast/core";
import { IngestionService } from "./ingestion.js";
import { InMemorySnapshotStore, SessionRegistry } from "./registry.js";

const NOW = Date.parse("2026-03-01T10:00:00.000Z");

function click(id: string): ClickEvent {
  return {
    id,
    type: "CLICK",
    timestamp: NOW,
    url: "https://shop.test/cart",
    element: { tagName: "button", id: "checkout" },
    button: "LEFT",
  };
}

describe("IngestionService", () => {
  let registry: SessionRegistry;
  let ingestion: IngestionService;
  let session: RecordingSession;

  beforeEach(() => {
    registry = new SessionRegistry({
      admission: { maxEventCount: 2 },
      store: new InMemorySnapshotStore(),
      now: () => NOW,
    });
    ingestion = new IngestionService({
      registry,
      redactKeys: ["password"],
      now: () => NOW,
    });
    session = registry.create({ name: "Cart" });
  });

  const send = (envelope: unknown) =>
    ingestion.handleEnvelope(session.id, envelope, "websocket");

  it("appends a decoded event", async () => {
    const result = await send(encodeEventEnvelope(session.id, click("e1"), NOW));

    expect(result).toEqual({ status: "accepted", eventId: "e1", duplicate: false });
    expect(session.lastEvent()).toEqual(click("e1"));
  });

  it("acknowledges a retransmitted event without appending it", async () => {
    await send(encodeEventEnvelope(session.id, click("e1"), NOW));
    const again = await send(JSON.stringify(encodeEventEnvelope(session.id, click("e1"), NOW)));

    expect(again).toEqual({ status: "accepted", eventId: "e1", duplicate: true });
    expect(session.eventCount()).toBe(1);
  });

  it("refuses events past the admission cap", async () => {
    await send(encodeEventEnvelope(session.id, click("e1"), NOW));
    await send(encodeEventEnvelope(session.id, click("e2"), NOW));
    const third = await send(encodeEventEnvelope(session.id, click("e3"), NOW));

    expect(third).toEqual({
      status: "refused",
      eventId: "e3",
      reason: "Session is at capacity",
    });
    expect(session.eventCount()).toBe(2);
  });

  it("refuses events while paused", async () => {
    await registry.mutate(session.id, (current) => current.pause());
    const result = await send(encodeEventEnvelope(session.id, click("e1"), NOW));

    expect(result).toEqual({ status: "refused", eventId: "e1", reason: "Session is paused" });
  });

  it("keeps arrival order across concurrent envelopes", async () => {
    await Promise.all([
      send(encodeEventEnvelope(session.id, click("a"), NOW)),
      send(encodeEventEnvelope(session.id, click("b"), NOW)),
    ]);
    expect(session.snapshot().events.map((event) => event.id)).toEqual(["a", "b"]);
  });

  it("reports malformed input", async () => {
    await expect(send("{oops")).resolves.toMatchObject({ status: "invalid" });
    await expect(
      send({ type: "CLICK", sessionId: session.id, timestamp: NOW, payload: { id: "x" } })
    ).resolves.toMatchObject({ status: "invalid" });
    await expect(
      send({ type: "BOGUS", sessionId: session.id, timestamp: NOW, payload: {} })
    ).resolves.toEqual({ status: "invalid", errors: ["Unknown envelope type: BOGUS"] });
  });

  it("rejects an envelope addressed to another session", async () => {
    const result = await send(encodeEventEnvelope("other", click("e1"), NOW));
    expect(result).toEqual({
      status: "invalid",
      errors: [`sessionId: expected ${session.id}, got other`],
    });
  });

  it("reports an unknown session", async () => {
    const result = await ingestion.handleEnvelope(
      "missing",
      encodeEventEnvelope("missing", click("e1"), NOW),
      "http"
    );
    expect(result).toEqual({ status: "unknown-session" });
  });

  it("records agent details from INIT", async () => {
    const result = await send(
      encodeControlEnvelope(
        session.id,
        "INIT",
        {
          userAgent: "test-agent",
          url: "https://shop.test/",
          viewport: { width: 1280, height: 720 },
          usingHttpFallback: true,
        },
        NOW
      )
    );

    expect(result).toEqual({ status: "control", type: "INIT" });
    expect(session.snapshot().agent).toEqual({
      userAgent: "test-agent",
      viewport: { width: 1280, height: 720 },
      initialUrl: "https://shop.test/",
      transport: "http",
      connectedAt: "2026-03-01T10:00:00.000Z",
    });
  });

  it("applies recorder control actions", async () => {
    await send(encodeControlEnvelope(session.id, "RECORDER_CONTROL", { action: "PAUSE" }, NOW));
    expect(session.status).toBe("PAUSED");

    await send(encodeControlEnvelope(session.id, "RECORDER_CONTROL", { action: "RESUME" }, NOW));
    expect(session.status).toBe("ACTIVE");

    await send(encodeControlEnvelope(session.id, "RECORDER_CONTROL", { action: "STOP" }, NOW));
    expect(session.status).toBe("COMPLETED");
  });

  it("keeps the last agent status report", async () => {
    await send(
      encodeControlEnvelope(
        session.id,
        "STATUS",
        { recording: "paused", connection: "CONNECTED", url: "https://shop.test/", queued: 3 },
        NOW
      )
    );
    expect(ingestion.lastStatus(session.id)).toEqual({
      recording: "paused",
      connection: "CONNECTED",
      url: "https://shop.test/",
      queued: 3,
      receivedAt: "2026-03-01T10:00:00.000Z",
    });
  });

  it("stores agent error reports", async () => {
    await send(
      encodeControlEnvelope(session.id, "ERROR", { message: "boom", context: "capture" }, 42)
    );
    expect(session.snapshot().agentErrors).toEqual([
      { message: "boom", context: "capture", timestamp: 42 },
    ]);
  });

  it("treats heartbeats as control messages", async () => {
    await expect(
      send(encodeControlEnvelope(session.id, "HEARTBEAT", {}, NOW))
    ).resolves.toEqual({ status: "control", type: "HEARTBEAT" });
  });
});
