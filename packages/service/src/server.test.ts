/**
 * Integration test for the testcast service routes.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import {
  encodeControlEnvelope,
  encodeEventEnvelope,
  type Config,
  type NavigationEvent,
} from "@testcast/core";
import { createServiceContext } from "./context.js";
import { createServer } from "./server.js";

const config: Config = {
  listenPort: 0,
  host: "127.0.0.1",
  maxEventCount: 3,
  codegenCacheSize: 10,
  defaultLanguage: "javascript",
  defaultFramework: "playwright",
  logLevel: "error",
  httpLogger: false,
  redactKeys: ["password"],
};

const openLogin: NavigationEvent = {
  id: "n1",
  type: "NAVIGATION",
  timestamp: 1700000000000,
  url: "https://shop.test/",
  targetUrl: "https://shop.test/login",
};

describe("testcast service", () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    app = await createServer(createServiceContext(config));
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  async function createSession(name = "Checkout"): Promise<{ id: string; sessionKey: string }> {
    const response = await app.inject({
      method: "POST",
      url: "/api/recorder/sessions",
      payload: { name },
    });
    expect(response.statusCode).toBe(201);
    return response.json();
  }

  function postEnvelope(sessionId: string, key: string, envelope: object) {
    return app.inject({
      method: "POST",
      url: `/api/recorder/events/${sessionId}`,
      headers: { "x-session-key": key },
      payload: envelope,
    });
  }

  it("GET /api/health returns ok", async () => {
    const response = await app.inject({ method: "GET", url: "/api/health" });

    expect(response.statusCode).toBe(200);
    const health = response.json();
    expect(health.status).toBe("ok");
    expect(health.sessions).toBe(0);
    expect(health.connectedAgents).toBe(0);
    expect(health).toHaveProperty("pid");
  });

  it("POST /api/recorder/sessions creates an active session with a key", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/api/recorder/sessions",
      payload: { name: "Checkout", baseUrl: "https://shop.test/" },
    });

    expect(response.statusCode).toBe(201);
    const session = response.json();
    expect(session.status).toBe("ACTIVE");
    expect(session.baseUrl).toBe("https://shop.test/");
    expect(session.admission).toEqual({ maxEventCount: 3 });
    expect(session.sessionKey).toMatch(/^[0-9a-f]{32}$/);
    expect(session.events).toEqual([]);
  });

  it("rejects a session without a name", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/api/recorder/sessions",
      payload: {},
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: "Invalid session request",
      issues: ["name: Required"],
    });
  });

  it("lists and reads sessions without exposing the key", async () => {
    const { id } = await createSession();
    await app.inject({ method: "POST", url: `/api/recorder/sessions/${id}/pause` });

    const paused = await app.inject({
      method: "GET",
      url: "/api/recorder/sessions?status=PAUSED",
    });
    expect(paused.json().map((summary: { id: string }) => summary.id)).toEqual([id]);

    const active = await app.inject({
      method: "GET",
      url: "/api/recorder/sessions?status=ACTIVE",
    });
    expect(active.json()).toEqual([]);

    const bad = await app.inject({ method: "GET", url: "/api/recorder/sessions?status=bogus" });
    expect(bad.statusCode).toBe(400);

    const single = await app.inject({ method: "GET", url: `/api/recorder/sessions/${id}` });
    expect(single.statusCode).toBe(200);
    expect(single.json()).not.toHaveProperty("sessionKey");

    const missing = await app.inject({ method: "GET", url: "/api/recorder/sessions/nope" });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({ error: "Session not found" });
  });

  it("ingests events over the HTTP fallback endpoint", async () => {
    const { id, sessionKey } = await createSession();
    const envelope = encodeEventEnvelope(id, openLogin, 1700000000000);

    const wrongKey = await postEnvelope(id, "test-wrong-key", envelope);
    expect(wrongKey.statusCode).toBe(401);

    const first = await postEnvelope(id, sessionKey, envelope);
    expect(first.statusCode).toBe(202);
    expect(first.json()).toEqual({ accepted: true, eventId: "n1", duplicate: false });

    const retry = await postEnvelope(id, sessionKey, envelope);
    expect(retry.json()).toEqual({ accepted: true, eventId: "n1", duplicate: true });

    const events = await app.inject({ method: "GET", url: `/api/recorder/sessions/${id}/events` });
    expect(events.json()).toEqual([openLogin]);
  });

  it("answers refused and malformed envelopes with client errors", async () => {
    const { id, sessionKey } = await createSession();
    await app.inject({ method: "POST", url: `/api/recorder/sessions/${id}/pause` });

    const refused = await postEnvelope(
      id,
      sessionKey,
      encodeEventEnvelope(id, openLogin, 1700000000000)
    );
    expect(refused.statusCode).toBe(409);
    expect(refused.json()).toEqual({
      accepted: false,
      eventId: "n1",
      error: "Session is paused",
    });

    const malformed = await postEnvelope(id, sessionKey, { type: "CLICK" });
    expect(malformed.statusCode).toBe(400);
    expect(malformed.json().error).toBe("Invalid envelope");

    const control = await postEnvelope(
      id,
      sessionKey,
      encodeControlEnvelope(id, "HEARTBEAT", {}, 1700000000000)
    );
    expect(control.statusCode).toBe(202);
    expect(control.json()).toEqual({ accepted: true, type: "HEARTBEAT" });
  });

  it("moves a session through its lifecycle", async () => {
    const { id } = await createSession();

    const paused = await app.inject({ method: "POST", url: `/api/recorder/sessions/${id}/pause` });
    expect(paused.json()).toMatchObject({ status: "PAUSED", agentNotified: false });

    const resumed = await app.inject({ method: "POST", url: `/api/recorder/sessions/${id}/resume` });
    expect(resumed.json().status).toBe("ACTIVE");

    const stopped = await app.inject({ method: "POST", url: `/api/recorder/sessions/${id}/stop` });
    expect(stopped.json().status).toBe("COMPLETED");
    expect(stopped.json().endTime).not.toBeNull();

    const again = await app.inject({ method: "POST", url: `/api/recorder/sessions/${id}/fail` });
    expect(again.statusCode).toBe(409);
    expect(again.json()).toEqual({ error: "Cannot fail a COMPLETED session" });

    const missing = await app.inject({ method: "POST", url: "/api/recorder/sessions/nope/stop" });
    expect(missing.statusCode).toBe(404);
  });

  it("reports commands that cannot reach an agent", async () => {
    const { id } = await createSession();

    const noAgent = await app.inject({
      method: "POST",
      url: `/api/recorder/sessions/${id}/commands`,
      payload: { action: "STATUS" },
    });
    expect(noAgent.statusCode).toBe(409);
    expect(noAgent.json()).toEqual({ error: "No agent connected" });

    const invalid = await app.inject({
      method: "POST",
      url: `/api/recorder/sessions/${id}/commands`,
      payload: { action: "REBOOT" },
    });
    expect(invalid.statusCode).toBe(400);
  });

  it("GET /api/recorder/status/:id summarises the session", async () => {
    const { id, sessionKey } = await createSession();
    await postEnvelope(id, sessionKey, encodeEventEnvelope(id, openLogin, 1700000000000));

    const response = await app.inject({ method: "GET", url: `/api/recorder/status/${id}` });
    expect(response.json()).toMatchObject({
      sessionId: id,
      status: "ACTIVE",
      eventCount: 1,
      agentConnected: false,
      agent: null,
      agentErrors: 0,
      lastStatus: null,
    });
  });

  it("POST /api/codegen/generate generates and caches", async () => {
    const payload = {
      steps: [openLogin],
      options: { language: "python", includeComments: false, includeImports: false },
    };

    const first = await app.inject({ method: "POST", url: "/api/codegen/generate", payload });
    expect(first.statusCode).toBe(200);
    expect(first.json()).toMatchObject({
      language: "python",
      framework: "selenium",
      fileExtension: ".py",
      cached: false,
    });
    expect(first.json().code).toContain('driver.get("https://shop.test/login")');

    const second = await app.inject({ method: "POST", url: "/api/codegen/generate", payload });
    expect(second.json().cached).toBe(true);

    const invalid = await app.inject({
      method: "POST",
      url: "/api/codegen/generate",
      payload: { steps: "none" },
    });
    expect(invalid.statusCode).toBe(400);
  });

  it("POST /api/recorder/sessions/:id/generate uses the recorded events", async () => {
    const { id, sessionKey } = await createSession();
    await postEnvelope(id, sessionKey, encodeEventEnvelope(id, openLogin, 1700000000000));

    const response = await app.inject({
      method: "POST",
      url: `/api/recorder/sessions/${id}/generate`,
    });
    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body).toMatchObject({
      sessionId: id,
      language: "javascript",
      framework: "playwright",
      fileExtension: ".js",
    });
    expect(body.code).toContain('await page.goto("https://shop.test/login");');
  });
});
