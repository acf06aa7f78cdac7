import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { AddressInfo } from "node:net";
import type { FastifyInstance } from "fastify";
import { WebSocket } from "ws";
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
  maxEventCount: 100,
  codegenCacheSize: 10,
  defaultLanguage: "javascript",
  defaultFramework: "playwright",
  logLevel: "error",
  httpLogger: false,
  redactKeys: [],
};

const openHome: NavigationEvent = {
  id: "n1",
  type: "NAVIGATION",
  timestamp: 1700000000000,
  url: "https://shop.test/",
  targetUrl: "https://shop.test/home",
};

/** Client socket that buffers parsed messages until a test asks for them */
class TestClient {
  readonly socket: WebSocket;
  private readonly received: unknown[] = [];
  private waiting: ((message: unknown) => void) | null = null;

  constructor(url: string) {
    this.socket = new WebSocket(url);
    this.socket.on("message", (data) => {
      const message: unknown = JSON.parse(data.toString());
      if (this.waiting) {
        const resolve = this.waiting;
        this.waiting = null;
        resolve(message);
      } else {
        this.received.push(message);
      }
    });
  }

  opened(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.once("open", () => resolve());
      this.socket.once("error", reject);
    });
  }

  closed(): Promise<number> {
    return new Promise((resolve) => {
      this.socket.once("close", (code: number) => resolve(code));
    });
  }

  next(): Promise<unknown> {
    const queued = this.received.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  send(message: object): void {
    this.socket.send(JSON.stringify(message));
  }
}

describe("recorder channel", () => {
  let app: FastifyInstance;
  let base: string;
  const clients: TestClient[] = [];

  beforeEach(async () => {
    app = await createServer(createServiceContext(config));
    await app.listen({ port: 0, host: "127.0.0.1" });
    const address: AddressInfo | string | null = app.server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Expected a TCP address");
    }
    base = `127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    for (const client of clients.splice(0)) {
      client.socket.terminate();
    }
    await app.close();
  });

  async function createSession(): Promise<{ id: string; sessionKey: string }> {
    const response = await app.inject({
      method: "POST",
      url: "/api/recorder/sessions",
      payload: { name: "Channel" },
    });
    return response.json();
  }

  function connect(sessionId: string, key: string): TestClient {
    const client = new TestClient(
      `ws://${base}/ws/recorder/${encodeURIComponent(sessionId)}?key=${encodeURIComponent(key)}`
    );
    clients.push(client);
    return client;
  }

  it("acknowledges events and heartbeats", async () => {
    const { id, sessionKey } = await createSession();
    const client = connect(id, sessionKey);
    await client.opened();

    client.send(encodeEventEnvelope(id, openHome, 1700000000000));
    expect(await client.next()).toEqual({
      type: "ACK",
      eventId: "n1",
      accepted: true,
      duplicate: false,
    });

    client.send(encodeControlEnvelope(id, "HEARTBEAT", {}, 1700000000000));
    expect(await client.next()).toMatchObject({ type: "HEARTBEAT_RESPONSE" });

    const events = await app.inject({ method: "GET", url: `/api/recorder/sessions/${id}/events` });
    expect(events.json()).toEqual([openHome]);
  });

  it("closes with 4401 for a bad session key", async () => {
    const { id } = await createSession();
    const client = connect(id, "test-wrong-key");

    expect(await client.closed()).toBe(4401);
  });

  it("closes with 4404 for an unknown session", async () => {
    const client = connect("missing", "test-key");

    expect(await client.closed()).toBe(4404);
  });

  it("supersedes the previous connection for a session", async () => {
    const { id, sessionKey } = await createSession();
    const first = connect(id, sessionKey);
    await first.opened();
    const firstClosed = first.closed();

    const second = connect(id, sessionKey);
    await second.opened();

    expect(await firstClosed).toBe(4000);
  });

  it("pushes commands to the connected agent", async () => {
    const { id, sessionKey } = await createSession();
    const client = connect(id, sessionKey);
    await client.opened();

    const response = await app.inject({
      method: "POST",
      url: `/api/recorder/sessions/${id}/commands`,
      payload: { action: "STATUS" },
    });

    expect(response.statusCode).toBe(202);
    expect(response.json()).toEqual({ delivered: true, action: "STATUS" });
    expect(await client.next()).toEqual({ type: "COMMAND", action: "STATUS" });
  });
});
