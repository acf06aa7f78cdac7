/**
 * Duplex recorder channel.
 *
 * Agents connect to /ws/recorder/{sessionId}?key={sessionKey}. One socket
 * per session; a newer connection supersedes the older one. Envelopes are
 * handed to the ingestion service in arrival order and answered with ACK
 * or HEARTBEAT_RESPONSE; commands are pushed back over the same socket.
 */

import type { IncomingMessage, Server } from "node:http";
import type { Duplex } from "node:stream";
import { WebSocket, WebSocketServer, type RawData } from "ws";
import {
  CLOSE_NORMAL,
  CLOSE_SUPERSEDED,
  CLOSE_UNAUTHORIZED,
  CLOSE_UNKNOWN_SESSION,
  createLogger,
  type InboundMessage,
  type RecorderAction,
} from "@testcast/core";
import type { IngestionService, IngestResult } from "./ingestion.js";
import type { SessionRegistry } from "./registry.js";

const logger = createLogger("channel");

const CHANNEL_PATH = /^\/ws\/recorder\/([^/]+)$/;

export interface RecorderChannelOptions {
  registry: SessionRegistry;
  ingestion: IngestionService;
  now?: () => number;
}

function rawText(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString("utf8");
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  return Buffer.from(data).toString("utf8");
}

export class RecorderChannel {
  private readonly wss = new WebSocketServer({ noServer: true });
  private readonly sockets = new Map<string, WebSocket>();
  private readonly now: () => number;

  constructor(private readonly options: RecorderChannelOptions) {
    this.now = options.now ?? Date.now;
  }

  /** Number of sessions with a connected agent */
  get connectedCount(): number {
    return this.sockets.size;
  }

  /** Route matching upgrade requests on `server` to the channel */
  attach(server: Server): void {
    server.on("upgrade", this.handleUpgrade);
  }

  isConnected(sessionId: string): boolean {
    return this.sockets.get(sessionId)?.readyState === WebSocket.OPEN;
  }

  /** Push a command to the session's agent; false when none is connected */
  sendCommand(sessionId: string, action: RecorderAction): boolean {
    return this.send(sessionId, { type: "COMMAND", action });
  }

  close(): void {
    for (const socket of this.sockets.values()) {
      socket.close(CLOSE_NORMAL, "Service shutting down");
    }
    this.sockets.clear();
    this.wss.close();
  }

  private readonly handleUpgrade = (
    request: IncomingMessage,
    socket: Duplex,
    head: Buffer
  ): void => {
    const url = new URL(request.url ?? "/", "http://localhost");
    const match = CHANNEL_PATH.exec(url.pathname);
    const encodedId = match?.[1];
    if (!encodedId) {
      socket.destroy();
      return;
    }
    const sessionId = decodeURIComponent(encodedId);
    const key = url.searchParams.get("key");
    this.wss.handleUpgrade(request, socket, head, (ws) => {
      this.accept(ws, sessionId, key);
    });
  };

  private accept(ws: WebSocket, sessionId: string, key: string | null): void {
    const session = this.options.registry.get(sessionId);
    if (!session) {
      ws.close(CLOSE_UNKNOWN_SESSION, "Unknown session");
      return;
    }
    if (key !== session.sessionKey) {
      logger.warn(`Rejected channel for ${sessionId}: bad session key`);
      ws.close(CLOSE_UNAUTHORIZED, "Invalid session key");
      return;
    }

    const previous = this.sockets.get(sessionId);
    if (previous) {
      previous.close(CLOSE_SUPERSEDED, "Superseded by a newer connection");
    }
    this.sockets.set(sessionId, ws);
    logger.info(`Agent channel open for ${sessionId}`);

    ws.on("message", (data: RawData) => {
      this.options.ingestion
        .handleEnvelope(sessionId, rawText(data), "websocket")
        .then((result) => this.reply(ws, sessionId, result))
        .catch((error: unknown) => {
          logger.error(`Failed to ingest message for ${sessionId}:`, error);
        });
    });
    ws.on("close", (code: number) => {
      if (this.sockets.get(sessionId) === ws) {
        this.sockets.delete(sessionId);
      }
      logger.info(`Agent channel closed for ${sessionId} (code ${code})`);
    });
    ws.on("error", (error: Error) => {
      logger.warn(`Channel error for ${sessionId}:`, error.message);
    });
  }

  private reply(ws: WebSocket, sessionId: string, result: IngestResult): void {
    switch (result.status) {
      case "accepted":
        this.write(ws, {
          type: "ACK",
          eventId: result.eventId,
          accepted: true,
          duplicate: result.duplicate,
        });
        break;
      case "refused":
        this.write(ws, {
          type: "ACK",
          eventId: result.eventId,
          accepted: false,
          reason: result.reason,
        });
        break;
      case "control":
        if (result.type === "HEARTBEAT") {
          this.write(ws, { type: "HEARTBEAT_RESPONSE", timestamp: this.now() });
        }
        break;
      case "invalid":
        logger.warn(`Invalid envelope for ${sessionId}:`, result.errors.join("; "));
        break;
      case "unknown-session":
        ws.close(CLOSE_UNKNOWN_SESSION, "Unknown session");
        break;
    }
  }

  private send(sessionId: string, message: InboundMessage): boolean {
    const ws = this.sockets.get(sessionId);
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      return false;
    }
    return this.write(ws, message);
  }

  private write(ws: WebSocket, message: InboundMessage): boolean {
    if (ws.readyState !== WebSocket.OPEN) {
      return false;
    }
    try {
      ws.send(JSON.stringify(message));
      return true;
    } catch (error) {
      logger.warn("Failed to send to agent:", error);
      return false;
    }
  }
}
