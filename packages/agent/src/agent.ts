/**
 * Recorder agent: ties DOM capture, SPA navigation tracking and delivery
 * together for one page and one recording session.
 */

import type { NavigationTrigger, RecordedEvent } from "@testcast/core";
import {
  decodeInboundMessage,
  encodeControlEnvelope,
  encodeEventEnvelope,
} from "@testcast/core/wire";
import type { ControlType, OutboundEnvelope, RecorderAction } from "@testcast/core/wire";
import { installCaptureListeners } from "./capture.js";
import { ConnectionManager } from "./connection.js";
import { HttpFallbackTransport } from "./http-fallback.js";
import { createAgentLogger } from "./logger.js";
import { NavigationWatcher } from "./navigation.js";
import type {
  AgentLogger,
  AgentOptions,
  ConnectionState,
  FetchLike,
  RecordingStatus,
  SocketFactory,
} from "./types.js";

/** Wraps the page's WebSocket in the SocketLike seam */
export const browserSocketFactory: SocketFactory = (url, handlers) => {
  const socket = new WebSocket(url);
  socket.onopen = () => handlers.onOpen();
  socket.onmessage = (event) => {
    if (typeof event.data === "string") {
      handlers.onMessage(event.data);
    }
  };
  socket.onclose = (event) => handlers.onClose(event.code);
  socket.onerror = () => handlers.onError();
  return socket;
};

const browserFetch: FetchLike = (url, init) => fetch(url, init);

function randomPrefix(): string {
  return Math.random().toString(36).slice(2, 10);
}

export class RecorderAgent {
  private status: RecordingStatus = "recording";
  private sequence = 0;
  private readonly logger: AgentLogger;
  private readonly connection: ConnectionManager;
  private readonly http: HttpFallbackTransport;
  private readonly navigation: NavigationWatcher;
  private readonly now: () => number;
  private readonly idPrefix: string;
  private removeListeners: (() => void) | null = null;

  constructor(
    private readonly win: Window,
    private readonly options: AgentOptions
  ) {
    this.logger = createAgentLogger(options.debug === true);
    this.now = options.now ?? Date.now;
    this.idPrefix = options.idPrefix ?? randomPrefix();

    const secure = win.location.protocol === "https:";
    this.connection = new ConnectionManager(
      {
        serverHost: options.serverHost,
        sessionId: options.sessionId,
        sessionKey: options.sessionKey,
        secure,
        socketFactory: options.socketFactory ?? browserSocketFactory,
        logger: this.logger,
        now: this.now,
      },
      {
        onOpen: () => this.announce(false),
        onMessage: (data) => this.handleMessage(data),
        onFallback: () => this.announce(true),
        onStateChange: (state) => this.logger.debug(`Connection state: ${state}`),
      }
    );
    this.http = new HttpFallbackTransport({
      baseUrl: `${secure ? "https:" : "http:"}//${options.serverHost}`,
      sessionId: options.sessionId,
      sessionKey: options.sessionKey,
      fetch: options.fetch ?? browserFetch,
      logger: this.logger,
      now: this.now,
    });
    this.navigation = new NavigationWatcher(win, (from, to, trigger) =>
      this.recordNavigation(from, to, trigger)
    );
  }

  get recordingStatus(): RecordingStatus {
    return this.status;
  }

  get connectionState(): ConnectionState {
    return this.connection.state;
  }

  get active(): boolean {
    return this.status !== "stopped";
  }

  start(): void {
    if (this.removeListeners) {
      return;
    }
    this.removeListeners = installCaptureListeners(this.win, {
      isRecording: () => this.status === "recording",
      nextId: () => this.nextId(),
      now: this.now,
      emit: (event) => this.record(event),
      unload: () => this.sendControl("UNLOAD", { url: this.win.location.href }),
    });
    this.navigation.start();
    this.http.start();
    this.connection.connect();
  }

  /** Send a recorded event; dropped unless recording */
  record(event: RecordedEvent): void {
    if (this.status !== "recording") {
      return;
    }
    this.deliver(encodeEventEnvelope(this.options.sessionId, event, this.now()));
  }

  /** Apply a service command; ignored once stopped */
  handleCommand(action: RecorderAction): void {
    if (this.status === "stopped") {
      return;
    }
    switch (action) {
      case "PAUSE":
        this.status = "paused";
        this.sendControl("RECORDER_CONTROL", { action });
        break;
      case "RESUME":
        this.status = "recording";
        this.sendControl("RECORDER_CONTROL", { action });
        break;
      case "STOP":
        this.stop();
        break;
      case "STATUS":
        this.sendControl("STATUS", {
          recording: this.status,
          connection: this.connection.state,
          url: this.win.location.href,
          queued: this.http.queued,
        });
        break;
      case "CAPTURE_SCREENSHOT":
        this.sendControl("SCREENSHOT_REQUEST", {
          url: this.win.location.href,
          title: this.win.document.title,
        });
        break;
    }
  }

  /** Stop recording, notify the service and release every resource */
  stop(): void {
    if (this.status === "stopped") {
      return;
    }
    this.status = "stopped";
    this.sendControl("RECORDER_CONTROL", { action: "STOP" });
    this.removeListeners?.();
    this.removeListeners = null;
    this.navigation.stop();
    this.http.stop();
    this.connection.disconnect();
  }

  /** Log an agent failure and report it over HTTP */
  reportError(context: string, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(`${context}:`, error);
    const envelope = encodeControlEnvelope(
      this.options.sessionId,
      "ERROR",
      { message, context },
      this.now()
    );
    this.http.send(envelope).catch((sendError: unknown) => {
      this.logger.error("Failed to report error:", sendError);
    });
  }

  private nextId(): string {
    this.sequence += 1;
    return `${this.idPrefix}-${this.sequence}`;
  }

  private recordNavigation(from: string, to: string, trigger: NavigationTrigger): void {
    // page scripts may have replaced the window property
    if (this.active && this.win.__testcastAgent !== this) {
      this.logger.debug("Re-registering agent on window");
      this.win.__testcastAgent = this;
    }
    this.record({
      id: this.nextId(),
      type: "NAVIGATION",
      timestamp: this.now(),
      url: to,
      title: this.win.document.title,
      sourceUrl: from,
      targetUrl: to,
      trigger,
    });
  }

  private announce(usingHttpFallback: boolean): void {
    const nav = this.win.navigator;
    this.sendControl("INIT", {
      userAgent: nav.userAgent,
      platform: nav.platform,
      language: nav.language,
      url: this.win.location.href,
      title: this.win.document.title,
      viewport: { width: this.win.innerWidth, height: this.win.innerHeight },
      usingHttpFallback,
    });
  }

  private handleMessage(data: string): void {
    const decoded = decodeInboundMessage(data);
    if (!decoded.ok) {
      this.reportError("Unreadable message from service", decoded.errors.join("; "));
      return;
    }
    const message = decoded.value;
    switch (message.type) {
      case "COMMAND":
        this.handleCommand(message.action);
        break;
      case "PING":
        this.sendControl("PONG", {});
        break;
      case "HEARTBEAT_RESPONSE":
        this.logger.debug("Heartbeat acknowledged");
        break;
      case "ACK":
        if (!message.accepted) {
          this.logger.warn(`Event ${message.eventId} rejected: ${message.reason ?? "unknown"}`);
        }
        break;
    }
  }

  private sendControl(type: ControlType, payload: Record<string, unknown>): void {
    this.deliver(encodeControlEnvelope(this.options.sessionId, type, payload, this.now()));
  }

  private deliver(envelope: OutboundEnvelope): void {
    if (this.connection.send(JSON.stringify(envelope))) {
      return;
    }
    this.http.send(envelope).catch((error: unknown) => {
      this.logger.error(`Failed to deliver ${envelope.type}:`, error);
    });
  }
}
