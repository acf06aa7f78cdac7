/**
 * Duplex channel to the service with reconnect, heartbeat and a one-way
 * switch to HTTP delivery.
 *
 * Attempt order on a secure page: wss, then ws immediately, then ws with
 * exponential backoff (1s, 2s, 4s ... capped at 16s). Five consecutive
 * failures switch the agent to HTTP for the rest of its lifetime.
 */

import {
  CLOSE_NORMAL,
  classifyTransportFailure,
  encodeControlEnvelope,
} from "@testcast/core/wire";
import type {
  AgentLogger,
  ConnectionState,
  SocketFactory,
  SocketLike,
} from "./types.js";

export const MAX_CONSECUTIVE_FAILURES = 5;
export const CONNECT_TIMEOUT_MS = 5000;
export const HEARTBEAT_INTERVAL_MS = 30000;
export const BASE_BACKOFF_MS = 1000;
export const MAX_BACKOFF_MS = 16000;

type Timer = ReturnType<typeof setTimeout>;

export interface ConnectionCallbacks {
  /** Channel opened; the caller announces itself here */
  onOpen(): void;
  onMessage(data: string): void;

  /** Fired once, when the agent gives up on the duplex channel */
  onFallback(): void;
  onStateChange?(state: ConnectionState): void;
}

export interface ConnectionOptions {
  serverHost: string;
  sessionId: string;
  sessionKey: string;

  /** Page was served over https */
  secure: boolean;

  socketFactory: SocketFactory;
  logger: AgentLogger;
  now: () => number;
}

/** Delay before the k-th backoff retry (k starts at 1) */
export function backoffDelay(k: number): number {
  return Math.min(BASE_BACKOFF_MS * 2 ** (k - 1), MAX_BACKOFF_MS);
}

export class ConnectionManager {
  private currentState: ConnectionState = "DISCONNECTED";
  private socket: SocketLike | null = null;
  private attempt = 0;
  private failures = 0;
  private backoffStep = 0;
  private insecureOnly: boolean;
  private stopped = false;
  private connectTimer: Timer | null = null;
  private reconnectTimer: Timer | null = null;
  private heartbeatTimer: Timer | null = null;

  constructor(
    private readonly options: ConnectionOptions,
    private readonly callbacks: ConnectionCallbacks
  ) {
    this.insecureOnly = !options.secure;
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  /** Consecutive failed attempts since the last successful open */
  get consecutiveFailures(): number {
    return this.failures;
  }

  connect(): void {
    if (
      this.currentState === "HTTP_FALLBACK" ||
      this.socket !== null ||
      this.reconnectTimer !== null
    ) {
      return;
    }
    this.stopped = false;
    this.open("CONNECTING");
  }

  /**
   * Send over the open channel. Returns false when the caller should use
   * HTTP instead; a throwing send counts as a connection failure.
   */
  send(data: string): boolean {
    if (this.currentState !== "CONNECTED" || this.socket === null) {
      return false;
    }
    try {
      this.socket.send(data);
      return true;
    } catch (error) {
      this.options.logger.error("WebSocket send failed:", error);
      this.dropSocket();
      this.fail();
      return false;
    }
  }

  /** Close deliberately; no reconnect follows */
  disconnect(): void {
    this.stopped = true;
    this.clearReconnect();
    const socket = this.socket;
    this.dropSocket();
    socket?.close(CLOSE_NORMAL, "Recording stopped");
    if (this.currentState !== "HTTP_FALLBACK") {
      this.setState("DISCONNECTED");
    }
  }

  private url(): string {
    const scheme = this.insecureOnly ? "ws" : "wss";
    const { serverHost, sessionId, sessionKey } = this.options;
    return `${scheme}://${serverHost}/ws/recorder/${encodeURIComponent(sessionId)}?key=${encodeURIComponent(sessionKey)}`;
  }

  private open(state: ConnectionState): void {
    this.reconnectTimer = null;
    if (this.stopped || this.currentState === "HTTP_FALLBACK") {
      return;
    }
    this.setState(state);
    const attempt = ++this.attempt;
    const url = this.url();
    const current = (): boolean => attempt === this.attempt;
    this.options.logger.debug(`Connecting to ${url}`);

    try {
      this.socket = this.options.socketFactory(url, {
        onOpen: () => {
          if (current()) this.handleOpen();
        },
        onMessage: (data) => {
          if (current()) this.callbacks.onMessage(data);
        },
        onClose: (code) => {
          if (current()) this.handleClose(code);
        },
        onError: () => {
          if (current()) this.options.logger.debug("WebSocket error");
        },
      });
    } catch (error) {
      this.options.logger.error("Failed to create WebSocket:", error);
      this.socket = null;
      this.fail();
      return;
    }

    this.connectTimer = setTimeout(() => {
      this.connectTimer = null;
      if (!current() || this.currentState === "CONNECTED") {
        return;
      }
      this.options.logger.warn("WebSocket connection timeout");
      const socket = this.socket;
      this.dropSocket();
      socket?.close();
      this.fail();
    }, CONNECT_TIMEOUT_MS);
  }

  private handleOpen(): void {
    this.clearConnectTimer();
    this.failures = 0;
    this.backoffStep = 0;
    this.setState("CONNECTED");
    this.startHeartbeat();
    this.callbacks.onOpen();
  }

  private handleClose(code: number): void {
    this.options.logger.debug(`WebSocket closed with code ${code}`);
    this.dropSocket();
    if (this.stopped) {
      return;
    }
    if (classifyTransportFailure({ kind: "close", code }) === "terminal") {
      if (code !== CLOSE_NORMAL) {
        this.options.logger.warn(`Service refused the channel (code ${code})`);
      }
      this.setState("DISCONNECTED");
      return;
    }
    this.fail();
  }

  private fail(): void {
    this.failures += 1;
    if (this.failures >= MAX_CONSECUTIVE_FAILURES) {
      this.enterFallback();
      return;
    }
    let delay = 0;
    if (!this.insecureOnly) {
      this.insecureOnly = true;
    } else {
      this.backoffStep += 1;
      delay = backoffDelay(this.backoffStep);
    }
    this.setState("RECONNECTING");
    this.options.logger.debug(`Reconnecting in ${delay}ms (failure ${this.failures})`);
    this.reconnectTimer = setTimeout(() => this.open("RECONNECTING"), delay);
  }

  private enterFallback(): void {
    this.clearReconnect();
    this.dropSocket();
    this.options.logger.warn("Switching to HTTP delivery");
    this.setState("HTTP_FALLBACK");
    this.callbacks.onFallback();
  }

  private startHeartbeat(): void {
    this.stopHeartbeat();
    this.heartbeatTimer = setInterval(() => {
      const envelope = encodeControlEnvelope(
        this.options.sessionId,
        "HEARTBEAT",
        {},
        this.options.now()
      );
      this.send(JSON.stringify(envelope));
    }, HEARTBEAT_INTERVAL_MS);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer !== null) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  private clearConnectTimer(): void {
    if (this.connectTimer !== null) {
      clearTimeout(this.connectTimer);
      this.connectTimer = null;
    }
  }

  private clearReconnect(): void {
    if (this.reconnectTimer !== null) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  /** Forget the current socket; its late callbacks are ignored */
  private dropSocket(): void {
    this.attempt += 1;
    this.socket = null;
    this.clearConnectTimer();
    this.stopHeartbeat();
  }

  private setState(state: ConnectionState): void {
    if (this.currentState !== state) {
      this.currentState = state;
      this.callbacks.onStateChange?.(state);
    }
  }
}
