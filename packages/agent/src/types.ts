/**
 * Agent-side contracts. Browser APIs that touch the network are reached
 * through these seams so the agent can run against fakes.
 */

export type ConnectionState =
  | "CONNECTING"
  | "CONNECTED"
  | "DISCONNECTED"
  | "RECONNECTING"
  | "HTTP_FALLBACK";

export type RecordingStatus = "recording" | "paused" | "stopped";

export interface SocketHandlers {
  onOpen(): void;
  onMessage(data: string): void;
  onClose(code: number): void;
  onError(): void;
}

/** The part of a WebSocket the connection manager uses */
export interface SocketLike {
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => SocketLike;

export interface FetchInit {
  method: string;
  headers: Record<string, string>;
  body: string;
  signal: AbortSignal;
}

export interface FetchResponseLike {
  ok: boolean;
  status: number;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponseLike>;

export interface AgentLogger {
  debug(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export interface AgentOptions {
  sessionId: string;
  sessionKey: string;

  /** Service host and port, e.g. "127.0.0.1:8790" */
  serverHost: string;

  /** Enables console.debug output */
  debug?: boolean;

  socketFactory?: SocketFactory;
  fetch?: FetchLike;

  /** Prefix of generated event ids; random when omitted */
  idPrefix?: string;

  now?: () => number;
}
