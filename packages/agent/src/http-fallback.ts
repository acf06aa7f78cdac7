/**
 * HTTP delivery to POST /api/recorder/events/{sessionId}.
 * Used for every envelope once the duplex channel is given up, for single
 * sends while it is down, and for error reports.
 */

import { classifyTransportFailure } from "@testcast/core/wire";
import type { OutboundEnvelope } from "@testcast/core/wire";
import type { AgentLogger, FetchLike } from "./types.js";

export const QUEUE_CAPACITY = 50;
export const RETRY_INTERVAL_MS = 60000;
export const RETRY_BATCH_SIZE = 5;
export const MAX_QUEUE_AGE_MS = 5 * 60 * 1000;
export const REQUEST_TIMEOUT_MS = 5000;

type Outcome = "delivered" | "retry" | "rejected";

interface QueuedEnvelope {
  envelope: OutboundEnvelope;

  /** When the envelope first failed; kept across retries */
  queuedAt: number;
}

export interface HttpFallbackOptions {
  /** Origin of the service, e.g. "http://127.0.0.1:8790" */
  baseUrl: string;
  sessionId: string;
  sessionKey: string;
  fetch: FetchLike;
  logger: AgentLogger;
  now: () => number;
}

export class HttpFallbackTransport {
  private readonly queue: QueuedEnvelope[] = [];
  private retryTimer: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly options: HttpFallbackOptions) {}

  get endpoint(): string {
    return `${this.options.baseUrl}/api/recorder/events/${encodeURIComponent(this.options.sessionId)}`;
  }

  /** Envelopes waiting for the next retry pass */
  get queued(): number {
    return this.queue.length;
  }

  /** Start the periodic retry task */
  start(): void {
    if (this.retryTimer !== null) {
      return;
    }
    this.retryTimer = setInterval(() => {
      this.retryQueued().catch((error: unknown) => {
        this.options.logger.error("Retry pass failed:", error);
      });
    }, RETRY_INTERVAL_MS);
  }

  stop(): void {
    if (this.retryTimer !== null) {
      clearInterval(this.retryTimer);
      this.retryTimer = null;
    }
  }

  /**
   * Post one envelope. Transient failures are queued for retry; resolves
   * true when the service accepted it.
   */
  async send(envelope: OutboundEnvelope): Promise<boolean> {
    const outcome = await this.post(envelope);
    if (outcome === "retry") {
      this.enqueue({ envelope, queuedAt: this.options.now() });
    }
    return outcome === "delivered";
  }

  /** Re-send up to five queued envelopes, discarding expired ones */
  async retryQueued(): Promise<void> {
    if (this.queue.length === 0) {
      return;
    }
    const batch = this.queue.splice(0, RETRY_BATCH_SIZE);
    const now = this.options.now();
    this.options.logger.debug(`Retrying ${batch.length} queued envelope(s)`);

    for (const item of batch) {
      if (now - item.queuedAt >= MAX_QUEUE_AGE_MS) {
        this.options.logger.debug(`Discarding expired ${item.envelope.type} envelope`);
        continue;
      }
      const outcome = await this.post(item.envelope);
      if (outcome === "retry") {
        this.enqueue(item);
      }
    }
  }

  private enqueue(item: QueuedEnvelope): void {
    if (this.queue.length >= QUEUE_CAPACITY) {
      this.options.logger.warn(`Retry queue full, dropping ${item.envelope.type} envelope`);
      return;
    }
    this.queue.push(item);
  }

  private async post(envelope: OutboundEnvelope): Promise<Outcome> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);

    try {
      const response = await this.options.fetch(this.endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "X-Session-Key": this.options.sessionKey,
        },
        body: JSON.stringify(envelope),
        signal: controller.signal,
      });
      if (response.ok) {
        return "delivered";
      }
      this.options.logger.warn(`Service returned ${response.status} for ${envelope.type}`);
      return classifyTransportFailure({ kind: "http", status: response.status }) ===
        "transient"
        ? "retry"
        : "rejected";
    } catch (error) {
      this.options.logger.warn("HTTP delivery failed:", error);
      return "retry";
    } finally {
      clearTimeout(timeout);
    }
  }
}
