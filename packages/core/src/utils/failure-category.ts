/**
 * Transport failure classification.
 * Transient failures are retried (reconnect with backoff, or the HTTP retry
 * queue); terminal ones end delivery for that channel or message.
 */

export type FailureCategory = "transient" | "terminal";

export type TransportFailure =
  | { kind: "close"; code: number }
  | { kind: "http"; status: number }
  | { kind: "timeout" }
  | { kind: "network"; message?: string };

/** Close code for a deliberate shutdown */
export const CLOSE_NORMAL = 1000;

/** Close codes the service uses to refuse an agent */
export const CLOSE_SUPERSEDED = 4000;
export const CLOSE_UNAUTHORIZED = 4401;
export const CLOSE_UNKNOWN_SESSION = 4404;

const TERMINAL_CLOSE_CODES: ReadonlySet<number> = new Set([
  CLOSE_NORMAL,
  CLOSE_SUPERSEDED,
  CLOSE_UNAUTHORIZED,
  CLOSE_UNKNOWN_SESSION,
]);

/**
 * Decision tree:
 * 1. Socket closes: normal close and service refusals are terminal
 * 2. HTTP: no response, 408, 429 and 5xx are transient; other 4xx terminal
 * 3. Timeouts and network errors are transient
 */
export function classifyTransportFailure(
  failure: TransportFailure
): FailureCategory {
  switch (failure.kind) {
    case "close":
      return TERMINAL_CLOSE_CODES.has(failure.code) ? "terminal" : "transient";
    case "http":
      if (
        failure.status === 0 ||
        failure.status === 408 ||
        failure.status === 429 ||
        failure.status >= 500
      ) {
        return "transient";
      }
      return failure.status >= 400 ? "terminal" : "transient";
    case "timeout":
    case "network":
      return "transient";
  }
}
