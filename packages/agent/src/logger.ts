import type { AgentLogger } from "./types.js";

const PREFIX = "[testcast]";

/**
 * Console logger for page context. Debug output only when enabled;
 * warnings and errors always reach the console.
 */
export function createAgentLogger(debug: boolean): AgentLogger {
  return {
    debug: (...args) => {
      if (debug) {
        console.debug(PREFIX, ...args);
      }
    },
    warn: (...args) => console.warn(PREFIX, ...args),
    error: (...args) => console.error(PREFIX, ...args),
  };
}
