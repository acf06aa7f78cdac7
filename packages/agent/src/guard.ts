/**
 * One agent per page window. The running agent is kept on the window so a
 * second injection of the script finds it; session details are kept in
 * sessionStorage so a reloaded page can resume the same session.
 */

import { z } from "zod";
import { RecorderAgent } from "./agent.js";
import type { AgentOptions } from "./types.js";

declare global {
  interface Window {
    __testcastAgent?: RecorderAgent;
  }
}

export const SESSION_STORAGE_KEY = "testcast.session";

const storedSessionSchema = z.object({
  sessionId: z.string().min(1),
  sessionKey: z.string().min(1),
  serverHost: z.string().min(1),
  debug: z.boolean().optional(),
});

export type StoredSession = z.infer<typeof storedSessionSchema>;

function storage(win: Window): Storage | null {
  try {
    return win.sessionStorage;
  } catch {
    // sandboxed frames deny storage access
    return null;
  }
}

export function readStoredSession(win: Window): StoredSession | null {
  const raw = storage(win)?.getItem(SESSION_STORAGE_KEY);
  if (!raw) {
    return null;
  }
  try {
    const parsed = storedSessionSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    // corrupted entry; treated as absent
    return null;
  }
}

function storeSession(win: Window, options: AgentOptions): void {
  const session: StoredSession = {
    sessionId: options.sessionId,
    sessionKey: options.sessionKey,
    serverHost: options.serverHost,
    debug: options.debug,
  };
  storage(win)?.setItem(SESSION_STORAGE_KEY, JSON.stringify(session));
}

/**
 * Start recording in a window unless an active agent already runs there.
 * Returns the agent that owns the window.
 */
export function installRecorderAgent(win: Window, options: AgentOptions): RecorderAgent {
  const existing = win.__testcastAgent;
  if (existing?.active) {
    return existing;
  }
  const agent = new RecorderAgent(win, options);
  win.__testcastAgent = agent;
  storeSession(win, options);
  agent.start();
  return agent;
}

/**
 * Re-initialise from sessionStorage when the page lost its agent (a full
 * reload, or a script that replaced the window property). Runtime seams
 * such as socketFactory and fetch come from `overrides`.
 */
export function resumeRecorderAgent(
  win: Window,
  overrides: Partial<AgentOptions> = {}
): RecorderAgent | null {
  const existing = win.__testcastAgent;
  if (existing?.active) {
    return existing;
  }
  const stored = readStoredSession(win);
  return stored ? installRecorderAgent(win, { ...stored, ...overrides }) : null;
}

/** Forget the stored session so reloads no longer resume it */
export function clearStoredSession(win: Window): void {
  storage(win)?.removeItem(SESSION_STORAGE_KEY);
}
