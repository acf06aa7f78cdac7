import type { NavigationTrigger } from "@testcast/core";

export const URL_POLL_INTERVAL_MS = 1000;

export type NavigationListener = (
  from: string,
  to: string,
  trigger: NavigationTrigger
) => void;

/**
 * Detects in-page (SPA) navigation: history API calls, popstate, and a
 * URL poll for anything else that changes location without a reload.
 */
export class NavigationWatcher {
  private lastUrl: string;
  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private restoreHistory: (() => void) | null = null;

  constructor(
    private readonly win: Window,
    private readonly listener: NavigationListener
  ) {
    this.lastUrl = win.location.href;
  }

  start(): void {
    if (this.pollTimer !== null) {
      return;
    }
    const history = this.win.history;
    const pushState = history.pushState;
    const replaceState = history.replaceState;

    history.pushState = (data: unknown, unused: string, url?: string | URL | null) => {
      pushState.call(history, data, unused, url);
      this.check("HISTORY_API");
    };
    history.replaceState = (data: unknown, unused: string, url?: string | URL | null) => {
      replaceState.call(history, data, unused, url);
      this.check("HISTORY_API");
    };
    this.restoreHistory = () => {
      history.pushState = pushState;
      history.replaceState = replaceState;
    };

    this.win.addEventListener("popstate", this.onPopState);
    this.pollTimer = setInterval(() => this.check("OTHER"), URL_POLL_INTERVAL_MS);
  }

  stop(): void {
    if (this.pollTimer !== null) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
    this.restoreHistory?.();
    this.restoreHistory = null;
    this.win.removeEventListener("popstate", this.onPopState);
  }

  /** Report a location change since the last check */
  check(trigger: NavigationTrigger): void {
    const current = this.win.location.href;
    if (current === this.lastUrl) {
      return;
    }
    const from = this.lastUrl;
    this.lastUrl = current;
    this.listener(from, current, trigger);
  }

  private readonly onPopState = (): void => {
    this.check("HISTORY_API");
  };
}
