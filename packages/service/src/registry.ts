/**
 * Session registry.
 * Owns live recording sessions, serialises writes per session, and hands
 * terminal sessions to the snapshot store.
 */

import {
  createLogger,
  createRecordingSession,
  restoreRecordingSession,
  type AdmissionConfig,
  type RecordingSession,
  type RecordingSessionInit,
  type SessionSnapshot,
  type SessionStatus,
  type SessionSummary,
} from "@testcast/core";

const logger = createLogger("registry");

/** Where finished sessions go; the service keeps no files of its own */
export interface SessionSnapshotStore {
  save(snapshot: SessionSnapshot): Promise<void>;
  load(id: string): Promise<SessionSnapshot | null>;
  list(): Promise<SessionSnapshot[]>;
}

export class InMemorySnapshotStore implements SessionSnapshotStore {
  private readonly snapshots = new Map<string, SessionSnapshot>();

  async save(snapshot: SessionSnapshot): Promise<void> {
    this.snapshots.set(snapshot.id, structuredClone(snapshot));
  }

  async load(id: string): Promise<SessionSnapshot | null> {
    const snapshot = this.snapshots.get(id);
    return snapshot ? structuredClone(snapshot) : null;
  }

  async list(): Promise<SessionSnapshot[]> {
    return Array.from(this.snapshots.values(), (snapshot) =>
      structuredClone(snapshot)
    );
  }
}

export type NewSessionInit = Omit<RecordingSessionInit, "admission" | "now"> & {
  /** Overrides the registry's admission cap for this session */
  maxEventCount?: number;
};

export interface SessionRegistryOptions {
  admission: AdmissionConfig;
  store: SessionSnapshotStore;
  now?: () => number;
}

export class SessionRegistry {
  private readonly sessions = new Map<string, RecordingSession>();
  private readonly queues = new Map<string, Promise<void>>();
  private readonly saved = new Set<string>();

  constructor(private readonly options: SessionRegistryOptions) {}

  get size(): number {
    return this.sessions.size;
  }

  create(init: NewSessionInit): RecordingSession {
    const { maxEventCount, ...rest } = init;
    const session = createRecordingSession({
      ...rest,
      admission: {
        maxEventCount: maxEventCount ?? this.options.admission.maxEventCount,
      },
      now: this.options.now,
    });
    this.sessions.set(session.id, session);
    logger.info(`Session created: ${session.id} (${session.name})`);
    return session;
  }

  get(id: string): RecordingSession | undefined {
    return this.sessions.get(id);
  }

  /** Summaries in creation order, optionally filtered by status */
  list(status?: SessionStatus): SessionSummary[] {
    const summaries: SessionSummary[] = [];
    for (const session of this.sessions.values()) {
      if (!status || session.status === status) {
        summaries.push(session.summary());
      }
    }
    return summaries;
  }

  /**
   * Run a write against one session. Writes to the same session run one
   * at a time in call order; other sessions are not held up. Resolves
   * undefined when the session does not exist.
   */
  async mutate<T>(
    id: string,
    write: (session: RecordingSession) => T | Promise<T>
  ): Promise<T | undefined> {
    const session = this.sessions.get(id);
    if (!session) {
      return undefined;
    }
    const previous = this.queues.get(id) ?? Promise.resolve();
    const run = previous.then(async () => {
      const result = await write(session);
      await this.saveIfTerminal(session);
      return result;
    });
    // a failed write rejects for its caller only; later writes still run
    this.queues.set(
      id,
      run.then(
        () => undefined,
        () => undefined
      )
    );
    return run;
  }

  /** Load every stored snapshot not already live; returns how many */
  async hydrate(): Promise<number> {
    const snapshots = await this.options.store.list();
    let loaded = 0;
    for (const snapshot of snapshots) {
      if (this.sessions.has(snapshot.id)) {
        continue;
      }
      this.sessions.set(
        snapshot.id,
        restoreRecordingSession(snapshot, this.options.now)
      );
      if (snapshot.status === "COMPLETED" || snapshot.status === "FAILED") {
        this.saved.add(snapshot.id);
      }
      loaded += 1;
    }
    return loaded;
  }

  private async saveIfTerminal(session: RecordingSession): Promise<void> {
    if (!session.isTerminal() || this.saved.has(session.id)) {
      return;
    }
    try {
      await this.options.store.save(session.snapshot());
      this.saved.add(session.id);
      logger.info(`Session ${session.id} saved (${session.status})`);
    } catch (error) {
      logger.error(`Failed to save session ${session.id}:`, error);
    }
  }
}
