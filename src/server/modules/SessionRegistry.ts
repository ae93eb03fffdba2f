/**
 * SessionRegistry - Maps session ids to the live transport of each logical connection
 *
 * The only structure shared across sessions. Every mutation is synchronous, so on the
 * single-threaded event loop no other session can observe a half-applied create or remove.
 */
import crypto from "node:crypto";
import type { Session, SessionHandle } from "../../types/index.js";
import { logDebug, logError, logInfo } from "../../utils/logging.js";

export class SessionRegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SessionRegistryError";
  }
}

export class SessionRegistry<THandle extends SessionHandle = SessionHandle> {
  private readonly sessions = new Map<string, THandle>();

  constructor(private readonly generateId: () => string = () => crypto.randomUUID()) {}

  /**
   * Mints a fresh id, builds the handle for it and registers both.
   * @throws SessionRegistryError when the generated id is already live
   */
  create(factory: (id: string) => THandle): Session<THandle> {
    const id = this.generateId();
    if (this.sessions.has(id)) {
      throw new SessionRegistryError(`Session id collision: ${id}`);
    }

    const handle = factory(id);
    this.sessions.set(id, handle);
    logInfo(`Session registered: ${id}`, { activeSessions: this.sessions.size });
    return { id, handle };
  }

  get(id: string): THandle | undefined {
    return this.sessions.get(id);
  }

  /** Returns false for an unknown id; a second remove after a disconnect race is harmless. */
  remove(id: string): boolean {
    const removed = this.sessions.delete(id);
    if (removed) {
      logInfo(`Session removed: ${id}`, { activeSessions: this.sessions.size });
    } else {
      logDebug(`Session already removed: ${id}`);
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }

  ids(): string[] {
    return Array.from(this.sessions.keys());
  }

  /** Closes every live session and empties the registry. Used at shutdown. */
  async closeAll(): Promise<void> {
    const entries = Array.from(this.sessions.entries());
    this.sessions.clear();

    const outcomes = await Promise.allSettled(entries.map(([, handle]) => handle.close()));
    outcomes.forEach((outcome, index) => {
      if (outcome.status === "rejected") {
        logError(`Failed to close session ${entries[index]?.[0] ?? "unknown"}`, {
          error: outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason),
        });
      }
    });
    logInfo(`Closed ${entries.length} sessions`);
  }
}
