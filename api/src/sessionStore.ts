// api/src/sessionStore.ts
// In-memory session storage. A session idle for longer than `idleTtlMs`
// (measured from its updatedAt) is treated as gone and swept on create.
import { randomUUID } from "node:crypto";
import { AppError } from "./middleware/errorHandler.js";
import type { SessionState } from "./types.js";
import { createSession } from "./wizard.js";

export const DEFAULT_SESSION_IDLE_MS = 2 * 60 * 60 * 1000;

export type SessionStoreOptions = {
  newId?: () => string;
  idleTtlMs?: number;
  clock?: () => Date;
};

export class SessionStore {
  private readonly sessions = new Map<string, SessionState>();
  private readonly newId: () => string;
  private readonly idleTtlMs: number;
  private readonly clock: () => Date;

  constructor(options: SessionStoreOptions = {}) {
    this.newId = options.newId ?? randomUUID;
    this.idleTtlMs = options.idleTtlMs ?? DEFAULT_SESSION_IDLE_MS;
    this.clock = options.clock ?? (() => new Date());
    if (!Number.isFinite(this.idleTtlMs) || this.idleTtlMs <= 0) {
      throw new Error(`idleTtlMs must be a positive number, got ${this.idleTtlMs}`);
    }
  }

  create(now: Date = this.clock()): SessionState {
    this.sweep();
    const session = createSession(this.newId(), now);
    this.sessions.set(session.id, session);
    return session;
  }

  find(id: string): SessionState | null {
    const session = this.sessions.get(id);
    if (!session) return null;
    if (this.isExpired(session)) {
      this.sessions.delete(id);
      return null;
    }
    return session;
  }

  get(id: string): SessionState {
    const session = this.find(id);
    if (!session) {
      throw new AppError("Session not found", 404, { code: "SESSION_NOT_FOUND" });
    }
    return session;
  }

  save(session: SessionState): void {
    this.sessions.set(session.id, session);
  }

  delete(id: string): boolean {
    return this.find(id) !== null && this.sessions.delete(id);
  }

  /** Drops every idle session; returns how many were removed. */
  sweep(): number {
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (this.isExpired(session)) {
        this.sessions.delete(id);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }

  private isExpired(session: SessionState): boolean {
    return this.clock().getTime() - Date.parse(session.updatedAt) > this.idleTtlMs;
  }
}
