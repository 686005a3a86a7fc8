// ═══════════════════════════════════════════════════════════════════════════
// AgroPulse: Storage seams
// Route logic only sees these interfaces; the Memory* classes keep everything
// for the life of the process.
// ═══════════════════════════════════════════════════════════════════════════

import type { HistoryEntry } from "@/app/types";
import { SESSION_MAX_AGE_SECONDS } from "@/lib/session";

export const HISTORY_LIMIT = 5;

export interface UserRecord {
  username: string;
  farmName: string;
  passwordHash: string;
  createdAt: string;
}

export interface UserStore {
  get(username: string): Promise<UserRecord | undefined>;
  /** Returns false, and stores nothing, when the username is taken. */
  create(user: UserRecord): Promise<boolean>;
}

export interface SessionStore {
  put(token: string, username: string): Promise<void>;
  get(token: string): Promise<string | undefined>;
  delete(token: string): Promise<void>;
}

export interface HistoryStore {
  list(username: string): Promise<HistoryEntry[]>;
  /** Puts the entry at the head and drops anything past HISTORY_LIMIT. */
  prepend(username: string, entry: HistoryEntry): Promise<HistoryEntry[]>;
}

export class MemoryUserStore implements UserStore {
  private readonly users = new Map<string, UserRecord>();

  async get(username: string): Promise<UserRecord | undefined> {
    return this.users.get(username);
  }

  async create(user: UserRecord): Promise<boolean> {
    if (this.users.has(user.username)) return false;
    this.users.set(user.username, user);
    return true;
  }

  get size(): number {
    return this.users.size;
  }
}

export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, { username: string; expiresAt: number }>();

  constructor(private readonly maxAgeMs = SESSION_MAX_AGE_SECONDS * 1000) {}

  async put(token: string, username: string): Promise<void> {
    this.prune();
    this.sessions.set(token, { username, expiresAt: Date.now() + this.maxAgeMs });
  }

  async get(token: string): Promise<string | undefined> {
    const session = this.sessions.get(token);
    if (!session) return undefined;
    if (session.expiresAt <= Date.now()) {
      this.sessions.delete(token);
      return undefined;
    }
    return session.username;
  }

  async delete(token: string): Promise<void> {
    this.sessions.delete(token);
  }

  get size(): number {
    return this.sessions.size;
  }

  private prune(): void {
    const now = Date.now();
    for (const [token, session] of this.sessions) {
      if (session.expiresAt <= now) this.sessions.delete(token);
    }
  }
}

export class MemoryHistoryStore implements HistoryStore {
  private readonly histories = new Map<string, HistoryEntry[]>();

  constructor(private readonly limit = HISTORY_LIMIT) {}

  async list(username: string): Promise<HistoryEntry[]> {
    return [...(this.histories.get(username) ?? [])];
  }

  async prepend(username: string, entry: HistoryEntry): Promise<HistoryEntry[]> {
    const next = [entry, ...(this.histories.get(username) ?? [])].slice(0, this.limit);
    this.histories.set(username, next);
    return [...next];
  }
}
