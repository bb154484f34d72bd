// Node's crypto module provides the token entropy.
import { randomBytes } from 'crypto';
import { ReadWriteLock } from './locks';

export const SESSION_TTL_MS = 24 * 60 * 60 * 1000;
const TOKEN_BYTES = 32;

export interface IssuedSession {
  token: string;
  expiresAt: Date;
}

/**
 * Process-local map from session token to expiry instant. Lookups share the lock;
 * issue, revoke and sweep take it exclusively. Nothing is persisted, so a restart
 * invalidates every session.
 */
export class SessionStore {
  private sessions = new Map<string, number>();
  private lock = new ReadWriteLock();

  constructor(private readonly ttlMs: number = SESSION_TTL_MS) {}

  // 256 random bits as 64 hex characters, valid for ttlMs from now.
  issue(): Promise<IssuedSession> {
    return this.lock.write(() => {
      const token = randomBytes(TOKEN_BYTES).toString('hex');
      const expiresAt = Date.now() + this.ttlMs;
      this.sessions.set(token, expiresAt);
      return { token, expiresAt: new Date(expiresAt) };
    });
  }

  // Valid iff present and expiring strictly after now.
  validate(token: string): Promise<boolean> {
    return this.lock.read(() => {
      const expiresAt = this.sessions.get(token);
      return expiresAt !== undefined && expiresAt > Date.now();
    });
  }

  // Idempotent.
  revoke(token: string): Promise<void> {
    return this.lock.write(() => {
      this.sessions.delete(token);
    });
  }

  // Drops every session expiring at or before now; returns how many were dropped.
  sweep(): Promise<number> {
    return this.lock.write(() => {
      const now = Date.now();
      let removed = 0;
      for (const [token, expiresAt] of this.sessions) {
        if (expiresAt <= now) {
          this.sessions.delete(token);
          removed += 1;
        }
      }
      return removed;
    });
  }

  size(): Promise<number> {
    return this.lock.read(() => this.sessions.size);
  }

  get ttlSeconds(): number {
    return Math.floor(this.ttlMs / 1000);
  }
}
