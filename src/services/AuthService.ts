// Node's crypto module provides constant-time comparison.
import { createHash, timingSafeEqual } from 'crypto';
import { UnauthenticatedError } from '../errors/httpError';
import { IssuedSession, SessionStore } from '../storage/sessionStore';
import { logInfo, logWarn } from '../logger';

export interface AdminCredentials {
  username: string;
  password: string;
}

// Digests first so inputs of any length compare in constant time.
function safeEqual(a: string, b: string): boolean {
  const left = createHash('sha256').update(a).digest();
  const right = createHash('sha256').update(b).digest();
  return timingSafeEqual(left, right);
}

// Single operator account: exchanges credentials for session tokens.
export class AuthService {
  constructor(
    private readonly sessions: SessionStore,
    private readonly credentials: AdminCredentials
  ) {}

  async login(username: string, password: string): Promise<IssuedSession> {
    const userOk = safeEqual(username, this.credentials.username);
    const passOk = safeEqual(password, this.credentials.password);
    if (!userOk || !passOk) {
      logWarn('login_failed', {});
      throw new UnauthenticatedError('Invalid credentials');
    }
    const session = await this.sessions.issue();
    logInfo('login_succeeded', { expiresAt: session.expiresAt.toISOString() });
    return session;
  }

  async logout(token: string): Promise<void> {
    await this.sessions.revoke(token);
    logInfo('logout', {});
  }

  isAuthenticated(token: string | undefined): Promise<boolean> {
    if (!token) return Promise.resolve(false);
    return this.sessions.validate(token);
  }

  get sessionTtlSeconds(): number {
    return this.sessions.ttlSeconds;
  }
}
