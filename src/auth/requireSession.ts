// Express provides the middleware types.
import express from 'express';
import { UnauthenticatedError } from '../errors/httpError';
import { SessionStore } from '../storage/sessionStore';

const BEARER = /^Bearer\s+(\S+)\s*$/;

// Token from "Authorization: Bearer <token>", falling back to the auth cookie.
export function extractToken(req: express.Request, cookieName: string): string | undefined {
  const header = req.header('authorization');
  const match = header ? BEARER.exec(header) : null;
  if (match) return match[1];
  const cookie: unknown = req.cookies?.[cookieName];
  return typeof cookie === 'string' && cookie.length > 0 ? cookie : undefined;
}

// Express middleware that admits only requests carrying a live session token.
export function requireSession(sessions: SessionStore, cookieName: string): express.RequestHandler {
  return async (req, res, next) => {
    try {
      const token = extractToken(req, cookieName);
      if (!token) {
        next(new UnauthenticatedError('Authentication required'));
        return;
      }
      if (!(await sessions.validate(token))) {
        next(new UnauthenticatedError('Invalid or expired session'));
        return;
      }
      res.locals.sessionToken = token;
      next();
    } catch (e) {
      next(e);
    }
  };
}
