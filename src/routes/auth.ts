// Express provides routing for the operator session endpoints.
import express from 'express';
import { LoginSchema } from '../storefront/schemas';
import { AuthService } from '../services/AuthService';
import { extractToken } from '../auth/requireSession';

// Behind TLS-terminating proxies the original scheme arrives in X-Forwarded-Proto.
function isSecureRequest(req: express.Request): boolean {
  return req.secure || req.header('x-forwarded-proto') === 'https';
}

// Cross-origin (secure) deployments need SameSite=None; plain HTTP keeps Lax.
function cookieOptions(req: express.Request): express.CookieOptions {
  const secure = isSecureRequest(req);
  return { path: '/', httpOnly: true, secure, sameSite: secure ? 'none' : 'lax' };
}

export function createAuthRouter(auth: AuthService, guard: express.RequestHandler, cookieName: string): express.Router {
  const router = express.Router();

  router.post('/login', async (req, res, next) => {
    try {
      const input = LoginSchema.parse(req.body);
      const session = await auth.login(input.username, input.password);
      const expiresIn = auth.sessionTtlSeconds;
      res.cookie(cookieName, session.token, { ...cookieOptions(req), maxAge: expiresIn * 1000 });
      res.json({ token: session.token, message: 'Login successful', expiresIn });
    } catch (e) {
      next(e);
    }
  });

  router.post('/logout', guard, async (req, res, next) => {
    try {
      const token = res.locals.sessionToken;
      if (typeof token === 'string') {
        await auth.logout(token);
      }
      res.clearCookie(cookieName, cookieOptions(req));
      res.json({ message: 'Logged out successfully' });
    } catch (e) {
      next(e);
    }
  });

  // Answers 401 rather than erroring so the UI can branch on the body.
  router.get('/check', async (req, res, next) => {
    try {
      const authenticated = await auth.isAuthenticated(extractToken(req, cookieName));
      res.status(authenticated ? 200 : 401).json({ authenticated });
    } catch (e) {
      next(e);
    }
  });

  return router;
}
