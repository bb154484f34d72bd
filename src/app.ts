// Express provides the HTTP server and routing.
import express from 'express';
// Helmet adds secure HTTP headers.
import helmet from 'helmet';
// Morgan logs HTTP requests in a standard format.
import morgan from 'morgan';
// cookie-parser exposes the session cookie on req.cookies.
import cookieParser from 'cookie-parser';

import { requireSession } from './auth/requireSession';
import { env } from './config';
import { ConsistencyError } from './errors/persistenceError';
import { mapError } from './errors/mapError';
import { describeError, logError } from './logger';
import { createAuthRouter } from './routes/auth';
import { createDeliveredRouter, createOrdersRouter } from './routes/orders';
import { createProductsRouter } from './routes/products';
import { AuthService } from './services/AuthService';
import { OrderService } from './services/OrderService';
import { ProductService } from './services/ProductService';
import { SessionStore } from './storage/sessionStore';

export interface AppDependencies {
  products: ProductService;
  orders: OrderService;
  auth: AuthService;
  sessions: SessionStore;
  cookieName?: string;
}

// Builds the Express app around already-initialized components.
export function createApp(deps: AppDependencies): express.Express {
  const cookieName = deps.cookieName ?? env.AUTH_COOKIE_NAME;
  const app = express();

  // Helmet sets security-related headers for the HTTP API.
  app.use(helmet());
  // JSON body parser for incoming requests.
  app.use(express.json({ limit: '1mb' }));
  app.use(cookieParser());
  // Morgan logs HTTP requests for debugging and auditing.
  if (env.LOG_LEVEL !== 'silent') {
    app.use(morgan('combined'));
  }

  // Basic health check for the service process.
  app.get('/health', (_req, res) => res.json({ ok: true }));

  const guard = requireSession(deps.sessions, cookieName);
  app.use('/api/products', createProductsRouter(deps.products, guard));
  app.use('/api/orders', createOrdersRouter(deps.orders, guard));
  app.use('/api/delivered', createDeliveredRouter(deps.orders, guard));
  app.use('/api/auth', createAuthRouter(deps.auth, guard, cookieName));

  // Error handler: maps the taxonomy to status codes and logs server-side failures.
  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const mapped = mapError(err);
    if (mapped.status >= 500) {
      const extra =
        err instanceof ConsistencyError
          ? { recordId: err.recordId, orderId: err.orderId, detail: err.detail }
          : {};
      logError('request_failed', {
        method: req.method,
        path: req.originalUrl,
        status: mapped.status,
        ...describeError(err),
        ...extra,
      });
    }
    res.status(mapped.status).json({ error: mapped.error, details: mapped.details });
  });

  return app;
}
