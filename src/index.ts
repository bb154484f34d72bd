// dotenv loads .env values into process.env for local development.
import 'dotenv/config';
import { Server } from 'http';

import { createApp } from './app';
import { env, usingDefaultAdminCredentials } from './config';
import { describeError, logError, logInfo, logWarn } from './logger';
import { AuthService } from './services/AuthService';
import { CatalogCache } from './services/CatalogCache';
import { OrderService } from './services/OrderService';
import { ProductService } from './services/ProductService';
import { SequenceGenerator } from './services/SequenceGenerator';
import { SessionSweeper } from './services/SessionSweeper';
import { connectToStore } from './storage/mongo/connection';
import { MongoDeliveredOrderRepository, MongoOrderRepository } from './storage/mongo/mongoOrderRepository';
import { MongoProductRepository } from './storage/mongo/mongoProductRepository';
import { SessionStore } from './storage/sessionStore';

async function main(): Promise<void> {
  const store = await connectToStore(env.MONGODB_URI, env.MONGODB_DB, env.STORE_TIMEOUT_MS);
  logInfo('store_connected', { db: env.MONGODB_DB });

  const productRepo = new MongoProductRepository(store.products, store.timeoutMs);
  const orderRepo = new MongoOrderRepository(store.orders, store.timeoutMs);
  const deliveredRepo = new MongoDeliveredOrderRepository(store.delivered, store.timeoutMs);

  const sequence = new SequenceGenerator({
    product: [() => productRepo.highestProductId()],
    order: [() => orderRepo.highestOrderId(), () => deliveredRepo.highestOrderId()],
  });

  const catalog = new CatalogCache(productRepo);
  await catalog.load();

  const sessions = new SessionStore();
  const sweeper = new SessionSweeper(sessions, env.SESSION_SWEEP_INTERVAL_MS);
  sweeper.start();

  if (usingDefaultAdminCredentials()) {
    logWarn('admin_default_credentials', { username: env.ADMIN_USERNAME });
  }

  const app = createApp({
    products: new ProductService(productRepo, catalog, sequence),
    orders: new OrderService(productRepo, orderRepo, deliveredRepo, sequence),
    auth: new AuthService(sessions, { username: env.ADMIN_USERNAME, password: env.ADMIN_PASSWORD }),
    sessions,
    cookieName: env.AUTH_COOKIE_NAME,
  });

  const server: Server = app.listen(env.PORT, env.HOST, () => {
    logInfo('server_listening', { url: `http://${env.HOST}:${env.PORT}` });
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logInfo('shutdown_started', { signal });
    sweeper.stop();
    server.close(closeErr => {
      if (closeErr) logError('server_close_failed', describeError(closeErr));
      store
        .close()
        .then(() => {
          logInfo('shutdown_complete', {});
          process.exit(closeErr ? 1 : 0);
        })
        .catch(err => {
          logError('store_close_failed', describeError(err));
          process.exit(1);
        });
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch(err => {
  logError('startup_failed', describeError(err));
  process.exit(1);
});
