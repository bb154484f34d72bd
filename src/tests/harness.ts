import request from 'supertest';
import express from 'express';
import { createApp } from '../app';
import { AuthService } from '../services/AuthService';
import { CatalogCache } from '../services/CatalogCache';
import { OrderService } from '../services/OrderService';
import { ProductService } from '../services/ProductService';
import { SequenceGenerator } from '../services/SequenceGenerator';
import { InMemoryDeliveredOrderRepository, InMemoryOrderRepository } from '../storage/orderRepository';
import { InMemoryProductRepository } from '../storage/productRepository';
import { SessionStore } from '../storage/sessionStore';
import { Customer } from '../storage/recordTypes';

export const ADMIN = { username: 'operator', password: 'test-secret' };

export const JANE: Customer = {
  name: 'Jane',
  email: 'jane@example.com',
  phone: '555-0100',
  address: '1 Main St',
};

export interface Harness {
  productRepo: InMemoryProductRepository;
  orderRepo: InMemoryOrderRepository;
  deliveredRepo: InMemoryDeliveredOrderRepository;
  sequence: SequenceGenerator;
  catalog: CatalogCache;
  sessions: SessionStore;
  products: ProductService;
  orders: OrderService;
  auth: AuthService;
}

// Wires every component against in-memory repositories, with the default catalog loaded.
export async function buildHarness(): Promise<Harness> {
  const productRepo = new InMemoryProductRepository();
  const orderRepo = new InMemoryOrderRepository();
  const deliveredRepo = new InMemoryDeliveredOrderRepository();
  const sequence = new SequenceGenerator({
    product: [() => productRepo.highestProductId()],
    order: [() => orderRepo.highestOrderId(), () => deliveredRepo.highestOrderId()],
  });
  const catalog = new CatalogCache(productRepo);
  await catalog.load();
  const sessions = new SessionStore();
  return {
    productRepo,
    orderRepo,
    deliveredRepo,
    sequence,
    catalog,
    sessions,
    products: new ProductService(productRepo, catalog, sequence),
    orders: new OrderService(productRepo, orderRepo, deliveredRepo, sequence),
    auth: new AuthService(sessions, ADMIN),
  };
}

export function appFor(h: Harness): express.Express {
  return createApp({
    products: h.products,
    orders: h.orders,
    auth: h.auth,
    sessions: h.sessions,
    cookieName: 'auth_token',
  });
}

export async function loginToken(app: express.Express): Promise<string> {
  const res = await request(app).post('/api/auth/login').send(ADMIN).expect(200);
  return res.body.token;
}
