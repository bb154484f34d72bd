// Express provides routing for order endpoints.
import express from 'express';
import { CreateOrderSchema } from '../storefront/schemas';
import { OrderService } from '../services/OrderService';

// Customers place orders without a session; everything else is operator-only.
export function createOrdersRouter(orders: OrderService, guard: express.RequestHandler): express.Router {
  const router = express.Router();

  /**
   * POST /api/orders
   * Prices items from the store and records a pending order.
   */
  router.post('/', async (req, res, next) => {
    try {
      const input = CreateOrderSchema.parse(req.body);
      res.status(201).json(await orders.create(input));
    } catch (e) {
      next(e);
    }
  });

  // GET /api/orders, newest first.
  router.get('/', guard, async (_req, res, next) => {
    try {
      res.json(await orders.list());
    } catch (e) {
      next(e);
    }
  });

  router.get('/:id', guard, async (req, res, next) => {
    try {
      res.json(await orders.get(req.params.id));
    } catch (e) {
      next(e);
    }
  });

  // POST /api/orders/:id/deliver
  // Moves the order into the delivered collection.
  router.post('/:id/deliver', guard, async (req, res, next) => {
    try {
      const receipt = await orders.markDelivered(req.params.id);
      res.json({
        message: 'Order marked as delivered',
        orderId: receipt.orderId,
        deliveredAt: receipt.deliveredAt,
      });
    } catch (e) {
      next(e);
    }
  });

  return router;
}

// GET /api/delivered, newest deliveredAt first.
export function createDeliveredRouter(orders: OrderService, guard: express.RequestHandler): express.Router {
  const router = express.Router();
  router.get('/', guard, async (_req, res, next) => {
    try {
      res.json(await orders.listDelivered());
    } catch (e) {
      next(e);
    }
  });
  return router;
}
