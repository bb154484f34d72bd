// Express provides routing for catalog endpoints.
import express from 'express';
import { CreateProductSchema, UpdateProductSchema } from '../storefront/schemas';
import { ProductService } from '../services/ProductService';

// Listing and lookup are public; administration sits behind the session guard.
export function createProductsRouter(products: ProductService, guard: express.RequestHandler): express.Router {
  const router = express.Router();

  // GET /api/products
  router.get('/', async (_req, res, next) => {
    try {
      res.json(await products.list());
    } catch (e) {
      next(e);
    }
  });

  // GET /api/products/:id (record identity or numeric productId)
  router.get('/:id', async (req, res, next) => {
    try {
      res.json(await products.get(req.params.id));
    } catch (e) {
      next(e);
    }
  });

  router.post('/', guard, async (req, res, next) => {
    try {
      const input = CreateProductSchema.parse(req.body);
      res.status(201).json(await products.create(input));
    } catch (e) {
      next(e);
    }
  });

  router.put('/:id', guard, async (req, res, next) => {
    try {
      const input = UpdateProductSchema.parse(req.body);
      const product = await products.update(req.params.id, input);
      res.json({ message: 'Product updated successfully', product });
    } catch (e) {
      next(e);
    }
  });

  router.delete('/:id', guard, async (req, res, next) => {
    try {
      await products.delete(req.params.id);
      res.json({ message: 'Product deleted successfully' });
    } catch (e) {
      next(e);
    }
  });

  return router;
}
