import express from 'express';
import { RequestHandler } from 'express';
import { requireRole } from '../../middlewares/auth.middleware';
import { createProductsController } from './products.controller';
import { ProductsService } from './products.service';
import { productImageMiddleware } from './products.upload';

export const createProductsRouter = (products: ProductsService, authenticate: RequestHandler) => {
  const router = express.Router();
  const controller = createProductsController(products);

  router.get('/', controller.list);
  router.get('/:id', controller.get);
  router.get('/:id/reviews', controller.reviews);

  // Seller only; JSON or multipart with an optional `image` file
  router.post('/', authenticate, requireRole('seller'), productImageMiddleware, controller.create);
  router.put('/:id', authenticate, requireRole('seller'), productImageMiddleware, controller.update);
  router.delete('/:id', authenticate, requireRole('seller'), controller.remove);

  return router;
};
