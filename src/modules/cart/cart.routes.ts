import express from 'express';
import { RequestHandler } from 'express';
import { createCartController } from './cart.controller';
import { CartService } from './cart.service';

export const createCartRouter = (cart: CartService, authenticate: RequestHandler) => {
  const router = express.Router();
  const controller = createCartController(cart);

  // Every cart route needs a signed-in user, any role
  router.use(authenticate);

  router.get('/', controller.view);
  router.delete('/', controller.clear);
  router.post('/items', controller.addItem);
  router.put('/items/:product_id', controller.setQuantity);
  router.delete('/items/:product_id', controller.removeItem);

  return router;
};
