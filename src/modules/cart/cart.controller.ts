import { NextFunction, Response } from 'express';
import { principalOf } from '../../middlewares/auth.middleware';
import { AuthRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { CartService } from './cart.service';
import { addCartItemSchema, cartProductIdSchema, setCartQuantitySchema } from './cart.validation';

export const createCartController = (cart: CartService) => ({
  view: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      return ResponseHandler.success(res, await cart.view(principalOf(req).id));
    } catch (error) {
      next(error);
    }
  },

  addItem: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const payload = addCartItemSchema.parse(req.body);
      const line = await cart.add(principalOf(req).id, payload);
      return ResponseHandler.created(res, line, 'Added to cart');
    } catch (error) {
      next(error);
    }
  },

  setQuantity: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { product_id } = cartProductIdSchema.parse(req.params);
      const { quantity } = setCartQuantitySchema.parse(req.body);
      const line = await cart.setQuantity(principalOf(req).id, product_id, quantity);
      return ResponseHandler.success(res, line, 'Quantity updated');
    } catch (error) {
      next(error);
    }
  },

  removeItem: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { product_id } = cartProductIdSchema.parse(req.params);
      await cart.remove(principalOf(req).id, product_id);
      return ResponseHandler.noContent(res);
    } catch (error) {
      next(error);
    }
  },

  clear: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      await cart.clear(principalOf(req).id);
      return ResponseHandler.noContent(res);
    } catch (error) {
      next(error);
    }
  },
});
