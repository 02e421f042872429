import { NextFunction, Request, Response } from 'express';
import { principalOf } from '../../middlewares/auth.middleware';
import { AuthRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { ProductsService } from './products.service';
import { productIdSchema, productListQuerySchema, productSchema } from './products.validation';

export const createProductsController = (products: ProductsService) => ({
  list: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = productListQuerySchema.parse(req.query);
      return ResponseHandler.success(res, await products.list(query));
    } catch (error) {
      next(error);
    }
  },

  get: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = productIdSchema.parse(req.params);
      return ResponseHandler.success(res, await products.get(id));
    } catch (error) {
      next(error);
    }
  },

  reviews: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = productIdSchema.parse(req.params);
      return ResponseHandler.success(res, await products.reviews(id));
    } catch (error) {
      next(error);
    }
  },

  create: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const payload = productSchema.parse(req.body);
      const product = await products.create(payload, principalOf(req).id, req.file);
      return ResponseHandler.created(res, product, 'Product created');
    } catch (error) {
      next(error);
    }
  },

  update: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { id } = productIdSchema.parse(req.params);
      const payload = productSchema.parse(req.body);
      const product = await products.update(id, payload, principalOf(req).id, req.file);
      return ResponseHandler.success(res, product, 'Product updated');
    } catch (error) {
      next(error);
    }
  },

  remove: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { id } = productIdSchema.parse(req.params);
      const product = await products.deactivate(id, principalOf(req).id);
      return ResponseHandler.success(res, product, 'Product deactivated');
    } catch (error) {
      next(error);
    }
  },
});
