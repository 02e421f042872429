import { NextFunction, Request, Response } from 'express';
import { principalOf } from '../../middlewares/auth.middleware';
import { AuthRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { CategoriesService } from './categories.service';
import { categoryIdSchema, categorySchema } from './categories.validation';

export const createCategoriesController = (categories: CategoriesService) => ({
  list: async (_req: Request, res: Response, next: NextFunction) => {
    try {
      return ResponseHandler.success(res, await categories.list());
    } catch (error) {
      next(error);
    }
  },

  get: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = categoryIdSchema.parse(req.params);
      return ResponseHandler.success(res, await categories.get(id));
    } catch (error) {
      next(error);
    }
  },

  create: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const payload = categorySchema.parse(req.body);
      const category = await categories.create(payload, principalOf(req).id);
      return ResponseHandler.created(res, category, 'Category created');
    } catch (error) {
      next(error);
    }
  },

  update: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { id } = categoryIdSchema.parse(req.params);
      const payload = categorySchema.parse(req.body);
      const category = await categories.update(id, payload, principalOf(req).id);
      return ResponseHandler.success(res, category, 'Category updated');
    } catch (error) {
      next(error);
    }
  },

  remove: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { id } = categoryIdSchema.parse(req.params);
      await categories.deactivate(id, principalOf(req).id);
      return ResponseHandler.success(res, { id }, 'Category deactivated');
    } catch (error) {
      next(error);
    }
  },
});
