import express from 'express';
import { RequestHandler } from 'express';
import { requireRole } from '../../middlewares/auth.middleware';
import { createCategoriesController } from './categories.controller';
import { CategoriesService } from './categories.service';

export const createCategoriesRouter = (categories: CategoriesService, authenticate: RequestHandler) => {
  const router = express.Router();
  const controller = createCategoriesController(categories);

  router.get('/', controller.list);
  router.get('/:id', controller.get);

  // Admin only
  router.post('/', authenticate, requireRole('admin'), controller.create);
  router.put('/:id', authenticate, requireRole('admin'), controller.update);
  router.delete('/:id', authenticate, requireRole('admin'), controller.remove);

  return router;
};
