import express from 'express';
import { RequestHandler } from 'express';
import { requireRole } from '../../middlewares/auth.middleware';
import { createReviewsController } from './reviews.controller';
import { ReviewsService } from './reviews.service';

export const createReviewsRouter = (reviews: ReviewsService, authenticate: RequestHandler) => {
  const router = express.Router();
  const controller = createReviewsController(reviews);

  router.get('/', controller.list);
  router.post('/', authenticate, requireRole('buyer'), controller.create);
  router.put('/:id', authenticate, requireRole('buyer'), controller.update);
  router.delete('/:id', authenticate, requireRole('admin'), controller.remove);

  return router;
};
