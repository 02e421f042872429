import { NextFunction, Request, Response } from 'express';
import { principalOf } from '../../middlewares/auth.middleware';
import { AuthRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { ReviewsService } from './reviews.service';
import { createReviewSchema, reviewIdSchema, updateReviewSchema } from './reviews.validation';

export const createReviewsController = (reviews: ReviewsService) => ({
  list: async (_req: Request, res: Response, next: NextFunction) => {
    try {
      return ResponseHandler.success(res, await reviews.list());
    } catch (error) {
      next(error);
    }
  },

  create: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const payload = createReviewSchema.parse(req.body);
      const review = await reviews.create(payload, principalOf(req).id);
      return ResponseHandler.created(res, review, 'Review created');
    } catch (error) {
      next(error);
    }
  },

  update: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { id } = reviewIdSchema.parse(req.params);
      const payload = updateReviewSchema.parse(req.body);
      const review = await reviews.update(id, payload, principalOf(req).id);
      return ResponseHandler.success(res, review, 'Review updated');
    } catch (error) {
      next(error);
    }
  },

  remove: async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const { id } = reviewIdSchema.parse(req.params);
      await reviews.deactivate(id, principalOf(req).id);
      return ResponseHandler.success(res, { id }, 'Review deleted');
    } catch (error) {
      next(error);
    }
  },
});
