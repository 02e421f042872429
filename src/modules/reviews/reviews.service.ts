import { Review } from '../../connections/db/models/review.model';
import { Repositories, UnitOfWork } from '../../connections/db/unit-of-work';
import { ForbiddenError, NotFoundError } from '../../utils/errors';
import { auditLog } from '../../utils/logging';
import { recomputeProductRating } from './rating.service';
import { CreateReviewPayload, UpdateReviewPayload } from './reviews.validation';

// Concurrent review mutations on one product queue up behind this lock
const lockProduct = async ({ products }: Repositories, productId: number) => {
  if (!(await products.lockActiveById(productId))) {
    throw new NotFoundError('Product not found');
  }
};

const findActiveReview = async ({ reviews }: Repositories, id: number) => {
  const review = await reviews.findActiveById(id);
  if (!review) {
    throw new NotFoundError('Review not found');
  }
  return review;
};

export class ReviewsService {
  constructor(private readonly uow: UnitOfWork) {}

  list(): Promise<Review[]> {
    return this.uow.run(({ reviews }) => reviews.listActive());
  }

  async create(payload: CreateReviewPayload, userId: number): Promise<Review> {
    const review = await this.uow.run(async (repos) => {
      await lockProduct(repos, payload.product_id);
      const created = await repos.reviews.create({ ...payload, user_id: userId });
      await recomputeProductRating(repos, payload.product_id);
      return created;
    });

    auditLog('REVIEW_CREATED', { reviewId: review.id, productId: review.product_id, userId });
    return review;
  }

  async update(id: number, payload: UpdateReviewPayload, userId: number): Promise<Review> {
    return this.uow.run(async (repos) => {
      const current = await findActiveReview(repos, id);
      if (current.user_id !== userId) {
        throw new ForbiddenError('You can only update your own reviews');
      }

      await lockProduct(repos, current.product_id);
      const updated = await repos.reviews.update(id, payload);
      await recomputeProductRating(repos, current.product_id);
      return updated;
    });
  }

  async deactivate(id: number, actorId: number): Promise<void> {
    await this.uow.run(async (repos) => {
      const review = await findActiveReview(repos, id);
      await lockProduct(repos, review.product_id);
      await repos.reviews.deactivate(id);
      await recomputeProductRating(repos, review.product_id);
    });

    auditLog('REVIEW_DEACTIVATED', { reviewId: id, actorId });
  }
}
