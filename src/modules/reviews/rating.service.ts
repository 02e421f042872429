import { Repositories } from '../../connections/db/unit-of-work';

/**
 * Sets the product's rating to the mean grade of its active reviews, 0 when
 * none remain. Runs inside the unit of work of the review mutation that
 * triggered it, after the product row has been locked.
 */
export const recomputeProductRating = async (
  { products, reviews }: Pick<Repositories, 'products' | 'reviews'>,
  productId: number
): Promise<number> => {
  const rating = (await reviews.averageActiveGrade(productId)) ?? 0;
  await products.updateRating(productId, rating);
  return rating;
};
