import { z } from 'zod';

const comment = z.string().trim().max(1000, 'Comment must be at most 1000 characters').nullable().default(null);
const grade = z.number().int().min(1, 'Grade must be between 1 and 5').max(5, 'Grade must be between 1 and 5');

export const reviewIdSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const createReviewSchema = z.object({
  product_id: z.number().int().positive(),
  comment,
  grade,
});

export const updateReviewSchema = z.object({
  comment,
  grade,
});

export type CreateReviewPayload = z.infer<typeof createReviewSchema>;
export type UpdateReviewPayload = z.infer<typeof updateReviewSchema>;
