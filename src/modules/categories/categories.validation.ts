import { z } from 'zod';

export const categoryIdSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const categorySchema = z.object({
  name: z.string().trim().min(3, 'Name must be at least 3 characters').max(50),
  parent_id: z.number().int().positive().nullable().default(null),
});

export type CategoryPayload = z.infer<typeof categorySchema>;
