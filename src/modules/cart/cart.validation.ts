import { z } from 'zod';

// Upper bound of the INTEGER quantity column
export const MAX_CART_QUANTITY = 2147483647;

export const cartProductIdSchema = z.object({
  product_id: z.coerce.number().int().positive(),
});

export const addCartItemSchema = z.object({
  product_id: z.number().int().positive(),
  quantity: z.number().int().min(1, 'Quantity must be at least 1').max(MAX_CART_QUANTITY).default(1),
});

export const setCartQuantitySchema = z.object({
  quantity: z.number().int().min(1, 'Quantity must be at least 1').max(MAX_CART_QUANTITY),
});

export type AddCartItemPayload = z.infer<typeof addCartItemSchema>;
