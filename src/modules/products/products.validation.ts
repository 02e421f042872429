import { z } from 'zod';
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from '../../utils/pagination';

// Query strings and multipart fields arrive as text
const booleanFlag = z.preprocess((value) => {
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return value;
}, z.boolean());

const emptyToNull = (value: unknown) => (value === '' ? null : value);

export const productIdSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const productListQuerySchema = z.object({
  category_id: z.coerce.number().int().positive().optional(),
  include_subcategories: booleanFlag.default(false),
  min_price: z.coerce.number().nonnegative().optional(),
  max_price: z.coerce.number().nonnegative().optional(),
  in_stock: booleanFlag.optional(),
  seller_id: z.coerce.number().int().positive().optional(),
  search: z.string().max(200).optional(),
  page: z.coerce.number().int().min(1).default(1),
  page_size: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
});

export const productSchema = z.object({
  name: z.string().trim().min(3, 'Name must be at least 3 characters').max(100),
  description: z.preprocess(emptyToNull, z.string().max(500).nullable()).default(null),
  price: z.coerce
    .number()
    .positive('Price must be greater than 0')
    .max(99999999.99)
    .refine((value) => /^\d+(\.\d{1,2})?$/.test(String(value)), 'Price allows at most 2 decimal places'),
  stock: z.coerce.number().int().min(0, 'Stock cannot be negative'),
  category_id: z.coerce.number().int().positive(),
});

export type ProductListQuery = z.infer<typeof productListQuerySchema>;
export type ProductPayload = z.infer<typeof productSchema>;
