import { z } from 'zod';

// price stays loose here: the request validator owns InvalidPrice.
export const analyzeBody = z.object({
  brand: z.string().max(200).optional(),
  item_type: z.string().max(100).optional(),
  price: z.unknown(),
});

export const compareBody = z.object({
  item_type: z.string().max(100).optional(),
  price: z.unknown(),
  brands: z.array(z.string().max(200)).min(1).max(50),
});

export const brandNameParams = z.object({
  name: z.string().trim().min(1).max(200),
});
