import { z } from 'zod';

import { NativeIdSchema, PriceSchema } from './price.js';

export const TiendaNubeVariantSchema = z.object({
  id: NativeIdSchema,
  product_id: NativeIdSchema.optional(),
  sku: z.string().nullable().optional(),
  price: PriceSchema.nullable(),
});

export const TiendaNubeProductSchema = z.object({
  id: NativeIdSchema,
  name: z
    .record(z.string(), z.string())
    .refine((names) => Object.keys(names).length > 0, 'At least one locale is required'),
  published: z.boolean().optional(),
  variants: z.array(TiendaNubeVariantSchema),
});

export const TiendaNubeProductPageSchema = z.array(TiendaNubeProductSchema);

export const TiendaNubeErrorSchema = z.object({
  code: z.number().int().optional(),
  message: z.string().optional(),
  description: z.string().optional(),
});

export type TiendaNubeVariant = z.infer<typeof TiendaNubeVariantSchema>;
export type TiendaNubeProduct = z.infer<typeof TiendaNubeProductSchema>;
export type TiendaNubeError = z.infer<typeof TiendaNubeErrorSchema>;
