import { z } from 'zod';

import { NativeIdSchema, PriceSchema } from './price.js';

export const MercadoLibreSearchResponseSchema = z.object({
  results: z.array(z.string().min(1)),
  paging: z
    .object({
      total: z.number().int().nonnegative(),
      offset: z.number().int().nonnegative().optional(),
      limit: z.number().int().nonnegative().optional(),
    })
    .optional(),
});

export const MercadoLibreAttributeSchema = z.object({
  id: z.string(),
  value_name: z.string().nullable().optional(),
});

export const MercadoLibreItemSchema = z.object({
  id: NativeIdSchema,
  title: z.string(),
  price: PriceSchema,
  status: z.string().optional(),
  currency_id: z.string().optional(),
  seller_custom_field: z.string().nullable().optional(),
  attributes: z.array(MercadoLibreAttributeSchema).optional(),
});

/** One entry of `GET /items?ids=…`; non-200 entries carry an error body instead of an item. */
export const MercadoLibreMultigetEntrySchema = z.object({
  code: z.number().int(),
  body: z.unknown(),
});

export const MercadoLibreMultigetResponseSchema = z.array(MercadoLibreMultigetEntrySchema);

export type MercadoLibreSearchResponse = z.infer<typeof MercadoLibreSearchResponseSchema>;
export type MercadoLibreItem = z.infer<typeof MercadoLibreItemSchema>;
export type MercadoLibreMultigetEntry = z.infer<typeof MercadoLibreMultigetEntrySchema>;
