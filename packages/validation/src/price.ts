import { z } from 'zod';

/**
 * Prices arrive as JSON numbers (Mercado Libre) or decimal strings (Tienda Nube, "1499.90").
 */
export const PriceSchema = z
  .union([z.number(), z.string().trim().regex(/^\d+(\.\d+)?$/, 'Not a decimal amount')])
  .transform((value) => (typeof value === 'number' ? value : Number(value)))
  .pipe(z.number().finite().nonnegative());

export const NativeIdSchema = z
  .union([z.string().min(1), z.number().int().nonnegative()])
  .transform((value) => String(value));
