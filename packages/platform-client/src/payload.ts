import type { z } from 'zod';

import { ProtocolError } from './errors.js';

/**
 * Validates a platform response at the adapter boundary. Shape mismatches surface as
 * ProtocolError naming the payload, never as partially mapped records.
 */
export function parsePayload<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  payload: unknown,
  context: { platform: string; what: string }
): T {
  const result = schema.safeParse(payload);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
  throw new ProtocolError({
    platform: context.platform,
    message: `Unexpected ${context.what} payload from ${context.platform}${where}: ${issue?.message ?? 'invalid'}`,
    cause: result.error,
  });
}
