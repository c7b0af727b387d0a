import type { ZodType, ZodTypeDef } from 'zod';
import { formatZodIssues } from '../../utils/validation.js';

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

/** Validate model-supplied arguments against a tool's parameter schema. */
export function parseParams<T>(schema: ZodType<T, ZodTypeDef, unknown>, params: Record<string, unknown>): ParseResult<T> {
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    return { ok: false, error: `Invalid arguments: ${formatZodIssues(parsed.error)}` };
  }
  return { ok: true, value: parsed.data };
}
