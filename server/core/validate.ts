import { z } from 'zod';
import { HttpError } from './httpError.js';
import { isInputFormat, isOutputFormat } from './formats.js';

const FormatField = z
  .string()
  .trim()
  .toLowerCase()
  .max(32, 'Format identifier too long')
  .optional();

export const ConvertJsonBody = z.object({
  from: FormatField,
  to: FormatField,
  content: z.string({ invalid_type_error: 'content must be a string' }).default(''),
});

export const ConvertFormFields = z.object({
  from: FormatField,
  to: FormatField,
});

export type FormatPair = { from: string; to: string };

export function parseBody<Output>(schema: z.ZodType<Output, z.ZodTypeDef, unknown>, body: unknown): Output {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new HttpError(400, 'INVALID_REQUEST', issue?.message || 'Invalid request');
  }
  return parsed.data;
}

/**
 * Both formats present and drawn from the catalog, else a 400.
 */
export function resolveFormats(from: string | undefined, to: string | undefined): FormatPair {
  if (!from || !to) throw new HttpError(400, 'MISSING_FORMAT', 'Missing format specification');
  if (!isInputFormat(from)) throw new HttpError(400, 'UNSUPPORTED_FORMAT', `Unsupported source format: ${from}`);
  if (!isOutputFormat(to)) throw new HttpError(400, 'UNSUPPORTED_FORMAT', `Unsupported target format: ${to}`);
  return { from, to };
}
