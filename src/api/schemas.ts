import { z, type ZodType, type ZodTypeDef } from 'zod';
import { RequestValidationError } from '../errors/validation.js';

export const MAX_TEXT_LENGTH = 2000;
export const MAX_NEW_TOKENS = 200;
export const DEFAULT_MAX_TOKENS = 50;
export const MAX_DECODE_TOKENS = 4096;

/** Length in Unicode code points; `String.length` counts surrogate halves. */
export function characterCount(text: string): number {
  return [...text].length;
}

const BoundedText = z.string().superRefine((text, ctx) => {
  const length = characterCount(text);
  if (length < 1) {
    ctx.addIssue({
      code: z.ZodIssueCode.too_small,
      minimum: 1,
      inclusive: true,
      type: 'string',
      message: 'Must not be empty',
    });
  } else if (length > MAX_TEXT_LENGTH) {
    ctx.addIssue({
      code: z.ZodIssueCode.too_big,
      maximum: MAX_TEXT_LENGTH,
      inclusive: true,
      type: 'string',
      message: `Must be at most ${MAX_TEXT_LENGTH} characters`,
    });
  }
});

// ── Request schemas ──────────────────────────────────────────────────────────

export const GenerateRequestSchema = z.object({
  prompt: BoundedText,
  max_tokens: z
    .number()
    .int('Must be an integer')
    .min(1, 'Must be at least 1')
    .max(MAX_NEW_TOKENS, `Must be at most ${MAX_NEW_TOKENS}`)
    .default(DEFAULT_MAX_TOKENS),
});

export const EncodeRequestSchema = z.object({
  text: BoundedText,
});

export const DecodeRequestSchema = z.object({
  tokens: z
    .array(z.number().int('Must be an integer'))
    .min(1, 'Must contain at least 1 token')
    .max(MAX_DECODE_TOKENS, `Must contain at most ${MAX_DECODE_TOKENS} tokens`),
});

export type GenerateRequest = z.infer<typeof GenerateRequestSchema>;
export type EncodeRequest = z.infer<typeof EncodeRequestSchema>;
export type DecodeRequest = z.infer<typeof DecodeRequestSchema>;

// ── Response schemas ─────────────────────────────────────────────────────────

export interface HealthResponse {
  status: 'ok';
}

export interface GenerateResponse {
  text: string;
}

export interface EncodeResponse {
  tokens: number[];
}

export interface DecodeResponse {
  text: string;
}

/**
 * Validate a request body, throwing {@link RequestValidationError} with one
 * violation per failing field. Defaults declared on the schema are applied.
 */
export function parseBody<T>(schema: ZodType<T, ZodTypeDef, unknown>, body: unknown): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw RequestValidationError.fromZodError(result.error);
  }
  return result.data;
}
