/**
 * Input checks run before any cache lookup or network call.
 */

import { z } from 'zod';
import { ValidationError } from './errors.js';

export const MAX_PROMPT_LENGTH = 10000;

const FORBIDDEN_MODEL_CHARS = /[<>"'&|;`]/;

const PromptSchema = z
  .string()
  .refine((value) => value.trim().length > 0, 'Prompt cannot be empty')
  .refine((value) => value.length <= MAX_PROMPT_LENGTH, `Prompt exceeds ${MAX_PROMPT_LENGTH} characters`);

const ModelSchema = z
  .string()
  .refine((value) => value.trim().length > 0, 'Model name cannot be empty')
  .refine((value) => !FORBIDDEN_MODEL_CHARS.test(value), 'Model name contains forbidden characters');

function check<T>(schema: z.ZodType<T>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(result.error.issues[0]?.message ?? 'Invalid input');
  }
  return result.data;
}

/**
 * @throws ValidationError
 */
export function validatePrompt(prompt: string): string {
  return check(PromptSchema, prompt);
}

export function isValidPrompt(prompt: string): boolean {
  return PromptSchema.safeParse(prompt).success;
}

/**
 * @throws ValidationError
 */
export function validateModel(model: string): string {
  return check(ModelSchema, model);
}
