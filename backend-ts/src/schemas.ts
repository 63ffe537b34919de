/**
 * Zod schemas for everything crossing a process boundary:
 * Ollama responses, cache files on disk and HTTP API bodies.
 */

import { z } from 'zod';

// Ollama wire format

export const GenerateResponseBodySchema = z.object({
  model: z.string(),
  response: z.string(),
  created_at: z.string().optional(),
  done: z.boolean().optional(),
  total_duration: z.number().optional(),
  load_duration: z.number().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
  eval_duration: z.number().optional(),
});

export type GenerateResponseBody = z.infer<typeof GenerateResponseBodySchema>;

export const TagsResponseBodySchema = z.object({
  models: z.array(
    z.object({
      name: z.string(),
      size: z.number().default(0),
      modified_at: z.string().optional(),
      digest: z.string().optional(),
    })
  ),
});

// Cache files

export const GenerateResponseSchema = z.object({
  model: z.string(),
  response: z.string(),
  createdAt: z.string().optional(),
  done: z.boolean().optional(),
  totalDuration: z.number().optional(),
  loadDuration: z.number().optional(),
  promptEvalCount: z.number().optional(),
  evalCount: z.number().optional(),
  evalDuration: z.number().optional(),
});

export const StoredCacheEntrySchema = z.object({
  key: z.string().regex(/^[0-9a-f]{64}$/),
  value: GenerateResponseSchema,
  createdAt: z.number(),
  expiresAt: z.number(),
  accessCount: z.number().int().min(1),
});

// HTTP API

export const PresetNameSchema = z.enum(['fast', 'normal', 'code']);

export const AskRequestSchema = z.object({
  question: z.string(),
  model: z.string().optional(),
  preset: PresetNameSchema.optional(),
  useCache: z.boolean().optional(),
  timeoutMs: z.number().int().positive().max(600000).optional(),
  retries: z.number().int().min(0).max(5).optional(),
});

export const BatchAskRequestSchema = z.object({
  questions: z.array(z.string()).min(1, 'At least one question is required').max(50),
  model: z.string().optional(),
  preset: PresetNameSchema.optional(),
  useCache: z.boolean().optional(),
  timeoutMs: z.number().int().positive().max(600000).optional(),
  maxParallel: z.number().int().min(1).max(16).optional(),
});

export type AskRequest = z.infer<typeof AskRequestSchema>;
export type BatchAskRequest = z.infer<typeof BatchAskRequestSchema>;
