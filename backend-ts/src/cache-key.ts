/**
 * Cache key derivation for (prompt, model) pairs.
 */

import { createHash } from 'crypto';

export type CacheKey = string;

// NUL never appears in a prompt typed by a user nor in an Ollama model tag
const SEPARATOR = '\u0000';

const KEY_PATTERN = /^[0-9a-f]{64}$/;

/**
 * SHA-256 of `prompt NUL model`, hex encoded.
 */
export function computeKey(prompt: string, model: string): CacheKey {
  return createHash('sha256').update(`${prompt}${SEPARATOR}${model}`, 'utf8').digest('hex');
}

/**
 * Whether a string has the shape of a key produced by computeKey.
 */
export function isCacheKey(value: string): boolean {
  return KEY_PATTERN.test(value);
}
