/**
 * Shared types for the Ollama relay.
 * Used by the backend, the HTTP API and any editor integration talking to it.
 */

/**
 * Sampling options sent in the `options` field of `/api/generate`.
 */
export interface SamplingOptions {
  temperature: number;
  num_predict: number;
  top_k: number;
  top_p: number;
  repeat_penalty: number;
}

/**
 * Request body for `POST /api/generate`
 */
export interface GenerateRequestBody {
  model: string;
  prompt: string;
  stream: false;
  options: SamplingOptions;
}

/**
 * Generated text plus the timing metadata reported by the server.
 * This is the payload stored in the response cache.
 */
export interface GenerateResponse {
  model: string;
  response: string;
  createdAt?: string;
  done?: boolean;
  totalDuration?: number;
  loadDuration?: number;
  promptEvalCount?: number;
  evalCount?: number;
  evalDuration?: number;
}

/**
 * A model installed on the Ollama server (`GET /api/tags`)
 */
export interface ModelInfo {
  name: string;
  size: number;
  modifiedAt?: string;
  digest?: string;
}

/**
 * Named sampling presets
 */
export type PresetName = 'fast' | 'normal' | 'code';

/**
 * Error categories surfaced to callers
 */
export type ErrorKind = 'validation' | 'timeout' | 'transport';

/**
 * Serialized error, as returned by the HTTP API
 */
export interface ErrorBody {
  error: ErrorKind;
  message: string;
  elapsedMs: number;
}

/**
 * Result of a single ask
 */
export interface AskResult {
  key: string;
  model: string;
  response: GenerateResponse;
  fromCache: boolean;
  elapsedMs: number;
}

/**
 * Per-question outcome of a batch ask, in input order
 */
export type AskOutcomeBody =
  | { ok: true; result: AskResult }
  | { ok: false; error: ErrorBody };

/**
 * Response cache statistics
 */
export interface CacheStats {
  total: number;
  valid: number;
  expired: number;
  totalAccesses: number;
  maxSize: number;
  ttlMs: number;
}

/**
 * Outcome of a cache sweep
 */
export interface SweepResult {
  expired: number;
  evicted: number;
  /** Files removed from the disk mirror, when one is configured */
  pruned?: number;
}

/**
 * Response of `GET /api/status`
 */
export interface RelayStatus {
  endpoint: string;
  reachable: boolean;
  models: ModelInfo[];
  defaultModel: string;
  cache: CacheStats;
  error?: string;
}
