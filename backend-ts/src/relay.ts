/**
 * Process-wide wiring of cache, client, disk mirror and orchestrator from config.
 */

import type { GenerateResponse, RelayStatus } from '@ollama-relay/shared';
import { ResponseCache } from './cache.js';
import {
  CACHE_DIR,
  CACHE_MAX_SIZE,
  CACHE_TTL_SECONDS,
  DEFAULT_MODEL,
  DEFAULT_PRESET,
  MAX_PARALLEL,
  OLLAMA_ENDPOINT,
  STATUS_TIMEOUT,
} from './config.js';
import { describeError } from './errors.js';
import { logger } from './logger.js';
import { OllamaClient } from './ollama.js';
import { QueryOrchestrator } from './orchestrator.js';
import { FileCacheStore } from './storage.js';

export interface Relay {
  client: OllamaClient;
  orchestrator: QueryOrchestrator;
}

export interface RelayOptions {
  /** Overrides CACHE_DIR; null keeps the cache in memory only */
  cacheDir?: string | null;
}

export function createRelay(options: RelayOptions = {}): Relay {
  const client = new OllamaClient(OLLAMA_ENDPOINT);
  const cache = new ResponseCache<GenerateResponse>({
    ttlMs: CACHE_TTL_SECONDS * 1000,
    maxSize: CACHE_MAX_SIZE,
  });
  const cacheDir = options.cacheDir !== undefined ? options.cacheDir : CACHE_DIR;
  const store = cacheDir ? new FileCacheStore(cacheDir) : null;

  logger.debug(
    `Relay for ${OLLAMA_ENDPOINT}: model ${DEFAULT_MODEL}, cache ${CACHE_MAX_SIZE} entries / ${CACHE_TTL_SECONDS}s` +
      (store ? `, mirrored to ${store.directory}` : '')
  );

  const orchestrator = new QueryOrchestrator({
    cache,
    client,
    store,
    defaultModel: DEFAULT_MODEL,
    defaultPreset: DEFAULT_PRESET,
    maxParallel: MAX_PARALLEL,
  });

  return { client, orchestrator };
}

/**
 * Ollama reachability, installed models and cache state.
 */
export async function getRelayStatus(relay: Relay, timeoutMs = STATUS_TIMEOUT * 1000): Promise<RelayStatus> {
  const { client, orchestrator } = relay;
  const base = {
    endpoint: client.endpoint,
    defaultModel: orchestrator.defaultModel,
    cache: orchestrator.cacheStats(),
  };

  try {
    const models = await client.listModels({ timeoutMs });
    return { ...base, reachable: true, models };
  } catch (error) {
    logger.warn(`Ollama unreachable at ${client.endpoint}: ${describeError(error)}`);
    return { ...base, reachable: false, models: [], error: describeError(error) };
  }
}
