/**
 * Query orchestration: cache check, request on miss, cache store.
 *
 * Per request: validate -> cache check -> hit: done
 *                                      -> miss: execute -> success: store, done
 *                                                       -> failure: done(error)
 * Failed or timed-out requests never write to the cache.
 */

import type { AskResult, CacheStats, GenerateResponse, PresetName, SweepResult } from '@ollama-relay/shared';
import { ResponseCache } from './cache.js';
import { computeKey, type CacheKey } from './cache-key.js';
import { TimeoutError, toRelayError, type RelayError } from './errors.js';
import { logger } from './logger.js';
import type { GenerateExecutor } from './ollama.js';
import { getPreset, type Preset } from './presets.js';
import type { FileCacheStore } from './storage.js';
import { validateModel, validatePrompt } from './validation.js';
import { runWorkerPool } from './worker-pool.js';

export interface AskOptions {
  model?: string;
  preset?: PresetName;
  useCache?: boolean;
  /** Overrides the preset's timeout */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ConcurrentAskOptions extends Omit<AskOptions, 'signal'> {
  maxParallel?: number;
}

export type AskOutcome = { ok: true; result: AskResult } | { ok: false; error: RelayError };

/**
 * Handle for a question whose answer may still be on its way.
 */
export interface PendingQuery {
  key: CacheKey;
  /** True when the answer was already cached and `result` is settled */
  fromCache: boolean;
  result: Promise<AskResult>;
  /**
   * Wait for the result, giving up with a TimeoutError after `timeoutMs`.
   * Giving up does not cancel the request; call `cancel` for that.
   */
  wait(timeoutMs?: number): Promise<AskResult>;
  cancel(): void;
}

export interface OrchestratorOptions {
  cache: ResponseCache<GenerateResponse>;
  client: GenerateExecutor;
  store?: FileCacheStore | null;
  defaultModel: string;
  defaultPreset?: PresetName;
  maxParallel?: number;
}

interface AskPlan {
  key: CacheKey;
  prompt: string;
  model: string;
  preset: Preset;
  useCache: boolean;
  timeoutMs: number;
  startedAt: number;
  hit: GenerateResponse | null;
}

function waitFor<T>(promise: Promise<T>, timeoutMs: number | undefined): Promise<T> {
  if (timeoutMs === undefined) {
    return promise;
  }

  let timeoutId: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(
      () => reject(new TimeoutError(timeoutMs, timeoutMs, `Gave up waiting after ${timeoutMs}ms`)),
      timeoutMs
    );
  });

  return Promise.race([promise, timeout]).finally(() => clearTimeout(timeoutId));
}

export class QueryOrchestrator {
  private readonly cache: ResponseCache<GenerateResponse>;
  private readonly client: GenerateExecutor;
  private readonly store: FileCacheStore | null;
  readonly defaultModel: string;
  readonly defaultPreset: PresetName;
  readonly maxParallel: number;

  constructor(options: OrchestratorOptions) {
    this.cache = options.cache;
    this.client = options.client;
    this.store = options.store ?? null;
    this.defaultModel = options.defaultModel;
    this.defaultPreset = options.defaultPreset ?? 'normal';
    this.maxParallel = options.maxParallel ?? 2;
  }

  /**
   * Ask one question and wait for the answer.
   *
   * @throws ValidationError before touching cache or network
   * @throws TimeoutError, TransportError from the request on a miss
   */
  async ask(question: string, options: AskOptions = {}): Promise<AskResult> {
    const plan = this.prepare(question, options);
    if (plan.hit) {
      return this.toResult(plan, plan.hit, true);
    }
    return this.resolveMiss(plan, options.signal);
  }

  /**
   * Ask one question without waiting.
   *
   * Validation and the in-memory cache check run synchronously; a cache hit
   * returns an already settled handle, a miss starts the request and returns
   * immediately.
   *
   * @throws ValidationError synchronously
   */
  askAsync(question: string, options: AskOptions = {}): PendingQuery {
    const plan = this.prepare(question, options);

    if (plan.hit) {
      const settled = Promise.resolve(this.toResult(plan, plan.hit, true));
      return {
        key: plan.key,
        fromCache: true,
        result: settled,
        wait: () => settled,
        cancel: () => undefined,
      };
    }

    const controller = new AbortController();
    const callerSignal = options.signal;
    const onCallerAbort = () => controller.abort();
    if (callerSignal?.aborted) {
      controller.abort();
    } else {
      callerSignal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    const result = this.resolveMiss(plan, controller.signal).finally(() =>
      callerSignal?.removeEventListener('abort', onCallerAbort)
    );
    // Callers that only use wait() or drop the handle must not crash the process
    result.catch((error: unknown) => logger.debug(`Background ask ${plan.key.slice(0, 12)} failed: ${error}`));

    return {
      key: plan.key,
      fromCache: false,
      result,
      wait: (timeoutMs?: number) => waitFor(result, timeoutMs),
      cancel: () => controller.abort(),
    };
  }

  /**
   * Ask several questions with at most `maxParallel` requests in flight.
   * Outcome i belongs to question i; failures are reported per question.
   */
  async askConcurrent(questions: readonly string[], options: ConcurrentAskOptions = {}): Promise<AskOutcome[]> {
    const { maxParallel = this.maxParallel, ...askOptions } = options;
    logger.info(`Asking ${questions.length} questions, up to ${maxParallel} at a time`);

    return runWorkerPool(
      questions,
      async (question): Promise<AskOutcome> => {
        try {
          return { ok: true, result: await this.ask(question, askOptions) };
        } catch (error) {
          return { ok: false, error: toRelayError(error) };
        }
      },
      maxParallel
    );
  }

  /**
   * Drop every cached response, in memory and on disk.
   */
  async clearCache(): Promise<void> {
    this.cache.clear();
    if (this.store) {
      await this.store.clear();
    }
    logger.info('Response cache cleared');
  }

  cacheStats(): CacheStats {
    return this.cache.stats();
  }

  /**
   * Remove expired entries and enforce the size bound now. Expired and
   * corrupt files in the disk mirror are pruned as well.
   */
  async optimizeCache(): Promise<SweepResult> {
    const result: SweepResult = this.cache.sweep();
    if (this.store) {
      const { removed } = await this.store.scan();
      result.pruned = removed;
    }
    logger.info(`Cache optimized: ${result.expired} expired, ${result.evicted} evicted, ${result.pruned ?? 0} files pruned`);
    return result;
  }

  /**
   * Load the disk mirror into memory, e.g. at process start.
   *
   * @returns Number of entries restored
   */
  async warmCache(): Promise<number> {
    if (!this.store) {
      return 0;
    }

    const { entries } = await this.store.scan();
    let restored = 0;
    for (const entry of entries) {
      if (this.cache.restore(entry)) {
        restored += 1;
      }
    }
    logger.debug(`Restored ${restored} cached responses from ${this.store.directory}`);
    return restored;
  }

  private prepare(question: string, options: AskOptions): AskPlan {
    const startedAt = performance.now();
    const prompt = validatePrompt(question);
    const model = validateModel(options.model ?? this.defaultModel);
    const preset = getPreset(options.preset ?? this.defaultPreset);
    const useCache = options.useCache ?? true;
    const key = computeKey(prompt, model);

    const hit = useCache ? this.cache.get(key) : null;
    if (hit) {
      logger.debug(`Cache hit for ${model}: ${key.slice(0, 12)}`);
    }

    return {
      key,
      prompt,
      model,
      preset,
      useCache,
      timeoutMs: options.timeoutMs ?? preset.timeoutMs,
      startedAt,
      hit,
    };
  }

  private async resolveMiss(plan: AskPlan, signal: AbortSignal | undefined): Promise<AskResult> {
    if (plan.useCache) {
      const stored = await this.loadDurable(plan.key);
      if (stored) {
        return this.toResult(plan, stored, true);
      }
    }

    logger.info(`Querying ${plan.model} (${plan.preset.name})`);
    let response: GenerateResponse;
    try {
      response = await this.client.generate(
        { model: plan.model, prompt: plan.prompt, options: plan.preset.options },
        { timeoutMs: plan.timeoutMs, signal }
      );
    } catch (error) {
      const relayError = toRelayError(error);
      relayError.elapsedMs = performance.now() - plan.startedAt;
      logger.warn(`Query to ${plan.model} failed: ${relayError.message}`);
      throw relayError;
    }

    if (plan.useCache) {
      this.cache.put(plan.key, response);
      const entry = this.cache.peek(plan.key);
      if (this.store && entry) {
        await this.store.save(entry);
      }
    }

    return this.toResult(plan, response, false);
  }

  /**
   * Consult the disk mirror; a usable entry is copied back into memory.
   */
  private async loadDurable(key: CacheKey): Promise<GenerateResponse | null> {
    if (!this.store) {
      return null;
    }

    try {
      const entry = await this.store.load(key);
      if (!entry || !this.cache.restore(entry)) {
        return null;
      }
      logger.debug(`Disk cache hit: ${key.slice(0, 12)}`);
      return this.cache.get(key) ?? entry.value;
    } catch (error) {
      logger.warn(`Could not read disk cache for ${key}: ${error}`);
      return null;
    }
  }

  private toResult(plan: AskPlan, response: GenerateResponse, fromCache: boolean): AskResult {
    return {
      key: plan.key,
      model: plan.model,
      response,
      fromCache,
      elapsedMs: performance.now() - plan.startedAt,
    };
  }
}
