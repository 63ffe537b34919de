/**
 * Ollama API client: one request per call, bounded by a timeout, no caching
 * and no retries.
 */

import type {
  GenerateRequestBody,
  GenerateResponse,
  ModelInfo,
  SamplingOptions,
} from '@ollama-relay/shared';
import { TransportError, ValidationError } from './errors.js';
import { requestJson } from './http-client.js';
import { logger } from './logger.js';
import { GenerateResponseBodySchema, TagsResponseBodySchema, type GenerateResponseBody } from './schemas.js';

export interface GenerateRequest {
  model: string;
  prompt: string;
  options: SamplingOptions;
}

export interface CallOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * The part of the client the orchestrator depends on.
 */
export interface GenerateExecutor {
  generate(request: GenerateRequest, options: CallOptions): Promise<GenerateResponse>;
}

function fromWire(body: GenerateResponseBody): GenerateResponse {
  return {
    model: body.model,
    response: body.response,
    createdAt: body.created_at,
    done: body.done,
    totalDuration: body.total_duration,
    loadDuration: body.load_duration,
    promptEvalCount: body.prompt_eval_count,
    evalCount: body.eval_count,
    evalDuration: body.eval_duration,
  };
}

export class OllamaClient implements GenerateExecutor {
  readonly endpoint: string;

  constructor(endpoint: string) {
    this.endpoint = endpoint.replace(/\/+$/, '');
  }

  /**
   * Run a single non-streaming generation.
   *
   * @throws TimeoutError if the server does not answer within `timeoutMs`
   * @throws TransportError on connection, HTTP or body-shape failures
   */
  async generate(request: GenerateRequest, options: CallOptions): Promise<GenerateResponse> {
    const payload: GenerateRequestBody = {
      model: request.model,
      prompt: request.prompt,
      stream: false,
      options: request.options,
    };

    logger.debug(`Generating with ${request.model} (timeout ${options.timeoutMs}ms)`);
    const startedAt = performance.now();
    const json = await requestJson(`${this.endpoint}/api/generate`, {
      method: 'POST',
      body: payload,
      timeoutMs: options.timeoutMs,
      signal: options.signal,
    });

    const parsed = GenerateResponseBodySchema.safeParse(json);
    if (!parsed.success) {
      throw new TransportError(`Unexpected response shape: ${parsed.error.issues[0]?.message ?? 'invalid body'}`, {
        reason: 'parse',
        cause: parsed.error,
        elapsedMs: performance.now() - startedAt,
      });
    }

    return fromWire(parsed.data);
  }

  /**
   * List installed models.
   */
  async listModels(options: CallOptions): Promise<ModelInfo[]> {
    const json = await requestJson(`${this.endpoint}/api/tags`, options);
    const parsed = TagsResponseBodySchema.safeParse(json);
    if (!parsed.success) {
      throw new TransportError('Unexpected /api/tags response shape', { reason: 'parse', cause: parsed.error });
    }

    return parsed.data.models.map((model) => ({
      name: model.name,
      size: model.size,
      modifiedAt: model.modified_at,
      digest: model.digest,
    }));
  }
}

/**
 * Pick the installed model with the largest reported size.
 *
 * Size is only a proxy for capability; callers opt into this with `auto`.
 */
export function selectLargestModel(models: ModelInfo[]): string | null {
  let best: ModelInfo | null = null;
  for (const model of models) {
    if (best === null || model.size > best.size) {
      best = model;
    }
  }
  return best?.name ?? null;
}

export const AUTO_MODEL = 'auto';

/**
 * Resolve the `auto` model name to the largest installed model.
 * Any other name is returned unchanged.
 */
export async function resolveModel(client: OllamaClient, requested: string, timeoutMs: number): Promise<string> {
  if (requested !== AUTO_MODEL) {
    return requested;
  }

  const best = selectLargestModel(await client.listModels({ timeoutMs }));
  if (best === null) {
    throw new ValidationError(`Cannot resolve model "${AUTO_MODEL}": no models installed at ${client.endpoint}`);
  }
  logger.info(`Resolved model "${AUTO_MODEL}" to ${best}`);
  return best;
}
