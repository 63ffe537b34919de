/**
 * Fastify HTTP API over the orchestrator, for editor integrations.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import type { AskOutcomeBody, ErrorKind } from '@ollama-relay/shared';
import { CORS_ORIGINS, LOG_LEVEL, SERVER_HOST, SERVER_PORT, STATUS_TIMEOUT } from './config.js';
import { isRelayError } from './errors.js';
import { closeHttpClient } from './http-client.js';
import { logger } from './logger.js';
import { resolveModel } from './ollama.js';
import { getRelayStatus, type Relay } from './relay.js';
import { withRetry } from './retry.js';
import type { AskOptions } from './orchestrator.js';
import { AskRequestSchema, BatchAskRequestSchema, type AskRequest, type BatchAskRequest } from './schemas.js';
import { isValidPrompt, validatePrompt } from './validation.js';

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  validation: 400,
  timeout: 504,
  transport: 502,
};

function toAskOptions(body: AskRequest | BatchAskRequest, model: string): AskOptions {
  return {
    model,
    preset: body.preset,
    useCache: body.useCache,
    timeoutMs: body.timeoutMs,
  };
}

export interface ServerOptions {
  logLevel?: string;
  corsOrigins?: string[];
}

/**
 * Create the Fastify instance with all routes registered.
 */
export async function buildServer(relay: Relay, options: ServerOptions = {}): Promise<FastifyInstance> {
  const { client, orchestrator } = relay;
  const statusTimeoutMs = STATUS_TIMEOUT * 1000;

  const app = Fastify({
    logger: {
      level: options.logLevel ?? LOG_LEVEL,
    },
  });

  await app.register(cors, {
    origin: options.corsOrigins ?? CORS_ORIGINS,
    methods: ['GET', 'POST', 'DELETE'],
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.code(400).send({
        error: 'validation',
        message: error.issues[0]?.message ?? 'Invalid request body',
        elapsedMs: 0,
      });
    }

    if (isRelayError(error)) {
      return reply.code(STATUS_BY_KIND[error.kind]).send(error.toJSON());
    }

    // Fastify's own client errors (malformed JSON, wrong content type)
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ error: 'validation', message: error.message, elapsedMs: 0 });
    }

    request.log.error(error);
    return reply.code(500).send({ error: 'internal', message: 'Internal server error', elapsedMs: 0 });
  });

  /**
   * Health check endpoint.
   */
  app.get('/', async () => {
    return { status: 'ok', service: 'ollama-relay' };
  });

  /**
   * Ollama reachability, installed models and cache state.
   */
  app.get('/api/status', async () => {
    return getRelayStatus(relay, statusTimeoutMs);
  });

  /**
   * Ask one question.
   */
  app.post('/api/ask', async (request) => {
    const body = AskRequestSchema.parse(request.body);
    // Reject bad input before `auto` costs a round trip to Ollama
    validatePrompt(body.question);
    const model = await resolveModel(client, body.model ?? orchestrator.defaultModel, statusTimeoutMs);

    return withRetry(
      () => orchestrator.ask(body.question, toAskOptions(body, model)),
      `ask:${model}`,
      { retries: body.retries ?? 0 }
    );
  });

  /**
   * Ask several questions concurrently; results come back in request order.
   */
  app.post('/api/ask/batch', async (request) => {
    const body = BatchAskRequestSchema.parse(request.body);
    const requested = body.model ?? orchestrator.defaultModel;
    // A batch with nothing valid to ask fails per question, without contacting Ollama
    const model = body.questions.some(isValidPrompt)
      ? await resolveModel(client, requested, statusTimeoutMs)
      : requested;

    const outcomes = await orchestrator.askConcurrent(body.questions, {
      ...toAskOptions(body, model),
      maxParallel: body.maxParallel,
    });

    const results = outcomes.map((outcome): AskOutcomeBody =>
      outcome.ok ? outcome : { ok: false, error: outcome.error.toJSON() }
    );
    return { results };
  });

  app.get('/api/cache/stats', async () => {
    return orchestrator.cacheStats();
  });

  app.post('/api/cache/optimize', async () => {
    const sweep = await orchestrator.optimizeCache();
    return { ...sweep, stats: orchestrator.cacheStats() };
  });

  app.delete('/api/cache', async () => {
    await orchestrator.clearCache();
    return { cleared: true };
  });

  return app;
}

/**
 * Build the server, listen on the configured address and shut down cleanly
 * on SIGINT/SIGTERM.
 */
export async function serve(relay: Relay): Promise<FastifyInstance> {
  const app = await buildServer(relay);

  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully...`);
    await app.close();
    await closeHttpClient();
    process.exit(0);
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));

  try {
    await app.listen({ port: SERVER_PORT, host: SERVER_HOST });
    logger.info(`Ollama relay listening on http://${SERVER_HOST}:${SERVER_PORT} -> ${relay.client.endpoint}`);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }

  return app;
}
