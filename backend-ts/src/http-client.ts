/**
 * JSON-over-HTTP transport with a hard deadline.
 * Uses undici's fetch on a shared keep-alive agent.
 */

import { Agent, fetch } from 'undici';
import type { Response } from 'undici';
import { TimeoutError, TransportError, type RelayError } from './errors.js';
import { logger } from './logger.js';

const agent = new Agent({
  keepAliveTimeout: 10000,
  connections: 16,
});

export interface JsonRequestOptions {
  method?: 'GET' | 'POST';
  body?: unknown;
  /** Upper bound on the whole exchange, headers and body included */
  timeoutMs: number;
  /** Caller-side cancellation */
  signal?: AbortSignal;
}

function describeCause(error: unknown): string {
  if (error instanceof Error) {
    const cause: unknown = error.cause;
    if (cause instanceof Error) {
      const code = (cause as NodeJS.ErrnoException).code;
      return code ? `${error.message} (${code})` : `${error.message} (${cause.message})`;
    }
    return error.message;
  }
  return String(error);
}

/**
 * Issue one request and parse the JSON body.
 *
 * Throws TimeoutError when the deadline passes first (the request is aborted),
 * and TransportError for refused connections, non-2xx statuses, caller
 * cancellation and unparseable bodies.
 */
export async function requestJson(url: string, options: JsonRequestOptions): Promise<unknown> {
  const { method = 'GET', body, timeoutMs, signal } = options;
  const startedAt = performance.now();
  const elapsed = () => performance.now() - startedAt;

  if (signal?.aborted) {
    throw new TransportError('Request cancelled', { reason: 'cancelled', elapsedMs: 0 });
  }

  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onCallerAbort = () => controller.abort();
  signal?.addEventListener('abort', onCallerAbort, { once: true });

  // Whatever interrupted us, the deadline and the caller's signal take precedence
  const failure = (error: unknown, fallback: () => RelayError): RelayError => {
    if (timedOut) {
      return new TimeoutError(timeoutMs, elapsed());
    }
    if (signal?.aborted) {
      return new TransportError('Request cancelled', { reason: 'cancelled', cause: error, elapsedMs: elapsed() });
    }
    return fallback();
  };

  try {
    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
        dispatcher: agent,
      });
    } catch (error) {
      throw failure(
        error,
        () =>
          new TransportError(`Cannot reach ${url}: ${describeCause(error)}`, {
            reason: 'connection',
            cause: error,
            elapsedMs: elapsed(),
          })
      );
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw failure(
        error,
        () =>
          new TransportError(`Connection dropped while reading response: ${describeCause(error)}`, {
            reason: 'connection',
            cause: error,
            elapsedMs: elapsed(),
          })
      );
    }

    logger.debug(`${method} ${url} -> ${response.status} in ${Math.round(elapsed())}ms`);

    if (!response.ok) {
      throw new TransportError(`HTTP ${response.status}: ${text.substring(0, 500)}`, {
        reason: 'http',
        statusCode: response.status,
        elapsedMs: elapsed(),
      });
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new TransportError(`Malformed JSON in response from ${url}`, {
        reason: 'parse',
        cause: error,
        elapsedMs: elapsed(),
      });
    }
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener('abort', onCallerAbort);
  }
}

/**
 * Close pooled connections.
 */
export async function closeHttpClient(): Promise<void> {
  await agent.close();
  logger.info('HTTP client cleaned up');
}
