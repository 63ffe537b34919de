/**
 * Error taxonomy for the relay.
 *
 * Every failure a caller can see is one of three kinds: the input was rejected
 * before anything happened (validation), the server did not answer in time
 * (timeout), or the exchange itself failed (transport).
 */

import type { ErrorBody, ErrorKind } from '@ollama-relay/shared';

export abstract class RelayError extends Error {
  abstract readonly kind: ErrorKind;

  /** Wall-clock time spent before the failure, in milliseconds */
  elapsedMs: number;

  constructor(message: string, elapsedMs = 0, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.elapsedMs = elapsedMs;
  }

  toJSON(): ErrorBody {
    return {
      error: this.kind,
      message: this.message,
      elapsedMs: this.elapsedMs,
    };
  }
}

export class ValidationError extends RelayError {
  readonly kind = 'validation';
}

export class TimeoutError extends RelayError {
  readonly kind = 'timeout';
  readonly timeoutMs: number;

  constructor(timeoutMs: number, elapsedMs = timeoutMs, message = `Request timed out after ${timeoutMs}ms`) {
    super(message, elapsedMs);
    this.timeoutMs = timeoutMs;
  }
}

/**
 * - `connection`: no HTTP response at all (refused, reset, DNS)
 * - `http`: the server answered with a non-2xx status
 * - `parse`: the body was not the JSON we expect
 * - `cancelled`: the caller aborted the request
 */
export type TransportFailure = 'connection' | 'http' | 'parse' | 'cancelled';

export interface TransportErrorOptions {
  reason: TransportFailure;
  cause?: unknown;
  statusCode?: number;
  elapsedMs?: number;
}

export class TransportError extends RelayError {
  readonly kind = 'transport';
  readonly reason: TransportFailure;
  readonly statusCode?: number;

  constructor(message: string, options: TransportErrorOptions) {
    super(message, options.elapsedMs ?? 0, { cause: options.cause });
    this.reason = options.reason;
    this.statusCode = options.statusCode;
  }
}

export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError;
}

/**
 * Wrap anything thrown into a RelayError so callers only deal with the taxonomy.
 */
export function toRelayError(error: unknown, elapsedMs = 0): RelayError {
  if (error instanceof RelayError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(message, { reason: 'connection', cause: error, elapsedMs });
}

/**
 * One-line, user-facing rendering: error kind, message and elapsed time.
 */
export function describeError(error: unknown): string {
  const relayError = toRelayError(error);
  return `[${relayError.kind.toUpperCase()}] ${relayError.message} (${Math.round(relayError.elapsedMs)} ms)`;
}
