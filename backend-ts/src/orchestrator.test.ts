import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { GenerateResponse } from '@ollama-relay/shared';
import { ResponseCache } from './cache.js';
import { computeKey } from './cache-key.js';
import { TimeoutError, TransportError, ValidationError } from './errors.js';
import { OllamaClient, type CallOptions, type GenerateExecutor, type GenerateRequest } from './ollama.js';
import { QueryOrchestrator } from './orchestrator.js';
import { FileCacheStore } from './storage.js';
import { promptOf, startOllamaStub, type OllamaStub } from './test-support/ollama-stub.js';

type Behaviour = (request: GenerateRequest, options: CallOptions) => Promise<GenerateResponse>;

class FakeExecutor implements GenerateExecutor {
  calls: Array<{ request: GenerateRequest; options: CallOptions }> = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly behaviour: Behaviour = async (request) => answer(request)) {}

  async generate(request: GenerateRequest, options: CallOptions): Promise<GenerateResponse> {
    this.calls.push({ request, options });
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      return await this.behaviour(request, options);
    } finally {
      this.inFlight -= 1;
    }
  }
}

function answer(request: GenerateRequest): GenerateResponse {
  return { model: request.model, response: `answer to ${request.prompt}`, done: true };
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function abortable(signal: AbortSignal | undefined): Promise<never> {
  const cancelled = () => new TransportError('Request cancelled', { reason: 'cancelled' });
  return new Promise((_, reject) => {
    if (signal?.aborted) {
      reject(cancelled());
      return;
    }
    signal?.addEventListener('abort', () => reject(cancelled()));
  });
}

function createOrchestrator(client: GenerateExecutor, store: FileCacheStore | null = null) {
  const cache = new ResponseCache<GenerateResponse>({ ttlMs: 60000, maxSize: 100 });
  const orchestrator = new QueryOrchestrator({ cache, client, store, defaultModel: 'm', maxParallel: 2 });
  return { cache, orchestrator };
}

describe('QueryOrchestrator', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('ask', () => {
    it('generates on a miss and serves the repeat from cache', async () => {
      const client = new FakeExecutor();
      const { orchestrator } = createOrchestrator(client);

      const first = await orchestrator.ask('What is 2+2?');
      const second = await orchestrator.ask('What is 2+2?');

      expect(first.fromCache).toBe(false);
      expect(second.fromCache).toBe(true);
      expect(second.response).toEqual(first.response);
      expect(second.key).toBe(computeKey('What is 2+2?', 'm'));
      expect(client.calls).toHaveLength(1);
    });

    it('uses the preset options and timeout', async () => {
      const client = new FakeExecutor();
      const { orchestrator } = createOrchestrator(client);

      await orchestrator.ask('q', { preset: 'code' });

      expect(client.calls[0]?.request.options.num_predict).toBe(200);
      expect(client.calls[0]?.options.timeoutMs).toBe(30000);
    });

    it('lets the caller override the timeout', async () => {
      const client = new FakeExecutor();
      const { orchestrator } = createOrchestrator(client);

      await orchestrator.ask('q', { preset: 'fast', timeoutMs: 1234 });

      expect(client.calls[0]?.options.timeoutMs).toBe(1234);
    });

    it('keys on the model', async () => {
      const client = new FakeExecutor();
      const { orchestrator } = createOrchestrator(client);

      await orchestrator.ask('q', { model: 'a' });
      const other = await orchestrator.ask('q', { model: 'b' });

      expect(other.fromCache).toBe(false);
      expect(client.calls).toHaveLength(2);
    });

    it('bypasses the cache entirely when asked to', async () => {
      const client = new FakeExecutor();
      const { cache, orchestrator } = createOrchestrator(client);

      await orchestrator.ask('q');
      const uncached = await orchestrator.ask('q', { useCache: false });

      expect(uncached.fromCache).toBe(false);
      expect(client.calls).toHaveLength(2);
      expect(cache.stats().totalAccesses).toBe(1);
    });

    it('does not store answers generated without the cache', async () => {
      const client = new FakeExecutor();
      const { cache, orchestrator } = createOrchestrator(client);

      await orchestrator.ask('q', { useCache: false });

      expect(cache.size()).toBe(0);
    });

    it('rejects invalid input before doing any work', async () => {
      const client = new FakeExecutor();
      const { cache, orchestrator } = createOrchestrator(client);

      await expect(orchestrator.ask('   ')).rejects.toThrow(new ValidationError('Prompt cannot be empty'));
      await expect(orchestrator.ask('q', { model: 'm; rm -rf' })).rejects.toBeInstanceOf(ValidationError);
      await expect(orchestrator.ask('x'.repeat(10001))).rejects.toBeInstanceOf(ValidationError);
      expect(client.calls).toHaveLength(0);
      expect(cache.size()).toBe(0);
    });

    it('never caches failures', async () => {
      const client = new FakeExecutor(async () => {
        throw new TransportError('HTTP 500: boom', { reason: 'http', statusCode: 500 });
      });
      const { cache, orchestrator } = createOrchestrator(client);

      await expect(orchestrator.ask('q')).rejects.toBeInstanceOf(TransportError);
      expect(cache.size()).toBe(0);
    });

    it('records elapsed time on failures', async () => {
      const client = new FakeExecutor(async () => {
        await delay(30);
        throw new TimeoutError(25, 25);
      });
      const { orchestrator } = createOrchestrator(client);

      const error = await orchestrator.ask('q').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TimeoutError);
      if (error instanceof TimeoutError) {
        expect(error.elapsedMs).toBeGreaterThanOrEqual(25);
      }
    });

    it('wraps unexpected errors as transport errors', async () => {
      const client = new FakeExecutor(async () => {
        throw new Error('socket hang up');
      });
      const { orchestrator } = createOrchestrator(client);

      const error = await orchestrator.ask('q').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      if (error instanceof TransportError) {
        expect(error.reason).toBe('connection');
        expect(error.message).toBe('socket hang up');
      }
    });
  });

  describe('askAsync', () => {
    it('throws validation errors synchronously', () => {
      const { orchestrator } = createOrchestrator(new FakeExecutor());

      expect(() => orchestrator.askAsync('')).toThrow(ValidationError);
    });

    it('returns a settled handle on a cache hit', async () => {
      const client = new FakeExecutor();
      const { orchestrator } = createOrchestrator(client);
      await orchestrator.ask('q');

      const pending = orchestrator.askAsync('q');

      expect(pending.fromCache).toBe(true);
      expect((await pending.wait()).fromCache).toBe(true);
      expect(client.calls).toHaveLength(1);
    });

    it('starts the request without waiting for it', async () => {
      const client = new FakeExecutor(async (request) => {
        await delay(20);
        return answer(request);
      });
      const { orchestrator } = createOrchestrator(client);

      const pending = orchestrator.askAsync('q');

      expect(pending.fromCache).toBe(false);
      expect(pending.key).toBe(computeKey('q', 'm'));
      const result = await pending.result;
      expect(result.response.response).toBe('answer to q');
      expect(result.fromCache).toBe(false);
    });

    it('gives up waiting without cancelling, then cancels', async () => {
      const client = new FakeExecutor((_, options) => abortable(options.signal));
      const { cache, orchestrator } = createOrchestrator(client);

      const pending = orchestrator.askAsync('q');

      await expect(pending.wait(50)).rejects.toThrow('Gave up waiting after 50ms');
      expect(client.calls[0]?.options.signal?.aborted).toBe(false);

      pending.cancel();

      const error = await pending.result.catch((e: unknown) => e);
      expect(error).toBeInstanceOf(TransportError);
      if (error instanceof TransportError) {
        expect(error.reason).toBe('cancelled');
      }
      expect(cache.size()).toBe(0);
    });

    it('follows the caller signal', async () => {
      const client = new FakeExecutor((_, options) => abortable(options.signal));
      const { orchestrator } = createOrchestrator(client);
      const controller = new AbortController();

      const pending = orchestrator.askAsync('q', { signal: controller.signal });
      controller.abort();

      await expect(pending.result).rejects.toBeInstanceOf(TransportError);
    });

    it('stops listening to the caller signal once settled', async () => {
      const { orchestrator } = createOrchestrator(new FakeExecutor());
      const controller = new AbortController();
      const added = vi.spyOn(controller.signal, 'addEventListener');
      const removed = vi.spyOn(controller.signal, 'removeEventListener');

      await orchestrator.askAsync('q', { signal: controller.signal }).result;

      expect(added).toHaveBeenCalledTimes(1);
      expect(removed).toHaveBeenCalledTimes(1);
      expect(removed.mock.calls[0]?.[1]).toBe(added.mock.calls[0]?.[1]);
    });
  });

  describe('askConcurrent', () => {
    it('keeps input order and bounds requests in flight', async () => {
      const client = new FakeExecutor(async (request) => {
        await delay(request.prompt === 'first' ? 40 : 5);
        return answer(request);
      });
      const { orchestrator } = createOrchestrator(client);

      const outcomes = await orchestrator.askConcurrent(['first', 'second', 'third', 'fourth']);

      expect(outcomes.map((outcome) => (outcome.ok ? outcome.result.response.response : null))).toEqual([
        'answer to first',
        'answer to second',
        'answer to third',
        'answer to fourth',
      ]);
      expect(client.maxInFlight).toBe(2);
    });

    it('honours a per-call parallelism limit', async () => {
      const client = new FakeExecutor(async (request) => {
        await delay(5);
        return answer(request);
      });
      const { orchestrator } = createOrchestrator(client);

      await orchestrator.askConcurrent(['a', 'b', 'c'], { maxParallel: 1 });

      expect(client.maxInFlight).toBe(1);
    });

    it('reports failures per question', async () => {
      const client = new FakeExecutor(async (request) => {
        if (request.prompt === 'bad') {
          throw new TransportError('HTTP 500: boom', { reason: 'http', statusCode: 500 });
        }
        return answer(request);
      });
      const { orchestrator } = createOrchestrator(client);

      const outcomes = await orchestrator.askConcurrent(['good', 'bad', '', 'also good']);

      expect(outcomes.map((outcome) => (outcome.ok ? 'ok' : outcome.error.kind))).toEqual([
        'ok',
        'transport',
        'validation',
        'ok',
      ]);
    });

    it('returns an empty list for no questions', async () => {
      const client = new FakeExecutor();
      const { orchestrator } = createOrchestrator(client);

      expect(await orchestrator.askConcurrent([])).toEqual([]);
      expect(client.calls).toHaveLength(0);
    });
  });

  describe('cache maintenance', () => {
    it('clears cached answers', async () => {
      const client = new FakeExecutor();
      const { orchestrator } = createOrchestrator(client);
      await orchestrator.ask('q');

      await orchestrator.clearCache();

      expect(orchestrator.cacheStats().total).toBe(0);
      expect((await orchestrator.ask('q')).fromCache).toBe(false);
    });

    it('drops expired entries when optimizing', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
      const { orchestrator } = createOrchestrator(new FakeExecutor());
      await orchestrator.ask('a');
      await orchestrator.ask('b');

      vi.setSystemTime(new Date('2026-01-01T00:02:00Z'));

      expect(await orchestrator.optimizeCache()).toEqual({ expired: 2, evicted: 0 });
      expect(orchestrator.cacheStats().total).toBe(0);
    });
  });

  describe('with a disk mirror', () => {
    let dir: string | undefined;

    afterEach(async () => {
      if (dir) {
        await fs.rm(dir, { recursive: true, force: true });
        dir = undefined;
      }
    });

    const makeStore = async () => {
      dir = await fs.mkdtemp(join(tmpdir(), 'relay-orchestrator-'));
      return new FileCacheStore(dir);
    };

    it('persists answers and serves them to a fresh orchestrator', async () => {
      const store = await makeStore();
      await createOrchestrator(new FakeExecutor(), store).orchestrator.ask('q');

      const client = new FakeExecutor();
      const { orchestrator } = createOrchestrator(client, store);
      const result = await orchestrator.ask('q');

      expect(result.fromCache).toBe(true);
      expect(result.response.response).toBe('answer to q');
      expect(client.calls).toHaveLength(0);
    });

    it('warms memory from disk', async () => {
      const store = await makeStore();
      const { orchestrator: writer } = createOrchestrator(new FakeExecutor(), store);
      await writer.ask('a');
      await writer.ask('b');

      const { orchestrator } = createOrchestrator(new FakeExecutor(), store);

      expect(await orchestrator.warmCache()).toBe(2);
      expect(orchestrator.cacheStats().total).toBe(2);
    });

    it('clears the disk mirror too', async () => {
      const store = await makeStore();
      const { orchestrator } = createOrchestrator(new FakeExecutor(), store);
      await orchestrator.ask('q');

      await orchestrator.clearCache();

      expect(await fs.readdir(store.directory)).toEqual([]);
    });

    it('starts and optimizes despite an unreadable cache file', async () => {
      const store = await makeStore();
      await createOrchestrator(new FakeExecutor(), store).orchestrator.ask('q');
      await fs.mkdir(join(store.directory, `${computeKey('blocked', 'm')}.json`));

      const { orchestrator } = createOrchestrator(new FakeExecutor(), store);

      expect(await orchestrator.warmCache()).toBe(1);
      expect(await orchestrator.optimizeCache()).toEqual({ expired: 0, evicted: 0, pruned: 0 });
    });

    it('reports pruned files when optimizing', async () => {
      const store = await makeStore();
      const { orchestrator } = createOrchestrator(new FakeExecutor(), store);
      await orchestrator.ask('q');
      await fs.writeFile(join(store.directory, `${computeKey('x', 'm')}.json`), 'garbage', 'utf-8');

      expect(await orchestrator.optimizeCache()).toEqual({ expired: 0, evicted: 0, pruned: 1 });
    });
  });

  describe('against an Ollama server', () => {
    let stub: OllamaStub | undefined;

    afterEach(async () => {
      await stub?.close();
      stub = undefined;
    });

    it('answers a repeated question from cache without a second request', async () => {
      stub = await startOllamaStub((request) => ({
        delayMs: 30,
        body: { model: 'm', response: `echo ${promptOf(request.body)}`, done: true },
      }));
      const { orchestrator } = createOrchestrator(new OllamaClient(stub.endpoint));

      const first = await orchestrator.ask('What is 2+2?', { preset: 'fast' });
      const accessesBefore = orchestrator.cacheStats().totalAccesses;
      const second = await orchestrator.ask('What is 2+2?', { preset: 'fast' });

      expect(first.fromCache).toBe(false);
      expect(second.fromCache).toBe(true);
      expect(second.response.response).toBe('echo What is 2+2?');
      expect(second.elapsedMs).toBeLessThan(5);
      expect(orchestrator.cacheStats().totalAccesses).toBe(accessesBefore + 1);
      expect(stub.requests).toHaveLength(1);
    });

    it('times out a slow request without holding up a quick one', async () => {
      stub = await startOllamaStub((request) =>
        promptOf(request.body) === 'slow'
          ? { hang: true }
          : { body: { model: 'm', response: 'quick answer', done: true } }
      );
      const { cache, orchestrator } = createOrchestrator(new OllamaClient(stub.endpoint));

      const startedAt = Date.now();
      const outcomes = await orchestrator.askConcurrent(['slow', 'quick'], { timeoutMs: 1000 });
      const elapsed = Date.now() - startedAt;

      const [slow, quick] = outcomes;
      expect(slow?.ok).toBe(false);
      if (slow && !slow.ok) {
        expect(slow.error).toBeInstanceOf(TimeoutError);
      }
      expect(quick?.ok).toBe(true);
      expect(elapsed).toBeGreaterThanOrEqual(950);
      expect(elapsed).toBeLessThan(3000);
      expect(cache.size()).toBe(1);
    });
  });
});
