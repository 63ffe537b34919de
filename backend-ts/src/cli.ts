#!/usr/bin/env node
/**
 * Command line entry point.
 *
 * Each invocation is a fresh process, so the cache is mirrored to disk
 * (CACHE_DIR, or ~/.cache/ollama-relay) and loaded back on start.
 */

import { Command, InvalidArgumentError } from 'commander';
import type { PresetName } from '@ollama-relay/shared';
import { CLI_CACHE_DIR, STATUS_TIMEOUT } from './config.js';
import { describeError } from './errors.js';
import { formatAnswer, formatCacheStats, formatOutcome, formatStatus, formatSweep } from './format.js';
import { closeHttpClient } from './http-client.js';
import { resolveModel } from './ollama.js';
import { createRelay, getRelayStatus, type Relay } from './relay.js';
import { withRetry } from './retry.js';
import { serve } from './server.js';
import { isValidPrompt, validatePrompt } from './validation.js';

interface QueryFlags {
  model?: string;
  cache: boolean;
  timeout?: number;
  retries: number;
}

interface BatchFlags extends QueryFlags {
  parallel?: number;
  preset: PresetName;
}

function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number of seconds.');
  }
  return parsed;
}

function parsePreset(value: string): PresetName {
  if (value === 'fast' || value === 'normal' || value === 'code') {
    return value;
  }
  throw new InvalidArgumentError('Expected one of: fast, normal, code.');
}

function print(text: string): void {
  process.stdout.write(`${text}\n`);
}

async function openRelay(): Promise<Relay> {
  const relay = createRelay({ cacheDir: CLI_CACHE_DIR });
  await relay.orchestrator.warmCache();
  return relay;
}

/**
 * Run a command body, print failures as `[KIND] message (elapsed)` and set
 * the exit code. Pooled connections are closed so the process can exit.
 */
async function run(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    process.stderr.write(`${describeError(error)}\n`);
    process.exitCode = 1;
  } finally {
    await closeHttpClient();
  }
}

async function askCommand(question: string, preset: PresetName, flags: QueryFlags): Promise<void> {
  validatePrompt(question);
  const { client, orchestrator } = await openRelay();
  const model = await resolveModel(client, flags.model ?? orchestrator.defaultModel, STATUS_TIMEOUT * 1000);
  const result = await withRetry(
    () =>
      orchestrator.ask(question, {
        model,
        preset,
        useCache: flags.cache,
        timeoutMs: flags.timeout === undefined ? undefined : flags.timeout * 1000,
      }),
    `ask:${model}`,
    { retries: flags.retries }
  );
  print(formatAnswer(result));
}

function addQueryOptions(command: Command): Command {
  return command
    .option('-m, --model <name>', 'Model to use, or "auto" for the largest installed model')
    .option('--no-cache', 'Skip the response cache for this question')
    .option('-t, --timeout <seconds>', 'Override the preset timeout', parseSeconds)
    .option('-r, --retries <n>', 'Retry timeouts and connection failures', parseCount, 0);
}

function createProgram(): Command {
  const program = new Command()
    .name('ollama-relay')
    .description('Ask a local Ollama server, with cached answers and bounded concurrency.')
    .version('0.1.0', '-V, --version', 'Show version number');

  const presets: Array<[PresetName, string]> = [
    ['normal', 'Ask a question'],
    ['fast', 'Ask for a short, quick answer'],
    ['code', 'Ask for a code answer'],
  ];

  for (const [preset, description] of presets) {
    const name = preset === 'normal' ? 'ask' : preset;
    addQueryOptions(program.command(`${name} <question>`).description(description)).action(
      (question: string, flags: QueryFlags) => run(() => askCommand(question, preset, flags))
    );
  }

  addQueryOptions(
    program
      .command('batch <questions...>')
      .description('Ask several questions concurrently; answers print in order')
      .option('-p, --parallel <n>', 'Maximum requests in flight', parseCount)
      .option('--preset <name>', 'Sampling preset: fast, normal or code', parsePreset, 'normal')
  ).action((questions: string[], flags: BatchFlags) =>
    run(async () => {
      const { client, orchestrator } = await openRelay();
      const requested = flags.model ?? orchestrator.defaultModel;
      const model = questions.some(isValidPrompt)
        ? await resolveModel(client, requested, STATUS_TIMEOUT * 1000)
        : requested;
      const outcomes = await orchestrator.askConcurrent(questions, {
        model,
        preset: flags.preset,
        useCache: flags.cache,
        timeoutMs: flags.timeout === undefined ? undefined : flags.timeout * 1000,
        maxParallel: flags.parallel && flags.parallel > 0 ? flags.parallel : undefined,
      });
      print(outcomes.map(formatOutcome).join('\n\n'));
      if (outcomes.some((outcome) => !outcome.ok)) {
        process.exitCode = 1;
      }
    })
  );

  program
    .command('status')
    .description('Show server reachability, installed models and cache state')
    .action(() =>
      run(async () => {
        const status = await getRelayStatus(await openRelay());
        print(formatStatus(status));
        if (!status.reachable) {
          process.exitCode = 1;
        }
      })
    );

  program
    .command('cache-stats')
    .description('Show response cache statistics')
    .action(() =>
      run(async () => {
        const { orchestrator } = await openRelay();
        print(formatCacheStats(orchestrator.cacheStats()));
      })
    );

  program
    .command('clear-cache')
    .description('Delete every cached response')
    .action(() =>
      run(async () => {
        const { orchestrator } = await openRelay();
        await orchestrator.clearCache();
        print('Cache cleared');
      })
    );

  program
    .command('optimize')
    .description('Drop expired entries and enforce the cache size bound')
    .action(() =>
      run(async () => {
        const { orchestrator } = await openRelay();
        print(formatSweep(await orchestrator.optimizeCache()));
      })
    );

  program
    .command('serve')
    .description('Start the HTTP relay')
    .action(async () => {
      const relay = createRelay();
      await relay.orchestrator.warmCache();
      await serve(relay);
    });

  return program;
}

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    process.stderr.write(`${describeError(error)}\n`);
    process.exitCode = 1;
  });
