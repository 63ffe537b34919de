/**
 * Plain-text rendering for the CLI.
 */

import type { AskResult, CacheStats, ModelInfo, RelayStatus, SweepResult } from '@ollama-relay/shared';
import { describeError } from './errors.js';
import { selectLargestModel } from './ollama.js';
import type { AskOutcome } from './orchestrator.js';

export function formatDuration(ms: number): string {
  if (ms < 1) {
    return '<1 ms';
  }
  if (ms < 1000) {
    return `${Math.round(ms)} ms`;
  }
  return `${(ms / 1000).toFixed(1)} s`;
}

export function formatSize(bytes: number): string {
  const gb = bytes / 1024 ** 3;
  if (gb >= 1) {
    return `${gb.toFixed(1)} GB`;
  }
  return `${Math.round(bytes / 1024 ** 2)} MB`;
}

export function formatAnswer(result: AskResult): string {
  const source = result.fromCache ? 'cache hit' : 'generated';
  return [result.response.response.trim(), '', `-- ${result.model} | ${source} | ${formatDuration(result.elapsedMs)}`].join(
    '\n'
  );
}

export function formatOutcome(outcome: AskOutcome, index: number): string {
  const label = `[${index + 1}]`;
  if (!outcome.ok) {
    return `${label} ${describeError(outcome.error)}`;
  }
  return `${label} ${formatAnswer(outcome.result)}`;
}

export function formatCacheStats(stats: CacheStats): string {
  return [
    'Cache:',
    `  entries:   ${stats.total}/${stats.maxSize}`,
    `  valid:     ${stats.valid}`,
    `  expired:   ${stats.expired}`,
    `  accesses:  ${stats.totalAccesses}`,
    `  ttl:       ${Math.round(stats.ttlMs / 1000)} s`,
  ].join('\n');
}

export function formatSweep(result: SweepResult): string {
  const parts = [`${result.expired} expired`, `${result.evicted} evicted`];
  if (result.pruned !== undefined) {
    parts.push(`${result.pruned} files pruned`);
  }
  return `Cache optimized: ${parts.join(', ')}`;
}

function formatModels(models: ModelInfo[], defaultModel: string): string[] {
  const largest = selectLargestModel(models);
  return models.map((model) => {
    const marks = [model.name === defaultModel ? 'default' : '', model.name === largest ? 'largest' : '']
      .filter(Boolean)
      .join(', ');
    return `  ${model.name} (${formatSize(model.size)})${marks ? ` [${marks}]` : ''}`;
  });
}

export function formatStatus(status: RelayStatus): string {
  const lines = [`Ollama: ${status.endpoint}`];
  if (status.reachable) {
    lines.push(`  reachable, ${status.models.length} models installed`);
    lines.push(...formatModels(status.models, status.defaultModel));
  } else {
    lines.push(`  unreachable: ${status.error ?? 'unknown error'}`);
  }
  lines.push(`Default model: ${status.defaultModel}`);
  lines.push(formatCacheStats(status.cache));
  return lines.join('\n');
}
