/**
 * Named sampling presets.
 *
 * `fast` is for one-line answers, `normal` for prose, `code` for snippets.
 */

import type { PresetName, SamplingOptions } from '@ollama-relay/shared';

export interface Preset {
  name: PresetName;
  options: SamplingOptions;
  timeoutMs: number;
}

export const PRESETS: Readonly<Record<PresetName, Preset>> = {
  fast: {
    name: 'fast',
    options: { temperature: 0.1, num_predict: 20, top_k: 10, top_p: 0.9, repeat_penalty: 1.1 },
    timeoutMs: 10000,
  },
  normal: {
    name: 'normal',
    options: { temperature: 0.7, num_predict: 100, top_k: 40, top_p: 0.9, repeat_penalty: 1.1 },
    timeoutMs: 30000,
  },
  code: {
    name: 'code',
    options: { temperature: 0.2, num_predict: 200, top_k: 40, top_p: 0.9, repeat_penalty: 1.1 },
    timeoutMs: 30000,
  },
};

export function getPreset(name: PresetName): Preset {
  return PRESETS[name];
}
