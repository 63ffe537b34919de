import { describe, expect, it } from 'vitest';
import { getPreset } from './presets.js';

describe('presets', () => {
  it('keeps fast answers short', () => {
    expect(getPreset('fast')).toEqual({
      name: 'fast',
      options: { temperature: 0.1, num_predict: 20, top_k: 10, top_p: 0.9, repeat_penalty: 1.1 },
      timeoutMs: 10000,
    });
  });

  it('gives code answers room and a low temperature', () => {
    const code = getPreset('code');
    expect(code.options.temperature).toBe(0.2);
    expect(code.options.num_predict).toBe(200);
    expect(code.timeoutMs).toBe(30000);
  });

  it('uses the normal preset for prose', () => {
    const normal = getPreset('normal');
    expect(normal.options.temperature).toBe(0.7);
    expect(normal.options.num_predict).toBe(100);
    expect(normal.timeoutMs).toBe(30000);
  });
});
