import { describe, it, expect, vi } from 'vitest';
import { createCompletionProvider, createSynthesisEngine } from './index.js';
import type { SynthesisConfig } from '../lib/config.js';

vi.mock('../lib/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  }),
}));

const base: SynthesisConfig = {
  plugin: 'llm',
  provider: 'anthropic',
  model: 'test-model',
  maxOutputTokens: 3000,
  anthropicApiKey: 'test-secret',
  openaiApiKey: 'test-secret',
  openaiUrl: 'https://openai.test/v1',
  ollamaUrl: 'http://localhost:11434',
  templatePath: undefined,
};

describe('createSynthesisEngine', () => {
  it('should build the passthrough engine', async () => {
    const engine = createSynthesisEngine({ ...base, plugin: 'passthrough' });

    expect(engine.name).toBe('passthrough');
    await engine.close();
  });

  it('should build the template engine', async () => {
    const engine = createSynthesisEngine({ ...base, plugin: 'template' });

    expect(engine.name).toBe('template');
    await engine.close();
  });

  it('should build the LLM engine for every provider', async () => {
    for (const provider of ['anthropic', 'openai', 'ollama'] as const) {
      const engine = createSynthesisEngine({ ...base, provider });
      expect(engine.name).toBe('llm');
      await engine.close();
    }
  });
});

describe('createCompletionProvider', () => {
  it('should pick the configured provider', () => {
    for (const provider of ['anthropic', 'openai', 'ollama'] as const) {
      const created = createCompletionProvider({ ...base, provider });
      expect(created.name).toBe(provider);
      created.close();
    }
  });
});
