/**
 * Synthesis engine factory
 */

import type { SynthesisConfig } from '../lib/config.js';
import { createLogger } from '../lib/logger.js';
import { LlmSynthesisEngine } from './llm.js';
import { PassthroughSynthesisEngine } from './passthrough.js';
import { AnthropicProvider } from './providers/anthropic.js';
import { OllamaProvider } from './providers/ollama.js';
import { OpenAIProvider } from './providers/openai.js';
import { TemplateSynthesisEngine } from './template.js';
import type { CompletionProvider, SynthesisEngine } from './types.js';

const logger = createLogger('synthesis');

export function createCompletionProvider(config: SynthesisConfig): CompletionProvider {
  switch (config.provider) {
    case 'anthropic':
      return new AnthropicProvider({ apiKey: config.anthropicApiKey, model: config.model });
    case 'openai':
      return new OpenAIProvider({ apiKey: config.openaiApiKey, model: config.model, url: config.openaiUrl });
    case 'ollama':
      return new OllamaProvider({ url: config.ollamaUrl, model: config.model });
  }
}

export function createSynthesisEngine(config: SynthesisConfig): SynthesisEngine {
  if (config.plugin === 'passthrough') {
    logger.info('Using passthrough synthesis');
    return new PassthroughSynthesisEngine();
  }

  if (config.plugin === 'template') {
    logger.info({ templatePath: config.templatePath ?? 'default' }, 'Using template synthesis');
    return new TemplateSynthesisEngine(config.templatePath);
  }

  const provider = createCompletionProvider(config);
  logger.info({ provider: provider.name, model: config.model }, 'Using LLM synthesis');
  return new LlmSynthesisEngine(provider, { maxOutputTokens: config.maxOutputTokens });
}

export type { SynthesisEngine, SynthesisOptions, SynthesisPass, CompletionProvider } from './types.js';
