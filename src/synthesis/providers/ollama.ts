/**
 * Ollama provider (local models via /api/generate)
 */

import { z } from 'zod';
import type CircuitBreaker from 'opossum';
import { createCircuitBreaker, LLM_OPTIONS, shutdownCircuit } from '../../lib/circuit-breaker.js';
import { SynthesisError, errorMessage } from '../../lib/errors.js';
import type { CompletionProvider, CompletionRequest } from '../types.js';

const BREAKER_NAME = 'synthesis:ollama';

const generateResponse = z.object({ response: z.string() });

export interface OllamaProviderConfig {
  url: string;
  model: string;
}

export class OllamaProvider implements CompletionProvider {
  readonly name = 'ollama';
  private readonly breaker: CircuitBreaker<[CompletionRequest], string>;

  constructor(private readonly config: OllamaProviderConfig) {
    this.breaker = createCircuitBreaker(BREAKER_NAME, (request: CompletionRequest) => this.send(request), LLM_OPTIONS);
  }

  async complete(request: CompletionRequest): Promise<string> {
    return this.breaker.fire(request);
  }

  close(): void {
    shutdownCircuit(BREAKER_NAME);
  }

  private async send(request: CompletionRequest): Promise<string> {
    let response: Response;
    try {
      response = await fetch(`${this.config.url.replace(/\/$/, '')}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.config.model,
          system: request.system,
          prompt: request.prompt,
          stream: false,
          options: { num_predict: request.maxTokens },
        }),
        signal: request.signal,
      });
    } catch (error) {
      throw new SynthesisError(`Ollama request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new SynthesisError(`Ollama returned ${response.status}`);
    }

    const parsed = generateResponse.safeParse(await response.json());
    if (!parsed.success || !parsed.data.response.trim()) {
      throw new SynthesisError('Ollama returned no text');
    }
    return parsed.data.response.trim();
  }
}
