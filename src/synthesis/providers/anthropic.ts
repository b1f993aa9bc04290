/**
 * Anthropic Messages API provider
 */

import { z } from 'zod';
import type CircuitBreaker from 'opossum';
import { createCircuitBreaker, LLM_OPTIONS, shutdownCircuit } from '../../lib/circuit-breaker.js';
import { SynthesisError, errorMessage } from '../../lib/errors.js';
import type { CompletionProvider, CompletionRequest } from '../types.js';

const API_URL = 'https://api.anthropic.com/v1/messages';
const API_VERSION = '2023-06-01';
const BREAKER_NAME = 'synthesis:anthropic';

const messageResponse = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  stop_reason: z.string().nullable().optional(),
});

export interface AnthropicProviderConfig {
  apiKey: string;
  model: string;
}

export class AnthropicProvider implements CompletionProvider {
  readonly name = 'anthropic';
  private readonly breaker: CircuitBreaker<[CompletionRequest], string>;

  constructor(private readonly config: AnthropicProviderConfig) {
    this.breaker = createCircuitBreaker(BREAKER_NAME, (request: CompletionRequest) => this.send(request), LLM_OPTIONS);
  }

  async complete(request: CompletionRequest): Promise<string> {
    if (!this.config.apiKey) {
      throw new SynthesisError('ANTHROPIC_API_KEY is not set');
    }
    return this.breaker.fire(request);
  }

  close(): void {
    shutdownCircuit(BREAKER_NAME);
  }

  private async send(request: CompletionRequest): Promise<string> {
    let response: Response;
    try {
      response = await fetch(API_URL, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-api-key': this.config.apiKey,
          'anthropic-version': API_VERSION,
        },
        body: JSON.stringify({
          model: this.config.model,
          max_tokens: request.maxTokens,
          system: request.system,
          messages: [{ role: 'user', content: request.prompt }],
        }),
        signal: request.signal,
      });
    } catch (error) {
      throw new SynthesisError(`Anthropic request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new SynthesisError(`Anthropic returned ${response.status}`);
    }

    const parsed = messageResponse.safeParse(await response.json());
    if (!parsed.success) {
      throw new SynthesisError('Unexpected Anthropic response shape');
    }

    const text = parsed.data.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('')
      .trim();
    if (!text) {
      throw new SynthesisError('Anthropic returned no text');
    }
    return text;
  }
}
