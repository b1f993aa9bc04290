/**
 * OpenAI Chat Completions provider
 */

import { z } from 'zod';
import type CircuitBreaker from 'opossum';
import { createCircuitBreaker, LLM_OPTIONS, shutdownCircuit } from '../../lib/circuit-breaker.js';
import { SynthesisError, errorMessage } from '../../lib/errors.js';
import type { CompletionProvider, CompletionRequest } from '../types.js';

const BREAKER_NAME = 'synthesis:openai';

const chatResponse = z.object({
  choices: z.array(
    z.object({
      message: z.object({ content: z.string().nullable().optional() }),
    })
  ),
});

export interface OpenAIProviderConfig {
  apiKey: string;
  model: string;
  /** API root, e.g. https://api.openai.com/v1 */
  url: string;
}

export class OpenAIProvider implements CompletionProvider {
  readonly name = 'openai';
  private readonly breaker: CircuitBreaker<[CompletionRequest], string>;

  constructor(private readonly config: OpenAIProviderConfig) {
    this.breaker = createCircuitBreaker(BREAKER_NAME, (request: CompletionRequest) => this.send(request), LLM_OPTIONS);
  }

  async complete(request: CompletionRequest): Promise<string> {
    if (!this.config.apiKey) {
      throw new SynthesisError('OPENAI_API_KEY is not set');
    }
    return this.breaker.fire(request);
  }

  close(): void {
    shutdownCircuit(BREAKER_NAME);
  }

  private async send(request: CompletionRequest): Promise<string> {
    let response: Response;
    try {
      response = await fetch(`${this.config.url.replace(/\/$/, '')}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.config.apiKey}`,
        },
        body: JSON.stringify({
          model: this.config.model,
          max_tokens: request.maxTokens,
          messages: [
            { role: 'system', content: request.system },
            { role: 'user', content: request.prompt },
          ],
        }),
        signal: request.signal,
      });
    } catch (error) {
      throw new SynthesisError(`OpenAI request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new SynthesisError(`OpenAI returned ${response.status}`);
    }

    const parsed = chatResponse.safeParse(await response.json());
    if (!parsed.success) {
      throw new SynthesisError('Unexpected OpenAI response shape');
    }

    const text = (parsed.data.choices[0]?.message.content ?? '').trim();
    if (!text) {
      throw new SynthesisError('OpenAI returned no text');
    }
    return text;
  }
}
