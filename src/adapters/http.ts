/**
 * JSON over HTTP for source adapters
 *
 * Uses the global fetch. Non-2xx responses become AdapterError; every
 * adapter gets its own circuit breaker so a failing source is short-circuited.
 */

import { z } from 'zod';
import { createCircuitBreaker, shutdownCircuit } from '../lib/circuit-breaker.js';
import { AdapterError, errorMessage } from '../lib/errors.js';

export interface JsonRequest {
  url: string;
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: unknown;
  signal?: AbortSignal;
}

async function requestJson(source: string, request: JsonRequest): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(request.url, {
      method: request.method ?? 'GET',
      headers: {
        Accept: 'application/json',
        ...(request.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        ...request.headers,
      },
      body: request.body !== undefined ? JSON.stringify(request.body) : undefined,
      signal: request.signal,
    });
  } catch (error) {
    throw new AdapterError(source, `request failed: ${errorMessage(error)}`, { cause: error });
  }

  if (!response.ok) {
    throw new AdapterError(source, `HTTP ${response.status} ${response.statusText}`.trim(), {
      status: response.status,
    });
  }

  return response.json();
}

/**
 * HTTP client bound to one source
 */
export class SourceHttpClient {
  private readonly breakerName: string;
  private readonly fire: (request: JsonRequest) => Promise<unknown>;

  constructor(private readonly source: string) {
    this.breakerName = `adapter:${source}`;
    const breaker = createCircuitBreaker(this.breakerName, (request: JsonRequest) => requestJson(source, request), {
      // 404 is an answer, not an outage
      errorFilter: (error: unknown) => error instanceof AdapterError && error.status === 404,
    });
    this.fire = (request) => breaker.fire(request);
  }

  /**
   * Request and validate the JSON body
   */
  async json<T>(request: JsonRequest, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const body = await this.fire(request);
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new AdapterError(this.source, `unexpected response shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
  }

  close(): void {
    shutdownCircuit(this.breakerName);
  }
}
