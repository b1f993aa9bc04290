/**
 * Trace context propagation
 *
 * Every MCP tool call and every pipeline build runs inside a trace so that
 * the log lines of all adapters touched by that unit of work share one id.
 * Uses AsyncLocalStorage for automatic context propagation.
 */

import { AsyncLocalStorage } from 'async_hooks';
import crypto from 'crypto';

export interface TraceContext {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  startTime: number;
  metadata?: Record<string, unknown>;
}

const traceStorage = new AsyncLocalStorage<TraceContext>();

/**
 * Generate a new trace ID (16 hex chars)
 */
export function generateTraceId(): string {
  return crypto.randomBytes(8).toString('hex');
}

/**
 * Generate a new span ID (8 hex chars)
 */
export function generateSpanId(): string {
  return crypto.randomBytes(4).toString('hex');
}

export function getTraceContext(): TraceContext | undefined {
  return traceStorage.getStore();
}

export function getTraceId(): string | undefined {
  return traceStorage.getStore()?.traceId;
}

/**
 * Run an async function within a new trace context
 */
export async function withTraceAsync<T>(
  fn: () => Promise<T>,
  options?: {
    traceId?: string;
    metadata?: Record<string, unknown>;
  }
): Promise<T> {
  const parent = getTraceContext();
  const context: TraceContext = {
    traceId: options?.traceId ?? parent?.traceId ?? generateTraceId(),
    spanId: generateSpanId(),
    parentSpanId: parent?.spanId,
    startTime: Date.now(),
    metadata: { ...parent?.metadata, ...options?.metadata },
  };

  return traceStorage.run(context, fn);
}

/**
 * Get trace info for logging (always returns object, with or without trace)
 */
export function getTraceInfo(): { traceId?: string; spanId?: string; parentSpanId?: string } {
  const ctx = getTraceContext();
  if (!ctx) return {};
  return {
    traceId: ctx.traceId,
    spanId: ctx.spanId,
    parentSpanId: ctx.parentSpanId,
  };
}

/**
 * Milliseconds since the current span started
 */
export function getSpanDuration(): number | undefined {
  const ctx = getTraceContext();
  return ctx ? Date.now() - ctx.startTime : undefined;
}
