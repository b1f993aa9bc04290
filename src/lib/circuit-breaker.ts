/**
 * Circuit Breaker Module
 *
 * Short-circuits calls to a source or LLM provider that keeps failing.
 * Uses the opossum library.
 */

import CircuitBreaker from 'opossum';
import { createLogger } from './logger.js';

const logger = createLogger('circuit-breaker');

export interface CircuitBreakerOptions {
  /** Request timeout in ms; false leaves timing to the caller (default: false) */
  timeout?: number | false;
  /** Error threshold percentage to open circuit (default: 50) */
  errorThresholdPercentage?: number;
  /** Time in ms before trying again after circuit opens (default: 30000) */
  resetTimeout?: number;
  /** Rolling window size for stats (default: 10) */
  rollingCountBuckets?: number;
  /** Rolling window duration in ms (default: 10000) */
  rollingCountTimeout?: number;
  /** Minimum requests before circuit can open (default: 5) */
  volumeThreshold?: number;
  /** Errors for which this returns true do not count as failures */
  errorFilter?: (error: unknown) => boolean;
}

// Timeouts are enforced by FetchCoordinator, not by the breaker
const DEFAULT_OPTIONS: CircuitBreakerOptions = {
  timeout: false,
  errorThresholdPercentage: 50,
  resetTimeout: 30000,
  rollingCountBuckets: 10,
  rollingCountTimeout: 10000,
  volumeThreshold: 5,
};

/**
 * LLM provider settings (longer reset window)
 */
export const LLM_OPTIONS: CircuitBreakerOptions = {
  errorThresholdPercentage: 60,
  resetTimeout: 60000,
  volumeThreshold: 3,
};

const breakers: Map<string, CircuitBreaker<unknown[], unknown>> = new Map();

/**
 * Create a circuit breaker for an async function
 *
 * @param name - Unique name for this breaker (for logging/monitoring)
 */
export function createCircuitBreaker<TArgs extends unknown[], TResult>(
  name: string,
  fn: (...args: TArgs) => Promise<TResult>,
  options: CircuitBreakerOptions = {}
): CircuitBreaker<TArgs, TResult> {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  const breaker = new CircuitBreaker(fn, {
    timeout: opts.timeout,
    errorThresholdPercentage: opts.errorThresholdPercentage,
    resetTimeout: opts.resetTimeout,
    rollingCountBuckets: opts.rollingCountBuckets,
    rollingCountTimeout: opts.rollingCountTimeout,
    volumeThreshold: opts.volumeThreshold,
    errorFilter: opts.errorFilter,
  });

  breaker.on('reject', () => {
    logger.warn({ breaker: name }, 'Circuit breaker rejected call (circuit open)');
  });

  breaker.on('open', () => {
    logger.error({ breaker: name, resetTimeout: opts.resetTimeout },
      'Circuit breaker OPENED - calls will be rejected');
  });

  breaker.on('halfOpen', () => {
    logger.info({ breaker: name }, 'Circuit breaker half-open - testing upstream');
  });

  breaker.on('close', () => {
    logger.info({ breaker: name }, 'Circuit breaker CLOSED - upstream recovered');
  });

  breakers.set(name, breaker as CircuitBreaker<unknown[], unknown>);

  return breaker;
}

export interface BreakerState {
  state: 'OPEN' | 'HALF_OPEN' | 'CLOSED';
  failures: number;
  successes: number;
  rejects: number;
}

/**
 * Get circuit breaker stats for all registered breakers
 */
export function getCircuitBreakerStats(): Record<string, BreakerState> {
  const stats: Record<string, BreakerState> = {};

  for (const [name, breaker] of breakers) {
    const breakerStats = breaker.stats;
    stats[name] = {
      state: breaker.opened ? 'OPEN' : (breaker.halfOpen ? 'HALF_OPEN' : 'CLOSED'),
      failures: breakerStats.failures,
      successes: breakerStats.successes,
      rejects: breakerStats.rejects,
    };
  }

  return stats;
}

/**
 * Stop and forget a breaker (its rolling-stats timer keeps the process alive otherwise)
 */
export function shutdownCircuit(name: string): void {
  const breaker = breakers.get(name);
  if (breaker) {
    breaker.shutdown();
    breakers.delete(name);
  }
}
