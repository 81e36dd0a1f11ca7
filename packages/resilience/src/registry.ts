/**
 * One circuit breaker per protected resource
 */

import { CircuitBreaker } from './circuit-breaker.js';
import type { CircuitBreakerMetrics, CircuitBreakerOptions } from './types.js';

export type RegistryBreakerOptions = Omit<CircuitBreakerOptions, 'name'>;

export class CircuitBreakerRegistry {
  private readonly circuitBreakers = new Map<string, CircuitBreaker>();

  /**
   * @param defaults - options applied to every breaker the registry creates
   */
  constructor(private readonly defaults: RegistryBreakerOptions = {}) {}

  /**
   * Create or get a circuit breaker. Options only apply on creation.
   */
  get(name: string, options: RegistryBreakerOptions = {}): CircuitBreaker {
    const existing = this.circuitBreakers.get(name);
    if (existing) {
      return existing;
    }

    const breaker = new CircuitBreaker({ ...this.defaults, ...options, name });
    this.circuitBreakers.set(name, breaker);
    return breaker;
  }

  has(name: string): boolean {
    return this.circuitBreakers.has(name);
  }

  getAll(): ReadonlyMap<string, CircuitBreaker> {
    return new Map(this.circuitBreakers);
  }

  getMetrics(): Record<string, CircuitBreakerMetrics> {
    const metrics: Record<string, CircuitBreakerMetrics> = {};
    for (const [name, breaker] of this.circuitBreakers) {
      metrics[name] = breaker.getMetrics();
    }
    return metrics;
  }

  resetAll(): void {
    for (const breaker of this.circuitBreakers.values()) {
      breaker.reset();
    }
  }
}
