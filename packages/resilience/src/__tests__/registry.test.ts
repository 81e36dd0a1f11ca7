import { LoggerFactory } from '@steadfast/logging';
import { describe, expect, it } from 'vitest';

import { CircuitBreakerRegistry, CircuitBreakerState } from '../index.js';

describe('CircuitBreakerRegistry', () => {
  const { logger } = LoggerFactory.createMemoryLogger('test');

  it('should return the same breaker for a name', () => {
    const registry = new CircuitBreakerRegistry({ logger });

    const first = registry.get('search');
    expect(registry.get('search')).toBe(first);
    expect(registry.get('uploads')).not.toBe(first);
    expect(registry.has('search')).toBe(true);
    expect(registry.has('billing')).toBe(false);
  });

  it('should apply options on creation only', () => {
    const registry = new CircuitBreakerRegistry({ logger, recoveryTimeoutMs: 10_000 });

    const breaker = registry.get('search', { failureThreshold: 2 });
    registry.get('search', { failureThreshold: 9 });

    expect(breaker.name).toBe('search');
    expect(breaker.failureThreshold).toBe(2);
    expect(breaker.recoveryTimeoutMs).toBe(10_000);
  });

  it('should report metrics per breaker and reset them all', async () => {
    const registry = new CircuitBreakerRegistry({ logger, failureThreshold: 1 });
    const search = registry.get('search');
    registry.get('uploads');

    await expect(
      search.execute(async () => {
        throw new Error('down');
      })
    ).rejects.toThrow('down');

    const metrics = registry.getMetrics();
    expect(Object.keys(metrics).sort()).toEqual(['search', 'uploads']);
    expect(metrics.search?.state).toBe(CircuitBreakerState.OPEN);
    expect(metrics.uploads?.totalRequests).toBe(0);

    registry.resetAll();
    expect(search.getState()).toBe(CircuitBreakerState.CLOSED);
    expect([...registry.getAll().keys()]).toEqual(['search', 'uploads']);
  });
});
