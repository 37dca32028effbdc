import { describe, expect, it } from 'vitest';
import { TestClock } from '../../testing/testContainer.js';
import { ProviderUnavailableError } from '../../utils/errors.js';
import { CircuitBreaker, CircuitBreakerRegistry } from './CircuitBreaker.js';

function breaker(clock: TestClock = new TestClock()) {
  return new CircuitBreaker('STRIPE', { failureThreshold: 3, resetTimeoutMs: 60_000, now: clock.now });
}

describe('CircuitBreaker', () => {
  it('should stay closed below the failure threshold', () => {
    const circuit = breaker();

    circuit.recordFailure();
    circuit.recordFailure();

    expect(() => circuit.assertCallable()).not.toThrow();
    expect(circuit.getStatus()).toMatchObject({ state: 'CLOSED', failureCount: 2 });
  });

  it('should only count consecutive failures', () => {
    const circuit = breaker();

    circuit.recordFailure();
    circuit.recordFailure();
    circuit.recordSuccess();
    circuit.recordFailure();

    expect(circuit.getStatus()).toMatchObject({ state: 'CLOSED', failureCount: 1 });
  });

  it('should reject calls with the remaining wait once open', () => {
    const clock = new TestClock();
    const circuit = breaker(clock);
    circuit.recordFailure();
    circuit.recordFailure();
    circuit.recordFailure();
    clock.advance(15_000);

    let thrown: unknown;
    try {
      circuit.assertCallable();
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ProviderUnavailableError);
    expect(thrown).toMatchObject({ code: 'PROVIDER_UNAVAILABLE', retryAfterMs: 45_000 });
    expect(circuit.getStatus()).toEqual({
      state: 'OPEN',
      failureCount: 3,
      failureThreshold: 3,
      lastFailureAt: '2026-03-02T09:00:00.000Z',
    });
  });

  it('should close again after a successful trial call', () => {
    const clock = new TestClock();
    const circuit = breaker(clock);
    circuit.recordFailure();
    circuit.recordFailure();
    circuit.recordFailure();
    clock.advance(60_000);

    circuit.assertCallable();
    expect(circuit.getStatus().state).toBe('HALF_OPEN');
    circuit.recordSuccess();

    expect(circuit.getStatus()).toMatchObject({ state: 'CLOSED', failureCount: 0 });
  });

  it('should reopen at once when the trial call fails', () => {
    const clock = new TestClock();
    const circuit = breaker(clock);
    circuit.recordFailure();
    circuit.recordFailure();
    circuit.recordFailure();
    clock.advance(60_000);
    circuit.assertCallable();

    circuit.recordFailure();

    expect(circuit.getStatus().state).toBe('OPEN');
    expect(() => circuit.assertCallable()).toThrow('STRIPE is temporarily unavailable');
  });
});

describe('CircuitBreakerRegistry', () => {
  it('should keep one breaker per provider', () => {
    const registry = new CircuitBreakerRegistry({ failureThreshold: 1, resetTimeoutMs: 60_000 });

    registry.get('STRIPE').recordFailure();

    expect(registry.get('STRIPE')).toBe(registry.get('STRIPE'));
    expect(registry.get('SHOPIFY').getStatus().state).toBe('CLOSED');
    expect(Object.keys(registry.getStatuses())).toEqual(['STRIPE', 'SHOPIFY']);
    expect(registry.getStatuses().STRIPE?.state).toBe('OPEN');
  });
});
