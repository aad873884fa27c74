import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventBus } from '../../../src/kernel/event-bus.js';
import { PolicyStore } from '../../../src/policy/policy-store.js';
import { CircuitBreakerRegistry } from '../../../src/resilience/breaker-registry.js';
import { CircuitBreaker, type CircuitPermit } from '../../../src/resilience/circuit-breaker.js';
import { testPolicy } from '../../helpers/fixtures.js';

const settings = {
  windowSize: 4,
  minimumCalls: 4,
  failureRateThreshold: 0.5,
  openDurationMs: 1000,
  maxOpenDurationMs: 3000,
};

function permit(cb: CircuitBreaker, at: number): CircuitPermit {
  const granted = cb.tryAcquire(at);
  if (!granted) throw new Error(`call refused at ${at}`);
  return granted;
}

function succeed(cb: CircuitBreaker, at: number): void {
  cb.recordSuccess(permit(cb, at), at);
}

function fail(cb: CircuitBreaker, at: number): void {
  cb.recordFailure(permit(cb, at), at);
}

function openBreaker(cb: CircuitBreaker, at: number): void {
  succeed(cb, at);
  succeed(cb, at);
  fail(cb, at);
  fail(cb, at);
}

describe('CircuitBreaker', () => {
  let eventBus: EventBus;
  let cb: CircuitBreaker;

  beforeEach(() => {
    eventBus = new EventBus();
    cb = new CircuitBreaker('generate-image', 'alpha', settings, eventBus);
  });

  describe('closed state', () => {
    it('should start closed and allow calls', () => {
      expect(cb.getState()).toBe('closed');
      expect(cb.tryAcquire(0)).toEqual({ generation: 0, trial: false });
    });

    it('should stay closed below the minimum number of calls', () => {
      fail(cb, 0);
      fail(cb, 0);
      fail(cb, 0);

      expect(cb.getState()).toBe('closed');
    });

    it('should stay closed while the failure rate is below the threshold', () => {
      succeed(cb, 0);
      succeed(cb, 0);
      succeed(cb, 0);
      fail(cb, 0);

      expect(cb.getState()).toBe('closed');
      expect(cb.getStats().failureRate).toBe(0.25);
    });

    it('should open exactly when the failure rate reaches the threshold', () => {
      succeed(cb, 0);
      succeed(cb, 0);
      fail(cb, 0);
      expect(cb.getState()).toBe('closed');

      fail(cb, 5);
      expect(cb.getState()).toBe('open');
      expect(cb.getOpenedAt()).toBe(5);
    });

    it('should only count the most recent outcomes', () => {
      fail(cb, 0);
      fail(cb, 0);
      for (let i = 0; i < 4; i++) succeed(cb, 0);
      fail(cb, 0);

      expect(cb.getState()).toBe('closed');
      expect(cb.getStats().windowCalls).toBe(4);
    });
  });

  describe('open state', () => {
    it('should refuse calls until the open duration has elapsed', () => {
      openBreaker(cb, 0);

      expect(cb.tryAcquire(999)).toBeNull();
      expect(cb.isOpen(999)).toBe(true);
      expect(cb.getState()).toBe('open');
      expect(cb.getStats().rejected).toBe(1);
    });

    it('should never close directly from open', () => {
      const first = permit(cb, 0);
      const second = permit(cb, 0);
      openBreaker(cb, 0);

      cb.recordSuccess(first, 10);
      cb.recordSuccess(second, 20);

      expect(cb.getState()).toBe('open');
      expect(cb.getStats().totalSuccesses).toBe(4);
    });

    it('should move to half_open and grant a single trial permit', () => {
      openBreaker(cb, 0);

      expect(cb.tryAcquire(1000)).toMatchObject({ trial: true });
      expect(cb.getState()).toBe('half_open');
      expect(cb.tryAcquire(1001)).toBeNull();
    });
  });

  describe('half_open state', () => {
    it('should close and reset the window after a successful trial', () => {
      openBreaker(cb, 0);
      succeed(cb, 1000);

      expect(cb.getState()).toBe('closed');
      expect(cb.getStats().windowCalls).toBe(0);
      expect(cb.getOpenedAt()).toBeNull();
    });

    it('should reopen with a doubled open duration after a failed trial', () => {
      openBreaker(cb, 0);
      fail(cb, 1000);

      expect(cb.getState()).toBe('open');
      expect(cb.getOpenedAt()).toBe(1000);
      expect(cb.getStats().openDurationMs).toBe(2000);
      expect(cb.tryAcquire(2999)).toBeNull();
      expect(cb.tryAcquire(3000)).not.toBeNull();
    });

    it('should cap the open duration', () => {
      openBreaker(cb, 0);
      fail(cb, 1000); // 2000
      fail(cb, 3000); // capped at 3000

      expect(cb.getStats().openDurationMs).toBe(3000);
    });

    it('should restore the base open duration once closed', () => {
      openBreaker(cb, 0);
      fail(cb, 1000);
      succeed(cb, 3000);

      expect(cb.getStats().openDurationMs).toBe(1000);
    });

    it('should not let a call admitted while closed decide the trial by succeeding', () => {
      const early = permit(cb, 0);
      openBreaker(cb, 0);
      const trial = permit(cb, 1000);

      cb.recordSuccess(early, 1010);

      expect(cb.getState()).toBe('half_open');
      expect(cb.getStats().totalSuccesses).toBe(3);

      cb.recordSuccess(trial, 1020);
      expect(cb.getState()).toBe('closed');
    });

    it('should not let a call admitted while closed reopen the circuit by failing', () => {
      const early = permit(cb, 0);
      openBreaker(cb, 0);
      permit(cb, 1000);

      cb.recordFailure(early, 1010);

      expect(cb.getState()).toBe('half_open');
      expect(cb.getStats()).toMatchObject({ totalFailures: 3, openDurationMs: 1000 });
    });

    it('should keep outcomes of earlier calls out of the window after closing', () => {
      const early = permit(cb, 0);
      openBreaker(cb, 0);
      succeed(cb, 1000);

      cb.recordFailure(early, 1010);

      expect(cb.getState()).toBe('closed');
      expect(cb.getStats().windowCalls).toBe(0);
    });
  });

  it('should emit every transition', () => {
    const handler = vi.fn();
    eventBus.on('circuit:state_changed', handler);

    openBreaker(cb, 0);
    succeed(cb, 1000);

    expect(handler.mock.calls.map(([payload]) => `${payload.from}->${payload.to}`)).toEqual([
      'closed->open',
      'open->half_open',
      'half_open->closed',
    ]);
  });

  it('should reset to a fresh closed breaker and ignore calls admitted before', () => {
    const early = permit(cb, 0);
    openBreaker(cb, 0);
    cb.reset();
    cb.recordFailure(early, 10);

    expect(cb.getState()).toBe('closed');
    expect(cb.getStats()).toMatchObject({ totalFailures: 1, totalSuccesses: 0, windowCalls: 0 });
  });
});

describe('CircuitBreakerRegistry', () => {
  it('should keep one breaker per capability and provider', () => {
    const eventBus = new EventBus();
    const snapshot = new PolicyStore(eventBus, testPolicy()).current();
    const registry = new CircuitBreakerRegistry(eventBus);

    const a = registry.get('generate-image', 'alpha', snapshot);

    expect(registry.get('generate-image', 'alpha', snapshot)).toBe(a);
    expect(registry.get('generate-video', 'alpha', snapshot)).not.toBe(a);
    expect(registry.peek('generate-image', 'beta')).toBeUndefined();
    expect(registry.states()).toEqual([
      { capability: 'generate-image', provider: 'alpha', state: 'closed' },
      { capability: 'generate-video', provider: 'alpha', state: 'closed' },
    ]);
  });

  it('should refresh settings only from newer snapshots', () => {
    const eventBus = new EventBus();
    const store = new PolicyStore(eventBus, testPolicy());
    const first = store.current();
    const registry = new CircuitBreakerRegistry(eventBus);
    const breaker = registry.get('generate-image', 'alpha', first);

    const doc = testPolicy();
    store.reload({
      ...doc,
      resilience: {
        defaults: { ...doc.resilience.defaults, breaker: { ...doc.resilience.defaults.breaker, openDurationMs: 5000 } },
      },
    });
    registry.get('generate-image', 'alpha', store.current());
    expect(breaker.getStats().openDurationMs).toBe(5000);

    registry.get('generate-image', 'alpha', first);
    expect(breaker.getStats().openDurationMs).toBe(5000);
  });
});
