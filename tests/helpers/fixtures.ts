import { AdapterError, type AdapterErrorKind } from '../../src/adapters/adapter-error.js';
import type {
  AdapterInvocation,
  AdapterResult,
  ProviderAdapter,
} from '../../src/adapters/adapter-registry.js';
import { DEFAULT_CONFIG } from '../../src/config/config.js';
import type { PolicyDocumentInput } from '../../src/policy/schemas.js';
import type { CircuitBreaker } from '../../src/resilience/circuit-breaker.js';
import type { Config } from '../../src/types/index.js';

/**
 * Small policy with fast timings: three image providers in priority order,
 * one 10 USD request-level scope and a 1 USD rate for each provider.
 */
export function testPolicy() {
  return {
    version: 'test-1',
    routing: {
      capabilities: {
        'generate-image': {
          providers: [
            { id: 'alpha', priority: 1 },
            { id: 'beta', priority: 2 },
            { id: 'gamma', priority: 3 },
          ],
        },
      },
    },
    resilience: {
      defaults: {
        maxAttempts: 3,
        backoff: { baseDelayMs: 1, multiplier: 2, maxDelayMs: 4 },
        attemptTimeoutMs: 20,
        breaker: {
          windowSize: 10,
          minimumCalls: 5,
          failureRateThreshold: 0.5,
          openDurationMs: 1000,
          maxOpenDurationMs: 8000,
        },
      },
    },
    cost: {
      scopes: [{ id: 'global', unit: 'usd', ceiling: 10, windowMs: 60_000 }],
      rates: {
        alpha: { usd: 1 },
        beta: { usd: 1 },
        gamma: { usd: 1 },
      },
    },
    cache: {
      ttlMs: 60_000,
      maxEntries: 100,
      similarityThreshold: 0.8,
    },
  } satisfies PolicyDocumentInput;
}

export const testConfig: Config = {
  ...DEFAULT_CONFIG,
  logging: { level: 'silent' },
};

type Behaviour = (invocation: AdapterInvocation) => Promise<AdapterResult<string>>;

export class FakeAdapter implements ProviderAdapter<string> {
  readonly calls: AdapterInvocation[] = [];

  constructor(
    readonly id: string,
    private behaviour: Behaviour = async () => ({ payload: `${id}-payload` }),
  ) {}

  respondWith(behaviour: Behaviour): void {
    this.behaviour = behaviour;
  }

  invoke(invocation: AdapterInvocation): Promise<AdapterResult<string>> {
    this.calls.push(invocation);
    return this.behaviour(invocation);
  }
}

export function failing(kind: AdapterErrorKind = 'unavailable', retryable = true): Behaviour {
  return async () => {
    throw new AdapterError('backend failed', kind, retryable);
  };
}

/** Never settles on its own; rejects once the attempt's signal is aborted. */
export const hanging: Behaviour = (invocation) =>
  new Promise((_, reject) => {
    invocation.signal.addEventListener('abort', () => reject(invocation.signal.reason));
  });

export const noPause = async (): Promise<void> => {};

/** Send `count` failing calls through the breaker. */
export function recordFailures(breaker: CircuitBreaker, count: number, at?: number): void {
  for (let i = 0; i < count; i++) {
    const permit = breaker.tryAcquire(at);
    if (!permit) throw new Error(`${breaker.provider} refused call ${i + 1}`);
    breaker.recordFailure(permit, at);
  }
}
