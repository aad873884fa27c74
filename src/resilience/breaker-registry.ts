import type { EventBus } from '../kernel/event-bus.js';
import { resolveResilience } from '../policy/resolve.js';
import type { PolicySnapshot } from '../policy/schemas.js';
import { CircuitBreaker, type CircuitState, type CircuitStats } from './circuit-breaker.js';

interface Registered {
  breaker: CircuitBreaker;
  revision: number;
}

/**
 * One breaker per (capability, provider), created on first use with the
 * settings resolved from the snapshot that asked for it. A newer snapshot
 * revision refreshes the settings; an older one never rolls them back.
 */
export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, Registered>();

  constructor(private readonly eventBus: EventBus) {}

  get(capability: string, provider: string, snapshot: PolicySnapshot): CircuitBreaker {
    const key = `${capability}::${provider}`;
    const settings = resolveResilience(snapshot.resilience, capability, provider).breaker;
    const registered = this.breakers.get(key);

    if (!registered) {
      const breaker = new CircuitBreaker(capability, provider, settings, this.eventBus);
      this.breakers.set(key, { breaker, revision: snapshot.revision });
      return breaker;
    }

    if (snapshot.revision > registered.revision) {
      registered.breaker.updateSettings(settings);
      registered.revision = snapshot.revision;
    }
    return registered.breaker;
  }

  /** Existing breaker, without creating one. */
  peek(capability: string, provider: string): CircuitBreaker | undefined {
    return this.breakers.get(`${capability}::${provider}`)?.breaker;
  }

  states(): Array<{ capability: string; provider: string; state: CircuitState }> {
    return [...this.breakers.values()].map(({ breaker }) => ({
      capability: breaker.capability,
      provider: breaker.provider,
      state: breaker.getState(),
    }));
  }

  getStats(): CircuitStats[] {
    return [...this.breakers.values()].map(({ breaker }) => breaker.getStats());
  }

  reset(): void {
    for (const { breaker } of this.breakers.values()) {
      breaker.reset();
    }
  }
}
