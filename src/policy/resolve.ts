import type {
  CostUnit,
  DeepReadonly,
  CostPolicy,
  ResilienceOverride,
  ResiliencePolicy,
  ResilienceSettings,
} from './schemas.js';

export interface Cost {
  usd: number;
  tokens: number;
}

export const ZERO_COST: Cost = Object.freeze({ usd: 0, tokens: 0 });

function applyOverride(
  base: ResilienceSettings,
  override: DeepReadonly<ResilienceOverride> | undefined,
): ResilienceSettings {
  if (!override) return base;
  return {
    maxAttempts: override.maxAttempts ?? base.maxAttempts,
    attemptTimeoutMs: override.attemptTimeoutMs ?? base.attemptTimeoutMs,
    backoff: { ...base.backoff, ...override.backoff },
    breaker: { ...base.breaker, ...override.breaker },
  };
}

/**
 * Effective resilience settings for one (capability, provider) pair:
 * defaults, then the provider override, then the capability-specific one.
 */
export function resolveResilience(
  policy: DeepReadonly<ResiliencePolicy>,
  capability: string,
  provider: string,
): ResilienceSettings {
  const defaults: ResilienceSettings = {
    maxAttempts: policy.defaults.maxAttempts,
    attemptTimeoutMs: policy.defaults.attemptTimeoutMs,
    backoff: { ...policy.defaults.backoff },
    breaker: { ...policy.defaults.breaker },
  };
  const byProvider = applyOverride(defaults, policy.providers[provider]);
  return applyOverride(byProvider, policy.capabilities[capability]?.[provider]);
}

/** Rate card entry for a provider call; capability-specific rates win. */
export function resolveRate(
  policy: DeepReadonly<CostPolicy>,
  provider: string,
  capability: string,
): Cost {
  const rate = policy.rates[provider];
  if (!rate) return ZERO_COST;
  const specific = rate.capabilities[capability];
  if (specific) return { usd: specific.usd, tokens: specific.tokens };
  return { usd: rate.usd, tokens: rate.tokens };
}

export function amountIn(cost: Cost, unit: CostUnit): number {
  return unit === 'usd' ? cost.usd : cost.tokens;
}

/** Component-wise maximum; used for conservative pre-routing holds. */
export function maxCost(costs: readonly Cost[]): Cost {
  return costs.reduce<Cost>(
    (acc, cost) => ({ usd: Math.max(acc.usd, cost.usd), tokens: Math.max(acc.tokens, cost.tokens) }),
    { usd: 0, tokens: 0 },
  );
}
