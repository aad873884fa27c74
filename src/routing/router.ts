/**
 * Router
 *
 * Turns a capability's routing policy into the ordered list of providers
 * the orchestrator will try. Feature-disabled providers are removed;
 * providers behind an open circuit are kept but moved to the end.
 *
 * @module routing/router
 */

import type { PolicySnapshot, ProviderRoute, Tier, DeepReadonly } from '../policy/schemas.js';
import type { CircuitBreakerRegistry } from '../resilience/breaker-registry.js';
import { type CostMode, type Result, ok, err } from '../types/index.js';
import { DEGRADATION_FLAG, isCapabilityEnabled, isFlagEnabled, isProviderEnabled } from './feature-gate.js';

export interface RoutingContext {
  costMode?: CostMode;
  /** Moved to the front when it is part of the capability's chain */
  requestedProvider?: string;
}

export interface RoutingError {
  code: 'no_providers_configured';
  capability: string;
  message: string;
}

const TIER_RANK: Record<Tier, number> = { low: 0, medium: 1, high: 2 };

function tierScore(route: DeepReadonly<ProviderRoute>, mode: CostMode): number {
  switch (mode) {
    case 'cost_optimized':
      return TIER_RANK[route.costTier];
    case 'quality_optimized':
      return -TIER_RANK[route.qualityTier];
    case 'balanced':
      return 0;
  }
}

/**
 * Order: cost-mode tier preference, then priority (lower first, unset last),
 * then weight (higher first), then declaration order.
 */
export function orderProviders(routes: ReadonlyArray<DeepReadonly<ProviderRoute>>, mode: CostMode): string[] {
  return routes
    .map((route, index) => ({ route, index }))
    .sort((a, b) => {
      const byTier = tierScore(a.route, mode) - tierScore(b.route, mode);
      if (byTier !== 0) return byTier;

      const byPriority = (a.route.priority ?? Number.POSITIVE_INFINITY) - (b.route.priority ?? Number.POSITIVE_INFINITY);
      if (byPriority !== 0 && !Number.isNaN(byPriority)) return byPriority;

      const byWeight = (b.route.weight ?? 0) - (a.route.weight ?? 0);
      if (byWeight !== 0) return byWeight;

      return a.index - b.index;
    })
    .map(({ route }) => route.id);
}

export class Router {
  constructor(private readonly breakers: CircuitBreakerRegistry) {}

  candidates(
    capability: string,
    context: RoutingContext,
    snapshot: PolicySnapshot,
    now: number = Date.now(),
  ): Result<string[], RoutingError> {
    const route = snapshot.routing.capabilities[capability];
    const { features } = snapshot;

    if (!route || !isCapabilityEnabled(features, capability)) {
      return err(this.noProviders(capability, route ? 'capability is disabled' : 'capability has no routing policy'));
    }

    const chain = orderProviders(route.providers, context.costMode ?? snapshot.routing.costMode);
    for (const fallback of route.fallbacks) {
      if (!chain.includes(fallback)) chain.push(fallback);
    }

    const requested = context.requestedProvider;
    if (requested !== undefined && chain.includes(requested)) {
      chain.splice(chain.indexOf(requested), 1);
      chain.unshift(requested);
    }

    const enabled = chain.filter((provider) => isProviderEnabled(features, provider));

    const healthy: string[] = [];
    const open: Array<{ provider: string; openedAt: number }> = [];
    for (const provider of enabled) {
      const breaker = this.breakers.peek(capability, provider);
      const openedAt = breaker?.getOpenedAt();
      if (breaker?.isOpen(now) && openedAt != null) {
        open.push({ provider, openedAt });
      } else {
        healthy.push(provider);
      }
    }
    open.sort((a, b) => a.openedAt - b.openedAt);

    const ordered = [...healthy, ...open.map(({ provider }) => provider)];

    const { degradation } = snapshot.resilience;
    if (
      degradation.enabled &&
      degradation.provider &&
      isProviderEnabled(features, degradation.provider) &&
      isFlagEnabled(features, DEGRADATION_FLAG, true)
    ) {
      const index = ordered.indexOf(degradation.provider);
      if (index !== -1) ordered.splice(index, 1);
      ordered.push(degradation.provider);
    }

    if (ordered.length === 0) {
      return err(this.noProviders(capability, 'every configured provider is disabled'));
    }
    return ok(ordered);
  }

  private noProviders(capability: string, detail: string): RoutingError {
    return { code: 'no_providers_configured', capability, message: `No providers for "${capability}": ${detail}` };
  }
}
