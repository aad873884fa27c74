import type { DeepReadonly, FeaturesPolicy } from '../policy/schemas.js';

type Features = DeepReadonly<FeaturesPolicy>;

// Anything not explicitly switched off is on.

export function isProviderEnabled(features: Features, provider: string): boolean {
  return features.providers[provider] !== false;
}

export function isCapabilityEnabled(features: Features, capability: string): boolean {
  return features.capabilities[capability] !== false;
}

/** Flag that lets operators pull the degradation provider out of every chain */
export const DEGRADATION_FLAG = 'degradation_fallback';

export function isFlagEnabled(features: Features, flag: string, fallback = false): boolean {
  return features.flags[flag] ?? fallback;
}

export function isCachingEnabled(features: Features): boolean {
  return features.cachingEnabled;
}
