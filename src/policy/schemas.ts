/**
 * Policy document schemas.
 *
 * A policy document bundles every category the engine reads (routing,
 * resilience, cost, cache, features) with the security and quality
 * sections that only the validation gate interprets.
 *
 * @module policy/schemas
 */

import { z } from 'zod';
import { CostModeSchema, MAX_TIMER_MS } from '../types/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// ROUTING
// ═══════════════════════════════════════════════════════════════════════════

export const TierSchema = z.enum(['low', 'medium', 'high']);
export type Tier = z.infer<typeof TierSchema>;

export const ProviderRouteSchema = z.object({
  id: z.string().min(1),
  /** Lower runs first; omitted priorities sort after explicit ones */
  priority: z.number().int().optional(),
  /** Tie-breaker among equal priorities; higher runs first */
  weight: z.number().nonnegative().optional(),
  costTier: TierSchema.default('medium'),
  qualityTier: TierSchema.default('medium'),
});
export type ProviderRoute = z.infer<typeof ProviderRouteSchema>;

export const CapabilityRouteSchema = z.object({
  providers: z.array(ProviderRouteSchema).min(1),
  fallbacks: z.array(z.string().min(1)).default([]),
});
export type CapabilityRoute = z.infer<typeof CapabilityRouteSchema>;

export const RoutingPolicySchema = z.object({
  costMode: CostModeSchema.default('balanced'),
  capabilities: z.record(z.string().min(1), CapabilityRouteSchema),
});
export type RoutingPolicy = z.infer<typeof RoutingPolicySchema>;

// ═══════════════════════════════════════════════════════════════════════════
// RESILIENCE
// ═══════════════════════════════════════════════════════════════════════════

export const BackoffSchema = z.object({
  baseDelayMs: z.number().int().nonnegative().max(MAX_TIMER_MS),
  multiplier: z.number().min(1),
  maxDelayMs: z.number().int().nonnegative().max(MAX_TIMER_MS),
});
export type Backoff = z.infer<typeof BackoffSchema>;

export const BreakerSettingsSchema = z.object({
  /** Number of most recent outcomes the failure rate is computed over */
  windowSize: z.number().int().positive(),
  /** Outcomes required in the window before the breaker may open */
  minimumCalls: z.number().int().positive(),
  failureRateThreshold: z.number().gt(0).max(1),
  openDurationMs: z.number().int().nonnegative().max(MAX_TIMER_MS),
  /** Cap for the doubled open duration after a failed half-open trial */
  maxOpenDurationMs: z.number().int().nonnegative().max(MAX_TIMER_MS),
});
export type BreakerSettings = z.infer<typeof BreakerSettingsSchema>;

export const ResilienceSettingsSchema = z.object({
  maxAttempts: z.number().int().min(1).max(10),
  backoff: BackoffSchema,
  attemptTimeoutMs: z.number().int().positive().max(MAX_TIMER_MS),
  breaker: BreakerSettingsSchema,
});
export type ResilienceSettings = z.infer<typeof ResilienceSettingsSchema>;

export const ResilienceOverrideSchema = z.object({
  maxAttempts: ResilienceSettingsSchema.shape.maxAttempts.optional(),
  backoff: BackoffSchema.partial().optional(),
  attemptTimeoutMs: ResilienceSettingsSchema.shape.attemptTimeoutMs.optional(),
  breaker: BreakerSettingsSchema.partial().optional(),
});
export type ResilienceOverride = z.infer<typeof ResilienceOverrideSchema>;

export const DegradationSchema = z.object({
  enabled: z.boolean().default(false),
  provider: z.string().min(1).optional(),
  message: z
    .string()
    .default('Service is currently degraded. Please try again later or with a simpler request.'),
});

export const ResiliencePolicySchema = z.object({
  defaults: ResilienceSettingsSchema,
  providers: z.record(z.string(), ResilienceOverrideSchema).default({}),
  capabilities: z.record(z.string(), z.record(z.string(), ResilienceOverrideSchema)).default({}),
  degradation: DegradationSchema.default({}),
});
export type ResiliencePolicy = z.infer<typeof ResiliencePolicySchema>;

// ═══════════════════════════════════════════════════════════════════════════
// COST
// ═══════════════════════════════════════════════════════════════════════════

export const CostUnitSchema = z.enum(['usd', 'tokens']);
export type CostUnit = z.infer<typeof CostUnitSchema>;

export const RateSchema = z.object({
  usd: z.number().nonnegative().default(0),
  tokens: z.number().nonnegative().default(0),
});

export const ProviderRateSchema = RateSchema.extend({
  capabilities: z.record(z.string(), RateSchema).default({}),
});

export const BudgetScopeSchema = z.object({
  id: z.string().min(1),
  unit: CostUnitSchema,
  ceiling: z.number().nonnegative(),
  windowMs: z.number().int().positive(),
  /** When set, the scope only applies to calls made to this provider */
  provider: z.string().min(1).optional(),
});
export type BudgetScopeConfig = z.infer<typeof BudgetScopeSchema>;

export const CostPolicySchema = z.object({
  enabled: z.boolean().default(true),
  perRequestLimitUsd: z.number().positive().optional(),
  scopes: z.array(BudgetScopeSchema).default([]),
  rates: z.record(z.string(), ProviderRateSchema).default({}),
});
export type CostPolicy = z.infer<typeof CostPolicySchema>;

// ═══════════════════════════════════════════════════════════════════════════
// CACHE
// ═══════════════════════════════════════════════════════════════════════════

export const CachePolicySchema = z.object({
  enabled: z.boolean().default(true),
  ttlMs: z.number().int().positive(),
  ttlByCapabilityMs: z.record(z.string(), z.number().int().positive()).default({}),
  maxEntries: z.number().int().positive(),
  /** null disables near-duplicate matching */
  similarityThreshold: z.number().min(0).max(1).nullable().default(0.9),
});
export type CachePolicy = z.infer<typeof CachePolicySchema>;

// ═══════════════════════════════════════════════════════════════════════════
// FEATURES
// ═══════════════════════════════════════════════════════════════════════════

export const FeaturesPolicySchema = z.object({
  cachingEnabled: z.boolean().default(true),
  providers: z.record(z.string(), z.boolean()).default({}),
  capabilities: z.record(z.string(), z.boolean()).default({}),
  flags: z.record(z.string(), z.boolean()).default({}),
});
export type FeaturesPolicy = z.infer<typeof FeaturesPolicySchema>;

// ═══════════════════════════════════════════════════════════════════════════
// DOCUMENT
// ═══════════════════════════════════════════════════════════════════════════

const OpaqueSectionSchema = z.record(z.string(), z.unknown()).default({});

export const PolicyDocumentSchema = z.object({
  version: z.string().min(1),
  routing: RoutingPolicySchema,
  resilience: ResiliencePolicySchema,
  cost: CostPolicySchema.default({}),
  cache: CachePolicySchema,
  security: OpaqueSectionSchema,
  quality: OpaqueSectionSchema,
  features: FeaturesPolicySchema.default({}),
});
export type PolicyDocument = z.infer<typeof PolicyDocumentSchema>;
export type PolicyDocumentInput = z.input<typeof PolicyDocumentSchema>;

export type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

/** Immutable, versioned policy bundle. Never mutated after publication. */
export type PolicySnapshot = DeepReadonly<
  PolicyDocument & {
    revision: number;
    loadedAt: string;
  }
>;
