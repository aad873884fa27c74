/**
 * Creative Orchestrator — Main Exports
 *
 * Public API surface for the orchestration engine.
 *
 * @module creative-orchestrator
 * @version 1.0.0
 */

// Types
export {
  type Config,
  type CostMode,
  type GenerationRequest,
  type GenerationRequestInput,
  type JsonValue,
  type LogLevel,
  type Result,
  ConfigSchema,
  CostModeSchema,
  MAX_TIMER_MS,
  GenerationRequestSchema,
  ok,
  err,
  isOk,
  isErr,
} from './types/index.js';

// Config
export {
  CONFIG_ENV_VAR,
  DEFAULT_CONFIG,
  loadConfig,
  getConfig,
  getConfigPath,
  clearConfigCache,
  reloadConfig,
} from './config/config.js';

// Kernel
export { EventBus, type EventMap } from './kernel/event-bus.js';
export { createLogger, formatError } from './utils/logger.js';

// Policy
export { PolicyStore, PolicyValidationError, parsePolicyDocument } from './policy/policy-store.js';
export { DEFAULT_POLICY } from './policy/defaults.js';
export { type Cost, resolveRate, resolveResilience } from './policy/resolve.js';
export {
  type PolicyDocument,
  type PolicyDocumentInput,
  type PolicySnapshot,
  type ResilienceSettings,
  type BreakerSettings,
  type BudgetScopeConfig,
  PolicyDocumentSchema,
} from './policy/schemas.js';

// Cache
export { ResponseCache, type CacheEntry, type CacheHit, type CacheStats } from './cache/response-cache.js';
export { fingerprint, similarityKey, jaccard, type SimilarityKey } from './cache/fingerprint.js';

// Budget
export {
  BudgetLedger,
  type Admission,
  type BudgetHold,
  type CommitReport,
  type ScopeStatus,
} from './budget/budget-ledger.js';

// Resilience
export { CircuitBreaker, type CircuitPermit, type CircuitState, type CircuitStats } from './resilience/circuit-breaker.js';
export { CircuitBreakerRegistry } from './resilience/breaker-registry.js';
export { ResilienceExecutor, backoffDelay, type ProviderOutcome, type FailureReason } from './resilience/executor.js';
export { AttemptTimeoutError, withTimeout } from './resilience/timeout.js';

// Routing
export { Router, orderProviders, type RoutingContext, type RoutingError } from './routing/router.js';
export { isProviderEnabled, isCapabilityEnabled, isFlagEnabled, DEGRADATION_FLAG } from './routing/feature-gate.js';

// Adapters
export {
  AdapterRegistry,
  type AdapterInvocation,
  type AdapterResult,
  type ProviderAdapter,
} from './adapters/adapter-registry.js';
export { AdapterError, type AdapterErrorKind } from './adapters/adapter-error.js';

// Validation
export {
  PolicyValidationGate,
  allowAllGate,
  type ValidationGate,
  type GateInput,
  type GateVerdict,
  type OutputGateInput,
} from './security/validation-gate.js';
export {
  SecuritySectionSchema,
  QualitySectionSchema,
  type SecuritySection,
  type QualitySection,
} from './security/sections.js';
export { maskPii, type PiiKind, type MaskResult } from './security/pii-masking.js';
export { toxicityScore } from './security/toxicity.js';
export { checkFormat, checkOutputQuality } from './security/output-checks.js';

// Orchestrator
export { Orchestrator, type OrchestratorOptions } from './orchestrator/orchestrator.js';
export type {
  OrchestrationOutcome,
  OrchestrationStatus,
  AttemptRecord,
  OrchestrationError,
} from './orchestrator/types.js';
