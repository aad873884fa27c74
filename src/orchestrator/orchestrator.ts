/**
 * Orchestrator
 *
 * The single composition point of the engine. Every request runs the same
 * fixed pipeline against the policy snapshot captured at admission:
 *
 *   validate → cache → budget → route → resilient call (per candidate)
 *     → output check → cache store
 *
 * Candidates are tried strictly in router order and the first success
 * wins; there is no parallel fan-out.
 *
 * @module orchestrator
 */

import { randomUUID } from 'node:crypto';
import type { AdapterRegistry, AdapterResult } from '../adapters/adapter-registry.js';
import { BudgetLedger } from '../budget/budget-ledger.js';
import { fingerprint, similarityKey, type SimilarityKey } from '../cache/fingerprint.js';
import { ResponseCache } from '../cache/response-cache.js';
import { getConfig } from '../config/config.js';
import type { EventBus } from '../kernel/event-bus.js';
import type { PolicyStore } from '../policy/policy-store.js';
import { type Cost, maxCost, resolveRate } from '../policy/resolve.js';
import type { PolicySnapshot } from '../policy/schemas.js';
import { CircuitBreakerRegistry } from '../resilience/breaker-registry.js';
import { ResilienceExecutor, type ProviderOutcome } from '../resilience/executor.js';
import { isCachingEnabled } from '../routing/feature-gate.js';
import { Router, type RoutingContext } from '../routing/router.js';
import { allowAllGate, PolicyValidationGate, type GateVerdict, type ValidationGate } from '../security/validation-gate.js';
import {
  type Config,
  type GenerationRequest,
  type GenerationRequestInput,
  GenerationRequestSchema,
} from '../types/index.js';
import { createLogger, formatError } from '../utils/logger.js';
import type { AttemptRecord, OrchestrationOutcome } from './types.js';

const log = createLogger('orchestrator');

export interface OrchestratorOptions<TPayload> {
  policies: PolicyStore;
  adapters: AdapterRegistry<TPayload>;
  eventBus: EventBus;
  /** Defaults to the policy-driven gate, or allow-all when validation is disabled in config */
  gate?: ValidationGate;
  config?: Config;
  cache?: ResponseCache<TPayload>;
  ledger?: BudgetLedger;
  breakers?: CircuitBreakerRegistry;
  /** Backoff sleep; replaced in tests */
  pause?: (ms: number) => Promise<void>;
}

interface CacheKeys {
  fingerprint: string;
  similarity: SimilarityKey;
}

type Completion<TPayload> = Omit<
  OrchestrationOutcome<TPayload>,
  'requestId' | 'capability' | 'policyVersion' | 'policyRevision' | 'durationMs' | 'attempts'
> & { attempts?: AttemptRecord[] };

function toAttempt<T>(outcome: ProviderOutcome<T>): AttemptRecord {
  const { provider, tries, durationMs } = outcome;
  switch (outcome.status) {
    case 'success':
      return { provider, status: 'success', tries, durationMs };
    case 'circuit_open':
      return { provider, status: 'circuit_open', tries, durationMs, reason: 'circuit_open' };
    case 'exhausted': {
      const attempt: AttemptRecord = { provider, status: 'exhausted', tries, durationMs, reason: outcome.reason };
      if (outcome.errorKind !== undefined) attempt.errorKind = outcome.errorKind;
      if (outcome.error !== undefined) attempt.error = outcome.error;
      return attempt;
    }
  }
}

export class Orchestrator<TPayload> {
  readonly cache: ResponseCache<TPayload>;
  readonly ledger: BudgetLedger;
  readonly breakers: CircuitBreakerRegistry;
  readonly router: Router;
  private readonly executor: ResilienceExecutor;
  private readonly policies: PolicyStore;
  private readonly adapters: AdapterRegistry<TPayload>;
  private readonly eventBus: EventBus;
  private readonly gate: ValidationGate;
  private readonly config: Config;

  constructor(options: OrchestratorOptions<TPayload>) {
    this.policies = options.policies;
    this.adapters = options.adapters;
    this.eventBus = options.eventBus;
    this.config = options.config ?? getConfig();
    this.gate = options.gate ?? (this.config.orchestration.validation_enabled ? new PolicyValidationGate() : allowAllGate);
    this.cache = options.cache ?? new ResponseCache<TPayload>(options.eventBus);
    this.ledger = options.ledger ?? new BudgetLedger(options.eventBus);
    this.breakers = options.breakers ?? new CircuitBreakerRegistry(options.eventBus);
    this.router = new Router(this.breakers);
    this.executor = new ResilienceExecutor(this.breakers, options.pause);
  }

  /**
   * Run one generation request through the pipeline. Never throws: every
   * failure is reported as an outcome.
   */
  async orchestrate(capability: string, input: GenerationRequestInput): Promise<OrchestrationOutcome<TPayload>> {
    const startedAt = Date.now();
    const requestId = randomUUID();
    const snapshot = this.policies.current();
    this.ledger.sync(snapshot.cost.scopes, snapshot.revision, startedAt);

    const finish = (completion: Completion<TPayload>): OrchestrationOutcome<TPayload> => {
      const outcome: OrchestrationOutcome<TPayload> = {
        requestId,
        capability,
        attempts: [],
        ...completion,
        policyVersion: snapshot.version,
        policyRevision: snapshot.revision,
        durationMs: Date.now() - startedAt,
      };

      log.info(
        {
          requestId,
          capability,
          status: outcome.status,
          providerUsed: outcome.providerUsed,
          attempts: outcome.attempts.map((a) => `${a.provider}:${a.status}`),
          policyRevision: outcome.policyRevision,
          durationMs: outcome.durationMs,
        },
        'Orchestration completed',
      );
      this.eventBus.emit('orchestration:completed', outcome);
      return outcome;
    };

    // ── Validate ────────────────────────────────────────────────────────
    const parsed = GenerationRequestSchema.safeParse(input);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return finish({
        status: 'validation_rejected',
        error: {
          code: 'validation_rejected',
          message: `Invalid request: ${issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unknown issue'}`,
        },
      });
    }
    const deadline = startedAt + (parsed.data.deadlineMs ?? this.config.orchestration.default_deadline_ms);

    const verdict = await this.runGate(capability, parsed.data, snapshot);
    if (!verdict.ok) {
      return finish({ status: 'validation_rejected', error: { code: 'validation_rejected', message: verdict.reason } });
    }
    // The gate may have masked the prompt; only the masked form goes further.
    const request = verdict.request ?? parsed.data;

    // ── Cache ───────────────────────────────────────────────────────────
    let keys: CacheKeys | undefined;
    if (snapshot.cache.enabled && isCachingEnabled(snapshot.features)) {
      keys = {
        fingerprint: fingerprint(capability, request.prompt, request.params),
        similarity: similarityKey(capability, request.prompt, request.params),
      };
      const hit = this.cache.lookup(keys.fingerprint, keys.similarity, snapshot.cache);
      if (hit) {
        return finish({
          status: 'cache_hit',
          payload: hit.entry.payload,
          providerUsed: hit.entry.provider,
          cache: { match: hit.match, score: hit.score, fingerprint: hit.entry.fingerprint },
        });
      }
    }

    // ── Budget ──────────────────────────────────────────────────────────
    const admission = this.ledger.admitCost(snapshot.cost, this.estimate(capability, request, snapshot));
    if (!admission.allowed) {
      return finish({ status: 'budget_rejected', error: { code: 'budget_rejected', message: admission.reason } });
    }
    const requestHolds = admission.holds;

    // ── Route ───────────────────────────────────────────────────────────
    const context: RoutingContext = {};
    if (request.costMode !== undefined) context.costMode = request.costMode;
    if (request.requestedProvider !== undefined) context.requestedProvider = request.requestedProvider;

    const routed = this.router.candidates(capability, context, snapshot);
    if (!routed.success) {
      this.ledger.releaseAll(requestHolds);
      return finish({
        status: 'no_providers_configured',
        error: { code: 'no_providers_configured', message: routed.error.message },
      });
    }

    // ── Try candidates ──────────────────────────────────────────────────
    const attempts: AttemptRecord[] = [];

    for (const provider of routed.data) {
      if (Date.now() >= deadline) break;

      const rate = resolveRate(snapshot.cost, provider, capability);
      const providerAdmission = this.ledger.admitCost(snapshot.cost, rate, provider);
      if (!providerAdmission.allowed) {
        attempts.push({
          provider,
          status: 'skipped',
          tries: 0,
          reason: 'budget_rejected',
          error: providerAdmission.reason,
          durationMs: 0,
        });
        continue;
      }
      const providerHolds = providerAdmission.holds;

      const adapter = this.adapters.get(provider);
      if (!adapter) {
        this.ledger.releaseAll(providerHolds);
        log.warn({ requestId, capability, provider }, 'No adapter registered for provider');
        attempts.push({ provider, status: 'skipped', tries: 0, reason: 'adapter_missing', durationMs: 0 });
        continue;
      }

      const outcome = await this.executor.execute<AdapterResult<TPayload>>({
        capability,
        provider,
        snapshot,
        deadline,
        work: (signal) => adapter.invoke({ provider, capability, request, deadline, signal }),
      });
      attempts.push(toAttempt(outcome));

      if (outcome.status === 'success') {
        const cost: Cost = {
          usd: outcome.value.cost?.usd ?? rate.usd,
          tokens: outcome.value.cost?.tokens ?? rate.tokens,
        };
        const budget = this.ledger.commitAll([...requestHolds, ...providerHolds], cost);

        const checked = await this.runOutputGate(capability, provider, request, outcome.value.payload, snapshot);
        if (!checked.ok) {
          return finish({
            status: 'output_rejected',
            providerUsed: provider,
            attempts,
            cost,
            budget,
            error: { code: 'output_rejected', message: `Output rejected: ${checked.reason}` },
          });
        }

        if (keys) {
          const ttlMs = snapshot.cache.ttlByCapabilityMs[capability] ?? snapshot.cache.ttlMs;
          this.cache.store(keys.fingerprint, keys.similarity, outcome.value.payload, provider, ttlMs, snapshot.cache);
        }

        return finish({
          status: 'success',
          payload: outcome.value.payload,
          providerUsed: provider,
          attempts,
          cost,
          budget,
        });
      }

      this.ledger.releaseAll(providerHolds);
    }

    this.ledger.releaseAll(requestHolds);

    if (attempts.length > 0 && attempts.every((attempt) => attempt.reason === 'budget_rejected')) {
      return finish({
        status: 'budget_rejected',
        attempts,
        error: { code: 'budget_rejected', message: 'Every candidate provider was denied by its budget scope' },
      });
    }

    const deadlineExceeded = Date.now() >= deadline || attempts.some((a) => a.reason === 'deadline_exceeded');
    const { degradation } = snapshot.resilience;
    const summary = attempts.map((a) => `${a.provider}: ${a.reason ?? a.status}`).join(', ');
    return finish({
      status: 'exhausted',
      attempts,
      error: {
        code: 'exhausted',
        reason: deadlineExceeded ? 'deadline_exceeded' : 'all_candidates_failed',
        message: deadlineExceeded
          ? `Request deadline exceeded after ${attempts.length} candidate(s)${summary ? ` (${summary})` : ''}`
          : `All candidates failed (${summary})`,
        ...(degradation.enabled ? { degradationMessage: degradation.message } : {}),
      },
    });
  }

  /** Conservative pre-routing estimate: the dearest configured provider, or the caller's figure. */
  private estimate(capability: string, request: GenerationRequest, snapshot: PolicySnapshot): Cost {
    const route = snapshot.routing.capabilities[capability];
    const providers = route ? [...route.providers.map((p) => p.id), ...route.fallbacks] : [];
    const highest = maxCost(providers.map((provider) => resolveRate(snapshot.cost, provider, capability)));
    return request.estimatedCostUsd !== undefined ? { ...highest, usd: request.estimatedCostUsd } : highest;
  }

  private async runGate(capability: string, request: GenerationRequest, snapshot: PolicySnapshot): Promise<GateVerdict> {
    try {
      return await this.gate.validate({ capability, request }, snapshot);
    } catch (error) {
      log.error({ capability, err: formatError(error) }, 'Validation gate failed; rejecting request');
      return { ok: false, category: 'security', reason: `Validation gate failed: ${formatError(error).message}` };
    }
  }

  private async runOutputGate(
    capability: string,
    provider: string,
    request: GenerationRequest,
    payload: TPayload,
    snapshot: PolicySnapshot,
  ): Promise<GateVerdict> {
    if (!this.gate.validateOutput) return { ok: true };
    try {
      return await this.gate.validateOutput({ capability, provider, request, payload }, snapshot);
    } catch (error) {
      log.error({ capability, provider, err: formatError(error) }, 'Output gate failed; rejecting payload');
      return { ok: false, category: 'quality', reason: `Output gate failed: ${formatError(error).message}` };
    }
  }
}
