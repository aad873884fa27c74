/**
 * Policy Store
 *
 * Holds the single current policy snapshot. A reload validates the new
 * document completely, freezes it and swaps the reference in one
 * assignment, so readers only ever see a whole snapshot. Requests keep the
 * reference they captured at admission for their entire lifetime.
 *
 * @module policy/policy-store
 */

import type { EventBus } from '../kernel/event-bus.js';
import { type Result, ok, err } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { DEFAULT_POLICY } from './defaults.js';
import { resolveResilience } from './resolve.js';
import {
  PolicyDocumentSchema,
  type PolicyDocument,
  type PolicySnapshot,
  type ResilienceSettings,
} from './schemas.js';

const log = createLogger('policy-store');

export class PolicyValidationError extends Error {
  readonly code = 'policy_reload_rejected' as const;

  constructor(readonly issues: string[]) {
    super(`Invalid policy document: ${issues.join('; ')}`);
    this.name = 'PolicyValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════

function checkSettings(label: string, settings: ResilienceSettings): string[] {
  const issues: string[] = [];
  if (settings.backoff.maxDelayMs < settings.backoff.baseDelayMs) {
    issues.push(`${label}.backoff: maxDelayMs must be >= baseDelayMs`);
  }
  if (settings.breaker.maxOpenDurationMs < settings.breaker.openDurationMs) {
    issues.push(`${label}.breaker: maxOpenDurationMs must be >= openDurationMs`);
  }
  if (settings.breaker.minimumCalls > settings.breaker.windowSize) {
    issues.push(`${label}.breaker: minimumCalls must be <= windowSize`);
  }
  return issues;
}

/** Rules that span fields, checked on the merged settings the engine will actually use. */
function checkConsistency(doc: PolicyDocument): string[] {
  const issues: string[] = [];
  const { resilience } = doc;

  issues.push(...checkSettings('resilience.defaults', resolveResilience(resilience, '', '')));

  for (const provider of Object.keys(resilience.providers)) {
    issues.push(
      ...checkSettings(`resilience.providers.${provider}`, resolveResilience(resilience, '', provider)),
    );
  }

  for (const [capability, providers] of Object.entries(resilience.capabilities)) {
    for (const provider of Object.keys(providers)) {
      issues.push(
        ...checkSettings(
          `resilience.capabilities.${capability}.${provider}`,
          resolveResilience(resilience, capability, provider),
        ),
      );
    }
  }

  if (resilience.degradation.enabled && !resilience.degradation.provider) {
    issues.push('resilience.degradation: provider is required when degradation is enabled');
  }

  const seen = new Set<string>();
  for (const scope of doc.cost.scopes) {
    if (seen.has(scope.id)) {
      issues.push(`cost.scopes: duplicate scope id "${scope.id}"`);
    }
    seen.add(scope.id);
  }

  return issues;
}

/**
 * Parse and validate a policy document without publishing it.
 */
export function parsePolicyDocument(input: unknown): Result<PolicyDocument, PolicyValidationError> {
  const parsed = PolicyDocumentSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    });
    return err(new PolicyValidationError(issues));
  }

  const issues = checkConsistency(parsed.data);
  if (issues.length > 0) {
    return err(new PolicyValidationError(issues));
  }

  return ok(parsed.data);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function versionOf(input: unknown): string | undefined {
  if (typeof input === 'object' && input !== null && 'version' in input && typeof input.version === 'string') {
    return input.version;
  }
  return undefined;
}

// ═══════════════════════════════════════════════════════════════════════════
// POLICY STORE
// ═══════════════════════════════════════════════════════════════════════════

export class PolicyStore {
  private snapshot: PolicySnapshot;
  private revision = 0;

  /**
   * @throws PolicyValidationError when the initial document is invalid
   */
  constructor(
    private readonly eventBus: EventBus,
    initial: unknown = DEFAULT_POLICY,
  ) {
    const parsed = parsePolicyDocument(initial);
    if (!parsed.success) {
      throw parsed.error;
    }
    this.snapshot = this.freeze(parsed.data);
    log.info({ version: this.snapshot.version, revision: this.snapshot.revision }, 'Policy loaded');
  }

  current(): PolicySnapshot {
    return this.snapshot;
  }

  /**
   * Validate and atomically publish a new snapshot. On failure the previous
   * snapshot stays current.
   */
  reload(input: unknown): Result<PolicySnapshot, PolicyValidationError> {
    const parsed = parsePolicyDocument(input);
    const previous = this.snapshot;

    if (!parsed.success) {
      log.error(
        { attemptedVersion: versionOf(input), revision: previous.revision, issues: parsed.error.issues },
        'Policy reload rejected; keeping last known good snapshot',
      );
      this.eventBus.emit('policy:reload_rejected', {
        attemptedVersion: versionOf(input),
        currentRevision: previous.revision,
        issues: parsed.error.issues,
      });
      return err(parsed.error);
    }

    const next = this.freeze(parsed.data);
    this.snapshot = next;

    log.info({ version: next.version, revision: next.revision }, 'Policy reloaded');
    this.eventBus.emit('policy:reloaded', {
      version: next.version,
      revision: next.revision,
      previousRevision: previous.revision,
    });

    return ok(next);
  }

  private freeze(doc: PolicyDocument): PolicySnapshot {
    this.revision += 1;
    return deepFreeze({
      ...doc,
      revision: this.revision,
      loadedAt: new Date().toISOString(),
    });
  }
}
