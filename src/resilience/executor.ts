/**
 * Resilience Executor
 *
 * Drives one provider call through the breaker, per-attempt timeout and
 * exponential backoff resolved from the request's policy snapshot. Every
 * attempt outcome, including timeouts, is reported to the breaker.
 *
 * @module resilience/executor
 */

import { AdapterError, type AdapterErrorKind, isRetryable } from '../adapters/adapter-error.js';
import { resolveResilience } from '../policy/resolve.js';
import type { Backoff, PolicySnapshot } from '../policy/schemas.js';
import { createLogger, formatError } from '../utils/logger.js';
import type { CircuitBreakerRegistry } from './breaker-registry.js';
import { AttemptTimeoutError, sleep, withTimeout } from './timeout.js';

const log = createLogger('resilience-executor');

export type FailureReason = 'timeout' | 'error' | 'non_retryable' | 'deadline_exceeded' | 'circuit_open';

interface OutcomeBase {
  provider: string;
  /** Calls actually sent to the provider */
  tries: number;
  durationMs: number;
}

export type ProviderOutcome<T> =
  | (OutcomeBase & { status: 'success'; value: T })
  | (OutcomeBase & { status: 'circuit_open'; reason: 'circuit_open' })
  | (OutcomeBase & {
      status: 'exhausted';
      reason: FailureReason;
      errorKind?: AdapterErrorKind;
      error?: string;
    });

export interface ExecuteCall<T> {
  capability: string;
  provider: string;
  snapshot: PolicySnapshot;
  /** Absolute request deadline (epoch ms) */
  deadline: number;
  work: (signal: AbortSignal) => Promise<T>;
}

/** min(base · multiplier^(attempt−1), maxDelayMs) */
export function backoffDelay(backoff: Backoff, attempt: number): number {
  return Math.min(backoff.baseDelayMs * Math.pow(backoff.multiplier, attempt - 1), backoff.maxDelayMs);
}

export class ResilienceExecutor {
  constructor(
    private readonly breakers: CircuitBreakerRegistry,
    private readonly pause: (ms: number) => Promise<void> = sleep,
  ) {}

  async execute<T>(call: ExecuteCall<T>): Promise<ProviderOutcome<T>> {
    const { capability, provider, snapshot, deadline } = call;
    const settings = resolveResilience(snapshot.resilience, capability, provider);
    const breaker = this.breakers.get(capability, provider, snapshot);
    const startedAt = Date.now();
    const elapsed = (): number => Date.now() - startedAt;

    let tries = 0;
    let lastFailure: { reason: FailureReason; errorKind?: AdapterErrorKind; error: string } | undefined;

    for (let attempt = 1; attempt <= settings.maxAttempts; attempt++) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return { status: 'exhausted', provider, tries, durationMs: elapsed(), reason: 'deadline_exceeded' };
      }

      const permit = breaker.tryAcquire();
      if (!permit) {
        log.debug({ capability, provider, attempt }, 'Circuit open; call short-circuited');
        if (tries === 0) {
          return { status: 'circuit_open', provider, tries, durationMs: elapsed(), reason: 'circuit_open' };
        }
        return { status: 'exhausted', provider, tries, durationMs: elapsed(), reason: 'circuit_open' };
      }

      tries++;
      try {
        const value = await withTimeout(call.work, Math.min(settings.attemptTimeoutMs, remaining));
        breaker.recordSuccess(permit);
        return { status: 'success', provider, tries, durationMs: elapsed(), value };
      } catch (error) {
        breaker.recordFailure(permit);

        const timedOut = error instanceof AttemptTimeoutError;
        lastFailure = {
          reason: timedOut ? 'timeout' : 'error',
          error: formatError(error).message,
        };
        if (error instanceof AdapterError) {
          lastFailure.errorKind = error.kind;
        } else if (timedOut) {
          lastFailure.errorKind = 'timeout';
        }

        log.debug({ capability, provider, attempt, err: formatError(error) }, 'Attempt failed');

        if (!timedOut && !isRetryable(error)) {
          return { status: 'exhausted', provider, tries, durationMs: elapsed(), ...lastFailure, reason: 'non_retryable' };
        }
      }

      if (attempt < settings.maxAttempts) {
        const delay = backoffDelay(settings.backoff, attempt);
        if (Date.now() + delay >= deadline) {
          return { status: 'exhausted', provider, tries, durationMs: elapsed(), ...lastFailure, reason: 'deadline_exceeded' };
        }
        await this.pause(delay);
      }
    }

    return {
      status: 'exhausted',
      provider,
      tries,
      durationMs: elapsed(),
      ...lastFailure,
      reason: lastFailure?.reason ?? 'error',
    };
  }
}
