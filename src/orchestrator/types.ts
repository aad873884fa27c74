import type { AdapterErrorKind } from '../adapters/adapter-error.js';
import type { CommitReport } from '../budget/budget-ledger.js';
import type { Cost } from '../policy/resolve.js';
import type { FailureReason } from '../resilience/executor.js';

export type OrchestrationStatus =
  | 'success'
  | 'cache_hit'
  | 'budget_rejected'
  | 'exhausted'
  | 'validation_rejected'
  | 'output_rejected'
  | 'no_providers_configured';

export type AttemptReason = FailureReason | 'budget_rejected' | 'adapter_missing';

/** One candidate provider and how it ended. */
export interface AttemptRecord {
  provider: string;
  status: 'success' | 'circuit_open' | 'exhausted' | 'skipped';
  /** Calls actually sent to the provider */
  tries: number;
  reason?: AttemptReason;
  errorKind?: AdapterErrorKind;
  error?: string;
  durationMs: number;
}

export interface OrchestrationError {
  code: Exclude<OrchestrationStatus, 'success' | 'cache_hit'>;
  message: string;
  /** Set when every candidate failed or the deadline passed */
  reason?: 'deadline_exceeded' | 'all_candidates_failed';
  /** Degradation message from the resilience policy, when enabled */
  degradationMessage?: string;
}

export interface OrchestrationOutcome<TPayload = unknown> {
  requestId: string;
  capability: string;
  status: OrchestrationStatus;
  payload?: TPayload;
  error?: OrchestrationError;
  providerUsed?: string;
  attempts: AttemptRecord[];
  cache?: { match: 'exact' | 'similar'; score: number; fingerprint: string };
  cost?: Cost;
  budget?: CommitReport[];
  policyVersion: string;
  policyRevision: number;
  durationMs: number;
}
