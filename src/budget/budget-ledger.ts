/**
 * Budget Ledger
 *
 * Tracks consumption per budget scope and answers admission questions.
 * Admission reserves the estimate as a provisional hold; a successful call
 * commits its actual cost in place of the hold, a failed one releases it.
 *
 * All mutations are synchronous, so a check-then-reserve runs to completion
 * before any other request can observe the scope.
 *
 * Counters are keyed by scope id and unit. Admission is checked against the
 * scope definition of the caller's own snapshot, so a reload never changes
 * the limits a request in flight is held to; a scope dropped by a reload is
 * retired rather than deleted and keeps counting for those requests.
 *
 * @module budget/budget-ledger
 */

import type { EventBus } from '../kernel/event-bus.js';
import { amountIn, type Cost } from '../policy/resolve.js';
import type { BudgetScopeConfig, CostPolicy, CostUnit, DeepReadonly } from '../policy/schemas.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('budget-ledger');

type ScopeConfig = DeepReadonly<BudgetScopeConfig>;

interface ScopeState {
  /** Latest synced definition; drives the window length */
  config: ScopeConfig;
  /** Present in the most recently synced snapshot */
  active: boolean;
  windowStart: number;
  consumed: number;
  reserved: number;
  holds: Map<number, number>;
}

export interface BudgetHold {
  id: number;
  scopeId: string;
  unit: CostUnit;
  amount: number;
  /** Ceiling the hold was admitted under */
  ceiling: number;
}

export type Admission =
  | { allowed: true; holds: BudgetHold[] }
  | { allowed: false; scopeId?: string; reason: string };

export interface CommitReport {
  scopeId: string;
  unit: CostUnit;
  committed: number;
  consumed: number;
  ceiling: number;
  overshoot: number;
}

export interface ScopeStatus {
  id: string;
  unit: CostUnit;
  provider?: string;
  ceiling: number;
  windowMs: number;
  windowStart: Date;
  consumed: number;
  reserved: number;
  remaining: number;
  /** false once a reload has dropped the scope */
  active: boolean;
}

function keyOf(scopeId: string, unit: CostUnit): string {
  return `${scopeId}::${unit}`;
}

export class BudgetLedger {
  private readonly scopes = new Map<string, ScopeState>();
  private nextHoldId = 1;
  private syncedRevision = 0;

  constructor(private readonly eventBus: EventBus) {}

  /**
   * Adopt scope definitions from a snapshot. Older revisions are ignored so
   * a request still running on a previous snapshot cannot roll limits back.
   * Counters of scopes that keep their id and unit survive; scopes the
   * snapshot no longer names are retired.
   */
  sync(scopes: readonly ScopeConfig[], revision: number, now: number = Date.now()): void {
    if (revision <= this.syncedRevision) return;
    this.syncedRevision = revision;

    const keys = new Set<string>();
    for (const config of scopes) {
      const key = keyOf(config.id, config.unit);
      keys.add(key);
      const state = this.scopes.get(key);
      if (state) {
        state.config = config;
        state.active = true;
      } else {
        this.scopes.set(key, this.createState(config, true, now));
      }
    }

    for (const [key, state] of this.scopes) {
      if (!keys.has(key) && state.active) {
        state.active = false;
        log.info({ scopeId: state.config.id, unit: state.config.unit }, 'Budget scope retired');
      }
    }
  }

  /**
   * Atomic check-then-reserve against one scope, as the caller's snapshot
   * defines it. Denied when consumed + reserved + estimate would pass the
   * ceiling.
   */
  admit(scope: ScopeConfig, estimate: number, now: number = Date.now()): Admission {
    const key = keyOf(scope.id, scope.unit);
    let state = this.scopes.get(key);
    if (!state) {
      // Named by a snapshot this ledger never synced (superseded before use)
      state = this.createState(scope, this.syncedRevision === 0, now);
      this.scopes.set(key, state);
    }

    this.rolloverIfDue(state, now);

    const { id: scopeId, ceiling, unit } = scope;
    if (state.consumed + state.reserved + estimate > ceiling) {
      return {
        allowed: false,
        scopeId,
        reason:
          `Budget scope "${scopeId}" cannot admit ${estimate} ${unit}: ` +
          `${state.consumed} consumed + ${state.reserved} reserved of ${ceiling}`,
      };
    }

    const hold: BudgetHold = { id: this.nextHoldId++, scopeId, unit, amount: estimate, ceiling };
    state.reserved += estimate;
    state.holds.set(hold.id, estimate);
    return { allowed: true, holds: [hold] };
  }

  /** All-or-nothing admission across several scopes. */
  admitAll(requests: ReadonlyArray<{ scope: ScopeConfig; estimate: number }>, now: number = Date.now()): Admission {
    const granted: BudgetHold[] = [];
    for (const { scope, estimate } of requests) {
      const admission = this.admit(scope, estimate, now);
      if (!admission.allowed) {
        this.releaseAll(granted);
        return admission;
      }
      granted.push(...admission.holds);
    }
    return { allowed: true, holds: granted };
  }

  /**
   * Admit an estimated cost against every scope the policy applies to a call.
   * Without a provider this covers the request-level scopes and the
   * per-request limit; with one, only the scopes bound to that provider.
   */
  admitCost(
    policy: DeepReadonly<CostPolicy>,
    estimate: Cost,
    provider?: string,
    now: number = Date.now(),
  ): Admission {
    if (!policy.enabled) {
      return { allowed: true, holds: [] };
    }

    if (provider === undefined && policy.perRequestLimitUsd !== undefined && estimate.usd > policy.perRequestLimitUsd) {
      return {
        allowed: false,
        reason: `Estimated cost $${estimate.usd} exceeds the per-request limit of $${policy.perRequestLimitUsd}`,
      };
    }

    const requests = policy.scopes
      .filter((scope) => scope.provider === provider)
      .map((scope) => ({ scope, estimate: amountIn(estimate, scope.unit) }));

    return this.admitAll(requests, now);
  }

  /**
   * Replace a hold with the actual cost. Overshoot past the ceiling is still
   * committed and reported.
   */
  commit(hold: BudgetHold, actual: number, now: number = Date.now()): CommitReport | undefined {
    const state = this.scopes.get(keyOf(hold.scopeId, hold.unit));
    if (!state) return undefined;

    this.dropHold(state, hold);
    this.rolloverIfDue(state, now);

    state.consumed += actual;
    const { ceiling } = hold;
    const overshoot = Math.max(0, state.consumed - ceiling);

    if (overshoot > 0) {
      log.warn({ scopeId: hold.scopeId, consumed: state.consumed, ceiling, overshoot }, 'Budget ceiling overshot');
      this.eventBus.emit('budget:overshoot', {
        scopeId: hold.scopeId,
        ceiling,
        consumed: state.consumed,
        overshoot,
        timestamp: new Date(now),
      });
    }

    return { scopeId: hold.scopeId, unit: hold.unit, committed: actual, consumed: state.consumed, ceiling, overshoot };
  }

  commitAll(holds: readonly BudgetHold[], actual: Cost, now: number = Date.now()): CommitReport[] {
    const reports: CommitReport[] = [];
    for (const hold of holds) {
      const report = this.commit(hold, amountIn(actual, hold.unit), now);
      if (report) reports.push(report);
    }
    return reports;
  }

  /** Return a provisional hold. Releasing twice, or after a rollover, is a no-op. */
  release(hold: BudgetHold): void {
    const state = this.scopes.get(keyOf(hold.scopeId, hold.unit));
    if (state) this.dropHold(state, hold);
  }

  releaseAll(holds: readonly BudgetHold[]): void {
    for (const hold of holds) this.release(hold);
  }

  /**
   * Reset a scope whose window has elapsed. Returns true when it rolled over.
   */
  rollover(scopeId: string, now: number = Date.now()): boolean {
    let rolled = false;
    for (const state of this.scopes.values()) {
      if (state.config.id === scopeId && this.rolloverIfDue(state, now)) rolled = true;
    }
    return rolled;
  }

  getStatus(now: number = Date.now()): ScopeStatus[] {
    return [...this.scopes.values()].map((state) => {
      this.rolloverIfDue(state, now);
      const { id, unit, provider, ceiling, windowMs } = state.config;
      const status: ScopeStatus = {
        id,
        unit,
        ceiling,
        windowMs,
        windowStart: new Date(state.windowStart),
        consumed: state.consumed,
        reserved: state.reserved,
        remaining: Math.max(0, ceiling - state.consumed - state.reserved),
        active: state.active,
      };
      if (provider !== undefined) status.provider = provider;
      return status;
    });
  }

  private createState(config: ScopeConfig, active: boolean, now: number): ScopeState {
    return { config, active, windowStart: now, consumed: 0, reserved: 0, holds: new Map() };
  }

  private dropHold(state: ScopeState, hold: BudgetHold): void {
    const amount = state.holds.get(hold.id);
    if (amount === undefined) return;
    state.holds.delete(hold.id);
    state.reserved = Math.max(0, state.reserved - amount);
  }

  /** Holds taken in the previous window are discarded with it. */
  private rolloverIfDue(state: ScopeState, now: number): boolean {
    if (now < state.windowStart + state.config.windowMs) return false;

    const previousConsumed = state.consumed;
    state.windowStart = now;
    state.consumed = 0;
    state.reserved = 0;
    state.holds.clear();

    log.info({ scopeId: state.config.id, previousConsumed }, 'Budget window rolled over');
    this.eventBus.emit('budget:rollover', {
      scopeId: state.config.id,
      previousConsumed,
      windowStart: new Date(now),
    });
    return true;
  }
}
