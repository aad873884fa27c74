import type { EventBus } from '../kernel/event-bus.js';
import type { BreakerSettings } from '../policy/schemas.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('circuit-breaker');

export type CircuitState = 'closed' | 'open' | 'half_open';

export interface CircuitStats {
  capability: string;
  provider: string;
  state: CircuitState;
  /** Failure rate over the rolling window (0 when empty) */
  failureRate: number;
  windowCalls: number;
  totalSuccesses: number;
  totalFailures: number;
  rejected: number;
  openedAt: Date | null;
  openDurationMs: number;
}

/**
 * Proof that a call was let through. Outcomes only move the breaker when the
 * permit was issued in the current state; anything older counts towards the
 * lifetime totals alone.
 */
export interface CircuitPermit {
  readonly generation: number;
  readonly trial: boolean;
}

/**
 * Circuit breaker for one (capability, provider) pair.
 *
 * Three-state pattern:
 * - closed: calls flow; each outcome enters a rolling window of the last N
 * - open: calls are refused until the open duration has elapsed
 * - half_open: a single trial call is let through
 *
 * State transitions:
 * - closed → open: window holds ≥ minimumCalls and failure rate ≥ threshold
 * - open → half_open: now − openedAt ≥ open duration (on the next permit request)
 * - half_open → closed: trial succeeds (window and open duration reset)
 * - half_open → open: trial fails (open duration doubles, capped)
 *
 * Every transition starts a new generation. A call that was let through in an
 * earlier generation (say, before the circuit opened) can no longer stand in
 * for the half-open trial or land in a fresh window.
 */
export class CircuitBreaker {
  private state: CircuitState = 'closed';
  /** true marks a failure */
  private window: boolean[] = [];
  private openedAt: number | null = null;
  private openDurationMs: number;
  private trialInFlight = false;
  private generation = 0;
  private totalSuccesses = 0;
  private totalFailures = 0;
  private rejected = 0;

  constructor(
    readonly capability: string,
    readonly provider: string,
    private settings: BreakerSettings,
    private readonly eventBus: EventBus,
  ) {
    this.openDurationMs = settings.openDurationMs;
  }

  /**
   * Ask to send one call. Moves open → half_open when the open duration has
   * elapsed, and hands out at most one trial permit while half-open.
   * Returns null when the call is refused.
   */
  tryAcquire(now: number = Date.now()): CircuitPermit | null {
    if (this.state === 'closed') {
      return { generation: this.generation, trial: false };
    }

    if (this.state === 'open') {
      if (this.openedAt !== null && now - this.openedAt >= this.openDurationMs) {
        this.transition('half_open', now);
        this.trialInFlight = true;
        return { generation: this.generation, trial: true };
      }
      this.rejected++;
      return null;
    }

    if (!this.trialInFlight) {
      this.trialInFlight = true;
      return { generation: this.generation, trial: true };
    }
    this.rejected++;
    return null;
  }

  recordSuccess(permit: CircuitPermit, now: number = Date.now()): void {
    this.totalSuccesses++;
    if (permit.generation !== this.generation) return;

    if (this.state === 'closed') {
      this.push(false);
      return;
    }

    if (this.state === 'half_open' && permit.trial) {
      this.window = [];
      this.openDurationMs = this.settings.openDurationMs;
      this.openedAt = null;
      this.trialInFlight = false;
      this.transition('closed', now);
    }
  }

  recordFailure(permit: CircuitPermit, now: number = Date.now()): void {
    this.totalFailures++;
    if (permit.generation !== this.generation) return;

    if (this.state === 'closed') {
      this.push(true);
      const { minimumCalls, failureRateThreshold } = this.settings;
      if (this.window.length >= minimumCalls && this.failureRate() >= failureRateThreshold) {
        this.open(now, this.settings.openDurationMs);
      }
      return;
    }

    if (this.state === 'half_open' && permit.trial) {
      this.open(now, Math.min(this.openDurationMs * 2, this.settings.maxOpenDurationMs));
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  /** Open and still refusing calls at `now`. */
  isOpen(now: number = Date.now()): boolean {
    return this.state === 'open' && this.openedAt !== null && now - this.openedAt < this.openDurationMs;
  }

  getOpenedAt(): number | null {
    return this.openedAt;
  }

  /** Adopt settings from a newer policy; the window shrinks if needed. */
  updateSettings(settings: BreakerSettings): void {
    this.settings = settings;
    if (this.window.length > settings.windowSize) {
      this.window = this.window.slice(-settings.windowSize);
    }
    if (this.state === 'closed') {
      this.openDurationMs = settings.openDurationMs;
    }
  }

  getStats(): CircuitStats {
    return {
      capability: this.capability,
      provider: this.provider,
      state: this.state,
      failureRate: this.failureRate(),
      windowCalls: this.window.length,
      totalSuccesses: this.totalSuccesses,
      totalFailures: this.totalFailures,
      rejected: this.rejected,
      openedAt: this.openedAt !== null ? new Date(this.openedAt) : null,
      openDurationMs: this.openDurationMs,
    };
  }

  reset(): void {
    this.state = 'closed';
    this.window = [];
    this.openedAt = null;
    this.openDurationMs = this.settings.openDurationMs;
    this.trialInFlight = false;
    this.generation++;
    this.totalSuccesses = 0;
    this.totalFailures = 0;
    this.rejected = 0;
  }

  private failureRate(): number {
    if (this.window.length === 0) return 0;
    return this.window.filter(Boolean).length / this.window.length;
  }

  private push(failed: boolean): void {
    this.window.push(failed);
    if (this.window.length > this.settings.windowSize) {
      this.window.shift();
    }
  }

  private open(now: number, durationMs: number): void {
    this.openedAt = now;
    this.openDurationMs = durationMs;
    this.trialInFlight = false;
    this.transition('open', now);
  }

  private transition(to: CircuitState, now: number = Date.now()): void {
    const from = this.state;
    this.state = to;
    this.generation++;

    const payload = {
      capability: this.capability,
      provider: this.provider,
      from,
      to,
      failureRate: this.failureRate(),
      openDurationMs: this.openDurationMs,
      timestamp: new Date(now),
    };

    if (to === 'open') {
      log.warn(payload, 'Circuit opened');
    } else {
      log.info(payload, `Circuit ${to === 'closed' ? 'closed' : 'half-open'}`);
    }
    this.eventBus.emit('circuit:state_changed', payload);
  }
}
