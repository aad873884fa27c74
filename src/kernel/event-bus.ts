import type { OrchestrationOutcome } from '../orchestrator/types.js';
import type { CircuitState } from '../resilience/circuit-breaker.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('event-bus');

/**
 * EventMap interface defining event name to payload mappings.
 * The EventBus is the engine's only observability sink: it emits
 * structured payloads and leaves formatting and transport to subscribers.
 */
export interface EventMap {
  // ── Orchestration ──────────────────────────────────────────────────────
  'orchestration:completed': OrchestrationOutcome;

  // ── Resilience ─────────────────────────────────────────────────────────
  'circuit:state_changed': {
    capability: string;
    provider: string;
    from: CircuitState;
    to: CircuitState;
    failureRate: number;
    openDurationMs: number;
    timestamp: Date;
  };

  // ── Budget ─────────────────────────────────────────────────────────────
  'budget:overshoot': { scopeId: string; ceiling: number; consumed: number; overshoot: number; timestamp: Date };
  'budget:rollover': { scopeId: string; previousConsumed: number; windowStart: Date };

  // ── Cache ──────────────────────────────────────────────────────────────
  'cache:evicted': { fingerprint: string; reason: 'capacity' | 'expired' };

  // ── Policy ─────────────────────────────────────────────────────────────
  'policy:reloaded': { version: string; revision: number; previousRevision: number };
  'policy:reload_rejected': { attemptedVersion?: string; currentRevision: number; issues: string[] };

  // ── System ─────────────────────────────────────────────────────────────
  'system:handler_error': { event: string; error: string; handler: string; timestamp: Date };
}

type Handler = (payload: never) => void;

/**
 * Typed in-process event bus. A throwing handler is isolated: the error is
 * logged, counted and re-emitted as `system:handler_error`.
 */
export class EventBus {
  private listeners: Map<keyof EventMap, Set<Handler>> = new Map();
  private handlerErrors: number = 0;

  /**
   * Subscribe to an event
   * @returns Unsubscribe function
   */
  on<K extends keyof EventMap>(
    event: K,
    handler: (payload: EventMap[K]) => void
  ): () => void {
    let handlers = this.listeners.get(event);
    if (!handlers) {
      handlers = new Set();
      this.listeners.set(event, handlers);
    }

    handlers.add(handler);

    return () => this.off(event, handler);
  }

  off<K extends keyof EventMap>(
    event: K,
    handler: (payload: EventMap[K]) => void
  ): void {
    const handlers = this.listeners.get(event);
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        this.listeners.delete(event);
      }
    }
  }

  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): void {
    const handlers = this.listeners.get(event);
    if (!handlers) return;

    for (const handler of [...handlers]) {
      try {
        (handler as (payload: EventMap[K]) => void)(payload);
      } catch (error) {
        this.handlerErrors++;
        const errorMsg = error instanceof Error ? error.message : String(error);

        log.error({ event, err: error }, 'Error in event handler');

        // Guard against recursion from handler_error handlers
        if (event !== 'system:handler_error') {
          this.emit('system:handler_error', {
            event,
            error: errorMsg,
            handler: handler.name || 'anonymous',
            timestamp: new Date(),
          });
        }
      }
    }
  }

  /**
   * Subscribe to an event for a single occurrence
   */
  once<K extends keyof EventMap>(
    event: K,
    handler: (payload: EventMap[K]) => void
  ): () => void {
    const wrappedHandler = (payload: EventMap[K]): void => {
      this.off(event, wrappedHandler);
      handler(payload);
    };

    return this.on(event, wrappedHandler);
  }

  clear(): void {
    this.listeners.clear();
    this.handlerErrors = 0;
  }

  listenerCount(event: keyof EventMap): number {
    const handlers = this.listeners.get(event);
    return handlers ? handlers.size : 0;
  }

  getHandlerErrorCount(): number {
    return this.handlerErrors;
  }
}
