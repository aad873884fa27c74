import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventBus } from '../../../src/kernel/event-bus.js';
import { PolicyStore, PolicyValidationError, parsePolicyDocument } from '../../../src/policy/policy-store.js';
import { DEFAULT_POLICY } from '../../../src/policy/defaults.js';
import { testPolicy } from '../../helpers/fixtures.js';

describe('PolicyStore', () => {
  let eventBus: EventBus;
  let store: PolicyStore;

  beforeEach(() => {
    eventBus = new EventBus();
    store = new PolicyStore(eventBus, testPolicy());
  });

  describe('construction', () => {
    it('should load the built-in defaults when no document is given', () => {
      const defaults = new PolicyStore(eventBus);
      const snapshot = defaults.current();

      expect(snapshot.version).toBe('1.0.0');
      expect(snapshot.revision).toBe(1);
      expect(Object.keys(snapshot.routing.capabilities)).toEqual([
        'generate-image',
        'generate-diagram',
        'generate-video',
      ]);
    });

    it('should apply schema defaults', () => {
      const snapshot = store.current();

      expect(snapshot.routing.costMode).toBe('balanced');
      expect(snapshot.routing.capabilities['generate-image']?.fallbacks).toEqual([]);
      expect(snapshot.cost.enabled).toBe(true);
      expect(snapshot.features.cachingEnabled).toBe(true);
      expect(snapshot.resilience.degradation.enabled).toBe(false);
    });

    it('should throw PolicyValidationError for an invalid initial document', () => {
      expect(() => new PolicyStore(eventBus, { version: 'broken' })).toThrow(PolicyValidationError);
    });
  });

  describe('immutability', () => {
    it('should deep-freeze the snapshot', () => {
      const snapshot = store.current();

      expect(Object.isFrozen(snapshot)).toBe(true);
      expect(Object.isFrozen(snapshot.resilience.defaults.breaker)).toBe(true);
      expect(Object.isFrozen(snapshot.cost.scopes)).toBe(true);
      expect(Reflect.set(snapshot.resilience.defaults, 'maxAttempts', 9)).toBe(false);
      expect(snapshot.resilience.defaults.maxAttempts).toBe(3);
    });
  });

  describe('reload', () => {
    it('should swap in a valid document with the next revision', () => {
      const handler = vi.fn();
      eventBus.on('policy:reloaded', handler);

      const result = store.reload({ ...testPolicy(), version: 'test-2' });

      expect(result.success).toBe(true);
      expect(store.current().version).toBe('test-2');
      expect(store.current().revision).toBe(2);
      expect(handler).toHaveBeenCalledWith({ version: 'test-2', revision: 2, previousRevision: 1 });
    });

    it('should keep serving the previous snapshot when the document is malformed', () => {
      const handler = vi.fn();
      eventBus.on('policy:reload_rejected', handler);
      const before = store.current();

      const doc = testPolicy();
      const result = store.reload({
        ...doc,
        version: 'test-2',
        resilience: { defaults: { ...doc.resilience.defaults, maxAttempts: 0 } },
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('policy_reload_rejected');
        expect(result.error.issues).toEqual([
          'resilience.defaults.maxAttempts: Number must be greater than or equal to 1',
        ]);
      }
      expect(store.current()).toBe(before);
      expect(handler).toHaveBeenCalledWith({
        attemptedVersion: 'test-2',
        currentRevision: 1,
        issues: ['resilience.defaults.maxAttempts: Number must be greater than or equal to 1'],
      });
    });

    it('should leave a previously captured snapshot untouched', () => {
      const captured = store.current();
      store.reload({ ...testPolicy(), version: 'test-2' });

      expect(captured.version).toBe('test-1');
      expect(captured.revision).toBe(1);
      expect(store.current()).not.toBe(captured);
    });

    it('should report a non-object document', () => {
      const result = store.reload('not a policy');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues).toEqual(['(root): Expected object, received string']);
      }
    });
  });
});

describe('parsePolicyDocument', () => {
  it('should accept the default policy', () => {
    expect(parsePolicyDocument(DEFAULT_POLICY).success).toBe(true);
  });

  it('should reject a backoff cap below the base delay', () => {
    const doc = testPolicy();
    const result = parsePolicyDocument({
      ...doc,
      resilience: {
        defaults: { ...doc.resilience.defaults, backoff: { baseDelayMs: 100, multiplier: 2, maxDelayMs: 10 } },
      },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues).toEqual(['resilience.defaults.backoff: maxDelayMs must be >= baseDelayMs']);
    }
  });

  it('should check provider overrides against the merged settings', () => {
    const doc = testPolicy();
    const result = parsePolicyDocument({
      ...doc,
      resilience: {
        ...doc.resilience,
        providers: { alpha: { breaker: { minimumCalls: 50 } } },
      },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues).toEqual(['resilience.providers.alpha.breaker: minimumCalls must be <= windowSize']);
    }
  });

  it('should check capability overrides against the merged settings', () => {
    const doc = testPolicy();
    const result = parsePolicyDocument({
      ...doc,
      resilience: {
        ...doc.resilience,
        capabilities: { 'generate-image': { beta: { breaker: { maxOpenDurationMs: 10 } } } },
      },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues).toEqual([
        'resilience.capabilities.generate-image.beta.breaker: maxOpenDurationMs must be >= openDurationMs',
      ]);
    }
  });

  it('should require a degradation provider when degradation is enabled', () => {
    const doc = testPolicy();
    const result = parsePolicyDocument({
      ...doc,
      resilience: { ...doc.resilience, degradation: { enabled: true } },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues).toEqual([
        'resilience.degradation: provider is required when degradation is enabled',
      ]);
    }
  });

  it('should reject timer settings Node.js cannot schedule', () => {
    const doc = testPolicy();
    const result = parsePolicyDocument({
      ...doc,
      resilience: {
        defaults: {
          ...doc.resilience.defaults,
          attemptTimeoutMs: 2_147_483_648,
          breaker: { ...doc.resilience.defaults.breaker, maxOpenDurationMs: 2_147_483_648 },
        },
      },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues).toContain(
        'resilience.defaults.attemptTimeoutMs: Number must be less than or equal to 2147483647',
      );
      expect(result.error.issues).toContain(
        'resilience.defaults.breaker.maxOpenDurationMs: Number must be less than or equal to 2147483647',
      );
    }
  });

  it('should reject duplicate budget scope ids', () => {
    const doc = testPolicy();
    const result = parsePolicyDocument({
      ...doc,
      cost: {
        ...doc.cost,
        scopes: [...doc.cost.scopes, { id: 'global', unit: 'tokens', ceiling: 5, windowMs: 1000 }],
      },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues).toEqual(['cost.scopes: duplicate scope id "global"']);
    }
  });
});
