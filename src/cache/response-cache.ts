/**
 * Response Cache
 *
 * In-memory store of generated payloads keyed by request fingerprint, with
 * a secondary shape index for near-duplicate lookups. Entries expire at
 * `expiresAt` (an entry whose expiry equals now is already gone) and are
 * purged lazily; capacity overflow evicts the oldest-created entries.
 *
 * @module cache/response-cache
 */

import type { EventBus } from '../kernel/event-bus.js';
import type { CachePolicy, DeepReadonly } from '../policy/schemas.js';
import { createLogger } from '../utils/logger.js';
import { jaccard, type SimilarityKey } from './fingerprint.js';

const log = createLogger('response-cache');

export interface CacheEntry<TPayload> {
  fingerprint: string;
  similarity: SimilarityKey;
  payload: TPayload;
  provider: string;
  createdAt: number;
  expiresAt: number;
}

export interface CacheHit<TPayload> {
  entry: CacheEntry<TPayload>;
  match: 'exact' | 'similar';
  /** 1 for exact matches, the Jaccard score otherwise */
  score: number;
}

export interface CacheStats {
  size: number;
  hits: number;
  similarHits: number;
  misses: number;
  evictions: number;
  expirations: number;
}

type Limits = Pick<DeepReadonly<CachePolicy>, 'maxEntries' | 'similarityThreshold'>;

export class ResponseCache<TPayload> {
  /** Insertion order is creation order: a replaced entry is re-inserted at the end */
  private readonly entries = new Map<string, CacheEntry<TPayload>>();
  private readonly byShape = new Map<string, Set<string>>();
  private hits = 0;
  private similarHits = 0;
  private misses = 0;
  private evictions = 0;
  private expirations = 0;

  constructor(private readonly eventBus: EventBus) {}

  lookup(
    fingerprint: string,
    similarity: SimilarityKey,
    limits: Limits,
    now: number = Date.now(),
  ): CacheHit<TPayload> | undefined {
    const exact = this.live(fingerprint, now);
    if (exact) {
      this.hits++;
      return { entry: exact, match: 'exact', score: 1 };
    }

    if (limits.similarityThreshold !== null) {
      const best = this.bestSimilar(similarity, limits.similarityThreshold, now);
      if (best) {
        this.hits++;
        this.similarHits++;
        return best;
      }
    }

    this.misses++;
    return undefined;
  }

  store(
    fingerprint: string,
    similarity: SimilarityKey,
    payload: TPayload,
    provider: string,
    ttlMs: number,
    limits: Limits,
    now: number = Date.now(),
  ): CacheEntry<TPayload> {
    this.remove(fingerprint);

    const entry: CacheEntry<TPayload> = {
      fingerprint,
      similarity,
      payload,
      provider,
      createdAt: now,
      expiresAt: now + ttlMs,
    };
    this.entries.set(fingerprint, entry);

    let shapeSet = this.byShape.get(similarity.shape);
    if (!shapeSet) {
      shapeSet = new Set();
      this.byShape.set(similarity.shape, shapeSet);
    }
    shapeSet.add(fingerprint);

    this.evictOverflow(limits.maxEntries);
    return entry;
  }

  /** Remove every expired entry; returns how many were removed. */
  prune(now: number = Date.now()): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.expire(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
    this.byShape.clear();
  }

  /** Entries held, including expired ones not yet purged. */
  get size(): number {
    return this.entries.size;
  }

  getStats(): CacheStats {
    return {
      size: this.entries.size,
      hits: this.hits,
      similarHits: this.similarHits,
      misses: this.misses,
      evictions: this.evictions,
      expirations: this.expirations,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // INTERNALS
  // ═══════════════════════════════════════════════════════════════════════

  private live(fingerprint: string, now: number): CacheEntry<TPayload> | undefined {
    const entry = this.entries.get(fingerprint);
    if (!entry) return undefined;
    if (entry.expiresAt <= now) {
      this.expire(fingerprint);
      return undefined;
    }
    return entry;
  }

  private bestSimilar(similarity: SimilarityKey, threshold: number, now: number): CacheHit<TPayload> | undefined {
    const shapeSet = this.byShape.get(similarity.shape);
    if (!shapeSet) return undefined;

    let best: CacheHit<TPayload> | undefined;
    for (const key of [...shapeSet]) {
      const entry = this.live(key, now);
      if (!entry) continue;

      const score = jaccard(similarity.tokens, entry.similarity.tokens);
      // Newer entries win ties
      if (score >= threshold && (!best || score >= best.score)) {
        best = { entry, match: 'similar', score };
      }
    }
    return best;
  }

  private evictOverflow(maxEntries: number): void {
    while (this.entries.size > maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) return;

      this.remove(oldest.value);
      this.evictions++;
      log.debug({ fingerprint: oldest.value }, 'Evicted cache entry over capacity');
      this.eventBus.emit('cache:evicted', { fingerprint: oldest.value, reason: 'capacity' });
    }
  }

  private expire(fingerprint: string): void {
    this.remove(fingerprint);
    this.expirations++;
    this.eventBus.emit('cache:evicted', { fingerprint, reason: 'expired' });
  }

  private remove(fingerprint: string): void {
    const entry = this.entries.get(fingerprint);
    if (!entry) return;

    this.entries.delete(fingerprint);
    const shapeSet = this.byShape.get(entry.similarity.shape);
    if (shapeSet) {
      shapeSet.delete(fingerprint);
      if (shapeSet.size === 0) {
        this.byShape.delete(entry.similarity.shape);
      }
    }
  }
}
