import { createHash } from 'node:crypto';
import type { JsonValue } from '../types/index.js';

/**
 * Secondary key for near-duplicate matching. Two requests can only match
 * when their shape (capability plus every parameter) is identical; the
 * prompt token sets are then compared with Jaccard similarity.
 */
export interface SimilarityKey {
  shape: string;
  tokens: ReadonlySet<string>;
}

export function normalizeText(text: string): string {
  return text.trim().replace(/\s+/g, ' ');
}

function canonicalize(value: JsonValue): JsonValue {
  if (typeof value === 'string') {
    return normalizeText(value);
  }
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, JsonValue> = {};
    for (const key of Object.keys(value).sort()) {
      const child = value[key];
      if (child !== undefined) {
        sorted[key] = canonicalize(child);
      }
    }
    return sorted;
  }
  return value;
}

function sha256(value: JsonValue): string {
  return createHash('sha256').update(JSON.stringify(canonicalize(value))).digest('hex');
}

/** Exact-match cache key over capability, prompt and parameters. */
export function fingerprint(
  capability: string,
  prompt: string,
  params: Readonly<Record<string, JsonValue>>,
): string {
  return sha256({ capability, prompt, params: { ...params } });
}

export function tokenize(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/[^\p{L}\p{N}]+/u)
      .filter((token) => token.length > 0),
  );
}

export function similarityKey(
  capability: string,
  prompt: string,
  params: Readonly<Record<string, JsonValue>>,
): SimilarityKey {
  return {
    shape: sha256({ capability, params: { ...params } }),
    tokens: tokenize(prompt),
  };
}

/** |A ∩ B| / |A ∪ B|; two empty sets are identical. */
export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) return 1;

  let shared = 0;
  for (const token of a) {
    if (b.has(token)) shared++;
  }
  return shared / (a.size + b.size - shared);
}
