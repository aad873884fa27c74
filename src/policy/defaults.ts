import type { PolicyDocumentInput } from './schemas.js';

/**
 * Policy served when no document is supplied at startup.
 *
 * Rates are list prices per generation (USD); token figures apply to the
 * diagram-code capability, which is billed by the language model behind it.
 */
export const DEFAULT_POLICY: PolicyDocumentInput = {
  version: '1.0.0',
  routing: {
    costMode: 'balanced',
    capabilities: {
      'generate-image': {
        providers: [
          { id: 'openai', priority: 1, costTier: 'high', qualityTier: 'high' },
          { id: 'stable-diffusion', priority: 2, costTier: 'low', qualityTier: 'medium' },
          { id: 'cipher', priority: 3, costTier: 'medium', qualityTier: 'medium' },
        ],
        fallbacks: [],
      },
      'generate-diagram': {
        providers: [
          { id: 'openai', priority: 1, costTier: 'medium', qualityTier: 'high' },
          { id: 'anthropic', priority: 2, costTier: 'medium', qualityTier: 'high' },
        ],
        fallbacks: [],
      },
      'generate-video': {
        providers: [
          { id: 'replicate', priority: 1, costTier: 'low', qualityTier: 'medium' },
          { id: 'runway', priority: 2, costTier: 'high', qualityTier: 'high' },
        ],
        fallbacks: [],
      },
    },
  },
  resilience: {
    defaults: {
      maxAttempts: 3,
      backoff: { baseDelayMs: 500, multiplier: 2, maxDelayMs: 10_000 },
      attemptTimeoutMs: 120_000,
      breaker: {
        windowSize: 20,
        minimumCalls: 10,
        failureRateThreshold: 0.5,
        openDurationMs: 30_000,
        maxOpenDurationMs: 300_000,
      },
    },
    providers: {
      runway: { attemptTimeoutMs: 180_000 },
    },
    degradation: { enabled: false },
  },
  cost: {
    enabled: true,
    perRequestLimitUsd: 1,
    scopes: [
      { id: 'daily', unit: 'usd', ceiling: 100, windowMs: 86_400_000 },
      { id: 'monthly', unit: 'usd', ceiling: 3000, windowMs: 2_592_000_000 },
    ],
    rates: {
      openai: { usd: 0.04, capabilities: { 'generate-diagram': { usd: 0.01, tokens: 2000 } } },
      'stable-diffusion': { usd: 0.002 },
      cipher: { usd: 0.01 },
      anthropic: { usd: 0.01, tokens: 2000 },
      replicate: { usd: 0.05 },
      runway: { usd: 0.1 },
    },
  },
  cache: {
    enabled: true,
    ttlMs: 3_600_000,
    maxEntries: 10_000,
    similarityThreshold: 0.9,
  },
  security: {
    blockedPatterns: ['<script', 'javascript:', 'onerror=', 'onload='],
    injectionPatterns: [
      'ignore previous instructions',
      'forget everything',
      'system:',
      'assistant:',
      'you are now',
    ],
    piiDetection: { enabled: true, maskPattern: '***REDACTED***' },
  },
  quality: {
    minPromptLength: 3,
    maxPromptLength: 100_000,
    toxicity: { enabled: true, threshold: 0.7, blockOnToxicity: true },
    outputChecks: { enabled: true, imageCapabilities: ['generate-image'] },
  },
  features: {
    cachingEnabled: true,
  },
};
