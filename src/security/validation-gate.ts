/**
 * Validation gates.
 *
 * The engine treats the snapshot's security and quality sections as opaque;
 * a gate is the only place they are interpreted. A rejected request never
 * reaches the cache, the budget ledger or the router.
 *
 * Input stages, in order: prompt length, blocked patterns and keywords,
 * prompt injection, PII masking, toxicity. Output stages: format, then
 * payload quality.
 *
 * @module security/validation-gate
 */

import type { PolicySnapshot } from '../policy/schemas.js';
import type { GenerationRequest } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { checkFormat, checkOutputQuality } from './output-checks.js';
import { maskPii } from './pii-masking.js';
import { QualitySectionSchema, SecuritySectionSchema } from './sections.js';
import { toxicityScore } from './toxicity.js';

const log = createLogger('validation-gate');

export interface GateInput {
  capability: string;
  request: GenerationRequest;
}

export interface OutputGateInput extends GateInput {
  provider: string;
  payload: unknown;
}

export type GateVerdict =
  /** `request` replaces the caller's request when the gate rewrote it */
  | { ok: true; request?: GenerationRequest }
  | { ok: false; category: 'security' | 'quality'; reason: string };

export interface ValidationGate {
  validate(input: GateInput, snapshot: PolicySnapshot): GateVerdict | Promise<GateVerdict>;
  /** Runs on a provider's payload before it is cached or returned */
  validateOutput?(input: OutputGateInput, snapshot: PolicySnapshot): GateVerdict | Promise<GateVerdict>;
}

export const allowAllGate: ValidationGate = {
  validate: () => ({ ok: true }),
};

function reject(category: 'security' | 'quality', reason: string): GateVerdict {
  log.warn({ category, reason }, 'Request rejected by validation gate');
  return { ok: false, category, reason };
}

function parseSections(snapshot: PolicySnapshot) {
  const security = SecuritySectionSchema.safeParse(snapshot.security);
  if (!security.success) {
    return reject('security', `Security policy is malformed: ${security.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  const quality = QualitySectionSchema.safeParse(snapshot.quality);
  if (!quality.success) {
    return reject('quality', `Quality policy is malformed: ${quality.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  return { security: security.data, quality: quality.data };
}

// ═══════════════════════════════════════════════════════════════════════════
// POLICY-DRIVEN GATE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Gate driven by the snapshot's `security` and `quality` sections.
 * A section that does not parse rejects every request.
 */
export class PolicyValidationGate implements ValidationGate {
  validate({ capability, request }: GateInput, snapshot: PolicySnapshot): GateVerdict {
    const sections = parseSections(snapshot);
    if ('ok' in sections) return sections;
    const { security, quality } = sections;

    const prompt = request.prompt;
    const limits = quality.perCapability[capability];
    const min = limits?.minPromptLength ?? quality.minPromptLength;
    const max = limits?.maxPromptLength ?? quality.maxPromptLength;

    if (prompt.length < min) {
      return reject('quality', `Prompt length ${prompt.length} is below minimum ${min}`);
    }
    if (prompt.length > max) {
      return reject('quality', `Prompt length ${prompt.length} exceeds maximum ${max}`);
    }

    const lowered = prompt.toLowerCase();
    for (const pattern of security.blockedPatterns) {
      if (new RegExp(pattern, 'i').test(prompt)) {
        return reject('security', `Prompt contains blocked pattern: ${pattern}`);
      }
    }
    for (const keyword of security.blockedKeywords) {
      if (lowered.includes(keyword.toLowerCase())) {
        return reject('security', `Prompt contains blocked keyword: ${keyword}`);
      }
    }

    const { injectionPatterns, injectionThreshold } = security;
    if (injectionPatterns.length > 0) {
      const matched = injectionPatterns.filter((pattern) => new RegExp(pattern, 'i').test(prompt)).length;
      const risk = Math.min(matched / injectionPatterns.length, 1);
      if (risk >= injectionThreshold) {
        return reject('security', `Potential prompt injection detected (risk score: ${risk.toFixed(2)})`);
      }
    }

    const masked = maskPii(prompt, security.piiDetection);
    if (masked.detected.length > 0) {
      log.warn({ capability, detected: masked.detected }, 'PII masked in prompt');
    }

    if (quality.toxicity.enabled) {
      const score = toxicityScore(masked.text, quality.toxicity);
      if (score >= quality.toxicity.threshold) {
        const reason = `Potential toxicity detected (score: ${score.toFixed(2)})`;
        if (quality.toxicity.blockOnToxicity) {
          return reject('quality', reason);
        }
        log.warn({ capability, score }, reason);
      }
    }

    return masked.detected.length > 0 ? { ok: true, request: { ...request, prompt: masked.text } } : { ok: true };
  }

  validateOutput({ capability, provider, payload }: OutputGateInput, snapshot: PolicySnapshot): GateVerdict {
    const sections = parseSections(snapshot);
    if ('ok' in sections) return sections;

    const problem =
      checkFormat(payload, sections.quality.formatValidation) ??
      checkOutputQuality(capability, payload, sections.quality.outputChecks);
    if (problem !== null) {
      log.warn({ capability, provider, reason: problem }, 'Provider output rejected');
      return { ok: false, category: 'quality', reason: problem };
    }
    return { ok: true };
  }
}
