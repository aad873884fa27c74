/**
 * Schemas for the policy's `security` and `quality` sections.
 *
 * The policy store keeps both sections opaque; only the validation gate
 * parses them, so a malformed section fails at the gate rather than at reload.
 *
 * @module security/sections
 */

import { z } from 'zod';

const RegexSourceSchema = z.string().refine(
  (source) => {
    try {
      new RegExp(source, 'i');
      return true;
    } catch {
      return false;
    }
  },
  { message: 'Invalid regular expression' },
);

// ═══════════════════════════════════════════════════════════════════════════
// SECURITY
// ═══════════════════════════════════════════════════════════════════════════

export const PiiDetectionSchema = z.object({
  enabled: z.boolean().default(true),
  maskEmail: z.boolean().default(true),
  maskPhone: z.boolean().default(true),
  maskSsn: z.boolean().default(true),
  maskCreditCard: z.boolean().default(true),
  maskPattern: z.string().default('***REDACTED***'),
});
export type PiiDetection = z.infer<typeof PiiDetectionSchema>;

export const SecuritySectionSchema = z.object({
  /** Regular expressions that reject a prompt outright */
  blockedPatterns: z.array(RegexSourceSchema).default([]),
  /** Literal, case-insensitive keywords that reject a prompt outright */
  blockedKeywords: z.array(z.string().min(1)).default([]),
  injectionPatterns: z.array(RegexSourceSchema).default([]),
  /** Share of injection patterns that must match before a prompt is rejected */
  injectionThreshold: z.number().gt(0).max(1).default(0.7),
  piiDetection: PiiDetectionSchema.default({}),
});
export type SecuritySection = z.infer<typeof SecuritySectionSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// QUALITY
// ═══════════════════════════════════════════════════════════════════════════

const LengthLimitsSchema = z.object({
  minPromptLength: z.number().int().nonnegative().optional(),
  maxPromptLength: z.number().int().positive().optional(),
});

export const DEFAULT_TOXIC_KEYWORDS = [
  'hate',
  'violence',
  'harassment',
  'abuse',
  'discrimination',
  'offensive',
  'inappropriate',
];

export const ToxicitySchema = z.object({
  enabled: z.boolean().default(true),
  keywords: z.array(z.string().min(1)).min(1).default(DEFAULT_TOXIC_KEYWORDS),
  threshold: z.number().min(0).max(1).default(0.7),
  /** When false, a toxic prompt is logged and let through */
  blockOnToxicity: z.boolean().default(true),
});
export type Toxicity = z.infer<typeof ToxicitySchema>;

export const FormatValidationSchema = z.object({
  enabled: z.boolean().default(true),
  /** Keys an object payload must carry */
  requiredFields: z.array(z.string().min(1)).default([]),
  /** Reject payloads that are not plain objects */
  strict: z.boolean().default(false),
});
export type FormatValidation = z.infer<typeof FormatValidationSchema>;

export const OutputChecksSchema = z.object({
  enabled: z.boolean().default(true),
  /** Every item of an image payload's `data` must carry `url` or `b64_json` */
  checkImageData: z.boolean().default(true),
  imageCapabilities: z.array(z.string().min(1)).default(['generate-image']),
});
export type OutputChecks = z.infer<typeof OutputChecksSchema>;

export const QualitySectionSchema = z.object({
  minPromptLength: z.number().int().nonnegative().default(1),
  maxPromptLength: z.number().int().positive().default(100_000),
  perCapability: z.record(z.string(), LengthLimitsSchema).default({}),
  toxicity: ToxicitySchema.default({}),
  formatValidation: FormatValidationSchema.default({}),
  outputChecks: OutputChecksSchema.default({}),
});
export type QualitySection = z.infer<typeof QualitySectionSchema>;
