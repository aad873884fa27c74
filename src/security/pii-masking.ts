import type { PiiDetection } from './sections.js';

export type PiiKind = 'email' | 'credit_card' | 'ssn' | 'phone';

export interface MaskResult {
  text: string;
  detected: PiiKind[];
}

interface PiiPattern {
  kind: PiiKind;
  flag: 'maskEmail' | 'maskCreditCard' | 'maskSsn' | 'maskPhone';
  pattern: RegExp;
}

// Card and SSN run before phone so their digit groups are never half-masked.
const PII_PATTERNS: readonly PiiPattern[] = [
  { kind: 'email', flag: 'maskEmail', pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g },
  { kind: 'credit_card', flag: 'maskCreditCard', pattern: /\b\d{4}[- ]?\d{4}[- ]?\d{4}[- ]?\d{4}\b/g },
  { kind: 'ssn', flag: 'maskSsn', pattern: /\b\d{3}-\d{2}-\d{4}\b/g },
  { kind: 'phone', flag: 'maskPhone', pattern: /\b\d{3}[-.]?\d{3}[-.]?\d{4}\b/g },
];

/**
 * Replace email addresses, card numbers, SSNs and US phone numbers with the
 * policy's mask.
 */
export function maskPii(text: string, settings: PiiDetection): MaskResult {
  if (!settings.enabled) return { text, detected: [] };

  let masked = text;
  const detected: PiiKind[] = [];
  for (const { kind, flag, pattern } of PII_PATTERNS) {
    if (!settings[flag]) continue;
    const replaced = masked.replace(pattern, () => settings.maskPattern);
    if (replaced !== masked) {
      detected.push(kind);
      masked = replaced;
    }
  }
  return { text: masked, detected };
}
