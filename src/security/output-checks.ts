/**
 * Checks on a provider's payload before it is cached or returned.
 *
 * @module security/output-checks
 */

import type { FormatValidation, OutputChecks } from './sections.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Returns the reason the payload is malformed, or null. */
export function checkFormat(payload: unknown, settings: FormatValidation): string | null {
  if (!settings.enabled) return null;

  if (isRecord(payload)) {
    const missing = settings.requiredFields.find((field) => !(field in payload));
    if (missing !== undefined) return `Missing required field: ${missing}`;
  } else if (settings.strict) {
    return 'Payload must be an object';
  }
  return null;
}

/**
 * Returns the reason the payload fails the quality checks, or null.
 * Only object payloads with a `data` member are inspected.
 */
export function checkOutputQuality(capability: string, payload: unknown, settings: OutputChecks): string | null {
  if (!settings.enabled || !isRecord(payload) || !('data' in payload)) return null;

  const { data } = payload;
  if (Array.isArray(data) ? data.length === 0 : !data) {
    return `No output generated for ${capability}`;
  }

  if (settings.checkImageData && Array.isArray(data) && settings.imageCapabilities.includes(capability)) {
    const incomplete = data.some((item) => isRecord(item) && !item.url && !item.b64_json);
    if (incomplete) return 'Image data missing URL or base64 content';
  }
  return null;
}
