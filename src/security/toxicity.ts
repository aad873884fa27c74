import type { Toxicity } from './sections.js';

/** Share of the configured keywords found in the text, in [0, 1]. */
export function toxicityScore(text: string, settings: Toxicity): number {
  const lowered = text.toLowerCase();
  const found = settings.keywords.filter((keyword) => lowered.includes(keyword.toLowerCase())).length;
  return Math.min(found / settings.keywords.length, 1);
}
