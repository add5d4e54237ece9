/**
 * Generic normalization and string helpers.
 * These utilities are used across ingestion, scoring, and rendering.
 */

/**
 * Clamp a numeric value to [min, max].
 */
export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.max(min, Math.min(max, value));
}

export function round1(n: number): number {
  return Math.round(n * 10) / 10;
}

export function round3(n: number): number {
  return Math.round(n * 1000) / 1000;
}

/**
 * Reduce a free-text entity name to a lookup key: lowercase alphanumerics only.
 * "Pauline Hanson's One Nation" => "paulinehansonsonenation"
 */
export function toLookupKey(input?: string | null): string {
  if (!input) return '';
  return input
    .toLowerCase()
    .replace(/['’]/g, '')
    .replace(/[^a-z0-9]+/g, '');
}

/**
 * Normalize a headline for lexicon scoring: collapse whitespace + trim.
 */
export function normalizeHeadline(text: string): string {
  return (text || '').replace(/\s+/g, ' ').trim();
}
