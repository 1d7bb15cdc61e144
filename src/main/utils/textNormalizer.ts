/**
 * Text normalization helpers shared by matching and tag reconciliation.
 */

/**
 * Lowercases, turns punctuation (except &) into spaces and collapses whitespace.
 * e.g. "Daft Punk - One More Time!" → "daft punk one more time"
 */
export function normalizeText(value: string | null | undefined): string {
  return (value ?? '')
    .toLowerCase()
    .replace(/[^\w\s&]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/** Unique normalized tokens, sorted */
export function tokenize(value: string | null | undefined): string[] {
  const normalized = normalizeText(value);
  if (!normalized) return [];
  return [...new Set(normalized.split(' '))].sort();
}

const YEAR_PATTERN = /(?<!\d)\d{4}(?!\d)/;

/**
 * Extracts the first run of exactly four digits from a raw catalog year.
 * "2025//2025" → "2025", "2000-01-01" → "2000", "19xx" → null
 */
export function cleanYear(raw: string | number | null | undefined): string | null {
  if (raw === null || raw === undefined) return null;
  const match = YEAR_PATTERN.exec(String(raw));
  return match ? match[0] : null;
}

/** Comparison form for stored tag values */
export function normalizeTagValue(value: string | null | undefined): string {
  return (value ?? '').replace(/\s+/g, ' ').trim();
}
