const NULL_STAND_INS = new Set(['none', 'nan', 'null']);

/**
 * Canonical form of a stored text value: trimmed, or null when the value is
 * missing, blank, or one of the literal null stand-ins ("None", "nan", "NULL").
 * Idempotent.
 */
export function canonicalizeText(value: unknown): string | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : null;
  }
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  if (trimmed === '' || NULL_STAND_INS.has(trimmed.toLowerCase())) return null;
  return trimmed;
}

/** True for a stored value that is present in the data but canonicalizes to absent. */
export function isNullStandIn(value: unknown): boolean {
  return value !== null && value !== undefined && canonicalizeText(value) === null;
}

/** Year as a number, or null when it is missing or not numeric. */
export function coerceYear(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  const text = canonicalizeText(value);
  if (text === null) return null;
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
}

const TRAILING_CITY = /(?:^|\s*,\s*|\s+)(?:in\s+)?(?:san\s+francisco|sf)(?:\s*,?\s*(?:ca|california))?\s*$/i;
const TRAILING_STATE = /(?:^|\s*,\s*|\s+)(?:in\s+)?california\s*$/i;

/**
 * Removes a trailing generic city/region qualifier:
 * "Union Square, San Francisco" → "Union Square", "Pier 39 in SF" → "Pier 39".
 * Qualifiers inside a name ("San Francisco Art Institute") are kept.
 */
export function stripCityQualifier(text: string): string {
  return text.replace(TRAILING_CITY, '').replace(TRAILING_STATE, '').trim();
}

/** Key used to compare names and places loosely: lower case, letters and digits only. */
export function looseKey(text: string): string {
  return text.toLowerCase().replace(/[^a-z0-9]+/g, '');
}
