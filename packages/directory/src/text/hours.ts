/**
 * Hours Classification
 *
 * Some public datasets carry numeric source codes in their hours column.
 * Those are "bogus" hours: present, but not opening-hours text.
 */

const NUMERIC_CODE = /^[\d\s,.]+$/;

/**
 * True when the value is purely numeric (digits, whitespace, commas, periods)
 */
export function isNumericCode(value: string): boolean {
  return NUMERIC_CODE.test(value.trim());
}

/**
 * True if hours looks like a numeric code rather than real hours text
 *
 * Blank is not bogus: it is simply absent, and callers treat it separately.
 */
export function isBogusHours(hours: string | null | undefined): boolean {
  if (!hours || !hours.trim()) return false;

  const stripped = hours.trim();
  if (isNumericCode(stripped)) return true;

  const withoutPeriods = stripped.replace(/\./g, '');
  return stripped.length <= 4 && withoutPeriods.length > 0 && /^\d+$/.test(withoutPeriods);
}

/**
 * True when hours is non-blank opening-hours text
 */
export function hasGenuineHours(hours: string | null | undefined): boolean {
  return Boolean(hours && hours.trim()) && !isBogusHours(hours);
}
