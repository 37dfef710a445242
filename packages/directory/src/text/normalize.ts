/**
 * Display Text Normalization
 *
 * Title-casing for names and addresses imported in ALL CAPS, and the
 * facility-type suffixes ("Library", "Town Hall", "City Hall") that source
 * datasets tend to drop.
 */

import { isStateAbbrev } from './states.js';

const LETTER_RUN = /\p{L}+/gu;

/**
 * Upper-case a single code point unless that expands it ("ﬁ" -> "FI",
 * "ß" -> "SS"); an expansion would be lower-cased again on the next pass.
 */
function upperFirst(codePoint: string): string {
  const upper = codePoint.toUpperCase();
  return [...upper].length === 1 ? upper : codePoint;
}

/**
 * Title-case one token: each run of letters gets an uppercase first letter
 * and lowercase rest ("o'neil" -> "O'Neil", "3rd" -> "3Rd").
 */
function titleCaseToken(token: string): string {
  return token.replace(LETTER_RUN, (run) => {
    const [first = '', ...rest] = run;
    return upperFirst(first) + rest.join('').toLowerCase();
  });
}

/**
 * Title-case whitespace-separated tokens, keeping state abbreviations uppercase
 *
 * "CITYNAME TOWN HALL" -> "Cityname Town Hall", "boston ma" -> "Boston MA".
 * Whitespace runs collapse to single spaces. Blank input is returned unchanged.
 */
export function titleCase(value: string): string {
  if (!value.trim()) return value;

  return value
    .trim()
    .split(/\s+/)
    .map((token) => (isStateAbbrev(token) ? token.toUpperCase() : titleCaseToken(token)))
    .join(' ');
}

/**
 * Append a missing facility-type suffix
 *
 * Expects title-cased input so the appended suffix matches its casing.
 */
export function ensureSuffix(name: string): string {
  if (!name.trim()) return name;

  const trimmed = name.trim();
  const lower = trimmed.toLowerCase();

  const mentionsLibrary =
    lower.includes('library') || lower.includes(' lib ') || lower.endsWith(' lib');
  if (mentionsLibrary && !lower.endsWith('library')) {
    return `${trimmed} Library`;
  }

  if (lower.includes('municipal') && !lower.includes('city hall')) {
    return `${trimmed} City Hall`;
  }

  const mentionsHall = lower.includes('town hall') || lower.includes('city hall');
  const endsWithHall = lower.endsWith('town hall') || lower.endsWith('city hall');
  if (mentionsHall && !endsWithHall) {
    return `${trimmed} ${lower.includes('city') ? 'City Hall' : 'Town Hall'}`;
  }

  return trimmed;
}
