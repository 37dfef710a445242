/**
 * Address Parsing Utilities
 *
 * Addresses are comma-separated components: street[, city[, state|zip]].
 * These helpers infer the state from a zip code, split out city/state for the
 * place index, and convert between "City, ST" and URL slugs.
 */

import { isStateAbbrev, STATE_SLUGS, stateSlug } from './states.js';
import { getDefaultZipLookup, type ZipStateLookup } from './zip-lookup.js';

export interface CityState {
  readonly city: string | null;
  readonly state: string | null;
}

export interface ParsedCitySlug {
  readonly city: string;
  /** State name with spaces ("new hampshire"), or the raw last slug word */
  readonly state: string;
  /** True when `state` matched a known state-name suffix */
  readonly stateRecognized: boolean;
}

const FIVE_DIGITS = /^\d{5}$/;

function splitComponents(address: string): string[] {
  return address
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/**
 * Append (or substitute for a trailing zip) the state abbreviation inferred from the zip
 *
 * "123 Main St, Boston, 02101" + "02101" -> "123 Main St, Boston, MA"
 * "123 Main St, Boston" + "02101"        -> "123 Main St, Boston, MA"
 * An existing trailing state is never replaced. Unresolvable zips leave the
 * address unchanged.
 */
export function ensureStateInAddress(
  address: string,
  zip: string,
  lookup: ZipStateLookup = getDefaultZipLookup()
): string {
  if (!address.trim()) return address;

  const parts = splitComponents(address);
  const last = parts[parts.length - 1];
  if (last === undefined) return address;

  if (isStateAbbrev(last)) return address;

  if (FIVE_DIGITS.test(last)) {
    const state = lookup.stateForZip(zip || last);
    if (!state || parts.length < 2) return address;

    const secondLast = parts[parts.length - 2] ?? '';
    if (isStateAbbrev(secondLast)) return address;

    return [...parts.slice(0, -1), state].join(', ');
  }

  const state = lookup.stateForZip(zip);
  return state ? `${address.trim()}, ${state}` : address;
}

/**
 * Extract city and state from an address
 *
 * "123 Main St, Boston, MA" -> Boston/MA; "123 Main St, Palo Alto" + "94301"
 * -> Palo Alto/CA. The state falls back to the zip when the address has none.
 */
export function parseCityStateFromAddress(
  address: string,
  zip: string | null = null,
  lookup: ZipStateLookup = getDefaultZipLookup()
): CityState {
  const parts = splitComponents(address);

  if (parts.length === 0) {
    return { city: null, state: null };
  }

  if (parts.length === 1) {
    return { city: parts[0] ?? null, state: zip ? lookup.stateForZip(zip) : null };
  }

  const last = parts[parts.length - 1] ?? '';
  const secondLast = parts[parts.length - 2] ?? null;

  if (isStateAbbrev(last)) {
    return { city: secondLast, state: last.toUpperCase() };
  }

  if (FIVE_DIGITS.test(last)) {
    return { city: secondLast, state: lookup.stateForZip(zip || last) };
  }

  return { city: last, state: zip ? lookup.stateForZip(zip) : null };
}

/**
 * URL slug for a city: ("Belmont", "MA") -> "belmont-massachusetts"
 */
export function citySlug(city: string | null, state: string | null): string | null {
  if (!city || !city.trim() || !state) return null;

  const stateName = stateSlug(state);
  if (!stateName) return null;

  const cityPart = city.trim().toLowerCase().replace(/ /g, '-').replace(/'/g, '');
  return `${cityPart}-${stateName}`;
}

/**
 * Split a city slug into city and state text for geocoding
 *
 * "concord-new-hampshire" -> { city: "concord", state: "new hampshire" }.
 * State-name suffixes of up to four words are tried, longest first, so
 * "charleston-west-virginia" keeps West Virginia. Without a
 * known suffix the last word is taken as the state. Returns null when no city
 * part remains.
 */
export function parseCitySlug(slug: string): ParsedCitySlug | null {
  const words = slug.trim().toLowerCase().split('-').filter((w) => w.length > 0);
  if (words.length < 2) return null;

  for (let n = Math.min(4, words.length - 1); n >= 1; n--) {
    const suffix = words.slice(-n).join('-');
    if (STATE_SLUGS.has(suffix)) {
      return {
        city: words.slice(0, -n).join(' '),
        state: suffix.replace(/-/g, ' '),
        stateRecognized: true,
      };
    }
  }

  return {
    city: words.slice(0, -1).join(' '),
    state: words[words.length - 1] ?? '',
    stateRecognized: false,
  };
}
