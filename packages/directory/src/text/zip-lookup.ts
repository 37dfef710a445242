/**
 * Zip Code to State Lookup
 *
 * The default lookup maps the 3-digit sectional center prefix of a US zip code
 * to its state using the range table in `data/zip-prefix-states.json`. Callers
 * depend on the `ZipStateLookup` interface so a finer-grained source can be
 * swapped in.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

export interface ZipStateLookup {
  /** State abbreviation for a zip (5 digits or Zip+4), or null */
  stateForZip(zip: string | null | undefined): string | null;
}

const PrefixRangeSchema = z.object({
  from: z.string().regex(/^\d{3}$/),
  to: z.string().regex(/^\d{3}$/),
  state: z.string().length(2),
});

export type PrefixRange = z.infer<typeof PrefixRangeSchema>;

/**
 * Extract the leading 5 digits of a zip, accepting "12345-6789"
 */
export function normalizeZip(zip: string | null | undefined): string | null {
  if (!zip) return null;
  let value = zip.trim();
  if (value.includes('-')) {
    value = value.split('-')[0] ?? '';
  }
  const head = value.slice(0, 5);
  return /^\d{5}$/.test(head) ? head : null;
}

/**
 * Prefix-range lookup backed by the bundled table
 */
export class PrefixZipStateLookup implements ZipStateLookup {
  private readonly byPrefix: ReadonlyMap<number, string>;

  constructor(ranges: readonly PrefixRange[]) {
    const byPrefix = new Map<number, string>();
    for (const range of ranges) {
      for (let prefix = Number(range.from); prefix <= Number(range.to); prefix++) {
        byPrefix.set(prefix, range.state);
      }
    }
    this.byPrefix = byPrefix;
  }

  static fromBundledTable(): PrefixZipStateLookup {
    const path = fileURLToPath(new URL('../../data/zip-prefix-states.json', import.meta.url));
    const parsed = z.array(PrefixRangeSchema).safeParse(JSON.parse(readFileSync(path, 'utf-8')));

    if (!parsed.success) {
      throw new Error(`Invalid zip prefix table in ${path}: ${parsed.error.message}`);
    }
    return new PrefixZipStateLookup(parsed.data);
  }

  stateForZip(zip: string | null | undefined): string | null {
    const normalized = normalizeZip(zip);
    if (!normalized) return null;
    return this.byPrefix.get(Number(normalized.slice(0, 3))) ?? null;
  }
}

let defaultLookup: ZipStateLookup | null = null;

/**
 * Process-wide lookup over the bundled table
 */
export function getDefaultZipLookup(): ZipStateLookup {
  if (!defaultLookup) {
    defaultLookup = PrefixZipStateLookup.fromBundledTable();
  }
  return defaultLookup;
}
