/**
 * US State Reference Data
 *
 * Abbreviations (preserved uppercase by title-casing) and full names (used in
 * city URL slugs such as `belmont-massachusetts`). Loaded once from
 * `data/us-states.json`.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const StateEntrySchema = z.object({
  abbrev: z.string().length(2),
  name: z.string().min(1),
});

type StateEntry = z.infer<typeof StateEntrySchema>;

function loadStates(): readonly StateEntry[] {
  const path = fileURLToPath(new URL('../../data/us-states.json', import.meta.url));
  const parsed = z.array(StateEntrySchema).safeParse(JSON.parse(readFileSync(path, 'utf-8')));

  if (!parsed.success) {
    throw new Error(`Invalid state table in ${path}: ${parsed.error.message}`);
  }
  return parsed.data;
}

const STATES = loadStates();

/** Two-letter abbreviations of the 50 states and DC */
export const US_STATE_ABBREVS: ReadonlySet<string> = new Set(STATES.map((s) => s.abbrev));

const ABBREV_TO_SLUG: ReadonlyMap<string, string> = new Map(
  STATES.map((s) => [s.abbrev, s.name.toLowerCase().replace(/ /g, '-')])
);

/** Full state names in slug form (`new-hampshire`) */
export const STATE_SLUGS: ReadonlySet<string> = new Set(ABBREV_TO_SLUG.values());

/**
 * True when the value is exactly a known two-letter abbreviation (any case)
 */
export function isStateAbbrev(value: string): boolean {
  return value.length === 2 && US_STATE_ABBREVS.has(value.toUpperCase());
}

/**
 * Slug form of the state's full name, e.g. "MA" -> "massachusetts"
 */
export function stateSlug(abbrev: string): string | null {
  return ABBREV_TO_SLUG.get(abbrev.toUpperCase()) ?? null;
}
