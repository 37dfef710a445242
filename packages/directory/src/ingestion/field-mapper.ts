/**
 * Field Mapper
 *
 * Maps loosely named source columns (CSV headers, DBF attribute names) onto
 * the canonical record fields. Each canonical field has an ordered list of
 * synonyms; the list is resolved once per import against the fields actually
 * present, then read per row without re-probing.
 */

export type SourceRow = Readonly<Record<string, unknown>>;

export type FieldSynonyms<F extends string> = Readonly<Record<F, readonly string[]>>;

/** CSV columns recognized by the tabular importer */
export const TABULAR_SYNONYMS = {
  name: ['name', 'libname'],
  address: ['address'],
  city: ['city'],
  zip: ['zip'],
  hours: ['hours'],
  remarks: ['remarks'],
  latitude: ['latitude'],
  longitude: ['longitude', 'longitud'],
} as const satisfies FieldSynonyms<string>;

/** DBF attributes the shapefile importer looks for */
export const SHAPEFILE_SYNONYMS = {
  name: ['name', 'town', 'facility', 'site_name', 'label', 'title'],
  address: ['address', 'addr', 'street', 'location', 'site_addr'],
  zip: ['zip', 'zipcode', 'zip_code', 'postal', 'postcode'],
  city: ['city', 'town', 'municipality'],
} as const satisfies FieldSynonyms<string>;

function stringify(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

/**
 * Field lookup resolved against one source's field names
 */
export class FieldMapper<F extends string> {
  private constructor(private readonly sourceKeys: ReadonlyMap<string, readonly string[]>) {}

  /**
   * Resolve synonyms against the available field names (case-insensitive,
   * whitespace-trimmed). Source keys are kept in synonym order.
   */
  static resolve<F extends string>(
    synonyms: FieldSynonyms<F>,
    availableFields: readonly string[]
  ): FieldMapper<F> {
    const byNormalized = new Map<string, string>();
    for (const field of availableFields) {
      const normalized = field.trim().toLowerCase();
      if (!byNormalized.has(normalized)) {
        byNormalized.set(normalized, field);
      }
    }

    const sourceKeys = new Map<string, readonly string[]>();
    for (const [canonical, candidates] of Object.entries<readonly string[]>(synonyms)) {
      const keys: string[] = [];
      for (const synonym of candidates) {
        const actual = byNormalized.get(synonym);
        if (actual !== undefined) keys.push(actual);
      }
      sourceKeys.set(canonical, keys);
    }

    return new FieldMapper<F>(sourceKeys);
  }

  /**
   * True when at least one synonym of the field exists in the source
   */
  has(field: F): boolean {
    return (this.sourceKeys.get(field)?.length ?? 0) > 0;
  }

  /**
   * First non-empty value among the field's synonyms, trimmed ('' if none)
   */
  get(row: SourceRow, field: F): string {
    for (const key of this.sourceKeys.get(field) ?? []) {
      const value = stringify(row[key]);
      if (value) return value;
    }
    return '';
  }
}
