/**
 * Display Text Normalization Tests
 */

import { describe, it, expect } from 'vitest';
import { ensureSuffix, titleCase } from '../../../text/normalize.js';

describe('titleCase', () => {
  it('should title-case all-caps names', () => {
    expect(titleCase('CITYNAME TOWN HALL')).toBe('Cityname Town Hall');
  });

  it('should keep state abbreviations uppercase', () => {
    expect(titleCase('boston ma')).toBe('Boston MA');
    expect(titleCase('12 ELM ST, SALEM, NH')).toBe('12 Elm St, Salem, NH');
  });

  it('should capitalize each letter run inside a token', () => {
    expect(titleCase("o'neil branch")).toBe("O'Neil Branch");
  });

  it('should collapse whitespace runs', () => {
    expect(titleCase('  MAIN   STREET  ')).toBe('Main Street');
  });

  it('should return blank input unchanged', () => {
    expect(titleCase('')).toBe('');
    expect(titleCase('   ')).toBe('   ');
  });

  it('should not expand a leading letter whose uppercase form is longer', () => {
    expect(titleCase('ﬁsh market')).toBe('ﬁsh Market');
    expect(titleCase('HAUPTSTRAßE')).toBe('Hauptstraße');
  });

  it('should be idempotent', () => {
    for (const value of ['CITYNAME TOWN HALL', "o'NEIL ma", '3RD FLOOR, 1 MAIN ST', 'ﬁsh market', 'ßtraße PARK']) {
      const once = titleCase(value);
      expect(titleCase(once)).toBe(once);
    }
  });
});

describe('ensureSuffix', () => {
  it('should leave names that already end with a suffix alone', () => {
    expect(ensureSuffix('Belmont Library')).toBe('Belmont Library');
    expect(ensureSuffix('Arlington Town Hall')).toBe('Arlington Town Hall');
    expect(ensureSuffix('Quincy City Hall')).toBe('Quincy City Hall');
  });

  it('should append Library when a library is mentioned but not last', () => {
    expect(ensureSuffix('Library Of Watertown')).toBe('Library Of Watertown Library');
  });

  it('should append City Hall to municipal buildings', () => {
    expect(ensureSuffix('Lowell Municipal Building')).toBe('Lowell Municipal Building City Hall');
  });

  it('should move a mid-name hall mention to the end', () => {
    expect(ensureSuffix('Town Hall Annex')).toBe('Town Hall Annex Town Hall');
    expect(ensureSuffix('City Hall Plaza')).toBe('City Hall Plaza City Hall');
  });

  it('should not touch unrelated names', () => {
    expect(ensureSuffix('Central Park Comfort Station')).toBe('Central Park Comfort Station');
    expect(ensureSuffix('')).toBe('');
  });
});
