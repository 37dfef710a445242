/**
 * Upload Decoding Tests
 */

import { describe, it, expect } from 'vitest';
import { decodeText } from '../../../ingestion/encoding.js';

describe('decodeText', () => {
  it('should strip a UTF-8 byte-order mark', () => {
    const bytes = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('name,zip', 'utf-8')]);
    expect(decodeText(bytes)).toEqual({ text: 'name,zip', encoding: 'utf-8-sig' });
  });

  it('should decode plain UTF-8', () => {
    expect(decodeText(Buffer.from('Café', 'utf-8'))).toEqual({ text: 'Café', encoding: 'utf-8' });
  });

  it('should fall back to Windows-1252 for invalid UTF-8', () => {
    const bytes = Buffer.from([0x43, 0x61, 0x66, 0xe9, 0x20, 0x80]);
    expect(decodeText(bytes)).toEqual({ text: 'Café €', encoding: 'windows-1252' });
  });
});
