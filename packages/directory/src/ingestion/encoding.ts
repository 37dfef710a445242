/**
 * Text decoding for uploaded CSV files
 *
 * Spreadsheet exports arrive as UTF-8 (with or without a byte-order mark) or
 * in a Windows code page. Decoders are tried in order and the first one that
 * accepts the bytes wins.
 */

import { ImportError, errorMessage } from '../core/errors.js';

export type SourceEncoding = 'utf-8-sig' | 'utf-8' | 'windows-1252' | 'latin1';

export interface DecodedText {
  readonly text: string;
  readonly encoding: SourceEncoding;
}

const UTF8_BOM = [0xef, 0xbb, 0xbf] as const;

function hasUtf8Bom(bytes: Uint8Array): boolean {
  return UTF8_BOM.every((byte, i) => bytes[i] === byte);
}

type Decoder = (bytes: Uint8Array) => string | null;

const DECODERS: ReadonlyArray<readonly [SourceEncoding, Decoder]> = [
  [
    'utf-8-sig',
    (bytes) =>
      hasUtf8Bom(bytes) ? new TextDecoder('utf-8', { fatal: true }).decode(bytes.subarray(3)) : null,
  ],
  ['utf-8', (bytes) => new TextDecoder('utf-8', { fatal: true }).decode(bytes)],
  ['windows-1252', (bytes) => new TextDecoder('windows-1252', { fatal: true }).decode(bytes)],
  ['latin1', (bytes) => Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1')],
];

/**
 * Decode raw upload bytes, trying each supported encoding in turn
 *
 * @throws ImportError('DECODE_FAILED') when no decoder accepts the bytes
 */
export function decodeText(bytes: Uint8Array): DecodedText {
  const failures: string[] = [];

  for (const [encoding, decode] of DECODERS) {
    try {
      const text = decode(bytes);
      if (text !== null) {
        return { text, encoding };
      }
    } catch (error) {
      failures.push(`${encoding}: ${errorMessage(error)}`);
    }
  }

  throw new ImportError(
    'DECODE_FAILED',
    `Could not decode file as UTF-8, Windows-1252 or Latin-1 (${failures.join('; ')})`
  );
}
