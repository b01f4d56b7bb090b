/** Legacy text codecs for UST, OTO and voicebank metadata files. */

import iconv from 'iconv-lite';

export const DEFAULT_TEXT_ENCODING = 'shift_jis';

export function isKnownEncoding(encoding: string): boolean {
  return iconv.encodingExists(encoding);
}

export function decodeText(bytes: Buffer, encoding: string): string {
  return iconv.decode(bytes, encoding);
}

export function encodeText(text: string, encoding: string): Buffer {
  return iconv.encode(text, encoding);
}

/** Split on LF or CRLF, keeping empty lines. */
export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}
