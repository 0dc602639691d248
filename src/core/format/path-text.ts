import { toHexByte } from './byte-reader.js';

export type DecodedPath =
  | { readonly kind: 'ascii'; readonly text: string }
  | { readonly kind: 'escaped'; readonly text: string };

const FIRST_PRINTABLE = 0x20;
const LAST_ASCII = 0x7f;

function isPrintableAscii(byte: number): boolean {
  return byte >= FIRST_PRINTABLE && byte <= LAST_ASCII;
}

/**
 * Turn raw path bytes into text that is always safe to show and to use as a key.
 *
 * Plain printable ASCII passes through untouched (`ascii`). Anything else
 * (control bytes, high-bit bytes from a foreign code page) switches the
 * whole path to `escaped`: printable bytes stay as they are, the rest
 * become `%hh`.
 */
export function decodePathBytes(raw: Uint8Array): DecodedPath {
  if (raw.every(isPrintableAscii)) {
    return { kind: 'ascii', text: String.fromCharCode(...raw) };
  }

  let text = '';
  for (const byte of raw) {
    text += isPrintableAscii(byte) ? String.fromCharCode(byte) : `%${toHexByte(byte)}`;
  }
  return { kind: 'escaped', text };
}
