import {
  BAD_PATH_SENTINEL,
  FLAG_LAST,
  FRAGMENT_LAYOUT,
  MAX_PATH_LEN,
  MIN_PATH_LEN,
  isKnownFlag,
} from './layout.js';
import { readUint8, readUint16LE, toHexByte } from './byte-reader.js';
import { decodePathBytes } from './path-text.js';

export type PathEncoding = 'ascii' | 'escaped' | 'invalid';

/**
 * One file piece as stored on a volume.
 *
 * `warnings` is empty for a structurally clean record. A fragment with any
 * warning must not take part in reassembly.
 */
export interface Fragment {
  readonly last: boolean;
  readonly sequence: number;
  /** Reserved field, carried through unused */
  readonly unknown: number;
  readonly logicalPath: string;
  readonly pathEncoding: PathEncoding;
  readonly content: Uint8Array;
  readonly warnings: readonly string[];
}

/**
 * A fragment that is a whole file by itself: first piece and also the last.
 */
export function isCompleteFragment(fragment: Pick<Fragment, 'last' | 'sequence'>): boolean {
  return fragment.last && fragment.sequence === 1;
}

/**
 * Decode a fragment record. Never fails: problems are recorded as warnings
 * so the caller can report the fragment and move on.
 */
export function decodeFragment(bytes: Uint8Array): Fragment {
  const warnings: string[] = [];

  if (bytes.length < FRAGMENT_LAYOUT.CONTENT) {
    warnings.push(`record too short: ${bytes.length} bytes`);
  }

  const flag = readUint8(bytes, FRAGMENT_LAYOUT.FLAG);
  const pathLen = readUint8(bytes, FRAGMENT_LAYOUT.PATH_LEN);

  let logicalPath: string;
  let pathEncoding: PathEncoding;
  if (pathLen < MIN_PATH_LEN || pathLen > MAX_PATH_LEN) {
    warnings.push(`unexpected file path len: ${pathLen}`);
    logicalPath = BAD_PATH_SENTINEL;
    pathEncoding = 'invalid';
  } else {
    const decoded = decodePathBytes(
      trimTrailingNul(bytes.subarray(FRAGMENT_LAYOUT.PATH, FRAGMENT_LAYOUT.PATH + pathLen))
    );
    if (decoded.text.length === 0) {
      warnings.push('empty file path');
      logicalPath = BAD_PATH_SENTINEL;
      pathEncoding = 'invalid';
    } else {
      logicalPath = decoded.text;
      pathEncoding = decoded.kind;
    }
  }

  if (!isKnownFlag(flag)) {
    warnings.push(`unexpected flag value 0x${toHexByte(flag)}`);
  }

  return {
    last: flag === FLAG_LAST,
    sequence: readUint16LE(bytes, FRAGMENT_LAYOUT.SEQUENCE),
    unknown: readUint16LE(bytes, FRAGMENT_LAYOUT.UNKNOWN),
    logicalPath,
    pathEncoding,
    content: bytes.slice(FRAGMENT_LAYOUT.CONTENT),
    warnings,
  };
}

function trimTrailingNul(raw: Uint8Array): Uint8Array {
  return raw.length > 0 && raw[raw.length - 1] === 0 ? raw.subarray(0, raw.length - 1) : raw;
}
