import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { FLAG_LAST, VOLUME_HEADER_LAYOUT, isKnownFlag } from './layout.js';
import { readUint8, readUint16LE, toHexByte } from './byte-reader.js';

export interface VolumeHeader {
  /** True on the final volume of the backup set */
  readonly last: boolean;
  readonly sequence: number;
  readonly year: number;
  readonly day: number;
  readonly month: number;
  readonly warnings: readonly string[];
}

export type HeaderDecodeError =
  | {
      readonly code: 'HEADER_INVALID_SIZE';
      readonly expected: number;
      readonly actual: number;
      readonly message: string;
    }
  | { readonly code: 'HEADER_INVALID_FLAG'; readonly flag: number; readonly message: string };

/**
 * Decode a volume identification record.
 *
 * Size and flag are structural: a mismatch means the file is not a header
 * this tool understands, so decoding stops. Non-zero reserved bytes are
 * only suspicious and are collected as warnings.
 */
export function decodeVolumeHeader(bytes: Uint8Array): Result<VolumeHeader, HeaderDecodeError> {
  if (bytes.length !== VOLUME_HEADER_LAYOUT.TOTAL_SIZE) {
    return err({
      code: 'HEADER_INVALID_SIZE',
      expected: VOLUME_HEADER_LAYOUT.TOTAL_SIZE,
      actual: bytes.length,
      message: `expected ${VOLUME_HEADER_LAYOUT.TOTAL_SIZE} bytes, got ${bytes.length}`,
    });
  }

  const flag = readUint8(bytes, VOLUME_HEADER_LAYOUT.FLAG);
  if (!isKnownFlag(flag)) {
    return err({
      code: 'HEADER_INVALID_FLAG',
      flag,
      message: `unexpected flag value 0x${toHexByte(flag)}`,
    });
  }

  const warnings: string[] = [];
  for (let offset = VOLUME_HEADER_LAYOUT.RESERVED_START; offset < bytes.length; offset++) {
    const value = readUint8(bytes, offset);
    if (value !== 0) {
      warnings.push(`unexpected non-zero at ${offset}: ${value}`);
    }
  }

  return ok({
    last: flag === FLAG_LAST,
    sequence: readUint16LE(bytes, VOLUME_HEADER_LAYOUT.SEQUENCE),
    year: readUint16LE(bytes, VOLUME_HEADER_LAYOUT.YEAR),
    day: readUint8(bytes, VOLUME_HEADER_LAYOUT.DAY),
    month: readUint8(bytes, VOLUME_HEADER_LAYOUT.MONTH),
    warnings,
  });
}
