/**
 * On-disk layout of the legacy backup records.
 *
 * Volume identification record (exactly 128 bytes):
 *   [0]      flag (0x00 = more volumes follow, 0xFF = last volume)
 *   [1-2]    volume sequence (uint16 LE)
 *   [3-4]    year (uint16 LE)
 *   [5]      day
 *   [6]      month
 *   [7-127]  reserved, expected zero
 *
 * Fragment record (at least 128 bytes):
 *   [0]      flag (0x00 = more fragments follow, 0xFF = last fragment)
 *   [1-2]    fragment sequence, 1-based (uint16 LE)
 *   [3-4]    unknown (uint16 LE)
 *   [5..]    path bytes, path_len long
 *   [0x53]   path_len
 *   [0x80..] file content
 */
export const VOLUME_HEADER_LAYOUT = {
  FLAG: 0,
  SEQUENCE: 1,
  YEAR: 3,
  DAY: 5,
  MONTH: 6,
  RESERVED_START: 7,
  TOTAL_SIZE: 128,
} as const;

export const FRAGMENT_LAYOUT = {
  FLAG: 0,
  SEQUENCE: 1,
  UNKNOWN: 3,
  PATH: 5,
  PATH_LEN: 0x53,
  CONTENT: 0x80,
} as const;

export const FLAG_NOT_LAST = 0x00;
export const FLAG_LAST = 0xff;

export const MIN_PATH_LEN = 1;
export const MAX_PATH_LEN = 78;

/** Stands in for the path of a fragment whose path length is unusable. */
export const BAD_PATH_SENTINEL = 'bad_file';

export function isKnownFlag(flag: number): boolean {
  return flag === FLAG_NOT_LAST || flag === FLAG_LAST;
}
