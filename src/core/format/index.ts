export {
  VOLUME_HEADER_LAYOUT,
  FRAGMENT_LAYOUT,
  FLAG_LAST,
  FLAG_NOT_LAST,
  MIN_PATH_LEN,
  MAX_PATH_LEN,
  BAD_PATH_SENTINEL,
} from './layout.js';
export { readUint8, readUint16LE, bytesEqual, concatBytes } from './byte-reader.js';
export { decodeVolumeHeader, type VolumeHeader, type HeaderDecodeError } from './volume-header.js';
export { decodePathBytes, type DecodedPath } from './path-text.js';
export { decodeFragment, isCompleteFragment, type Fragment, type PathEncoding } from './fragment-record.js';
export { describeVolumeHeader, describeFragment } from './describe.js';
