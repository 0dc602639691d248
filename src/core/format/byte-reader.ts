/**
 * Bounds-tolerant little-endian readers.
 * Bytes past the end of the buffer read as zero.
 */

export function readUint8(bytes: Uint8Array, offset: number): number {
  return bytes[offset] ?? 0;
}

export function readUint16LE(bytes: Uint8Array, offset: number): number {
  return readUint8(bytes, offset) | (readUint8(bytes, offset + 1) << 8);
}

export function toHexByte(value: number): string {
  return value.toString(16).padStart(2, '0');
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}
