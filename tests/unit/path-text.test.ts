import { describe, it, expect } from 'vitest';
import { decodePathBytes } from '../../src/core/format/path-text.js';

describe('decodePathBytes', () => {
  it('passes printable ASCII through', () => {
    expect(decodePathBytes(Uint8Array.from([0x5c, 0x41, 0x2e, 0x54]))).toEqual({ kind: 'ascii', text: '\\A.T' });
  });

  it('escapes a control byte as %hh at its position', () => {
    expect(decodePathBytes(Uint8Array.from([0x41, 0x01, 0x42]))).toEqual({ kind: 'escaped', text: 'A%01B' });
  });

  it('escapes high-bit bytes with lowercase hex', () => {
    expect(decodePathBytes(Uint8Array.from([0x43, 0x41, 0x46, 0xc9]))).toEqual({ kind: 'escaped', text: 'CAF%c9' });
  });

  it('keeps 0x7f verbatim', () => {
    expect(decodePathBytes(Uint8Array.from([0x41, 0x7f]))).toEqual({ kind: 'ascii', text: 'A\x7f' });
  });

  it('treats an empty slice as plain ASCII', () => {
    expect(decodePathBytes(new Uint8Array(0))).toEqual({ kind: 'ascii', text: '' });
  });

  it('leaves a literal percent sign alone', () => {
    expect(decodePathBytes(Uint8Array.from([0x25, 0x80]))).toEqual({ kind: 'escaped', text: '%%80' });
  });
});
