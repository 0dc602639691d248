import { describe, it, expect } from 'vitest';
import { decodeFragment, isCompleteFragment } from '../../src/core/format/fragment-record.js';
import { buildFragment, bytes, text } from '../helpers/records.js';

describe('decodeFragment', () => {
  it('decodes flag, sequence, unknown, path and content', () => {
    const fragment = decodeFragment(
      buildFragment({ path: '\\DOCS\\A.TXT', sequence: 2, last: true, unknown: 0x1234, content: 'hello' })
    );

    expect(fragment.last).toBe(true);
    expect(fragment.sequence).toBe(2);
    expect(fragment.unknown).toBe(0x1234);
    expect(fragment.logicalPath).toBe('\\DOCS\\A.TXT');
    expect(fragment.pathEncoding).toBe('ascii');
    expect(text(fragment.content)).toBe('hello');
    expect(fragment.warnings).toEqual([]);
  });

  it('drops one trailing NUL from the path', () => {
    const fragment = decodeFragment(buildFragment({ path: 'X.TXT', nulTerminated: true }));
    expect(fragment.logicalPath).toBe('X.TXT');
  });

  it('accepts the longest allowed path', () => {
    const fragment = decodeFragment(buildFragment({ path: 'A'.repeat(78) }));
    expect(fragment.logicalPath).toBe('A'.repeat(78));
    expect(fragment.warnings).toEqual([]);
  });

  it.each([0, 79, 255])('substitutes the sentinel path for path length %i', (pathLen) => {
    const fragment = decodeFragment(buildFragment({ path: 'X.TXT', pathLen }));

    expect(fragment.logicalPath).toBe('bad_file');
    expect(fragment.pathEncoding).toBe('invalid');
    expect(fragment.warnings).toEqual([`unexpected file path len: ${pathLen}`]);
  });

  it('treats a path that is only a NUL as invalid', () => {
    const fragment = decodeFragment(buildFragment({ path: '', nulTerminated: true }));
    expect(fragment.logicalPath).toBe('bad_file');
    expect(fragment.warnings).toEqual(['empty file path']);
  });

  it('records an unknown flag as a warning instead of failing', () => {
    const fragment = decodeFragment(buildFragment({ path: 'X.TXT', flag: 0x01 }));

    expect(fragment.last).toBe(false);
    expect(fragment.logicalPath).toBe('X.TXT');
    expect(fragment.warnings).toEqual(['unexpected flag value 0x01']);
  });

  it('lists the path warning before the flag warning', () => {
    const fragment = decodeFragment(buildFragment({ path: 'X.TXT', flag: 0xab, pathLen: 0 }));
    expect(fragment.warnings).toEqual(['unexpected file path len: 0', 'unexpected flag value 0xab']);
  });

  it('escapes a 0x01 byte inside the path', () => {
    const fragment = decodeFragment(buildFragment({ path: Uint8Array.from([0x41, 0x01, 0x42]) }));

    expect(fragment.logicalPath).toBe('A%01B');
    expect(fragment.pathEncoding).toBe('escaped');
    expect(fragment.warnings).toEqual([]);
  });

  it('warns about a record shorter than the content offset', () => {
    const raw = new Uint8Array(0x54);
    raw[0] = 0xff;
    raw[1] = 1;
    raw.set(bytes('ABC'), 5);
    raw[0x53] = 3;

    const fragment = decodeFragment(raw);

    expect(fragment.warnings).toEqual(['record too short: 84 bytes']);
    expect(fragment.logicalPath).toBe('ABC');
    expect(fragment.content.length).toBe(0);
  });

  it('survives an empty record', () => {
    expect(decodeFragment(new Uint8Array(0)).warnings).toEqual([
      'record too short: 0 bytes',
      'unexpected file path len: 0',
    ]);
  });

  it('copies the content out of the record buffer', () => {
    const raw = buildFragment({ path: 'X.TXT', content: 'abc' });
    const fragment = decodeFragment(raw);
    raw[0x80] = 0x7a;

    expect(text(fragment.content)).toBe('abc');
  });
});

describe('isCompleteFragment', () => {
  it('is true only for the last fragment with sequence 1', () => {
    expect(isCompleteFragment({ last: true, sequence: 1 })).toBe(true);
    expect(isCompleteFragment({ last: true, sequence: 2 })).toBe(false);
    expect(isCompleteFragment({ last: false, sequence: 1 })).toBe(false);
  });
});
