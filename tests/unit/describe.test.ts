import { describe, it, expect } from 'vitest';
import { describeFragment, describeVolumeHeader } from '../../src/core/format/describe.js';
import { fragment } from '../helpers/records.js';

describe('describeVolumeHeader', () => {
  const base = { last: false, sequence: 2, year: 1991, day: 7, month: 3, warnings: [] };

  it('shows sequence and zero-padded date', () => {
    expect(describeVolumeHeader(base)).toBe('Disk 2, 1991-03-07');
  });

  it('marks the last volume and appends warnings', () => {
    expect(
      describeVolumeHeader({ ...base, last: true, sequence: 3, warnings: ['unexpected non-zero at 10: 5'] })
    ).toBe('Disk 3 last, 1991-03-07## (unexpected non-zero at 10: 5)');
  });

  it('pads a short year with spaces', () => {
    expect(describeVolumeHeader({ ...base, year: 85 })).toBe('Disk 2,   85-03-07');
  });
});

describe('describeFragment', () => {
  it('calls a single-fragment file complete', () => {
    expect(describeFragment(fragment('X.TXT', 1, true))).toBe('X.TXT (complete)');
  });

  it('shows the sequence of a piece', () => {
    expect(describeFragment(fragment('X.TXT', 1, false))).toBe('X.TXT (seq 1)');
    expect(describeFragment(fragment('X.TXT', 2, true))).toBe('X.TXT (seq 2 last)');
  });

  it('appends warnings', () => {
    const bad = { ...fragment('bad_file', 1, false), warnings: ['unexpected file path len: 0'] };
    expect(describeFragment(bad)).toBe('bad_file (seq 1)## (unexpected file path len: 0)');
  });
});
