import { describe, it, expect } from 'vitest';
import * as api from '../../src/index.js';

describe('library entrypoint', () => {
  it('exposes the decoders, assembler and use cases', () => {
    expect(typeof api.decodeVolumeHeader).toBe('function');
    expect(typeof api.decodeFragment).toBe('function');
    expect(typeof api.FragmentAssembler).toBe('function');
    expect(typeof api.RestoreWriter).toBe('function');
    expect(typeof api.restoreVolumes).toBe('function');
    expect(typeof api.inspectRecords).toBe('function');
    expect(typeof api.loadConfig).toBe('function');
    expect(api.BAD_PATH_SENTINEL).toBe('bad_file');
  });
});
