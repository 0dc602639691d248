import { describe, it, expect } from 'vitest';
import { loadConfig, withOverrides } from '../../src/config/app-config.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = expectOk(loadConfig({ env: {} }), 'defaults');

    expect(config).toEqual({
      paths: { outputDir: '.' },
      discovery: { headerFileName: 'BACKUPID.@@@', ignoredFileNames: ['cmd.sh'], ignoredSuffixes: ['.img'] },
      policy: { badHeader: { kind: 'skip_volume' } },
    });
  });

  it('reads every variable', () => {
    const config = expectOk(
      loadConfig({
        env: {
          BACKUP_RESTORE_OUTPUT_DIR: '/restore',
          BACKUP_RESTORE_HEADER_FILE: 'VOLUME.ID',
          BACKUP_RESTORE_IGNORE_FILES: ' run.sh, notes.txt ,',
          BACKUP_RESTORE_IGNORE_SUFFIXES: '.iso',
          BACKUP_RESTORE_ON_BAD_HEADER: 'abort_run',
        },
      }),
      'full env'
    );

    expect(config.paths.outputDir).toBe('/restore');
    expect(config.discovery).toEqual({
      headerFileName: 'VOLUME.ID',
      ignoredFileNames: ['run.sh', 'notes.txt'],
      ignoredSuffixes: ['.iso'],
    });
    expect(config.policy.badHeader).toEqual({ kind: 'abort_run' });
  });

  it('allows an empty ignore list', () => {
    const config = expectOk(loadConfig({ env: { BACKUP_RESTORE_IGNORE_FILES: '' } }), 'empty list');

    expect(config.discovery.ignoredFileNames).toEqual([]);
  });

  it('rejects a header file name containing a separator', () => {
    const error = expectErr(loadConfig({ env: { BACKUP_RESTORE_HEADER_FILE: 'disk1/BACKUPID.@@@' } }), 'separator');

    expect(error._tag).toBe('ConfigInvalid');
    expect(error.issues).toEqual([
      { path: 'BACKUP_RESTORE_HEADER_FILE', message: 'Header file name must not contain path separators' },
    ]);
  });

  it('rejects an empty output directory', () => {
    const error = expectErr(loadConfig({ env: { BACKUP_RESTORE_OUTPUT_DIR: '' } }), 'empty output');

    expect(error.issues).toEqual([{ path: 'BACKUP_RESTORE_OUTPUT_DIR', message: 'Output directory cannot be empty' }]);
  });

  it('rejects an unknown bad-header policy', () => {
    const error = expectErr(loadConfig({ env: { BACKUP_RESTORE_ON_BAD_HEADER: 'ignore' } }), 'policy');

    expect(error.issues.map((i) => i.path)).toEqual(['BACKUP_RESTORE_ON_BAD_HEADER']);
  });
});

describe('withOverrides', () => {
  const base = expectOk(loadConfig({ env: {} }), 'base');

  it('replaces output dir and policy', () => {
    const config = withOverrides(base, { outputDir: '/elsewhere', badHeader: { kind: 'abort_run' } });

    expect(config.paths.outputDir).toBe('/elsewhere');
    expect(config.policy.badHeader).toEqual({ kind: 'abort_run' });
    expect(config.discovery).toEqual(base.discovery);
  });

  it('keeps configured values when no override is given', () => {
    expect(withOverrides(base, { outputDir: '' })).toEqual(base);
  });
});
