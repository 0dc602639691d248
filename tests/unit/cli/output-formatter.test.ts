import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import chalk from 'chalk';
import { formatOutput, formatResult } from '../../../src/cli/output-formatter.js';
import { interpretCliResult } from '../../../src/cli/interpret-result.js';
import { failure, misuse, success } from '../../../src/cli/types/cli-result.js';
import { ThrowingProcessTerminator } from '../../../src/runtime/adapters/throwing-process-terminator.js';

describe('formatOutput', () => {
  let level: typeof chalk.level;

  beforeAll(() => {
    level = chalk.level;
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = level;
  });

  it('renders every part in order and drops empty sections', () => {
    const text = formatOutput({
      message: 'Done',
      details: ['Files written: 1'],
      sections: [
        { title: 'Unfinished files', lines: ['\\G.DAT (1 fragment(s), seq 1)'] },
        { title: 'Written', lines: [] },
      ],
      warnings: ['content changed on a.txt'],
      suggestions: ['Check the copies'],
    });

    expect(text.split('\n')).toEqual([
      '✅ Done',
      '',
      '  • Files written: 1',
      '',
      'Unfinished files:',
      '    \\G.DAT (1 fragment(s), seq 1)',
      '',
      '⚠️  Warnings:',
      '  • content changed on a.txt',
      '',
      '💡 Suggestions:',
      '  • Check the copies',
    ]);
  });

  it('marks errors', () => {
    expect(formatOutput({ message: 'Broken' }, true)).toBe('❌ Broken');
  });

  it('prints nothing for a silent success', () => {
    expect(formatResult(success())).toBe('');
    expect(formatResult(failure('Nope'))).toBe('❌ Nope');
  });
});

describe('interpretCliResult', () => {
  it('does not terminate on success', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const terminator = new ThrowingProcessTerminator();

    interpretCliResult(success({ message: 'ok' }), terminator);

    expect(terminator.calls).toEqual([]);
    expect(log).toHaveBeenCalledTimes(1);
    log.mockRestore();
  });

  it('terminates with the mapped exit on failure', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const terminator = new ThrowingProcessTerminator();

    expect(() => interpretCliResult(misuse('bad args'), terminator)).toThrow('[ProcessTerminator] terminate(misuse)');
    expect(() => interpretCliResult(failure('broken'), terminator)).toThrow('[ProcessTerminator] terminate(failure)');
    expect(terminator.calls).toEqual([{ kind: 'misuse' }, { kind: 'failure' }]);
    error.mockRestore();
  });
});
