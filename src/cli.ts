#!/usr/bin/env node
/**
 * backup-restore CLI - Composition Root
 *
 * Wires dependencies for each command and turns CliResult into output and
 * an exit code. No restore logic lives here.
 */

import 'reflect-metadata';
import { config as loadDotenv } from 'dotenv';
import { Command } from 'commander';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import type { ValidatedConfig, BadHeaderPolicy } from './config/app-config.js';
import { withOverrides } from './config/app-config.js';
import type { FileSystemPort } from './ports/fs.port.js';
import type { ILoggerFactory } from './core/logging/types.js';
import { FragmentAssembler } from './core/assembly/fragment-assembler.js';
import { RestoreWriter } from './core/output/restore-writer.js';
import { restoreVolumes } from './application/use-cases/restore-volumes.js';
import { inspectRecords } from './application/use-cases/inspect-records.js';
import { interpretCliResult, interpretCliResultWithoutDI } from './cli/interpret-result.js';
import { misuse } from './cli/types/index.js';
import { executeRestoreCommand, executeInspectCommand } from './cli/commands/index.js';

loadDotenv();

interface Services {
  readonly config: ValidatedConfig;
  readonly fs: FileSystemPort;
  readonly loggers: ILoggerFactory;
  readonly terminator: ProcessTerminator;
}

/**
 * Initialize DI, or report bad configuration and exit with a misuse code.
 */
function bootstrap(): Services {
  const initialized = initializeContainer({ runtimeMode: { kind: 'cli' } });
  if (initialized.isErr()) {
    const error = initialized.error;
    interpretCliResultWithoutDI(
      misuse(error.message, error.issues.map((i) => `${i.path}: ${i.message}`), [
        'Check the BACKUP_RESTORE_* environment variables',
      ])
    );
    process.exit(2);
  }

  return {
    config: container.resolve<ValidatedConfig>(DI.Config.App),
    fs: container.resolve<FileSystemPort>(DI.Infra.FileSystem),
    loggers: container.resolve<ILoggerFactory>(DI.Logging.Factory),
    terminator: container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('backup-restore')
  .description('Restore files split across the volumes of a legacy removable-media backup')
  .version('0.1.0');

program
  .command('restore <input>')
  .description('Reassemble and write every file found in the volume copies under <input>')
  .option('-o, --output <dir>', 'Directory to restore into (default: BACKUP_RESTORE_OUTPUT_DIR or ".")')
  .option('--abort-on-bad-header', 'Stop the run at the first unrecognized volume header')
  .option('-v, --verbose', 'List volumes and every written file')
  .action(async (input: string, options: { output?: string; abortOnBadHeader?: boolean; verbose?: boolean }) => {
    const services = bootstrap();
    const badHeader: BadHeaderPolicy | undefined = options.abortOnBadHeader ? { kind: 'abort_run' } : undefined;
    const config = withOverrides(services.config, { outputDir: options.output, badHeader });

    const result = await executeRestoreCommand(
      input,
      {
        restore: (inputRoot) =>
          restoreVolumes(
            inputRoot,
            {
              fs: services.fs,
              assembler: new FragmentAssembler(),
              writer: new RestoreWriter(
                services.fs,
                { outputRoot: config.paths.outputDir },
                services.loggers.create('RestoreWriter')
              ),
              logger: services.loggers.create('RestoreVolumes'),
            },
            { discovery: config.discovery, badHeader: config.policy.badHeader }
          ),
      },
      { outputDir: config.paths.outputDir, verbose: options.verbose }
    );

    interpretCliResult(result, services.terminator);
  });

program
  .command('inspect <input>')
  .description('Describe every volume header and fragment record under <input>')
  .action(async (input: string) => {
    const services = bootstrap();

    const result = await executeInspectCommand(input, {
      inspect: (root) => inspectRecords(services.fs, root, services.config.discovery),
    });

    interpretCliResult(result, services.terminator);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
