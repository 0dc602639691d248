import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { DI } from './tokens.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { ConfigInvalidError } from '../errors/app-error.js';
import type { FileSystemPort } from '../ports/fs.port.js';
import { NodeFileSystem } from '../infra/local/fs/index.js';
import type { ILoggerFactory } from '../core/logging/types.js';
import { PinoLoggerFactory } from '../core/logging/create-logger.js';
import { createBootstrapLogger } from '../core/logging/bootstrap.js';

let initialized = false;

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  readonly env?: Record<string, string | undefined>;
}

function detectRuntimeMode(): RuntimeMode {
  if (process.env['VITEST'] || process.env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'cli' };
}

// Tests may register any of these before initialization; existing registrations win.

function registerConfig(env: Record<string, string | undefined>): Result<void, ConfigInvalidError> {
  if (container.isRegistered(DI.Config.App)) return ok(undefined);

  const configResult = loadConfig({ env });
  if (configResult.isErr()) return err(configResult.error);

  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
  return ok(undefined);
}

function registerRuntime(mode: RuntimeMode): void {
  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });

  if (!container.isRegistered(DI.Runtime.ProcessTerminator)) {
    const terminator: ProcessTerminator =
      mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
    container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
  }
}

function registerInfra(): void {
  if (!container.isRegistered(DI.Logging.Factory)) {
    container.register<ILoggerFactory>(DI.Logging.Factory, {
      useFactory: instanceCachingFactory<ILoggerFactory>((c) => c.resolve(PinoLoggerFactory)),
    });
  }

  if (!container.isRegistered(DI.Infra.FileSystem)) {
    container.register<FileSystemPort>(DI.Infra.FileSystem, { useValue: new NodeFileSystem() });
  }
}

/**
 * Wire the container. Idempotent; config problems come back as data.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Result<void, ConfigInvalidError> {
  if (initialized) return ok(undefined);

  const logger = createBootstrapLogger('container');
  const configured = registerConfig(options.env ?? process.env);
  if (configured.isErr()) {
    logger.error({ issues: configured.error.issues }, 'configuration rejected');
    return configured;
  }

  const mode = options.runtimeMode ?? detectRuntimeMode();
  registerRuntime(mode);
  registerInfra();

  initialized = true;
  logger.debug({ mode: mode.kind }, 'container initialized');
  return ok(undefined);
}

export function isInitialized(): boolean {
  return initialized;
}

/**
 * Tests only: drop every registration so the next test starts clean.
 */
export function resetContainer(): void {
  container.clearInstances();
  container.reset();
  initialized = false;
}

export { container };
