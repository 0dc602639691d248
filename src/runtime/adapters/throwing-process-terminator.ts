import type { ProcessExit, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Test adapter: throws instead of exiting, so an accidental
 * termination fails the test that caused it.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  readonly calls: ProcessExit[] = [];

  terminate(exit: ProcessExit): never {
    this.calls.push(exit);
    throw new Error(`[ProcessTerminator] terminate(${exit.kind})`);
  }
}
