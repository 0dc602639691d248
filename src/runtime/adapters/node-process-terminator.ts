import type { ProcessExit, ProcessTerminator } from '../ports/process-terminator.js';
import { assertNever } from '../assert-never.js';

export class NodeProcessTerminator implements ProcessTerminator {
  terminate(exit: ProcessExit): never {
    switch (exit.kind) {
      case 'success':
        return process.exit(0);
      case 'failure':
        return process.exit(1);
      case 'misuse':
        return process.exit(2);
      default:
        return assertNever(exit);
    }
  }
}
