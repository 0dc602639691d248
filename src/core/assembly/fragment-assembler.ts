import type { Fragment } from '../format/fragment-record.js';
import { isCompleteFragment } from '../format/fragment-record.js';
import { concatBytes } from '../format/byte-reader.js';
import type { AwaitingReason } from './completeness.js';
import { checkCompleteness, sortBySequence } from './completeness.js';

/** A logical file whose bytes are ready to be written. */
export interface AssembledFile {
  readonly logicalPath: string;
  /** Fragments in sequence order */
  readonly fragments: readonly Fragment[];
  readonly content: Uint8Array;
}

export type AcceptOutcome =
  | { readonly kind: 'skipped'; readonly fragment: Fragment; readonly reasons: readonly string[] }
  | { readonly kind: 'duplicate'; readonly fragment: Fragment }
  | {
      readonly kind: 'completed';
      readonly file: AssembledFile;
      readonly inconsistencies: readonly string[];
      /** Pending fragments dropped because a self-contained fragment replaced them */
      readonly discarded: number;
    }
  | {
      readonly kind: 'pending';
      readonly logicalPath: string;
      readonly collected: number;
      readonly awaiting: AwaitingReason;
      readonly inconsistencies: readonly string[];
    };

export interface UnfinishedFile {
  readonly logicalPath: string;
  readonly fragmentCount: number;
  readonly sequences: readonly number[];
}

/**
 * Reassembly state for one restore run.
 *
 * A logical path is absent, pending, or completed, never two at once.
 * Fragments are keyed by path and sequence only, so pieces of one file may
 * come from any volume in any order.
 */
export class FragmentAssembler {
  private readonly pending = new Map<string, Fragment[]>();
  private readonly completed = new Set<string>();

  accept(fragment: Fragment): AcceptOutcome {
    if (fragment.warnings.length > 0) {
      return { kind: 'skipped', fragment, reasons: fragment.warnings };
    }

    if (this.completed.has(fragment.logicalPath)) {
      return { kind: 'duplicate', fragment };
    }

    if (isCompleteFragment(fragment)) {
      return this.completeSingle(fragment);
    }

    return this.mergePiece(fragment);
  }

  /** Paths still waiting for fragments, in the order they were first seen. */
  unfinished(): readonly UnfinishedFile[] {
    return [...this.pending.entries()].map(([logicalPath, fragments]) => ({
      logicalPath,
      fragmentCount: fragments.length,
      sequences: sortBySequence(fragments).map((f) => f.sequence),
    }));
  }

  isCompleted(logicalPath: string): boolean {
    return this.completed.has(logicalPath);
  }

  isPending(logicalPath: string): boolean {
    return this.pending.has(logicalPath);
  }

  private completeSingle(fragment: Fragment): AcceptOutcome {
    const dropped = this.pending.get(fragment.logicalPath)?.length ?? 0;
    this.pending.delete(fragment.logicalPath);
    this.completed.add(fragment.logicalPath);

    return {
      kind: 'completed',
      file: { logicalPath: fragment.logicalPath, fragments: [fragment], content: fragment.content },
      inconsistencies: dropped > 0 ? [`discarded ${dropped} pending fragment(s)`] : [],
      discarded: dropped,
    };
  }

  private mergePiece(fragment: Fragment): AcceptOutcome {
    const slices = this.pending.get(fragment.logicalPath) ?? [];
    slices.push(fragment);
    this.pending.set(fragment.logicalPath, slices);

    const verdict = checkCompleteness(slices);
    if (verdict.kind === 'incomplete') {
      return {
        kind: 'pending',
        logicalPath: fragment.logicalPath,
        collected: slices.length,
        awaiting: verdict.awaiting,
        inconsistencies: verdict.inconsistencies,
      };
    }

    this.pending.delete(fragment.logicalPath);
    this.completed.add(fragment.logicalPath);

    return {
      kind: 'completed',
      file: {
        logicalPath: fragment.logicalPath,
        fragments: verdict.ordered,
        content: concatBytes(verdict.ordered.map((f) => f.content)),
      },
      inconsistencies: verdict.inconsistencies,
      discarded: 0,
    };
  }
}
