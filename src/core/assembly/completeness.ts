import type { Fragment } from '../format/fragment-record.js';

/** Why a fragment set is not yet a whole file. */
export type AwaitingReason = 'gap' | 'duplicate_sequence' | 'last_fragment';

export type CompletenessVerdict =
  | {
      readonly kind: 'complete';
      readonly ordered: readonly Fragment[];
      readonly inconsistencies: readonly string[];
    }
  | {
      readonly kind: 'incomplete';
      readonly awaiting: AwaitingReason;
      readonly inconsistencies: readonly string[];
    };

export function sortBySequence(fragments: readonly Fragment[]): Fragment[] {
  return [...fragments].sort((a, b) => a.sequence - b.sequence);
}

/**
 * Completeness test for a multi-fragment set.
 *
 * Sorted by sequence, element `i` must carry sequence `i + 1`, and the final
 * element must carry the last flag. A last flag anywhere before the final
 * element is reported as an inconsistency and does not change the verdict.
 */
export function checkCompleteness(fragments: readonly Fragment[]): CompletenessVerdict {
  const ordered = sortBySequence(fragments);
  const inconsistencies: string[] = [];
  const finalIndex = ordered.length - 1;

  for (let i = 0; i < ordered.length; i++) {
    const fragment = ordered[i];
    if (fragment === undefined) break;

    if (fragment.sequence !== i + 1) {
      const previous = ordered[i - 1];
      const awaiting: AwaitingReason =
        previous !== undefined && previous.sequence === fragment.sequence ? 'duplicate_sequence' : 'gap';
      return { kind: 'incomplete', awaiting, inconsistencies };
    }

    if (fragment.last && i !== finalIndex) {
      inconsistencies.push(`last fragment flag on sequence ${fragment.sequence} of ${ordered.length}`);
    }
  }

  const final = ordered[finalIndex];
  if (final === undefined || !final.last) {
    return { kind: 'incomplete', awaiting: 'last_fragment', inconsistencies };
  }

  return { kind: 'complete', ordered, inconsistencies };
}
