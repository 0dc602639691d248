export { checkCompleteness, sortBySequence, type AwaitingReason, type CompletenessVerdict } from './completeness.js';
export {
  FragmentAssembler,
  type AcceptOutcome,
  type AssembledFile,
  type UnfinishedFile,
} from './fragment-assembler.js';
