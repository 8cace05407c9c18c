export { classifyResult, extractToolMessage } from './result-classifier.js';
export type {
  Outcome,
  OutcomeKind,
  SuccessOutcome,
  CancelledOutcome,
  ToolErrorOutcome,
} from './types.js';
