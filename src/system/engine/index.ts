export { createSequenceEngine } from './engine';
export {
  matchesRequiredState,
  formatRequiredStateAlert,
  formatLoopStart,
  MISSING_PARAMETER_MESSAGES,
  PRECONDITION_MISMATCH_MESSAGE,
} from './helpers';
export type {
  SequenceConfig,
  SequenceEngine,
  SequenceEngineDependencies,
  SequenceOutcome,
  TerminalState,
} from './types';
