export { createParameterGate } from './gate';
export { normalizeAnswer, PARAMETER_PROMPTS } from './helpers';
export type { ParameterGate, ParameterGateOptions, GateResult, GateOutcome, ParameterValueMap } from './types';
