export { createCalibration, loadCalibration } from './calibration';
export { compileFormula, parseExpression, tokenize, evaluate } from './parser';
export { extractFormula } from './helpers';
export type { Calibration, CalibrationOptions, CompiledFormula, Expr, FallbackReason } from './types';
